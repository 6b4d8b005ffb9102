import axios, { AxiosAdapter, AxiosInstance } from "axios";
import https from "https";
import { ConflictError, ConnectivityError, RejectedError } from "../core/errors";
import {
  ClusterApi,
  formatRef,
  KubeNamespace,
  KubeObject,
  KubePersistentVolume,
  MergePatch,
  ObjectRef,
  refOf,
} from "./types";

export interface ResolvedConnection {
  server: string;
  caPem?: string;
  certPem?: string;
  keyPem?: string;
  token?: string;
  insecureSkipTlsVerify: boolean;
}

export interface KubernetesClientOptions {
  timeoutMs?: number;
  fieldManager?: string;
  /** Transport override; an in-process adapter in tests. */
  adapter?: AxiosAdapter;
}

interface ApiResource {
  name: string;
  kind: string;
  namespaced: boolean;
}

interface ApiResourceList {
  resources: ApiResource[];
}

const MERGE_PATCH = { "Content-Type": "application/merge-patch+json" };
const APPLY_PATCH = { "Content-Type": "application/apply-patch+yaml" };

/**
 * Minimal REST client for the Kubernetes API server.
 */
export class KubernetesClient implements ClusterApi {
  private client: AxiosInstance;
  private fieldManager: string;
  private discovery = new Map<string, ApiResource[]>();

  constructor(connection: ResolvedConnection, options: KubernetesClientOptions = {}) {
    this.fieldManager = options.fieldManager ?? "homelab-provisioner";
    this.client = axios.create({
      baseURL: connection.server,
      httpsAgent: new https.Agent({
        ca: connection.caPem,
        cert: connection.certPem,
        key: connection.keyPem,
        rejectUnauthorized: !connection.insecureSkipTlsVerify,
      }),
      headers: {
        Accept: "application/json",
        ...(connection.token ? { Authorization: `Bearer ${connection.token}` } : {}),
      },
      timeout: options.timeoutMs ?? 30000,
      adapter: options.adapter,
    });
  }

  async version(): Promise<{ gitVersion: string }> {
    try {
      const response = await this.client.get<{ gitVersion: string }>("/version");
      return response.data;
    } catch (error) {
      throw toClusterError(error, "GET /version");
    }
  }

  // Namespaces

  getNamespace(name: string): Promise<KubeNamespace | null> {
    return this.read<KubeNamespace>(`/api/v1/namespaces/${name}`, `Namespace/${name}`);
  }

  async createNamespace(namespace: KubeNamespace): Promise<KubeNamespace> {
    try {
      const response = await this.client.post<KubeNamespace>("/api/v1/namespaces", namespace);
      return response.data;
    } catch (error) {
      throw toClusterError(error, formatRef(refOf(namespace)));
    }
  }

  async patchNamespace(name: string, patch: MergePatch): Promise<KubeNamespace> {
    try {
      const response = await this.client.patch<KubeNamespace>(`/api/v1/namespaces/${name}`, patch, { headers: MERGE_PATCH });
      return response.data;
    } catch (error) {
      throw toClusterError(error, `Namespace/${name}`);
    }
  }

  // Persistent volumes

  getPersistentVolume(name: string): Promise<KubePersistentVolume | null> {
    return this.read<KubePersistentVolume>(`/api/v1/persistentvolumes/${name}`, `PersistentVolume/${name}`);
  }

  async createPersistentVolume(volume: KubePersistentVolume): Promise<KubePersistentVolume> {
    try {
      const response = await this.client.post<KubePersistentVolume>("/api/v1/persistentvolumes", volume);
      return response.data;
    } catch (error) {
      throw toClusterError(error, formatRef(refOf(volume)));
    }
  }

  async patchPersistentVolume(name: string, patch: MergePatch): Promise<KubePersistentVolume> {
    try {
      const response = await this.client.patch<KubePersistentVolume>(`/api/v1/persistentvolumes/${name}`, patch, {
        headers: MERGE_PATCH,
      });
      return response.data;
    } catch (error) {
      throw toClusterError(error, `PersistentVolume/${name}`);
    }
  }

  // Generic manifests

  async getObject(ref: ObjectRef): Promise<KubeObject | null> {
    const path = await this.objectPath(ref);
    return this.read<KubeObject>(path, formatRef(ref));
  }

  async applyObject(object: KubeObject): Promise<KubeObject> {
    const ref = refOf(object);
    const path = await this.objectPath(ref);
    try {
      const response = await this.client.patch<KubeObject>(path, JSON.stringify(object), {
        headers: APPLY_PATCH,
        params: { fieldManager: this.fieldManager, force: true },
      });
      return response.data;
    } catch (error) {
      throw toClusterError(error, formatRef(ref));
    }
  }

  /**
   * Resolve the REST path of an object through API discovery. A kind missing
   * from the cached list triggers one refresh, for CRDs applied earlier in the
   * same bundle.
   */
  private async objectPath(ref: ObjectRef): Promise<string> {
    const base = ref.apiVersion === "v1" ? "/api/v1" : `/apis/${ref.apiVersion}`;
    let resource = (await this.resources(ref.apiVersion, base, false)).find((r) => r.kind === ref.kind);
    if (!resource) {
      resource = (await this.resources(ref.apiVersion, base, true)).find((r) => r.kind === ref.kind);
    }
    if (!resource) {
      throw new RejectedError(formatRef(ref), 404, `no resource type for kind ${ref.kind} in ${ref.apiVersion}`);
    }
    if (resource.namespaced) {
      if (!ref.namespace) {
        throw new RejectedError(formatRef(ref), 400, `${ref.kind} is namespaced but no namespace was given`);
      }
      return `${base}/namespaces/${ref.namespace}/${resource.name}/${ref.name}`;
    }
    return `${base}/${resource.name}/${ref.name}`;
  }

  private async resources(apiVersion: string, base: string, refresh: boolean): Promise<ApiResource[]> {
    const cached = this.discovery.get(apiVersion);
    if (cached && !refresh) return cached;
    try {
      const response = await this.client.get<ApiResourceList>(base);
      // Subresources (pods/log, deployments/scale) are not addressable objects.
      const resources = response.data.resources.filter((r) => !r.name.includes("/"));
      this.discovery.set(apiVersion, resources);
      return resources;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        this.discovery.set(apiVersion, []);
        return [];
      }
      throw toClusterError(error, `discovery ${base}`);
    }
  }

  private async read<T>(path: string, what: string): Promise<T | null> {
    try {
      const response = await this.client.get<T>(path);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw toClusterError(error, what);
    }
  }
}

/**
 * Map transport and HTTP failures onto the error taxonomy.
 */
export function toClusterError(error: unknown, what: string): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  const response = error.response;
  if (!response) {
    return new ConnectivityError(`API server unreachable during ${what}: ${error.code ?? error.message}`, undefined, error);
  }
  const reason = statusMessage(response.data) ?? error.message;
  switch (response.status) {
    case 401:
    case 403:
      return new ConnectivityError(`Credential rejected during ${what} (HTTP ${response.status}): ${reason}`, undefined, error);
    case 409:
      return new ConflictError(what, [], `Conflict on ${what}: ${reason}`);
    default:
      if (response.status >= 500 || response.status === 429) {
        return new ConnectivityError(`API server error during ${what} (HTTP ${response.status}): ${reason}`, undefined, error);
      }
      return new RejectedError(what, response.status, reason);
  }
}

function statusMessage(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return undefined;
}
