/**
 * Cluster Client Factory
 * Turns the credential published by the host layer into an authenticated
 * API handle. No retries: the operator re-runs converge.
 */
import { ConnectivityError, errorMessage, isProvisioningError } from "../core/errors";
import type { HostFilesystem } from "../host/filesystem";
import { KubernetesClient, ResolvedConnection } from "./client";
import { ClusterCredential, parseKubeconfig } from "./credentials";
import type { ClusterApi } from "./types";

export interface ClusterClientFactoryOptions {
  fs: HostFilesystem;
  requestTimeoutMs: number;
  fieldManager?: string;
  /** Replaces the axios client, e.g. with an in-memory cluster in tests. */
  connect?: (connection: ResolvedConnection) => ClusterApi;
}

export class ClusterClientFactory {
  private cached?: { digest: string; client: ClusterApi };

  constructor(private readonly options: ClusterClientFactoryOptions) {}

  /**
   * Build (or reuse) a client for the credential and probe the API server.
   *
   * @throws ConnectivityError when the credential is missing or the API is unreachable
   */
  async create(credential: ClusterCredential | undefined): Promise<ClusterApi> {
    if (!credential) {
      throw new ConnectivityError("No cluster credential available; the kubeconfig has not been published in this run");
    }
    if (this.cached?.digest === credential.digest) {
      return this.cached.client;
    }

    const connection = await this.resolve(credential);
    const client = this.options.connect
      ? this.options.connect(connection)
      : new KubernetesClient(connection, {
          timeoutMs: this.options.requestTimeoutMs,
          fieldManager: this.options.fieldManager,
        });

    try {
      await client.version();
    } catch (error) {
      if (isProvisioningError(error)) throw error;
      throw new ConnectivityError(`API server at ${connection.server} is unreachable: ${errorMessage(error)}`, undefined, error);
    }

    this.cached = { digest: credential.digest, client };
    return client;
  }

  private async resolve(credential: ClusterCredential): Promise<ResolvedConnection> {
    const text = await this.read(credential.kubeconfigPath, "kubeconfig");
    const parsed = parseKubeconfig(text, credential.context);
    return {
      server: parsed.server,
      token: parsed.token,
      insecureSkipTlsVerify: parsed.insecureSkipTlsVerify,
      caPem: parsed.caPem ?? (parsed.files.ca ? await this.read(parsed.files.ca, "certificate authority") : undefined),
      certPem: parsed.certPem ?? (parsed.files.cert ? await this.read(parsed.files.cert, "client certificate") : undefined),
      keyPem: parsed.keyPem ?? (parsed.files.key ? await this.read(parsed.files.key, "client key") : undefined),
    };
  }

  private async read(path: string, what: string): Promise<string> {
    let content: string | null;
    try {
      content = await this.options.fs.readFile(path);
    } catch (error) {
      throw new ConnectivityError(`Cannot read ${what} at ${path}: ${errorMessage(error)}`, undefined, error);
    }
    if (content === null) {
      throw new ConnectivityError(`${what} not found at ${path}`);
    }
    return content;
  }
}
