import axios from "axios";
import fs from "fs";
import YAML from "yaml";
import { z } from "zod";
import { ConfigurationError, ConnectivityError, errorMessage } from "../core/errors";
import type { KubeObject } from "../cluster/types";

const ManifestObjectSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().optional(),
        labels: z.record(z.string()).optional(),
        annotations: z.record(z.string()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

/** Kinds that never live in a namespace; everything else gets the bundle namespace. */
const CLUSTER_SCOPED = new Set([
  "Namespace",
  "CustomResourceDefinition",
  "ClusterRole",
  "ClusterRoleBinding",
  "PersistentVolume",
  "StorageClass",
  "PriorityClass",
  "IngressClass",
  "RuntimeClass",
  "APIService",
  "ValidatingWebhookConfiguration",
  "MutatingWebhookConfiguration",
  "CSIDriver",
]);

const APPLY_FIRST = ["CustomResourceDefinition", "Namespace"];

export interface ManifestSourceOptions {
  timeoutMs?: number;
}

/**
 * Loads a versioned manifest bundle once per source and keeps it for the
 * rest of the process.
 */
export class ManifestLoader {
  private cache = new Map<string, KubeObject[]>();

  constructor(private readonly options: ManifestSourceOptions = {}) {}

  async load(source: string): Promise<KubeObject[]> {
    const cached = this.cache.get(source);
    if (cached) return cached;

    const text = await this.fetch(source);
    const objects = parseManifests(text, source);
    this.cache.set(source, objects);
    return objects;
  }

  private async fetch(source: string): Promise<string> {
    if (/^https?:\/\//.test(source)) {
      try {
        const response = await axios.get<string>(source, {
          responseType: "text",
          timeout: this.options.timeoutMs ?? 30000,
        });
        return response.data;
      } catch (error) {
        throw new ConnectivityError(`Cannot download manifests from ${source}: ${errorMessage(error)}`, undefined, error);
      }
    }
    try {
      return await fs.promises.readFile(source.replace(/^file:\/\//, ""), "utf8");
    } catch (error) {
      throw new ConfigurationError(`Cannot read manifests at ${source}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Parse a multi-document YAML bundle. Empty documents are dropped and
 * `List` kinds are flattened into their items.
 */
export function parseManifests(text: string, source = "manifest"): KubeObject[] {
  const documents = YAML.parseAllDocuments(text);
  const objects: KubeObject[] = [];

  documents.forEach((document, index) => {
    if (document.errors.length > 0) {
      throw new ConfigurationError(`${source} document ${index + 1} is not valid YAML: ${document.errors[0].message}`);
    }
    const value: unknown = document.toJS();
    if (value === null || value === undefined) return;

    for (const item of flattenList(value)) {
      const parsed = ManifestObjectSchema.safeParse(item);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigurationError(
          `${source} document ${index + 1} is not a Kubernetes object: ${issue.path.join(".")}: ${issue.message}`,
        );
      }
      objects.push(parsed.data);
    }
  });

  return objects;
}

/**
 * Put the bundle in apply order and scope namespaced objects without an
 * explicit namespace to the bundle's namespace.
 */
export function prepareManifests(objects: KubeObject[], namespace: string): KubeObject[] {
  const rank = (object: KubeObject) => {
    const index = APPLY_FIRST.indexOf(object.kind);
    return index === -1 ? APPLY_FIRST.length : index;
  };

  return objects
    .map((object, position) => ({ object, position }))
    .sort((a, b) => rank(a.object) - rank(b.object) || a.position - b.position)
    .map(({ object }) => {
      if (CLUSTER_SCOPED.has(object.kind) || object.metadata.namespace) {
        return object;
      }
      return { ...object, metadata: { ...object.metadata, namespace } };
    });
}

function flattenList(value: unknown): unknown[] {
  if (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    value.kind.endsWith("List") &&
    "items" in value &&
    Array.isArray(value.items)
  ) {
    return value.items;
  }
  return [value];
}
