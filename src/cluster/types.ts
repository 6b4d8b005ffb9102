export interface ObjectMeta {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  resourceVersion?: string;
  uid?: string;
}

export interface KubeObject {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  [field: string]: unknown;
}

export interface ObjectRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
}

export interface KubeNamespace extends KubeObject {
  apiVersion: "v1";
  kind: "Namespace";
  status?: { phase?: string };
}

export interface PersistentVolumeBody {
  capacity: { storage: string };
  accessModes: string[];
  hostPath?: { path: string; type?: string };
  storageClassName?: string;
  persistentVolumeReclaimPolicy?: string;
  volumeMode?: string;
  claimRef?: { name?: string; namespace?: string };
}

export interface KubePersistentVolume extends KubeObject {
  apiVersion: "v1";
  kind: "PersistentVolume";
  spec: PersistentVolumeBody;
  status?: { phase?: "Pending" | "Available" | "Bound" | "Released" | "Failed" };
}

/** JSON merge patch body (RFC 7386). */
export type MergePatch = Record<string, unknown>;

/**
 * Typed operations the cluster layer needs from the API server.
 */
export interface ClusterApi {
  version(): Promise<{ gitVersion: string }>;

  getNamespace(name: string): Promise<KubeNamespace | null>;
  createNamespace(namespace: KubeNamespace): Promise<KubeNamespace>;
  patchNamespace(name: string, patch: MergePatch): Promise<KubeNamespace>;

  getPersistentVolume(name: string): Promise<KubePersistentVolume | null>;
  createPersistentVolume(volume: KubePersistentVolume): Promise<KubePersistentVolume>;
  patchPersistentVolume(name: string, patch: MergePatch): Promise<KubePersistentVolume>;

  /** Generic read for manifest objects of any kind. */
  getObject(ref: ObjectRef): Promise<KubeObject | null>;
  /** Server-side apply of a manifest object of any kind. */
  applyObject(object: KubeObject): Promise<KubeObject>;
}

export function refOf(object: KubeObject): ObjectRef {
  return {
    apiVersion: object.apiVersion,
    kind: object.kind,
    name: object.metadata.name,
    namespace: object.metadata.namespace,
  };
}

export function formatRef(ref: ObjectRef): string {
  const scope = ref.namespace ? `${ref.namespace}/` : "";
  return `${ref.kind}/${scope}${ref.name} (${ref.apiVersion})`;
}
