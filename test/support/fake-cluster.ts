import { ConnectivityError, RejectedError } from "../../src/core/errors";
import {
  ClusterApi,
  formatRef,
  KubeNamespace,
  KubeObject,
  KubePersistentVolume,
  MergePatch,
  ObjectMeta,
  ObjectRef,
  refOf,
} from "../../src/cluster/types";

/**
 * In-memory API server. Stores what it is given, counts writes and lets a
 * test bind volumes or make the server unreachable.
 */
export class FakeCluster implements ClusterApi {
  readonly namespaces = new Map<string, KubeNamespace>();
  readonly volumes = new Map<string, KubePersistentVolume>();
  readonly objects = new Map<string, KubeObject>();
  readonly writes: string[] = [];
  reachable = true;
  private rejected = new Set<string>();
  private nextUid = 1;

  /** Number of create, patch and apply calls. */
  get writeCount(): number {
    return this.writes.length;
  }

  rejectKind(kind: string): this {
    this.rejected.add(kind);
    return this;
  }

  /** Simulate a claim binding the volume. */
  bind(name: string, claim: { namespace: string; name: string }): void {
    const volume = this.volumes.get(name);
    if (!volume) throw new Error(`no PersistentVolume ${name}`);
    volume.spec.claimRef = { ...claim };
    volume.status = { phase: "Bound" };
  }

  async version(): Promise<{ gitVersion: string }> {
    if (!this.reachable) {
      throw new ConnectivityError("connect ECONNREFUSED 127.0.0.1:6443");
    }
    return { gitVersion: "v1.28.5+k3s1" };
  }

  async getNamespace(name: string): Promise<KubeNamespace | null> {
    const namespace = this.namespaces.get(name);
    return namespace ? structuredClone(namespace) : null;
  }

  async createNamespace(namespace: KubeNamespace): Promise<KubeNamespace> {
    this.writes.push(`create Namespace/${namespace.metadata.name}`);
    const stored: KubeNamespace = { ...structuredClone(namespace), metadata: this.stamp(namespace.metadata), status: { phase: "Active" } };
    this.namespaces.set(namespace.metadata.name, stored);
    return structuredClone(stored);
  }

  async patchNamespace(name: string, patch: MergePatch): Promise<KubeNamespace> {
    this.writes.push(`patch Namespace/${name}`);
    const live = this.namespaces.get(name);
    if (!live) throw new RejectedError(`Namespace/${name}`, 404, "not found");
    live.metadata = patchMetadata(live.metadata, patch.metadata);
    return structuredClone(live);
  }

  async getPersistentVolume(name: string): Promise<KubePersistentVolume | null> {
    const volume = this.volumes.get(name);
    return volume ? structuredClone(volume) : null;
  }

  async createPersistentVolume(volume: KubePersistentVolume): Promise<KubePersistentVolume> {
    this.writes.push(`create PersistentVolume/${volume.metadata.name}`);
    const stored: KubePersistentVolume = {
      ...structuredClone(volume),
      metadata: this.stamp(volume.metadata),
      status: { phase: "Available" },
    };
    this.volumes.set(volume.metadata.name, stored);
    return structuredClone(stored);
  }

  async patchPersistentVolume(name: string, patch: MergePatch): Promise<KubePersistentVolume> {
    this.writes.push(`patch PersistentVolume/${name}`);
    const live = this.volumes.get(name);
    if (!live) throw new RejectedError(`PersistentVolume/${name}`, 404, "not found");
    live.metadata = patchMetadata(live.metadata, patch.metadata);

    const spec = patch.spec;
    if (isRecord(spec)) {
      const capacity = spec.capacity;
      if (isRecord(capacity) && typeof capacity.storage === "string") {
        live.spec.capacity = { storage: capacity.storage };
      }
      if (Array.isArray(spec.accessModes)) {
        live.spec.accessModes = spec.accessModes.filter((mode): mode is string => typeof mode === "string");
      }
      if (typeof spec.storageClassName === "string") {
        live.spec.storageClassName = spec.storageClassName;
      }
      if (typeof spec.persistentVolumeReclaimPolicy === "string") {
        live.spec.persistentVolumeReclaimPolicy = spec.persistentVolumeReclaimPolicy;
      }
    }
    return structuredClone(live);
  }

  async getObject(ref: ObjectRef): Promise<KubeObject | null> {
    const object = this.objects.get(keyOf(ref));
    return object ? structuredClone(object) : null;
  }

  async applyObject(object: KubeObject): Promise<KubeObject> {
    const ref = refOf(object);
    this.writes.push(`apply ${formatRef(ref)}`);
    if (this.rejected.has(object.kind)) {
      throw new RejectedError(formatRef(ref), 422, `${object.kind} is not allowed here`);
    }
    const existing = this.objects.get(keyOf(ref));
    const stored: KubeObject = {
      ...structuredClone(object),
      metadata: existing ? { ...object.metadata, uid: existing.metadata.uid } : this.stamp(object.metadata),
    };
    this.objects.set(keyOf(ref), stored);
    return structuredClone(stored);
  }

  private stamp(metadata: ObjectMeta): ObjectMeta {
    return { ...structuredClone(metadata), uid: `uid-${this.nextUid++}`, resourceVersion: "1" };
  }
}

function keyOf(ref: ObjectRef): string {
  return [ref.apiVersion, ref.kind, ref.namespace ?? "", ref.name].join("|");
}

function patchMetadata(metadata: ObjectMeta, patch: unknown): ObjectMeta {
  if (!isRecord(patch)) return metadata;
  return {
    ...metadata,
    labels: mergeStrings(metadata.labels, patch.labels),
    annotations: mergeStrings(metadata.annotations, patch.annotations),
  };
}

function mergeStrings(current: Record<string, string> | undefined, patch: unknown): Record<string, string> | undefined {
  if (!isRecord(patch)) return current;
  const merged: Record<string, string> = { ...current };
  for (const [key, value] of Object.entries(patch)) {
    if (typeof value === "string") merged[key] = value;
  }
  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
