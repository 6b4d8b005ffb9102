/**
 * Resource Applier
 *
 * Create-or-update reconciliation of cluster objects against live state.
 * Patches only divergent fields and never deletes.
 */
import { ConflictError } from "../core/errors";
import type { NamespaceObjectSpec, PersistentVolumeObjectSpec } from "../core/resource";
import { sameQuantity } from "./quantity";
import { ClusterApi, KubeNamespace, KubeObject, KubePersistentVolume, MergePatch, ObjectMeta, formatRef, refOf } from "./types";

export type ReconcileAction = "created" | "patched" | "unchanged";

export interface Reconciled<T extends KubeObject = KubeObject> {
  action: ReconcileAction;
  object: T;
  mutations: number;
  /** Dotted paths of the fields that were patched. */
  changed: string[];
}

export interface Divergence {
  patch: MergePatch;
  changed: string[];
  /** Fields that differ but cannot be changed on the live object. */
  immutable: string[];
}

export class ResourceApplier {
  constructor(private readonly api: ClusterApi) {}

  async reconcileNamespace(spec: NamespaceObjectSpec): Promise<Reconciled<KubeNamespace>> {
    const desired = toNamespace(spec);
    const live = await this.api.getNamespace(spec.metadata.name);
    if (!live) {
      return { action: "created", object: await this.api.createNamespace(desired), mutations: 1, changed: [] };
    }

    const diff = diffMetadata(desired.metadata, live.metadata);
    if (diff.changed.length === 0) {
      return { action: "unchanged", object: live, mutations: 0, changed: [] };
    }
    const patched = await this.api.patchNamespace(spec.metadata.name, diff.patch);
    return { action: "patched", object: patched, mutations: 1, changed: diff.changed };
  }

  async reconcilePersistentVolume(spec: PersistentVolumeObjectSpec): Promise<Reconciled<KubePersistentVolume>> {
    const desired = toPersistentVolume(spec);
    const live = await this.api.getPersistentVolume(spec.metadata.name);
    if (!live) {
      return { action: "created", object: await this.api.createPersistentVolume(desired), mutations: 1, changed: [] };
    }

    const diff = diffPersistentVolume(desired, live);
    if (diff.immutable.length > 0) {
      const bound = live.status?.phase === "Bound";
      throw new ConflictError(
        formatRef(refOf(live)),
        diff.immutable,
        `Refusing to change ${diff.immutable.join(", ")} of ${bound ? "bound" : "existing"} PersistentVolume '${spec.metadata.name}'` +
          `${live.spec.claimRef?.name ? ` (claimed by ${live.spec.claimRef.namespace}/${live.spec.claimRef.name})` : ""}; ` +
          "release and delete it by hand to change where its data lives",
      );
    }
    if (diff.changed.length === 0) {
      return { action: "unchanged", object: live, mutations: 0, changed: [] };
    }
    const patched = await this.api.patchPersistentVolume(spec.metadata.name, diff.patch);
    return { action: "patched", object: patched, mutations: 1, changed: diff.changed };
  }

  /**
   * Reconcile an arbitrary manifest object: skipped when every desired field
   * already has the desired value, otherwise server-side applied.
   */
  async reconcileManifest(desired: KubeObject): Promise<Reconciled> {
    const live = await this.api.getObject(refOf(desired));
    if (live && isSubset(stripStatus(desired), live)) {
      return { action: "unchanged", object: live, mutations: 0, changed: [] };
    }
    const applied = await this.api.applyObject(desired);
    return { action: live ? "patched" : "created", object: applied, mutations: 1, changed: [] };
  }

  async previewNamespace(spec: NamespaceObjectSpec): Promise<ReconcileAction> {
    const live = await this.api.getNamespace(spec.metadata.name);
    if (!live) return "created";
    return diffMetadata(toNamespace(spec).metadata, live.metadata).changed.length > 0 ? "patched" : "unchanged";
  }

  async previewPersistentVolume(spec: PersistentVolumeObjectSpec): Promise<ReconcileAction> {
    const live = await this.api.getPersistentVolume(spec.metadata.name);
    if (!live) return "created";
    const diff = diffPersistentVolume(toPersistentVolume(spec), live);
    if (diff.immutable.length > 0) {
      throw new ConflictError(formatRef(refOf(live)), diff.immutable, `Immutable fields differ: ${diff.immutable.join(", ")}`);
    }
    return diff.changed.length > 0 ? "patched" : "unchanged";
  }
}

export function toNamespace(spec: NamespaceObjectSpec): KubeNamespace {
  return {
    apiVersion: "v1",
    kind: "Namespace",
    metadata: withMetadata(spec.metadata.name, spec.metadata.labels, spec.metadata.annotations),
  };
}

export function toPersistentVolume(spec: PersistentVolumeObjectSpec): KubePersistentVolume {
  const { body } = spec;
  return {
    apiVersion: "v1",
    kind: "PersistentVolume",
    metadata: withMetadata(spec.metadata.name, spec.metadata.labels, spec.metadata.annotations),
    spec: {
      capacity: { storage: body.capacity },
      accessModes: [...body.accessModes],
      hostPath: { path: body.hostPath.path, type: body.hostPath.type },
      storageClassName: body.storageClassName,
      persistentVolumeReclaimPolicy: body.reclaimPolicy,
      volumeMode: body.volumeMode,
    },
  };
}

/**
 * Labels and annotations present in desired but missing or different live.
 * Extra live keys are left alone.
 */
export function diffMetadata(desired: ObjectMeta, live: ObjectMeta): Divergence {
  const patch: MergePatch = {};
  const changed: string[] = [];
  const metadata: Record<string, Record<string, string>> = {};

  for (const field of ["labels", "annotations"] as const) {
    const wanted = desired[field] ?? {};
    const current = live[field] ?? {};
    for (const [key, value] of Object.entries(wanted)) {
      if (current[key] !== value) {
        metadata[field] = { ...metadata[field], [key]: value };
        changed.push(`metadata.${field}.${key}`);
      }
    }
  }
  if (changed.length > 0) {
    patch.metadata = metadata;
  }
  return { patch, changed, immutable: [] };
}

/**
 * Capacity is immutable once a claim has bound the volume; the volume source
 * (host path and type) and volume mode are immutable always.
 */
export function diffPersistentVolume(desired: KubePersistentVolume, live: KubePersistentVolume): Divergence {
  const { patch, changed } = diffMetadata(desired.metadata, live.metadata);
  const immutable: string[] = [];
  const specPatch: Record<string, unknown> = {};
  const bound = live.status?.phase === "Bound";

  if (desired.spec.hostPath?.path !== live.spec.hostPath?.path) {
    immutable.push("spec.hostPath.path");
  }
  if ((desired.spec.hostPath?.type ?? "") !== (live.spec.hostPath?.type ?? "")) {
    immutable.push("spec.hostPath.type");
  }
  if ((desired.spec.volumeMode ?? "Filesystem") !== (live.spec.volumeMode ?? "Filesystem")) {
    immutable.push("spec.volumeMode");
  }

  if (!sameQuantity(desired.spec.capacity.storage, live.spec.capacity?.storage ?? "")) {
    if (bound) {
      immutable.push("spec.capacity.storage");
    } else {
      specPatch.capacity = { storage: desired.spec.capacity.storage };
      changed.push("spec.capacity.storage");
    }
  }
  if (!sameSet(desired.spec.accessModes, live.spec.accessModes ?? [])) {
    specPatch.accessModes = desired.spec.accessModes;
    changed.push("spec.accessModes");
  }
  if (desired.spec.storageClassName !== live.spec.storageClassName) {
    specPatch.storageClassName = desired.spec.storageClassName;
    changed.push("spec.storageClassName");
  }
  if (desired.spec.persistentVolumeReclaimPolicy !== live.spec.persistentVolumeReclaimPolicy) {
    specPatch.persistentVolumeReclaimPolicy = desired.spec.persistentVolumeReclaimPolicy;
    changed.push("spec.persistentVolumeReclaimPolicy");
  }

  if (Object.keys(specPatch).length > 0) {
    patch.spec = specPatch;
  }
  return { patch, changed, immutable };
}

/**
 * True when every field of `desired` is present in `live` with an equal
 * value. Arrays must match element-wise.
 */
export function isSubset(desired: unknown, live: unknown): boolean {
  if (Array.isArray(desired)) {
    return (
      Array.isArray(live) && desired.length === live.length && desired.every((item, index) => isSubset(item, live[index]))
    );
  }
  if (isRecord(desired)) {
    if (!isRecord(live)) return false;
    return Object.entries(desired).every(([key, value]) => isSubset(value, live[key]));
  }
  return desired === live;
}

function stripStatus(object: KubeObject): Record<string, unknown> {
  const { status: _status, ...rest } = object;
  return rest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sameSet(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((item) => b.includes(item));
}

function withMetadata(
  name: string,
  labels: Record<string, string> | undefined,
  annotations: Record<string, string> | undefined,
): ObjectMeta {
  return {
    name,
    ...(labels && Object.keys(labels).length > 0 ? { labels: { ...labels } } : {}),
    ...(annotations && Object.keys(annotations).length > 0 ? { annotations: { ...annotations } } : {}),
  };
}
