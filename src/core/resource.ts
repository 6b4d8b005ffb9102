import type { ClusterCredential } from "../cluster/credentials";
import type { HostContext } from "../host/context";
import type { Logger } from "../logging/logger";

export type ResourceKind = "host-operation" | "cluster-object";

export type OutputValue = string | string[];
export type OutputValues = Record<string, OutputValue>;

// Host layer

export type HostObservation =
  | { state: "absent" }
  | { state: "present"; version?: string; active?: boolean; details?: Record<string, string> };

/**
 * A privileged host procedure guarded by an idempotency predicate.
 * `install` runs when nothing is there, `upgrade` when something is there
 * but does not satisfy the predicate.
 */
export interface HostOperationSpec {
  /** Version or content digest the operation converges to. */
  readonly target: string;
  /** Human-readable postconditions, reported when the re-check fails. */
  readonly postconditions: string[];
  inspect(host: HostContext): Promise<HostObservation>;
  isSatisfied(observed: HostObservation): boolean;
  install(observed: HostObservation): string[];
  upgrade?(observed: HostObservation & { state: "present" }): string[];
  outputs(observed: HostObservation): OutputValues;
  /** Typed hand-off to later resources, e.g. the cluster credential. */
  provides?(observed: HostObservation): Provided;
}

// Cluster layer

export interface ObjectMetadata {
  name: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export type AccessMode = "ReadWriteOnce" | "ReadOnlyMany" | "ReadWriteMany" | "ReadWriteOncePod";

export type HostPathType =
  | ""
  | "DirectoryOrCreate"
  | "Directory"
  | "FileOrCreate"
  | "File"
  | "Socket"
  | "CharDevice"
  | "BlockDevice";

export interface NamespaceObjectSpec {
  kind: "Namespace";
  metadata: ObjectMetadata;
}

export interface PersistentVolumeObjectSpec {
  kind: "PersistentVolume";
  metadata: ObjectMetadata;
  body: {
    capacity: string;
    accessModes: AccessMode[];
    hostPath: { path: string; type: HostPathType };
    storageClassName: string;
    reclaimPolicy: "Retain" | "Delete" | "Recycle";
    volumeMode: "Filesystem" | "Block";
  };
}

export interface ManifestBundleObjectSpec {
  kind: "ManifestBundle";
  metadata: ObjectMetadata;
  /** Local file or https URL of a multi-document YAML bundle. */
  source: string;
  version: string;
  namespace: string;
}

export type ClusterObjectSpec = NamespaceObjectSpec | PersistentVolumeObjectSpec | ManifestBundleObjectSpec;

// Resources

interface ResourceBase<K extends ResourceKind, S> {
  id: string;
  kind: K;
  dependsOn: string[];
  spec: S;
  description?: string;
  /** Last observation made by the executor; null until the resource has been visited. */
  observed: unknown;
  lastAppliedRevision?: string;
}

export type HostOperationResource = ResourceBase<"host-operation", HostOperationSpec>;
export type ClusterObjectResource = ResourceBase<"cluster-object", ClusterObjectSpec>;
export type Resource = HostOperationResource | ClusterObjectResource;

export interface Provided {
  credential?: ClusterCredential;
}

export type ResourceStatus = "skipped" | "applied" | "failed";

export interface ApplyResult {
  status: Exclude<ResourceStatus, "failed">;
  observed: unknown;
  outputs: OutputValues;
  /** Number of mutating calls (commands or API writes) issued. */
  mutations: number;
  revision: string;
  provides?: Provided;
}

export type PlanDecision = "satisfied" | "install" | "upgrade" | "create" | "update" | "unknown";

export interface PlanResult {
  decision: PlanDecision;
  detail?: string;
  outputs?: OutputValues;
  provides?: Provided;
}

export interface RunContext {
  readonly logger: Logger;
  /** Aborted when the resource outlives its timeout; executors stop their current step. */
  readonly signal?: AbortSignal;
  credential?: ClusterCredential;
}

/** One executor per resource kind; the driver never looks inside a spec. */
export interface ResourceExecutor<R extends Resource = Resource> {
  apply(resource: R, context: RunContext): Promise<ApplyResult>;
  plan(resource: R, context: RunContext): Promise<PlanResult>;
}

export type ExecutorRegistry = {
  [K in ResourceKind]: ResourceExecutor<Extract<Resource, { kind: K }>>;
};

export function hostOperation(
  id: string,
  spec: HostOperationSpec,
  dependsOn: string[] = [],
  description?: string,
): HostOperationResource {
  return { id, kind: "host-operation", dependsOn, spec, description, observed: null };
}

export function clusterObject(
  id: string,
  spec: ClusterObjectSpec,
  dependsOn: string[] = [],
  description?: string,
): ClusterObjectResource {
  return { id, kind: "cluster-object", dependsOn, spec, description, observed: null };
}
