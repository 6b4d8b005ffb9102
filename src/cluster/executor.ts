import crypto from "crypto";
import type {
  ApplyResult,
  ClusterObjectResource,
  ClusterObjectSpec,
  OutputValues,
  PlanResult,
  ResourceExecutor,
  RunContext,
} from "../core/resource";
import { bootstrapOutputs, GitOpsBootstrapper } from "../gitops/bootstrapper";
import { ReconcileAction, ResourceApplier } from "./applier";
import type { ClusterClientFactory } from "./client-factory";

/**
 * Executes cluster-object resources: obtains the API handle from the
 * credential handed over by the host layer, then reconciles.
 */
export class ClusterObjectExecutor implements ResourceExecutor<ClusterObjectResource> {
  constructor(
    private readonly factory: ClusterClientFactory,
    private readonly bootstrapper: GitOpsBootstrapper,
  ) {}

  async apply(resource: ClusterObjectResource, context: RunContext): Promise<ApplyResult> {
    const api = await this.factory.create(context.credential);
    const applier = new ResourceApplier(api);
    const { spec } = resource;
    const revision = revisionOf(spec);

    switch (spec.kind) {
      case "Namespace": {
        const reconciled = await applier.reconcileNamespace(spec);
        logAction(context, reconciled.action, reconciled.changed);
        return {
          status: reconciled.action === "unchanged" ? "skipped" : "applied",
          observed: reconciled.object,
          outputs: { namespaces: [spec.metadata.name] },
          mutations: reconciled.mutations,
          revision,
        };
      }
      case "PersistentVolume": {
        const reconciled = await applier.reconcilePersistentVolume(spec);
        logAction(context, reconciled.action, reconciled.changed);
        return {
          status: reconciled.action === "unchanged" ? "skipped" : "applied",
          observed: reconciled.object,
          outputs: { persistentVolumes: [spec.metadata.name] },
          mutations: reconciled.mutations,
          revision,
        };
      }
      case "ManifestBundle": {
        const result = await this.bootstrapper.bootstrap(api, spec, context.logger);
        return {
          status: result.mutations === 0 ? "skipped" : "applied",
          observed: result,
          outputs: bootstrapOutputs(spec),
          mutations: result.mutations,
          revision,
        };
      }
    }
  }

  async plan(resource: ClusterObjectResource, context: RunContext): Promise<PlanResult> {
    if (!context.credential) {
      return { decision: "unknown", detail: "cluster not reachable before the host layer has run" };
    }
    const api = await this.factory.create(context.credential);
    const applier = new ResourceApplier(api);
    const { spec } = resource;

    switch (spec.kind) {
      case "Namespace":
        return planFor(await applier.previewNamespace(spec), { namespaces: [spec.metadata.name] });
      case "PersistentVolume":
        return planFor(await applier.previewPersistentVolume(spec), { persistentVolumes: [spec.metadata.name] });
      case "ManifestBundle":
        return this.bootstrapper.plan(api, spec);
    }
  }
}

function planFor(action: ReconcileAction, outputs: OutputValues): PlanResult {
  switch (action) {
    case "created":
      return { decision: "create" };
    case "patched":
      return { decision: "update" };
    case "unchanged":
      return { decision: "satisfied", outputs };
  }
}

function logAction(context: RunContext, action: ReconcileAction, changed: string[]): void {
  if (action === "patched") {
    context.logger.info(`✏️ Patched ${changed.join(", ")}`);
  } else if (action === "created") {
    context.logger.info("➕ Created");
  }
}

/** Digest of the desired state, recorded as the resource's last applied revision. */
export function revisionOf(spec: ClusterObjectSpec): string {
  return crypto.createHash("sha256").update(stableStringify(spec)).digest("hex").slice(0, 16);
}

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}
