/**
 * GitOps Bootstrapper
 *
 * Applies the GitOps controller's own installation bundle into its
 * namespace. Once the API server has accepted every object, application
 * delivery belongs to the controller; workload health is not awaited here.
 */
import { ResourceApplier } from "../cluster/applier";
import { ClusterApi, formatRef, refOf } from "../cluster/types";
import { ConfigurationError } from "../core/errors";
import type { ManifestBundleObjectSpec, OutputValues, PlanResult } from "../core/resource";
import type { Logger } from "../logging/logger";
import { ManifestLoader, prepareManifests } from "./manifests";

export interface BootstrapResult {
  created: string[];
  patched: string[];
  unchanged: string[];
  mutations: number;
}

export class GitOpsBootstrapper {
  constructor(private readonly loader: ManifestLoader) {}

  async bootstrap(api: ClusterApi, spec: ManifestBundleObjectSpec, logger: Logger): Promise<BootstrapResult> {
    await this.requireNamespace(api, spec);

    const objects = prepareManifests(await this.loader.load(spec.source), spec.namespace);
    logger.info(`📦 Applying ${objects.length} objects of ${spec.metadata.name} ${spec.version} into '${spec.namespace}'`);

    const applier = new ResourceApplier(api);
    const result: BootstrapResult = { created: [], patched: [], unchanged: [], mutations: 0 };

    for (const object of objects) {
      const name = formatRef(refOf(object));
      const reconciled = await applier.reconcileManifest(object);
      result.mutations += reconciled.mutations;
      switch (reconciled.action) {
        case "created":
          result.created.push(name);
          logger.debug(`➕ ${name}`);
          break;
        case "patched":
          result.patched.push(name);
          logger.debug(`✏️ ${name}`);
          break;
        case "unchanged":
          result.unchanged.push(name);
          break;
      }
    }

    logger.info(
      `🤝 ${spec.metadata.name} accepted: ${result.created.length} created, ${result.patched.length} updated, ` +
        `${result.unchanged.length} unchanged; application delivery is now handed off`,
    );
    return result;
  }

  async plan(api: ClusterApi, spec: ManifestBundleObjectSpec): Promise<PlanResult> {
    const namespace = await api.getNamespace(spec.namespace);
    const objects = prepareManifests(await this.loader.load(spec.source), spec.namespace);
    if (!namespace) {
      return { decision: "create", detail: `${objects.length} objects (namespace '${spec.namespace}' pending)` };
    }

    let pending = 0;
    for (const object of objects) {
      if (!(await api.getObject(refOf(object)))) pending += 1;
    }
    return pending === 0
      ? { decision: "satisfied", detail: `${objects.length} objects present`, outputs: bootstrapOutputs(spec) }
      : { decision: pending === objects.length ? "create" : "update", detail: `${pending}/${objects.length} objects missing` };
  }

  private async requireNamespace(api: ClusterApi, spec: ManifestBundleObjectSpec): Promise<void> {
    const namespace = await api.getNamespace(spec.namespace);
    if (!namespace) {
      throw new ConfigurationError(
        `Namespace '${spec.namespace}' does not exist; declare it as a dependency of the GitOps bootstrap`,
      );
    }
  }
}

export function bootstrapOutputs(spec: ManifestBundleObjectSpec): OutputValues {
  return {
    gitopsNamespace: spec.namespace,
    gitopsVersion: spec.version,
    gitopsAdminPasswordCommand: adminPasswordCommand(spec.namespace),
  };
}

/** The controller generates its own admin secret; this only says where to find it. */
export function adminPasswordCommand(namespace: string): string {
  return `kubectl -n ${namespace} get secret argocd-initial-admin-secret -o jsonpath="{.data.password}" | base64 -d`;
}
