import { expandHome } from "./config/settings";
import { ClusterClientFactory } from "./cluster/client-factory";
import { ClusterObjectExecutor } from "./cluster/executor";
import type { ResolvedConnection } from "./cluster/client";
import type { ClusterApi } from "./cluster/types";
import { StackExports, stackExports } from "./core/exports";
import { RunLock } from "./core/lock";
import { ConvergenceOrchestrator } from "./core/orchestrator";
import { declareResources, HostIdentity } from "./core/pipeline";
import type { Resource } from "./core/resource";
import { ManifestLoader } from "./gitops/manifests";
import { GitOpsBootstrapper } from "./gitops/bootstrapper";
import { HostFilesystem, LocalFilesystem } from "./host/filesystem";
import { currentIdentity } from "./host/context";
import { HostProvisioner } from "./host/provisioner";
import { LocalShellExecutor, ShellExecutor } from "./host/shell";
import { Logger } from "./logging/logger";
import { parseDuration, ProvisionConfig } from "./types/schemas";

export interface ProvisionerOverrides {
  shell?: ShellExecutor;
  fs?: HostFilesystem;
  connect?: (connection: ResolvedConnection) => ClusterApi;
  logger?: Logger;
  identity?: HostIdentity;
  exports?: StackExports;
  /** Pass null to run without the run-level lock. */
  lock?: RunLock | null;
}

export interface Provisioner {
  orchestrator: ConvergenceOrchestrator;
  resources: Resource[];
  logger: Logger;
}

/**
 * Wire the pipeline for a validated configuration. Every host and cluster
 * collaborator can be replaced, which is how the tests run without a host.
 */
export function createProvisioner(config: ProvisionConfig, overrides: ProvisionerOverrides = {}): Provisioner {
  const logger = overrides.logger ?? new Logger({ level: config.logging.level, format: config.logging.format });
  const identity = overrides.identity ?? currentIdentity();
  const fs = overrides.fs ?? new LocalFilesystem();
  const shell = overrides.shell ?? new LocalShellExecutor({ sudo: config.sudo, defaultTimeoutMs: parseDuration(config.timeouts.host_command) });

  const hostExecutor = new HostProvisioner({ shell, fs, commandTimeoutMs: parseDuration(config.timeouts.host_command) });
  const clusterExecutor = new ClusterObjectExecutor(
    new ClusterClientFactory({
      fs,
      requestTimeoutMs: parseDuration(config.timeouts.api_request),
      connect: overrides.connect,
    }),
    new GitOpsBootstrapper(new ManifestLoader({ timeoutMs: parseDuration(config.timeouts.api_request) })),
  );

  const lock =
    overrides.lock === null ? undefined : overrides.lock ?? new RunLock(expandHome(config.lock_path, identity.home));

  const orchestrator = new ConvergenceOrchestrator({
    executors: { "host-operation": hostExecutor, "cluster-object": clusterExecutor },
    logger,
    timeouts: {
      "host-operation": parseDuration(config.timeouts.host_operation),
      "cluster-object": parseDuration(config.timeouts.cluster_object),
    },
    lock,
    exports: overrides.exports ?? stackExports,
  });

  return { orchestrator, resources: declareResources(config, identity), logger };
}

export { currentIdentity } from "./host/context";
export { ConvergenceOrchestrator } from "./core/orchestrator";
export { ProvisioningRun } from "./core/run";
export { declareResources } from "./core/pipeline";
export { stackExports, StackExports } from "./core/exports";
export * from "./core/errors";
export type { ProvisionConfig } from "./types/schemas";
