import { expandHome } from "../config/settings";
import { NvidiaContainerToolkit } from "../host/gpu-toolkit";
import { K3sRuntime } from "../host/k3s";
import { KubeconfigPublisher } from "../host/kubeconfig";
import { NodeReadiness } from "../host/node-ready";
import { defaultManifestSource, parseDuration, ProvisionConfig } from "../types/schemas";
import { clusterObject, hostOperation, Resource } from "./resource";

export interface HostIdentity {
  home: string;
  uid: number;
  gid: number;
}

export const RESOURCE_IDS = {
  runtime: "k3s",
  gpu: "gpu-toolkit",
  kubeconfig: "kubeconfig",
  nodeReady: "node-ready",
  gitops: "gitops-bootstrap",
  namespace: (name: string) => `namespace:${name}`,
  volume: (name: string) => `pv:${name}`,
} as const;

/**
 * Declare the homelab resource graph:
 *
 *   k3s → [gpu-toolkit] → kubeconfig → node-ready → namespace:* / pv:* → gitops-bootstrap
 */
export function declareResources(config: ProvisionConfig, identity: HostIdentity): Resource[] {
  const resources: Resource[] = [];
  const kubeconfigPath = expandHome(config.credential.path, identity.home);

  resources.push(
    hostOperation(
      RESOURCE_IDS.runtime,
      new K3sRuntime({
        version: config.runtime.version,
        serverArgs: config.runtime.server_args,
        installScriptUrl: config.runtime.install_script_url,
      }),
      [],
      `k3s ${config.runtime.version}`,
    ),
  );

  // The toolkit registers with containerd on the next k3s start, so it must precede the credential and readiness checks.
  const beforeCredential: string[] = [RESOURCE_IDS.runtime];
  if (config.gpu.enabled) {
    resources.push(
      hostOperation(
        RESOURCE_IDS.gpu,
        new NvidiaContainerToolkit({
          version: config.gpu.toolkit_version,
          containerdConfigPath: config.gpu.containerd_config,
        }),
        [RESOURCE_IDS.runtime],
        `nvidia-container-toolkit ${config.gpu.toolkit_version}`,
      ),
    );
    beforeCredential.push(RESOURCE_IDS.gpu);
  }

  resources.push(
    hostOperation(
      RESOURCE_IDS.kubeconfig,
      new KubeconfigPublisher({
        sourcePath: config.runtime.kubeconfig_source,
        targetPath: kubeconfigPath,
        owner: { uid: identity.uid, gid: identity.gid },
      }),
      beforeCredential,
      kubeconfigPath,
    ),
    hostOperation(
      RESOURCE_IDS.nodeReady,
      new NodeReadiness({
        kubeconfigPath,
        timeoutSeconds: Math.ceil(parseDuration(config.runtime.node_ready_timeout) / 1000),
      }),
      [RESOURCE_IDS.kubeconfig],
    ),
  );

  const namespaces = [...config.namespaces];
  if (config.gitops.enabled && !namespaces.some((ns) => ns.name === config.gitops.namespace)) {
    namespaces.unshift({ name: config.gitops.namespace, labels: undefined, annotations: undefined });
  }
  for (const ns of namespaces) {
    resources.push(
      clusterObject(
        RESOURCE_IDS.namespace(ns.name),
        { kind: "Namespace", metadata: { name: ns.name, labels: ns.labels, annotations: ns.annotations } },
        [RESOURCE_IDS.nodeReady],
      ),
    );
  }

  for (const pv of config.storage) {
    resources.push(
      clusterObject(
        RESOURCE_IDS.volume(pv.name),
        {
          kind: "PersistentVolume",
          metadata: { name: pv.name, labels: pv.labels },
          body: {
            capacity: pv.capacity,
            accessModes: [...pv.access_modes],
            hostPath: { path: pv.host_path, type: pv.host_path_type },
            storageClassName: pv.storage_class,
            reclaimPolicy: pv.reclaim_policy,
            volumeMode: pv.volume_mode,
          },
        },
        [RESOURCE_IDS.nodeReady],
        `${pv.capacity} at ${pv.host_path}`,
      ),
    );
  }

  if (config.gitops.enabled) {
    resources.push(
      clusterObject(
        RESOURCE_IDS.gitops,
        {
          kind: "ManifestBundle",
          metadata: { name: "argocd" },
          source: config.gitops.manifests ?? defaultManifestSource(config.gitops.version),
          version: config.gitops.version,
          namespace: config.gitops.namespace,
        },
        [RESOURCE_IDS.namespace(config.gitops.namespace)],
        `Argo CD ${config.gitops.version}`,
      ),
    );
  }

  return resources;
}
