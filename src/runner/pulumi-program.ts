import * as pulumi from "@pulumi/pulumi";
import * as command from "@pulumi/command";
import * as k8s from "@pulumi/kubernetes";
import type { KubeObject } from "../cluster/types";
import { executionOrder } from "../core/graph";
import type { HostIdentity } from "../core/pipeline";
import { declareResources } from "../core/pipeline";
import type { ClusterObjectResource, HostOperationResource, OutputValues } from "../core/resource";
import { adminPasswordCommand } from "../gitops/bootstrapper";
import { prepareManifests } from "../gitops/manifests";
import { ProvisionConfig } from "../types/schemas";
import { expandHome } from "../config/settings";

export interface PulumiRendition {
  /** Every declared Pulumi resource, keyed by provisioning resource id. */
  resources: Map<string, pulumi.Resource[]>;
  provider: k8s.Provider;
  outputs: OutputValues;
}

/**
 * Render the provisioning graph as Pulumi resources: host operations become
 * local commands re-created when their target changes, cluster objects go
 * through a Kubernetes provider bound to the published kubeconfig.
 *
 * Must be called inside a Pulumi program (or under runtime mocks).
 */
export function declarePulumiStack(
  config: ProvisionConfig,
  identity: HostIdentity,
  manifests: KubeObject[] = [],
): PulumiRendition {
  const ordered = executionOrder(declareResources(config, identity));
  const declared = new Map<string, pulumi.Resource[]>();
  const kubeconfigPath = expandHome(config.credential.path, identity.home);
  const dependsOn = (ids: string[]) => ids.flatMap((id) => declared.get(id) ?? []);

  const hostOps = ordered.filter((r): r is HostOperationResource => r.kind === "host-operation");
  for (const resource of hostOps) {
    const cmd = new command.local.Command(
      resource.id,
      {
        create: resource.spec.install({ state: "absent" }).join(" && "),
        triggers: [resource.spec.target],
      },
      { dependsOn: dependsOn(resource.dependsOn), deleteBeforeReplace: true },
    );
    declared.set(resource.id, [cmd]);
  }

  const provider = new k8s.Provider(
    "k3s",
    { kubeconfig: kubeconfigPath },
    { dependsOn: dependsOn(hostOps.map((r) => r.id)) },
  );

  const namespaces: string[] = [];
  const volumes: string[] = [];
  const outputs: OutputValues = { runtimeVersion: config.runtime.version, kubeconfigPath };

  const clusterObjects = ordered.filter((r): r is ClusterObjectResource => r.kind === "cluster-object");
  for (const resource of clusterObjects) {
    const opts: pulumi.CustomResourceOptions = { provider, dependsOn: dependsOn(resource.dependsOn) };
    const { spec } = resource;

    switch (spec.kind) {
      case "Namespace":
        declared.set(resource.id, [
          new k8s.core.v1.Namespace(
            resource.id,
            { metadata: { name: spec.metadata.name, labels: spec.metadata.labels, annotations: spec.metadata.annotations } },
            opts,
          ),
        ]);
        namespaces.push(spec.metadata.name);
        break;
      case "PersistentVolume":
        declared.set(resource.id, [
          new k8s.core.v1.PersistentVolume(
            resource.id,
            {
              metadata: { name: spec.metadata.name, labels: spec.metadata.labels },
              spec: {
                capacity: { storage: spec.body.capacity },
                accessModes: spec.body.accessModes,
                hostPath: { path: spec.body.hostPath.path, type: spec.body.hostPath.type },
                storageClassName: spec.body.storageClassName,
                persistentVolumeReclaimPolicy: spec.body.reclaimPolicy,
                volumeMode: spec.body.volumeMode,
              },
            },
            opts,
          ),
        ]);
        volumes.push(spec.metadata.name);
        break;
      case "ManifestBundle":
        declared.set(
          resource.id,
          prepareManifests(manifests, spec.namespace).map(
            (object) =>
              new k8s.apiextensions.CustomResource(
                `${resource.id}-${object.kind}-${object.metadata.namespace ?? "cluster"}-${object.metadata.name}`.toLowerCase(),
                { ...object },
                opts,
              ),
          ),
        );
        outputs.gitopsNamespace = spec.namespace;
        outputs.gitopsAdminPasswordCommand = adminPasswordCommand(spec.namespace);
        break;
    }
  }

  return { resources: declared, provider, outputs: { ...outputs, namespaces, persistentVolumes: volumes } };
}
