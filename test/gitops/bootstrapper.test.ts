import { beforeEach, describe, expect, it } from "vitest";
import type { ManifestBundleObjectSpec } from "../../src/core/resource";
import { adminPasswordCommand, bootstrapOutputs, GitOpsBootstrapper } from "../../src/gitops/bootstrapper";
import { ManifestLoader } from "../../src/gitops/manifests";
import { silentLogger } from "../../src/logging/logger";
import { FIXTURE_MANIFESTS } from "../support/config";
import { FakeCluster } from "../support/fake-cluster";

const bundle: ManifestBundleObjectSpec = {
  kind: "ManifestBundle",
  metadata: { name: "argocd" },
  source: FIXTURE_MANIFESTS,
  version: "v2.9.3",
  namespace: "argocd",
};

describe("GitOpsBootstrapper", () => {
  let cluster: FakeCluster;
  let bootstrapper: GitOpsBootstrapper;

  beforeEach(() => {
    cluster = new FakeCluster();
    bootstrapper = new GitOpsBootstrapper(new ManifestLoader());
  });

  it("requires its namespace to exist", async () => {
    await expect(bootstrapper.bootstrap(cluster, bundle, silentLogger())).rejects.toMatchObject({
      kind: "configuration",
      message: "Namespace 'argocd' does not exist; declare it as a dependency of the GitOps bootstrap",
    });
    expect(cluster.writeCount).toBe(0);
  });

  it("applies the bundle once and hands off", async () => {
    await cluster.createNamespace({ apiVersion: "v1", kind: "Namespace", metadata: { name: "argocd" } });

    const first = await bootstrapper.bootstrap(cluster, bundle, silentLogger());
    const second = await bootstrapper.bootstrap(cluster, bundle, silentLogger());

    expect(first.created).toEqual([
      "CustomResourceDefinition/applications.argoproj.io (apiextensions.k8s.io/v1)",
      "ServiceAccount/argocd/argocd-server (v1)",
      "ConfigMap/argocd/argocd-cm (v1)",
      "ClusterRole/argocd-server (rbac.authorization.k8s.io/v1)",
      "Deployment/argocd/argocd-server (apps/v1)",
    ]);
    expect(first.mutations).toBe(5);
    expect(second).toMatchObject({ created: [], patched: [], mutations: 0 });
    expect(second.unchanged).toHaveLength(5);
  });

  it("stops at an object the API server rejects", async () => {
    await cluster.createNamespace({ apiVersion: "v1", kind: "Namespace", metadata: { name: "argocd" } });
    cluster.rejectKind("ClusterRole");

    await expect(bootstrapper.bootstrap(cluster, bundle, silentLogger())).rejects.toMatchObject({
      kind: "rejected",
      status: 422,
    });
    expect(cluster.objects.size).toBe(3);
  });

  it("plans the objects still missing", async () => {
    expect(await bootstrapper.plan(cluster, bundle)).toEqual({
      decision: "create",
      detail: "5 objects (namespace 'argocd' pending)",
    });

    await cluster.createNamespace({ apiVersion: "v1", kind: "Namespace", metadata: { name: "argocd" } });
    await bootstrapper.bootstrap(cluster, bundle, silentLogger());
    expect((await bootstrapper.plan(cluster, bundle)).decision).toBe("satisfied");
  });

  it("exports where to find the generated admin password", () => {
    expect(bootstrapOutputs(bundle)).toEqual({
      gitopsNamespace: "argocd",
      gitopsVersion: "v2.9.3",
      gitopsAdminPasswordCommand: adminPasswordCommand("argocd"),
    });
    expect(adminPasswordCommand("argocd")).toBe(
      'kubectl -n argocd get secret argocd-initial-admin-secret -o jsonpath="{.data.password}" | base64 -d',
    );
  });
});
