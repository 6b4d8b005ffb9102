import { describe, expect, it } from "vitest";
import { ManifestLoader, parseManifests, prepareManifests } from "../../src/gitops/manifests";
import { FIXTURE_MANIFESTS } from "../support/config";

describe("parseManifests", () => {
  it("drops empty documents and flattens lists", () => {
    const text = [
      "apiVersion: v1",
      "kind: List",
      "items:",
      "  - { apiVersion: v1, kind: ServiceAccount, metadata: { name: a } }",
      "  - { apiVersion: v1, kind: ServiceAccount, metadata: { name: b } }",
      "---",
      "---",
      "apiVersion: v1",
      "kind: Secret",
      "metadata: { name: c }",
    ].join("\n");

    expect(parseManifests(text).map((o) => `${o.kind}/${o.metadata.name}`)).toEqual([
      "ServiceAccount/a",
      "ServiceAccount/b",
      "Secret/c",
    ]);
  });

  it("rejects documents that are not Kubernetes objects", () => {
    expect(() => parseManifests("kind: ConfigMap\nmetadata: { name: x }\n", "install.yaml")).toThrow(
      "install.yaml document 1 is not a Kubernetes object: apiVersion: Required",
    );
  });

  it("rejects invalid YAML", () => {
    expect(() => parseManifests("kind: [unclosed\n", "install.yaml")).toThrow(/^install.yaml document 1 is not valid YAML/);
  });
});

describe("prepareManifests", () => {
  it("orders definitions first and scopes namespaced objects to the bundle namespace", async () => {
    const objects = prepareManifests(await new ManifestLoader().load(FIXTURE_MANIFESTS), "argocd");

    expect(objects.map((o) => `${o.kind}/${o.metadata.namespace ?? "-"}/${o.metadata.name}`)).toEqual([
      "CustomResourceDefinition/-/applications.argoproj.io",
      "ServiceAccount/argocd/argocd-server",
      "ConfigMap/argocd/argocd-cm",
      "ClusterRole/-/argocd-server",
      "Deployment/argocd/argocd-server",
    ]);
  });

  it("keeps an explicit namespace", () => {
    const [object] = prepareManifests(
      [{ apiVersion: "v1", kind: "ConfigMap", metadata: { name: "x", namespace: "kube-system" } }],
      "argocd",
    );
    expect(object.metadata.namespace).toBe("kube-system");
  });
});

describe("ManifestLoader", () => {
  it("loads each source once", async () => {
    const loader = new ManifestLoader();
    expect(await loader.load(FIXTURE_MANIFESTS)).toBe(await loader.load(FIXTURE_MANIFESTS));
  });

  it("reports a missing local bundle as a configuration error", async () => {
    await expect(new ManifestLoader().load("/nonexistent/install.yaml")).rejects.toMatchObject({ kind: "configuration" });
  });
});
