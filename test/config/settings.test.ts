import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  applyEnvOverrides,
  expandHome,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from "../../src/config/settings";
import { defaultManifestSource, parseDuration } from "../../src/types/schemas";

describe("configuration", () => {
  it("fills in the single-node defaults", () => {
    const config = parseConfig({ runtime: { version: "v1.28.5+k3s1" } });

    expect(config.runtime.server_args).toEqual(["--disable=traefik", "--write-kubeconfig-mode=644"]);
    expect(config.gpu.enabled).toBe(false);
    expect(config.credential.path).toBe("~/.kube/config");
    expect(config.namespaces).toEqual([{ name: "media" }]);
    expect(config.storage).toEqual([
      {
        name: "jellyfin-config-pv",
        capacity: "10Gi",
        access_modes: ["ReadWriteOnce"],
        host_path: "/data/jellyfin/config",
        host_path_type: "DirectoryOrCreate",
        storage_class: "local-storage",
        reclaim_policy: "Retain",
        volume_mode: "Filesystem",
      },
      {
        name: "jellyfin-media-pv",
        capacity: "500Gi",
        access_modes: ["ReadWriteMany"],
        host_path: "/data/jellyfin/media",
        host_path_type: "DirectoryOrCreate",
        storage_class: "local-storage",
        reclaim_policy: "Retain",
        volume_mode: "Filesystem",
      },
    ]);
    expect(config.gitops).toEqual({ enabled: true, namespace: "argocd", version: "v2.9.3" });
  });

  it("lists every problem with its path", () => {
    expect(() =>
      parseConfig({
        runtime: { version: "1.28" },
        storage: [{ name: "data", capacity: "lots", access_modes: ["ReadWriteOnce"], host_path: "/data" }],
      }),
    ).toThrow(
      "Config validation failed:\n- runtime.version: expected a k3s release such as v1.28.5+k3s1\n- storage.0.capacity: expected a quantity such as 10Gi",
    );
  });

  it("rejects duplicate namespaces and unknown keys", () => {
    expect(() => parseConfig({ runtime: { version: "v1.28.5" }, namespaces: [{ name: "media" }, { name: "media" }] })).toThrow(
      "- namespaces.1.name: duplicate namespace 'media'",
    );
    expect(() => parseConfig({ runtime: { version: "v1.28.5" }, domain: "lab.example.com" })).toThrow(/Unrecognized key/);
  });

  it("applies environment overrides over the file", () => {
    const data = applyEnvOverrides(
      { runtime: { version: "v1.27.9+k3s1" }, gpu: { enabled: true } },
      { K3S_VERSION: "v1.28.5+k3s1", HOMELAB_GPU: "false", HOMELAB_LOG_LEVEL: "debug" },
    );
    const config = parseConfig(data);

    expect(config.runtime.version).toBe("v1.28.5+k3s1");
    expect(config.gpu.enabled).toBe(false);
    expect(config.logging.level).toBe("debug");
  });

  it("parses durations", () => {
    expect(parseDuration("250ms")).toBe(250);
    expect(parseDuration("60s")).toBe(60000);
    expect(parseDuration("10m")).toBe(600000);
    expect(parseDuration("1h")).toBe(3600000);
    expect(() => parseDuration("10 minutes")).toThrow("Invalid duration: 10 minutes");
  });

  it("points the GitOps bundle at the pinned upstream release", () => {
    expect(defaultManifestSource("v2.9.3")).toBe(
      "https://raw.githubusercontent.com/argoproj/argo-cd/v2.9.3/manifests/install.yaml",
    );
  });

  it("expands the home directory", () => {
    expect(expandHome("~/.kube/config", "/home/tester")).toBe("/home/tester/.kube/config");
    expect(expandHome("/etc/rancher/k3s/k3s.yaml", "/home/tester")).toBe("/etc/rancher/k3s/k3s.yaml");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "homelab-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads the file named by HOMELAB_CONFIG", () => {
    fs.writeFileSync(path.join(dir, "lab.yaml"), "runtime:\n  version: v1.28.5+k3s1\ngpu:\n  enabled: true\n");
    const env = { HOMELAB_CONFIG: "lab.yaml" };

    expect(resolveConfigPath(undefined, { env, cwd: dir })).toBe(path.join(dir, "lab.yaml"));
    expect(loadConfig(undefined, { env, cwd: dir }).gpu.enabled).toBe(true);
  });

  it("reports a missing file as a configuration error", () => {
    expect(() => loadConfig("missing.yaml", { env: {}, cwd: dir })).toThrow(`Config file not found: ${path.join(dir, "missing.yaml")}`);
  });

  it("loads the example config shipped with the project", () => {
    const config = loadConfig(path.resolve(__dirname, "../../examples/homelab.yaml"), { env: {} });

    expect(config.runtime.version).toBe("v1.28.5+k3s1");
    expect(config.namespaces.map((ns) => ns.name)).toEqual(["argocd", "media"]);
    expect(config.storage.map((pv) => pv.capacity)).toEqual(["10Gi", "500Gi"]);
  });
});
