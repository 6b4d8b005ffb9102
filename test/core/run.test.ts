import { describe, expect, it } from "vitest";
import { InstallationError } from "../../src/core/errors";
import { ProvisioningRun } from "../../src/core/run";

describe("ProvisioningRun", () => {
  it("merges list outputs without duplicates and replaces scalars", () => {
    const run = new ProvisioningRun();
    run.export({ namespaces: ["argocd"], runtimeVersion: "v1.27.9+k3s1" });
    run.export({ namespaces: ["media", "argocd"], runtimeVersion: "v1.28.5+k3s1" });
    expect(run.outputs).toEqual({ namespaces: ["argocd", "media"], runtimeVersion: "v1.28.5+k3s1" });
  });

  it("succeeds only when every planned resource is satisfied", () => {
    const run = new ProvisioningRun();
    run.plan(["k3s", "kubeconfig"]);
    run.record({ id: "k3s", status: "applied", mutations: 1, durationMs: 5 });
    run.finalize();
    expect(run.success).toBe(false);
    expect(run.report().notAttempted).toEqual(["kubeconfig"]);
  });

  it("reports the failed resource and what was never attempted", () => {
    const run = new ProvisioningRun();
    run.plan(["k3s", "gpu-toolkit", "kubeconfig"]);
    run.record({ id: "k3s", status: "skipped", mutations: 0, durationMs: 1 });
    const error = new InstallationError("install step exited with 100", { resourceId: "gpu-toolkit", exitCode: 100 });
    run.record({ id: "gpu-toolkit", status: "failed", mutations: 0, durationMs: 1, error });
    run.finalize(error);

    expect(run.report()).toEqual({
      success: false,
      succeeded: ["k3s"],
      failed: { id: "gpu-toolkit", kind: "installation", message: "install step exited with 100", retryable: true },
      notAttempted: ["kubeconfig"],
      mutations: 0,
      outputs: {},
    });
    expect(run.executed).toEqual(["k3s", "gpu-toolkit"]);
  });

  it("cannot change once finalized", () => {
    const run = new ProvisioningRun();
    run.finalize();
    expect(run.isFinalized).toBe(true);
    expect(() => run.record({ id: "k3s", status: "applied", mutations: 1, durationMs: 1 })).toThrow(
      "ProvisioningRun is finalized and can no longer change",
    );
    expect(() => run.export({ kubeconfigPath: "/tmp/config" })).toThrow(/finalized/);
  });

  it("freezes its outputs, list values included", () => {
    const run = new ProvisioningRun();
    run.export({ namespaces: ["argocd"] });
    run.finalize();

    const namespaces = run.outputs.namespaces;
    expect(Array.isArray(namespaces) && Object.isFrozen(namespaces)).toBe(true);
    expect(Object.isFrozen(run.outputs)).toBe(true);
    expect(run.finishedAt).toBeInstanceOf(Date);
  });
});
