import type { HostObservation, HostOperationSpec, OutputValues } from "../core/resource";
import type { HostContext } from "./context";
import { quote } from "./shell";

export interface NodeReadyOptions {
  kubeconfigPath: string;
  timeoutSeconds: number;
}

/**
 * Waits until every node reports Ready, using the published kubeconfig so
 * the credential is exercised before the cluster layer depends on it.
 */
export class NodeReadiness implements HostOperationSpec {
  readonly target = "Ready";
  readonly postconditions: string[];

  constructor(private readonly options: NodeReadyOptions) {
    this.postconditions = ["all nodes report condition Ready"];
  }

  async inspect(host: HostContext): Promise<HostObservation> {
    const result = await host.shell.execute(`${this.kubectl()} get nodes --no-headers`, { timeoutMs: host.commandTimeoutMs });
    if (result.exitCode !== 0) {
      return { state: "absent" };
    }
    const nodes = result.stdout
      .split("\n")
      .map((line) => line.trim().split(/\s+/))
      .filter((fields) => fields.length >= 2 && fields[0] !== "");
    const ready = nodes.filter(([, status]) => status === "Ready").length;
    return {
      state: "present",
      version: `${ready}/${nodes.length}`,
      active: nodes.length > 0 && ready === nodes.length,
    };
  }

  isSatisfied(observed: HostObservation): boolean {
    return observed.state === "present" && observed.active === true;
  }

  install(): string[] {
    const attempts = Math.max(1, Math.ceil(this.options.timeoutSeconds / 2));
    return [
      // The API server may still be starting: wait for it to answer before waiting on nodes.
      `for i in $(seq 1 ${attempts}); do ${this.kubectl()} get nodes >/dev/null 2>&1 && break; sleep 2; done`,
      `${this.kubectl()} wait --for=condition=ready node --all --timeout=${this.options.timeoutSeconds}s`,
    ];
  }

  upgrade(): string[] {
    return [`${this.kubectl()} wait --for=condition=ready node --all --timeout=${this.options.timeoutSeconds}s`];
  }

  outputs(observed: HostObservation): OutputValues {
    return observed.state === "present" && observed.version ? { nodesReady: observed.version } : {};
  }

  private kubectl(): string {
    return `k3s kubectl --kubeconfig ${quote(this.options.kubeconfigPath)}`;
  }
}
