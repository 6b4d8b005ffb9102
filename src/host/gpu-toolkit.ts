import { DetectionError } from "../core/errors";
import type { HostObservation, HostOperationSpec, OutputValues } from "../core/resource";
import type { HostContext } from "./context";
import { quote } from "./shell";

export interface GpuToolkitOptions {
  version: string;
  /** containerd config rendered by k3s; k3s adds the nvidia runtime when the toolkit is present at start. */
  containerdConfigPath: string;
  runtimeServiceName?: string;
}

const KEYRING = "/usr/share/keyrings/nvidia-container-toolkit-keyring.gpg";
const SOURCES_LIST = "/etc/apt/sources.list.d/nvidia-container-toolkit.list";
const VERSION_PATTERN = /version (\d+\.\d+\.\d+)/;

/**
 * NVIDIA container toolkit, registered as a containerd runtime for k3s.
 */
export class NvidiaContainerToolkit implements HostOperationSpec {
  readonly target: string;
  readonly postconditions: string[];
  private readonly service: string;

  constructor(private readonly options: GpuToolkitOptions) {
    this.target = options.version;
    this.service = options.runtimeServiceName ?? "k3s";
    this.postconditions = [
      `nvidia-container-toolkit ${options.version} installed`,
      `nvidia runtime registered in ${options.containerdConfigPath}`,
    ];
  }

  async inspect(host: HostContext): Promise<HostObservation> {
    const cli = await host.shell.execute("nvidia-ctk --version", { timeoutMs: host.commandTimeoutMs });
    if (cli.exitCode === 127) {
      return { state: "absent" };
    }
    if (cli.exitCode !== 0) {
      throw new DetectionError(`'nvidia-ctk --version' exited with ${cli.exitCode}: ${cli.stderr.trim()}`);
    }
    const match = VERSION_PATTERN.exec(cli.stdout);
    if (!match) {
      throw new DetectionError(`Unrecognized nvidia-ctk version output: ${cli.stdout.trim()}`);
    }

    const runtime = await host.shell.execute(`grep -q nvidia ${quote(this.options.containerdConfigPath)}`, {
      timeoutMs: host.commandTimeoutMs,
    });
    // Registered runtime is reported as "active"; the config file may not exist before the first k3s restart.
    return { state: "present", version: match[1], active: runtime.exitCode === 0 };
  }

  isSatisfied(observed: HostObservation): boolean {
    return observed.state === "present" && observed.version === this.target && observed.active === true;
  }

  install(): string[] {
    return [
      `curl -fsSL https://nvidia.github.io/libnvidia-container/gpgkey | gpg --dearmor --yes -o ${KEYRING}`,
      `curl -fsSL https://nvidia.github.io/libnvidia-container/stable/deb/nvidia-container-toolkit.list | sed 's#deb https://#deb [signed-by=${KEYRING}] https://#g' > ${SOURCES_LIST}`,
      ...this.packageSteps(),
    ];
  }

  upgrade(observed: HostObservation & { state: "present" }): string[] {
    if (observed.version === this.target) {
      // Installed but k3s has not picked the runtime up yet.
      return [`systemctl restart ${this.service}`];
    }
    return this.packageSteps();
  }

  outputs(observed: HostObservation): OutputValues {
    return observed.state === "present" && observed.version ? { gpuToolkitVersion: observed.version } : {};
  }

  private packageSteps(): string[] {
    const pinned = ["nvidia-container-toolkit", "nvidia-container-toolkit-base", "libnvidia-container-tools", "libnvidia-container1"]
      .map((pkg) => `${pkg}=${this.options.version}-1`)
      .join(" ");
    return [
      "apt-get update",
      `DEBIAN_FRONTEND=noninteractive apt-get install -y --allow-downgrades ${pinned}`,
      `systemctl restart ${this.service}`,
    ];
  }
}
