import { DetectionError } from "../core/errors";
import type { HostObservation, HostOperationSpec, OutputValues } from "../core/resource";
import type { HostContext } from "./context";
import { quote } from "./shell";

export interface K3sOptions {
  version: string;
  /** Flags passed to the k3s server, e.g. `--disable=traefik`. */
  serverArgs: string[];
  installScriptUrl: string;
  serviceName?: string;
}

const VERSION_PATTERN = /k3s version (v\d+\.\d+\.\d+(?:\+k3s\d+)?)/;

/**
 * The k3s runtime. Satisfied when the installed binary matches the target
 * version and the systemd unit is active.
 */
export class K3sRuntime implements HostOperationSpec {
  readonly target: string;
  readonly postconditions: string[];
  private readonly service: string;

  constructor(private readonly options: K3sOptions) {
    this.target = options.version;
    this.service = options.serviceName ?? "k3s";
    this.postconditions = [`k3s ${options.version} installed`, `systemd unit ${this.service} active`];
  }

  async inspect(host: HostContext): Promise<HostObservation> {
    const version = await host.shell.execute("k3s --version", { timeoutMs: host.commandTimeoutMs });
    if (version.exitCode === 127) {
      return { state: "absent" };
    }
    if (version.exitCode !== 0) {
      throw new DetectionError(`'k3s --version' exited with ${version.exitCode}: ${version.stderr.trim()}`);
    }
    const match = VERSION_PATTERN.exec(version.stdout);
    if (!match) {
      throw new DetectionError(`Unrecognized k3s version output: ${version.stdout.trim()}`);
    }

    const unit = await host.shell.execute(`systemctl is-active ${this.service}`, { timeoutMs: host.commandTimeoutMs });
    return { state: "present", version: match[1], active: unit.stdout.trim() === "active" };
  }

  isSatisfied(observed: HostObservation): boolean {
    return (
      observed.state === "present" &&
      observed.version !== undefined &&
      versionMatches(observed.version, this.target) &&
      observed.active === true
    );
  }

  install(): string[] {
    return [this.installScript({})];
  }

  upgrade(observed: HostObservation & { state: "present" }): string[] {
    if (observed.version !== undefined && versionMatches(observed.version, this.target)) {
      // Right binary, stopped unit.
      return [`systemctl enable --now ${this.service}`];
    }
    // The install script upgrades in place; force the restart onto the new binary.
    return [this.installScript({ INSTALL_K3S_FORCE_RESTART: "true" })];
  }

  outputs(observed: HostObservation): OutputValues {
    return observed.state === "present" && observed.version ? { runtimeVersion: observed.version } : {};
  }

  private installScript(extraEnv: Record<string, string>): string {
    const env = Object.entries({ INSTALL_K3S_VERSION: releaseTag(this.options.version), ...extraEnv })
      .map(([key, value]) => `${key}=${quote(value)}`)
      .join(" ");
    const args = this.options.serverArgs.map(quote).join(" ");
    return `curl -sfL ${quote(this.options.installScriptUrl)} | ${env} sh -s - ${args}`.trim();
  }
}

/**
 * The published release to install. k3s tags every upstream patch as
 * `+k3s1` first, so an unqualified `v1.28.5` pins `v1.28.5+k3s1`.
 */
export function releaseTag(version: string): string {
  return version.includes("+") ? version : `${version}+k3s1`;
}

/**
 * `v1.28.5` matches `v1.28.5+k3s1`; a fully qualified target must match exactly.
 */
export function versionMatches(installed: string, target: string): boolean {
  if (installed === target) return true;
  return !target.includes("+") && installed.startsWith(`${target}+`);
}
