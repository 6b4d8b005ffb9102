import crypto from "crypto";
import path from "path";
import { DetectionError } from "../core/errors";
import type { HostObservation, HostOperationSpec, OutputValues, Provided } from "../core/resource";
import type { HostContext } from "./context";
import { quote } from "./shell";

export interface KubeconfigOptions {
  /** Written by k3s, root-owned. */
  sourcePath: string;
  /** User-owned copy handed to the cluster client. */
  targetPath: string;
  owner: { uid: number; gid: number };
  mode?: number;
}

/**
 * Publishes the k3s kubeconfig to a user-owned path with owner-only
 * permissions. Satisfied when the copy exists with the right mode and owner
 * and the same content as the source.
 */
export class KubeconfigPublisher implements HostOperationSpec {
  readonly target: string;
  readonly postconditions: string[];
  private readonly mode: number;

  constructor(private readonly options: KubeconfigOptions) {
    this.mode = options.mode ?? 0o600;
    this.target = options.targetPath;
    this.postconditions = [
      `${options.targetPath} matches ${options.sourcePath}`,
      `${options.targetPath} has mode ${this.mode.toString(8)} and owner ${options.owner.uid}`,
    ];
  }

  async inspect(host: HostContext): Promise<HostObservation> {
    const source = await host.fs.readFile(this.options.sourcePath);
    if (source === null) {
      throw new DetectionError(`${this.options.sourcePath} not found; is the cluster runtime installed?`);
    }
    const [target, stat] = await Promise.all([host.fs.readFile(this.options.targetPath), host.fs.stat(this.options.targetPath)]);
    if (target === null || stat === null) {
      return { state: "absent" };
    }

    const digest = sha256(target);
    return {
      state: "present",
      version: digest,
      details: {
        mode: stat.mode.toString(8),
        uid: String(stat.uid),
        upToDate: String(digest === sha256(source)),
      },
    };
  }

  isSatisfied(observed: HostObservation): boolean {
    return (
      observed.state === "present" &&
      observed.details?.upToDate === "true" &&
      observed.details.mode === this.mode.toString(8) &&
      observed.details.uid === String(this.options.owner.uid)
    );
  }

  install(): string[] {
    return [`mkdir -p ${quote(path.dirname(this.options.targetPath))}`, ...this.copy()];
  }

  upgrade(): string[] {
    return this.copy();
  }

  outputs(observed: HostObservation): OutputValues {
    return observed.state === "present" ? { kubeconfigPath: this.options.targetPath } : {};
  }

  provides(observed: HostObservation): Provided {
    if (observed.state !== "present" || observed.version === undefined) {
      return {};
    }
    return { credential: { kubeconfigPath: this.options.targetPath, digest: observed.version } };
  }

  private copy(): string[] {
    const { uid, gid } = this.options.owner;
    return [
      `install -m ${this.mode.toString(8)} -o ${uid} -g ${gid} ${quote(this.options.sourcePath)} ${quote(this.options.targetPath)}`,
    ];
  }
}

export function sha256(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}
