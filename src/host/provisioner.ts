/**
 * Host Provisioner
 *
 * Converges host operations: evaluates the idempotency predicate, runs the
 * install or upgrade procedure only when it does not hold, then re-checks it.
 */
import { AbortedError, DetectionError, InstallationError, errorMessage, isProvisioningError } from "../core/errors";
import type {
  ApplyResult,
  HostObservation,
  HostOperationResource,
  PlanResult,
  ResourceExecutor,
  RunContext,
} from "../core/resource";
import type { HostContext } from "./context";
import { summarize } from "./shell";

type Procedure = "install" | "upgrade";

export class HostProvisioner implements ResourceExecutor<HostOperationResource> {
  constructor(private readonly host: HostContext) {}

  async apply(resource: HostOperationResource, context: RunContext): Promise<ApplyResult> {
    const { spec } = resource;
    const host = this.scoped(context.signal);
    const observed = await this.detect(resource, host);

    if (spec.isSatisfied(observed)) {
      context.logger.debug(`Predicate holds (${describe(observed)}), nothing to do`);
      return {
        status: "skipped",
        observed,
        outputs: spec.outputs(observed),
        mutations: 0,
        revision: spec.target,
        provides: spec.provides?.(observed),
      };
    }

    const procedure = this.route(resource, observed);
    const commands =
      procedure === "upgrade" && observed.state === "present" && spec.upgrade ? spec.upgrade(observed) : spec.install(observed);

    context.logger.info(
      procedure === "upgrade"
        ? `⬆️ Upgrading ${describe(observed)} → ${spec.target}`
        : `📦 Installing ${spec.target}`,
    );

    // Partial installs of system packages are not safe to retry blindly: stop at the first failure.
    for (const command of commands) {
      if (context.signal?.aborted) {
        throw new AbortedError(`${procedure} of '${resource.id}' cancelled before '${summarize(command)}'`, resource.id);
      }
      context.logger.debug(`⚙️ Executing: ${summarize(command)}`);
      const result = await host.shell.execute(command, { timeoutMs: host.commandTimeoutMs });
      if (result.exitCode !== 0) {
        throw new InstallationError(`${procedure} step '${summarize(command)}' exited with ${result.exitCode}: ${result.stderr.trim()}`, {
          resourceId: resource.id,
          exitCode: result.exitCode,
          stderr: result.stderr,
        });
      }
    }

    const after = await this.detect(resource, host);
    if (!spec.isSatisfied(after)) {
      throw new InstallationError(
        `${procedure} finished but postconditions do not hold (${describe(after)}): ${spec.postconditions.join("; ")}`,
        { resourceId: resource.id },
      );
    }

    return {
      status: "applied",
      observed: after,
      outputs: spec.outputs(after),
      mutations: commands.length,
      revision: spec.target,
      provides: spec.provides?.(after),
    };
  }

  async plan(resource: HostOperationResource, context?: RunContext): Promise<PlanResult> {
    const observed = await this.detect(resource, this.scoped(context?.signal));
    if (resource.spec.isSatisfied(observed)) {
      return {
        decision: "satisfied",
        detail: describe(observed),
        outputs: resource.spec.outputs(observed),
        provides: resource.spec.provides?.(observed),
      };
    }
    return { decision: this.route(resource, observed), detail: `${describe(observed)} → ${resource.spec.target}` };
  }

  /**
   * Nothing there means install; something there that fails the predicate
   * (wrong version, stopped service) means upgrade, when the operation has one.
   */
  private route(resource: HostOperationResource, observed: HostObservation): Procedure {
    return observed.state === "present" && resource.spec.upgrade ? "upgrade" : "install";
  }

  /** The host context with every command bound to the resource's cancellation signal. */
  private scoped(signal: AbortSignal | undefined): HostContext {
    if (!signal) return this.host;
    const { shell } = this.host;
    return { ...this.host, shell: { execute: (command, options = {}) => shell.execute(command, { ...options, signal }) } };
  }

  private async detect(resource: HostOperationResource, host: HostContext): Promise<HostObservation> {
    try {
      return await resource.spec.inspect(host);
    } catch (error) {
      if (isProvisioningError(error) && error.kind !== "installation") {
        throw error.forResource(resource.id);
      }
      throw new DetectionError(`Cannot evaluate idempotency predicate: ${errorMessage(error)}`, resource.id, error);
    }
  }
}

export function describe(observed: HostObservation): string {
  if (observed.state === "absent") return "not installed";
  const parts = [observed.version ?? "unknown version"];
  if (observed.active !== undefined) parts.push(observed.active ? "active" : "inactive");
  return parts.join(", ");
}
