import { AbortedError, ConfigurationError, errorMessage, ProvisioningError, TimeoutError, toProvisioningError } from "./errors";
import { StackExports, stackExports } from "./exports";
import { executionOrder } from "./graph";
import type { RunLock } from "./lock";
import type {
  ApplyResult,
  ExecutorRegistry,
  PlanDecision,
  PlanResult,
  Resource,
  ResourceKind,
  RunContext,
} from "./resource";
import { ProvisioningRun } from "./run";
import { Logger } from "../logging/logger";
import { ErrorHandler } from "../logging/error-handler";

const TIMED_OUT = Symbol("timed out");

export interface OrchestratorOptions {
  executors: ExecutorRegistry;
  logger: Logger;
  /** Upper bound per resource, by kind. */
  timeouts: Record<ResourceKind, number>;
  lock?: RunLock;
  exports?: StackExports;
}

export interface ConvergeOptions {
  /** Operator interrupt; honoured between resources. */
  signal?: AbortSignal;
}

export interface PlanEntry {
  id: string;
  kind: ResourceKind;
  decision: PlanDecision;
  detail?: string;
}

/**
 * Converges a resource set: orders it by declared dependencies and applies
 * one resource at a time, halting at the first failure. Nothing is rolled
 * back; re-running resumes because satisfied resources are skipped.
 */
export class ConvergenceOrchestrator {
  private readonly executors: ExecutorRegistry;
  private readonly logger: Logger;
  private readonly timeouts: Record<ResourceKind, number>;
  private readonly lock?: RunLock;
  private readonly exports: StackExports;
  readonly errors: ErrorHandler;

  constructor(options: OrchestratorOptions) {
    this.executors = options.executors;
    this.logger = options.logger;
    this.timeouts = options.timeouts;
    this.lock = options.lock;
    this.exports = options.exports ?? stackExports;
    this.errors = new ErrorHandler(this.logger);
  }

  async converge(resources: Resource[], options: ConvergeOptions = {}): Promise<ProvisioningRun> {
    const run = new ProvisioningRun();

    let ordered: Resource[];
    try {
      ordered = executionOrder(resources);
    } catch (error) {
      return run.finalize(this.errors.record(error));
    }
    run.plan(ordered.map((r) => r.id));

    try {
      await this.lock?.acquire();
    } catch (error) {
      return run.finalize(this.errors.record(error));
    }

    this.logger.info(`🚀 Converging ${ordered.length} resources: ${ordered.map((r) => r.id).join(" → ")}`);
    const context: RunContext = { logger: this.logger };
    let failure: ProvisioningError | undefined;

    try {
      for (const resource of ordered) {
        if (options.signal?.aborted) {
          failure = this.errors.record(new AbortedError(`Run aborted before '${resource.id}'`));
          break;
        }

        const pending = resource.dependsOn.filter((dep) => !run.isSatisfied(dep));
        if (pending.length > 0) {
          failure = this.errors.record(
            new ConfigurationError(`Resource '${resource.id}' is not ready; unsatisfied dependencies: ${pending.join(", ")}`),
            resource.id,
          );
          break;
        }

        const started = Date.now();
        const log = this.logger.child({ resource: resource.id });
        try {
          log.info(`🔄 Applying ${resource.kind}${resource.description ? ` (${resource.description})` : ""}`);
          const result = await this.withTimeout(resource, (signal) => this.dispatch(resource, { ...context, logger: log, signal }));

          resource.observed = result.observed;
          resource.lastAppliedRevision = result.revision;
          if (result.provides?.credential) {
            context.credential = result.provides.credential;
          }
          run.record({
            id: resource.id,
            status: result.status,
            mutations: result.mutations,
            durationMs: Date.now() - started,
            revision: result.revision,
          });
          run.export(result.outputs);
          log.info(result.status === "skipped" ? "✅ Already satisfied" : `✅ Applied (${result.mutations} changes)`);
        } catch (error) {
          failure = this.errors.record(toProvisioningError(error, resource.id));
          run.record({ id: resource.id, status: "failed", mutations: 0, durationMs: Date.now() - started, error: failure });
          break;
        }
      }
    } finally {
      await this.releaseLock();
    }

    run.finalize(failure);
    this.exports.merge(run.outputs);

    const report = run.report();
    if (report.success) {
      this.logger.info(`✅ Converged: ${report.succeeded.length} resources satisfied, ${report.mutations} changes`);
    } else {
      this.logger.error(
        `❌ Run halted at '${report.failed?.id ?? "run"}'; not attempted: ${report.notAttempted.join(", ") || "none"}`,
      );
    }
    return run;
  }

  /**
   * Dry run: evaluates idempotency predicates in order, mutates nothing.
   */
  async plan(resources: Resource[]): Promise<PlanEntry[]> {
    const ordered = executionOrder(resources);
    const context: RunContext = { logger: this.logger };
    const entries: PlanEntry[] = [];

    for (const resource of ordered) {
      let result: PlanResult;
      try {
        const log = this.logger.child({ resource: resource.id });
        result = await this.withTimeout(resource, (signal) => this.dispatchPlan(resource, { ...context, logger: log, signal }));
      } catch (error) {
        result = { decision: "unknown", detail: errorMessage(error) };
      }
      if (result.provides?.credential) {
        context.credential = result.provides.credential;
      }
      entries.push({ id: resource.id, kind: resource.kind, decision: result.decision, detail: result.detail });
    }
    return entries;
  }

  private dispatch(resource: Resource, context: RunContext): Promise<ApplyResult> {
    switch (resource.kind) {
      case "host-operation":
        return this.executors["host-operation"].apply(resource, context);
      case "cluster-object":
        return this.executors["cluster-object"].apply(resource, context);
    }
  }

  private dispatchPlan(resource: Resource, context: RunContext): Promise<PlanResult> {
    switch (resource.kind) {
      case "host-operation":
        return this.executors["host-operation"].plan(resource, context);
      case "cluster-object":
        return this.executors["cluster-object"].plan(resource, context);
    }
  }

  /**
   * Runs one resource against its kind's timeout. On expiry the operation's
   * signal is aborted and the run waits for it to settle, so nothing keeps
   * mutating the host once the failure is recorded and the lock released.
   */
  private async withTimeout<T>(resource: Resource, start: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.timeouts[resource.kind];
    const controller = new AbortController();
    const operation = start(controller.signal);
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    let outcome: T | typeof TIMED_OUT;
    try {
      outcome = await Promise.race([operation, expired]);
    } finally {
      clearTimeout(timer);
    }
    if (outcome !== TIMED_OUT) {
      return outcome;
    }

    controller.abort();
    this.logger.warn(`⏳ '${resource.id}' exceeded ${timeoutMs}ms; waiting for its current step to stop`);
    await operation.then(
      () => undefined,
      (error: unknown) => this.logger.debug(`'${resource.id}' stopped after timeout: ${errorMessage(error)}`),
    );
    throw new TimeoutError(`Resource '${resource.id}'`, timeoutMs, resource.id);
  }

  private async releaseLock(): Promise<void> {
    try {
      await this.lock?.release();
    } catch (error) {
      this.logger.warn(`⚠️ Failed to release run lock: ${errorMessage(error)}`);
    }
  }
}
