import type { ErrorKind, ProvisioningError } from "./errors";
import type { OutputValue, OutputValues, ResourceStatus } from "./resource";

export interface ResourceOutcome {
  id: string;
  status: ResourceStatus;
  mutations: number;
  durationMs: number;
  revision?: string;
  error?: ProvisioningError;
}

export interface RunReport {
  success: boolean;
  succeeded: string[];
  failed?: { id: string; kind: ErrorKind; message: string; retryable: boolean };
  notAttempted: string[];
  mutations: number;
  outputs: OutputValues;
}

/**
 * One invocation of the pipeline. Mutated as resources complete, frozen by
 * `finalize()`.
 */
export class ProvisioningRun {
  readonly startedAt = new Date();

  private endedAt?: Date;
  private converged = false;
  private failure?: ProvisioningError;
  private readonly planned: string[] = [];
  private readonly order: string[] = [];
  private readonly outcomes = new Map<string, ResourceOutcome>();
  private readonly exported: OutputValues = {};
  private finalized = false;

  get finishedAt(): Date | undefined {
    return this.endedAt;
  }

  get success(): boolean {
    return this.converged;
  }

  get error(): ProvisioningError | undefined {
    return this.failure;
  }

  /** Ids actually executed, in execution order. */
  get executed(): readonly string[] {
    return [...this.order];
  }

  get outputs(): Readonly<OutputValues> {
    return this.exported;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  plan(ids: string[]): void {
    this.assertOpen();
    this.planned.splice(0, this.planned.length, ...ids);
  }

  record(outcome: ResourceOutcome): void {
    this.assertOpen();
    if (!this.outcomes.has(outcome.id)) {
      this.order.push(outcome.id);
    }
    this.outcomes.set(outcome.id, outcome);
  }

  /**
   * Merge outputs: list values accumulate without duplicates, scalar values
   * are replaced.
   */
  export(values: OutputValues): void {
    this.assertOpen();
    for (const [key, value] of Object.entries(values)) {
      this.exported[key] = mergeOutput(this.exported[key], value);
    }
  }

  outcome(id: string): ResourceOutcome | undefined {
    return this.outcomes.get(id);
  }

  isSatisfied(id: string): boolean {
    const status = this.outcomes.get(id)?.status;
    return status === "skipped" || status === "applied";
  }

  finalize(error?: ProvisioningError): this {
    this.assertOpen();
    this.failure = error;
    this.converged = error === undefined && this.planned.every((id) => this.isSatisfied(id));
    this.endedAt = new Date();
    this.finalized = true;
    for (const value of Object.values(this.exported)) {
      if (Array.isArray(value)) Object.freeze(value);
    }
    Object.freeze(this.exported);
    return this;
  }

  report(): RunReport {
    const succeeded = this.order.filter((id) => this.isSatisfied(id));
    const failedOutcome = this.order.map((id) => this.outcomes.get(id)).find((o) => o?.status === "failed");
    const failedError = failedOutcome?.error ?? this.failure;
    return {
      success: this.converged,
      succeeded,
      failed:
        failedError === undefined
          ? undefined
          : {
              id: failedOutcome?.id ?? failedError.resourceId ?? "run",
              kind: failedError.kind,
              message: failedError.message,
              retryable: failedError.retryable,
            },
      notAttempted: this.planned.filter((id) => !this.outcomes.has(id)),
      mutations: [...this.outcomes.values()].reduce((sum, o) => sum + o.mutations, 0),
      outputs: { ...this.exported },
    };
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error("ProvisioningRun is finalized and can no longer change");
    }
  }
}

function mergeOutput(current: OutputValue | undefined, next: OutputValue): OutputValue {
  if (Array.isArray(next)) {
    const base = Array.isArray(current) ? current : current === undefined ? [] : [current];
    return [...new Set([...base, ...next])];
  }
  return next;
}
