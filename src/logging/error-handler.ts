/**
 * Error recording for provisioning runs.
 * Keeps every failure with its resource, kind and stack, and tells the
 * operator what a re-run will do about it.
 */
import { ErrorKind, ProvisioningError, toProvisioningError } from "../core/errors";
import { Logger } from "./logger";

export interface ErrorRecord {
  kind: ErrorKind;
  resourceId?: string;
  message: string;
  retryable: boolean;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

const REMEDIATION: Record<ErrorKind, string> = {
  configuration: "fix the configuration before re-running",
  installation: "re-run converge; satisfied steps are skipped and the failed step starts from scratch",
  detection: "check that the host tools used for detection are available, then re-run",
  connectivity: "check that the API server is reachable, then re-run",
  conflict: "remove or release the live object by hand; automatic resolution could lose data",
  rejected: "correct the object definition the API server rejected",
  timeout: "re-run converge, or raise the timeout for this step",
  lock: "wait for the other run to finish or remove a stale lock file",
  aborted: "re-run converge to continue where the run stopped",
};

export class ErrorHandler {
  private records: ErrorRecord[] = [];

  constructor(private readonly logger: Logger) {}

  record(error: unknown, resourceId?: string, context?: Record<string, unknown>): ProvisioningError {
    const normalized =
      resourceId === undefined && error instanceof ProvisioningError
        ? error
        : toProvisioningError(error, resourceId ?? "run");
    const record: ErrorRecord = {
      kind: normalized.kind,
      resourceId: normalized.resourceId,
      message: normalized.message,
      retryable: normalized.retryable,
      timestamp: new Date(),
      stack: normalized.stack,
      context,
    };
    this.records.push(record);
    this.logger.error(`${normalized.kind} error: ${normalized.message}`, {
      resource: normalized.resourceId,
      retryable: normalized.retryable,
      ...context,
    });
    return normalized;
  }

  getRecords(kind?: ErrorKind): ErrorRecord[] {
    if (kind) {
      return this.records.filter((record) => record.kind === kind);
    }
    return [...this.records];
  }

  clear(): void {
    this.records = [];
  }
}

export function remediationFor(kind: ErrorKind): string {
  return REMEDIATION[kind];
}
