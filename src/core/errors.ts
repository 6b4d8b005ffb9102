/**
 * Provisioning error taxonomy.
 * Every failure carries the resource it happened on and whether an
 * operator-triggered re-run can be expected to fix it.
 */

export type ErrorKind =
  | "configuration"
  | "installation"
  | "detection"
  | "connectivity"
  | "conflict"
  | "rejected"
  | "timeout"
  | "lock"
  | "aborted";

export class ProvisioningError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  resourceId?: string;

  constructor(kind: ErrorKind, message: string, options: { resourceId?: string; retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.resourceId = options.resourceId;
    this.retryable = options.retryable ?? false;
  }

  /** Attaches the resource id if the throwing component did not know it. */
  forResource(resourceId: string): this {
    if (!this.resourceId) {
      this.resourceId = resourceId;
    }
    return this;
  }
}

/** Cyclic or dangling dependencies, invalid configuration. Never retried. */
export class ConfigurationError extends ProvisioningError {
  constructor(message: string, resourceId?: string) {
    super("configuration", message, { resourceId });
  }
}

/** A host procedure exited non-zero or its postcondition did not hold afterwards. */
export class InstallationError extends ProvisioningError {
  readonly exitCode?: number;
  readonly stderr?: string;

  constructor(message: string, details: { resourceId?: string; exitCode?: number; stderr?: string } = {}) {
    // The failed step is retried from scratch on the next run, never within this one.
    super("installation", message, { resourceId: details.resourceId, retryable: true });
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/** The idempotency predicate itself could not be evaluated. */
export class DetectionError extends ProvisioningError {
  constructor(message: string, resourceId?: string, cause?: unknown) {
    super("detection", message, { resourceId, retryable: true, cause });
  }
}

/** API server or credential unreachable. Transient. */
export class ConnectivityError extends ProvisioningError {
  constructor(message: string, resourceId?: string, cause?: unknown) {
    super("connectivity", message, { resourceId, retryable: true, cause });
  }
}

/** Attempt to change an immutable field of a live object. Needs manual remediation. */
export class ConflictError extends ProvisioningError {
  readonly object: string;
  readonly fields: string[];

  constructor(object: string, fields: string[], message: string, resourceId?: string) {
    super("conflict", message, { resourceId });
    this.object = object;
    this.fields = fields;
  }
}

/** The API server refused the object (schema or admission failure). */
export class RejectedError extends ProvisioningError {
  readonly object: string;
  readonly status: number;

  constructor(object: string, status: number, reason: string, resourceId?: string) {
    super("rejected", `API rejected ${object} (HTTP ${status}): ${reason}`, { resourceId });
    this.object = object;
    this.status = status;
  }
}

export class TimeoutError extends ProvisioningError {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number, resourceId?: string) {
    super("timeout", `${what} exceeded ${timeoutMs}ms`, { resourceId, retryable: true });
    this.timeoutMs = timeoutMs;
  }
}

export class LockError extends ProvisioningError {
  constructor(message: string) {
    super("lock", message, { retryable: true });
  }
}

export class AbortedError extends ProvisioningError {
  constructor(message = "Run aborted by operator", resourceId?: string) {
    super("aborted", message, { resourceId, retryable: true });
  }
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalizes anything thrown by an executor into the taxonomy. Unknown
 * failures are treated as installation errors: they happened while mutating.
 */
export function toProvisioningError(error: unknown, resourceId: string): ProvisioningError {
  if (isProvisioningError(error)) {
    return error.forResource(resourceId);
  }
  const wrapped = new ProvisioningError("installation", errorMessage(error), { resourceId, cause: error });
  if (error instanceof Error && error.stack) {
    wrapped.stack = error.stack;
  }
  return wrapped;
}
