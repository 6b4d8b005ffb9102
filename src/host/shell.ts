import { ChildProcess, spawn } from "child_process";
import type { Readable } from "stream";
import { AbortedError, TimeoutError } from "../core/errors";

export interface ShellResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ShellOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
  /** Stops the command (and everything it started) when aborted. */
  signal?: AbortSignal;
}

export interface ShellExecutor {
  execute(command: string, options?: ShellOptions): Promise<ShellResult>;
}

export interface LocalShellOptions {
  /** Prefix privileged commands with `sudo -n` when not running as root. */
  sudo?: boolean;
  defaultTimeoutMs?: number;
  maxBufferBytes?: number;
  /** Time between SIGTERM and SIGKILL when a command is stopped. */
  killGraceMs?: number;
}

/**
 * Runs commands through /bin/sh on the local host. A non-zero exit code is
 * returned, not thrown; callers decide what failure means.
 *
 * Each command runs in its own process group, so a terminal Ctrl-C reaches
 * the CLI and not the step in progress. Timeouts and aborts signal the whole
 * group.
 */
export class LocalShellExecutor implements ShellExecutor {
  private readonly sudo: boolean;
  private readonly defaultTimeoutMs: number;
  private readonly maxBufferBytes: number;
  private readonly killGraceMs: number;

  constructor(options: LocalShellOptions = {}) {
    this.sudo = options.sudo ?? (typeof process.getuid === "function" && process.getuid() !== 0);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 10 * 60 * 1000;
    this.maxBufferBytes = options.maxBufferBytes ?? 16 * 1024 * 1024;
    this.killGraceMs = options.killGraceMs ?? 5000;
  }

  /** The exact line handed to /bin/sh. */
  commandLine(command: string): string {
    return this.sudo ? `sudo -n -E sh -c ${quote(command)}` : command;
  }

  execute(command: string, options: ShellOptions = {}): Promise<ShellResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new AbortedError(`Command '${summarize(command)}' cancelled before it started`));
    }

    return new Promise((resolve, reject) => {
      const child = spawn("/bin/sh", ["-c", this.commandLine(command)], {
        detached: true,
        stdio: ["ignore", "pipe", "pipe"],
        env: { ...process.env, ...options.env },
      });
      const stdout = collect(child.stdout, this.maxBufferBytes);
      const stderr = collect(child.stderr, this.maxBufferBytes);

      let stopped: "timeout" | "aborted" | undefined;
      let escalation: NodeJS.Timeout | undefined;
      const stop = (reason: "timeout" | "aborted") => {
        if (stopped) return;
        stopped = reason;
        killGroup(child, "SIGTERM");
        escalation = setTimeout(() => killGroup(child, "SIGKILL"), this.killGraceMs);
      };
      const timer = setTimeout(() => stop("timeout"), timeoutMs);
      const onAbort = () => stop("aborted");
      signal?.addEventListener("abort", onAbort, { once: true });

      const cleanup = () => {
        clearTimeout(timer);
        clearTimeout(escalation);
        signal?.removeEventListener("abort", onAbort);
      };

      child.once("error", (error) => {
        cleanup();
        reject(error);
      });
      child.once("close", (code, exitSignal) => {
        cleanup();
        if (stopped === "timeout") {
          reject(new TimeoutError(`Command '${summarize(command)}'`, timeoutMs));
          return;
        }
        if (stopped === "aborted") {
          reject(new AbortedError(`Command '${summarize(command)}' cancelled`));
          return;
        }
        const err = stderr();
        resolve({
          exitCode: code ?? 1,
          stdout: stdout(),
          stderr: err === "" && exitSignal ? `terminated by ${exitSignal}` : err,
        });
      });
    });
  }
}

function collect(stream: Readable | null, limit: number): () => string {
  const chunks: Buffer[] = [];
  let size = 0;
  stream?.on("data", (chunk: Buffer) => {
    if (size < limit) {
      chunks.push(chunk);
      size += chunk.length;
    }
  });
  return () => Buffer.concat(chunks).subarray(0, limit).toString("utf8");
}

function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    // ESRCH: the group is already gone.
    if (!(error instanceof Error && "code" in error && error.code === "ESRCH")) {
      child.kill(signal);
    }
  }
}

/** Single-quote a string for /bin/sh. */
export function quote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function summarize(command: string, words = 4): string {
  const parts = command.trim().split(/\s+/);
  return parts.length > words ? `${parts.slice(0, words).join(" ")} …` : parts.join(" ");
}
