import crypto from "crypto";
import fs from "fs";
import path from "path";
import { errorMessage, LockError } from "./errors";

interface LockContents {
  pid: number;
  startedAt: string;
}

/**
 * Run-level lock. Two converge runs must never race on host package state,
 * so the lock file is created exclusively and names its owner.
 */
export class RunLock {
  private held = false;

  constructor(readonly lockPath: string, private readonly pid: number = process.pid) {}

  async acquire(): Promise<void> {
    if (this.held) {
      throw new LockError(`${this.lockPath} is already held by a run in this process`);
    }
    await fs.promises.mkdir(path.dirname(this.lockPath), { recursive: true });

    if (await this.create()) return;

    // A live owner holds the lock, including another lock object in this process.
    const owner = await this.readOwner();
    if (owner && isProcessAlive(owner.pid)) {
      throw new LockError(`Another provisioning run (pid ${owner.pid}, started ${owner.startedAt}) holds ${this.lockPath}`);
    }

    // Stale lock from a dead process: remove it and race for a fresh exclusive create.
    await fs.promises.rm(this.lockPath, { force: true });
    if (!(await this.create())) {
      throw new LockError(`Another provisioning run took over the stale lock ${this.lockPath}`);
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await fs.promises.rm(this.lockPath, { force: true });
  }

  /**
   * Exclusive create; false when the file already exists. The contents are
   * written to a staging file first and hard-linked into place, so a reader
   * never sees a lock without its owner.
   */
  private async create(): Promise<boolean> {
    const contents: LockContents = { pid: this.pid, startedAt: new Date().toISOString() };
    const staging = `${this.lockPath}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.promises.writeFile(staging, JSON.stringify(contents), { mode: 0o600 });
      await fs.promises.link(staging, this.lockPath);
    } catch (error) {
      if (isAlreadyExists(error)) return false;
      throw new LockError(`Cannot create lock file ${this.lockPath}: ${errorMessage(error)}`);
    } finally {
      await fs.promises.rm(staging, { force: true });
    }
    this.held = true;
    return true;
  }

  private async readOwner(): Promise<LockContents | null> {
    try {
      const raw = await fs.promises.readFile(this.lockPath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "pid" in parsed &&
        typeof parsed.pid === "number" &&
        "startedAt" in parsed &&
        typeof parsed.startedAt === "string"
      ) {
        return { pid: parsed.pid, startedAt: parsed.startedAt };
      }
      return null;
    } catch {
      // Unreadable or half-written lock is treated as stale.
      return null;
    }
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else.
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}
