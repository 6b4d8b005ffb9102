import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LockError } from "../../src/core/errors";
import { RunLock } from "../../src/core/lock";

describe("RunLock", () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "homelab-lock-"));
    lockPath = path.join(dir, "nested", "converge.lock");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the lock file naming its owner and removes it on release", async () => {
    const lock = new RunLock(lockPath, 4242);
    await lock.acquire();

    const contents = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    expect(contents.pid).toBe(4242);
    expect(typeof contents.startedAt).toBe("string");

    await lock.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("refuses a lock held by a live process", async () => {
    // The test runner itself is a live process that is not the caller.
    const held = new RunLock(lockPath, process.pid);
    await held.acquire();

    const second = new RunLock(lockPath, process.pid + 1);
    await expect(second.acquire()).rejects.toBeInstanceOf(LockError);
    await expect(second.acquire()).rejects.toThrow(`Another provisioning run (pid ${process.pid}`);

    await held.release();
  });

  it("refuses a second lock in the same process while the first is held", async () => {
    const first = new RunLock(lockPath);
    const second = new RunLock(lockPath);
    await first.acquire();

    await expect(second.acquire()).rejects.toThrow(`Another provisioning run (pid ${process.pid}`);
    await expect(first.acquire()).rejects.toThrow(`${lockPath} is already held by a run in this process`);

    await first.release();
    await second.acquire();
    await second.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("takes over a lock left behind by a dead process", async () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    // Larger than any pid_max, so never alive.
    fs.writeFileSync(lockPath, JSON.stringify({ pid: 99999999, startedAt: "2024-01-01T00:00:00.000Z" }));

    const lock = new RunLock(lockPath, 4242);
    await lock.acquire();

    expect(JSON.parse(fs.readFileSync(lockPath, "utf8")).pid).toBe(4242);
    await lock.release();
  });

  it("does not remove a lock it never acquired", async () => {
    const held = new RunLock(lockPath, process.pid);
    await held.acquire();

    await new RunLock(lockPath, 4242).release();
    expect(fs.existsSync(lockPath)).toBe(true);

    await held.release();
  });
});
