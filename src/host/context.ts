import { spawnSync } from "child_process";
import os from "os";
import type { HostIdentity } from "../core/pipeline";
import type { HostFilesystem } from "./filesystem";
import type { ShellExecutor } from "./shell";

/**
 * Everything a host operation may touch. Injected so detection can run
 * against a fake host in tests.
 */
export interface HostContext {
  shell: ShellExecutor;
  fs: HostFilesystem;
  /** Upper bound for a single command. */
  commandTimeoutMs: number;
}

/**
 * The invoking user; under sudo that is the user behind it, so the
 * kubeconfig ends up in their home directory and owned by them.
 */
export function currentIdentity(
  env: NodeJS.ProcessEnv = process.env,
  lookupHome: (user: string) => string | undefined = passwdHome,
): HostIdentity {
  const info = os.userInfo();
  const uid = env.SUDO_UID ? Number(env.SUDO_UID) : info.uid;
  const gid = env.SUDO_GID ? Number(env.SUDO_GID) : info.gid;
  if (!env.SUDO_USER || env.SUDO_USER === info.username) {
    return { uid, gid, home: info.homedir };
  }
  const user = env.SUDO_USER;
  const home = lookupHome(user) ?? (user === "root" ? "/root" : `/home/${user}`);
  return { uid, gid, home };
}

/** Home directory from the passwd database (files, LDAP or whatever NSS is configured with). */
export function passwdHome(user: string): string | undefined {
  const result = spawnSync("getent", ["passwd", user], { encoding: "utf8" });
  return result.status === 0 ? parsePasswdHome(result.stdout) : undefined;
}

export function parsePasswdHome(entry: string): string | undefined {
  const fields = entry.trim().split(":");
  return fields.length >= 7 && fields[5] !== "" ? fields[5] : undefined;
}
