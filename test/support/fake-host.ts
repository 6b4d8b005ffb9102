import type { FileStat, HostFilesystem } from "../../src/host/filesystem";
import type { ShellExecutor, ShellOptions, ShellResult } from "../../src/host/shell";

export const K3S_KUBECONFIG = "/etc/rancher/k3s/k3s.yaml";

const INSPECTIONS = ["k3s --version", "systemctl is-active", "nvidia-ctk --version", "grep -q nvidia", "get nodes --no-headers"];

interface FakeFile {
  content: string;
  mode: number;
  uid: number;
}

interface Injected {
  fragment: string;
  result: ShellResult;
  remaining: number;
}

export function kubeconfigFor(server = "https://127.0.0.1:6443"): string {
  const b64 = (value: string) => Buffer.from(value).toString("base64");
  return [
    "apiVersion: v1",
    "kind: Config",
    "clusters:",
    "- name: default",
    "  cluster:",
    `    server: ${server}`,
    `    certificate-authority-data: ${b64("test-ca")}`,
    "users:",
    "- name: default",
    "  user:",
    `    client-certificate-data: ${b64("test-cert")}`,
    `    client-key-data: ${b64("test-key")}`,
    "contexts:",
    "- name: default",
    "  context:",
    "    cluster: default",
    "    user: default",
    "current-context: default",
    "",
  ].join("\n");
}

/**
 * A single-node host simulated in memory: the k3s install script, the
 * NVIDIA packages, `install(1)` and kubectl behave just enough like the
 * real ones for detection to see their effects.
 */
export class FakeHost implements ShellExecutor, HostFilesystem {
  k3s?: { version: string; active: boolean };
  gpu?: { version: string; registered: boolean };
  nodesReady = false;
  readonly files = new Map<string, FakeFile>();
  readonly commands: string[] = [];
  private injected: Injected[] = [];

  /** Make the next `times` commands containing `fragment` fail. */
  failOn(fragment: string, result: Partial<ShellResult> = {}, times = 1): this {
    this.injected.push({
      fragment,
      result: { exitCode: result.exitCode ?? 1, stdout: result.stdout ?? "", stderr: result.stderr ?? "boom" },
      remaining: times,
    });
    return this;
  }

  writeFile(path: string, content: string, mode = 0o644, uid = 0): void {
    this.files.set(path, { content, mode, uid });
  }

  /** Commands that changed something, i.e. everything but detection. */
  mutatingCommands(): string[] {
    return this.commands.filter((command) => !INSPECTIONS.some((fragment) => command.includes(fragment)));
  }

  async readFile(path: string): Promise<string | null> {
    return this.files.get(path)?.content ?? null;
  }

  async stat(path: string): Promise<FileStat | null> {
    const file = this.files.get(path);
    return file ? { mode: file.mode, uid: file.uid, size: file.content.length } : null;
  }

  async execute(command: string, _options?: ShellOptions): Promise<ShellResult> {
    this.commands.push(command);

    const injected = this.injected.find((entry) => entry.remaining > 0 && command.includes(entry.fragment));
    if (injected) {
      injected.remaining -= 1;
      return injected.result;
    }
    return this.run(command);
  }

  private run(command: string): ShellResult {
    if (command === "k3s --version") {
      return this.k3s
        ? ok(`k3s version ${this.k3s.version} (7b8d3b1e)\ngo version go1.20.12\n`)
        : { exitCode: 127, stdout: "", stderr: "sh: k3s: not found" };
    }
    if (command.startsWith("systemctl is-active ")) {
      return this.k3s?.active ? ok("active\n") : { exitCode: 3, stdout: "inactive\n", stderr: "" };
    }
    if (command === "nvidia-ctk --version") {
      return this.gpu
        ? ok(`NVIDIA Container Toolkit CLI version ${this.gpu.version}\ncommit: d167812\n`)
        : { exitCode: 127, stdout: "", stderr: "sh: nvidia-ctk: not found" };
    }
    if (command.startsWith("grep -q nvidia ")) {
      return { exitCode: this.gpu?.registered ? 0 : 1, stdout: "", stderr: "" };
    }
    if (command.includes("get nodes --no-headers")) {
      if (!this.k3s?.active) {
        return { exitCode: 1, stdout: "", stderr: "The connection to the server 127.0.0.1:6443 was refused" };
      }
      const status = this.nodesReady ? "Ready" : "NotReady";
      return ok(`homelab   ${status}   control-plane,master   2m   ${this.k3s.version}\n`);
    }

    const k3sVersion = /INSTALL_K3S_VERSION='([^']+)'/.exec(command);
    if (command.startsWith("curl -sfL ") && k3sVersion) {
      this.startRuntime(k3sVersion[1]);
      if (!this.files.has(K3S_KUBECONFIG)) {
        this.writeFile(K3S_KUBECONFIG, kubeconfigFor(), 0o644, 0);
      }
      return ok("[INFO]  systemd: Starting k3s\n");
    }
    if (command === "systemctl enable --now k3s" || command === "systemctl restart k3s") {
      if (!this.k3s) return { exitCode: 5, stdout: "", stderr: "Unit k3s.service not found." };
      this.startRuntime(this.k3s.version);
      return ok("");
    }

    const toolkit = /nvidia-container-toolkit=(\d+\.\d+\.\d+)-1/.exec(command);
    if (command.includes("apt-get install") && toolkit) {
      this.gpu = { version: toolkit[1], registered: false };
      return ok("");
    }
    if (command.startsWith("curl -fsSL https://nvidia.github.io/") || command === "apt-get update") {
      return ok("");
    }

    if (command.startsWith("mkdir -p ")) {
      return ok("");
    }
    const copy = /^install -m (\d+) -o (\d+) -g (\d+) '([^']+)' '([^']+)'$/.exec(command);
    if (copy) {
      const source = this.files.get(copy[4]);
      if (!source) return { exitCode: 1, stdout: "", stderr: `install: cannot stat '${copy[4]}'` };
      this.writeFile(copy[5], source.content, parseInt(copy[1], 8), Number(copy[2]));
      return ok("");
    }

    if (command.startsWith("for i in $(seq ")) {
      return ok("");
    }
    if (command.includes(" wait --for=condition=ready node --all ")) {
      if (!this.k3s?.active) return { exitCode: 1, stdout: "", stderr: "error: timed out waiting for the condition" };
      this.nodesReady = true;
      return ok("node/homelab condition met\n");
    }

    return { exitCode: 127, stdout: "", stderr: `sh: unexpected command: ${command}` };
  }

  /** A (re)started k3s picks up an installed toolkit and reports its node as NotReady for a while. */
  private startRuntime(version: string): void {
    this.k3s = { version, active: true };
    this.nodesReady = false;
    if (this.gpu) {
      this.gpu.registered = true;
    }
  }
}

function ok(stdout: string): ShellResult {
  return { exitCode: 0, stdout, stderr: "" };
}
