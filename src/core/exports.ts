/**
 * Stack exports
 *
 * Process-wide surface for the values external tooling reads after a run:
 * installed runtime version, kubeconfig path, namespaces, and the command
 * that prints the GitOps controller's initial admin password.
 */
import fs from "fs";
import path from "path";
import type { OutputValue, OutputValues } from "./resource";

export class StackExports {
  private values = new Map<string, OutputValue>();

  set(key: string, value: OutputValue): void {
    this.values.set(key, value);
  }

  get(key: string): OutputValue | undefined {
    return this.values.get(key);
  }

  merge(values: OutputValues): void {
    for (const [key, value] of Object.entries(values)) {
      this.set(key, value);
    }
  }

  all(): OutputValues {
    return Object.fromEntries(this.values);
  }

  clear(): void {
    this.values.clear();
  }

  async writeTo(file: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, JSON.stringify(this.all(), null, 2) + "\n", "utf8");
  }

  static async readFrom(file: string): Promise<OutputValues> {
    const raw = await fs.promises.readFile(file, "utf8");
    const parsed: unknown = JSON.parse(raw);
    const values: OutputValues = {};
    if (typeof parsed === "object" && parsed !== null) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") {
          values[key] = value;
        } else if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
          values[key] = value;
        }
      }
    }
    return values;
  }
}

export const stackExports = new StackExports();
