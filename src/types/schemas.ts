import { z } from "zod";
import { isQuantity } from "../cluster/quantity";

const DURATION = /^\d+(ms|s|m|h)$/;
const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;

const LabelsSchema = z.record(z.string()).optional();

export const RuntimeSchema = z.object({
  version: z.string().regex(/^v\d+\.\d+\.\d+(\+k3s\d+)?$/, "expected a k3s release such as v1.28.5+k3s1"),
  server_args: z.array(z.string().min(1)).default(["--disable=traefik", "--write-kubeconfig-mode=644"]),
  install_script_url: z.string().url().default("https://get.k3s.io"),
  kubeconfig_source: z.string().min(1).default("/etc/rancher/k3s/k3s.yaml"),
  node_ready_timeout: z.string().regex(DURATION).default("60s"),
});

export const GpuSchema = z.object({
  enabled: z.boolean().default(false),
  toolkit_version: z.string().regex(/^\d+\.\d+\.\d+$/).default("1.14.3"),
  containerd_config: z.string().min(1).default("/var/lib/rancher/k3s/agent/etc/containerd/config.toml"),
});

export const CredentialSchema = z.object({
  path: z.string().min(1).default("~/.kube/config"),
  context: z.string().optional(),
});

export const NamespaceSchema = z.object({
  name: z.string().max(63).regex(DNS_LABEL, "namespace names must be DNS-1123 labels"),
  labels: LabelsSchema,
  annotations: LabelsSchema,
});

export const StorageSchema = z.object({
  name: z.string().max(253).regex(DNS_SUBDOMAIN, "volume names must be DNS-1123 subdomains"),
  capacity: z.string().refine(isQuantity, "expected a quantity such as 10Gi"),
  access_modes: z.array(z.enum(["ReadWriteOnce", "ReadOnlyMany", "ReadWriteMany", "ReadWriteOncePod"])).nonempty(),
  host_path: z.string().startsWith("/"),
  host_path_type: z
    .enum(["", "DirectoryOrCreate", "Directory", "FileOrCreate", "File", "Socket", "CharDevice", "BlockDevice"])
    .default("DirectoryOrCreate"),
  storage_class: z.string().default("local-storage"),
  reclaim_policy: z.enum(["Retain", "Delete", "Recycle"]).default("Retain"),
  volume_mode: z.enum(["Filesystem", "Block"]).default("Filesystem"),
  labels: LabelsSchema,
});

export const GitOpsSchema = z.object({
  enabled: z.boolean().default(true),
  namespace: z.string().regex(DNS_LABEL).default("argocd"),
  version: z.string().regex(/^v\d+\.\d+\.\d+$/).default("v2.9.3"),
  /** Local path or https URL of the installation bundle; defaults to the upstream install.yaml of `version`. */
  manifests: z.string().min(1).optional(),
});

export const TimeoutsSchema = z.object({
  host_command: z.string().regex(DURATION).default("10m"),
  host_operation: z.string().regex(DURATION).default("20m"),
  api_request: z.string().regex(DURATION).default("30s"),
  cluster_object: z.string().regex(DURATION).default("5m"),
});

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  format: z.enum(["json", "text"]).default("text"),
});

export const ProvisionConfigSchema = z
  .object({
    runtime: RuntimeSchema,
    gpu: GpuSchema.default({}),
    credential: CredentialSchema.default({}),
    namespaces: z.array(NamespaceSchema).default([{ name: "media" }]),
    storage: z.array(StorageSchema).default([
      {
        name: "jellyfin-config-pv",
        capacity: "10Gi",
        access_modes: ["ReadWriteOnce"],
        host_path: "/data/jellyfin/config",
      },
      {
        name: "jellyfin-media-pv",
        capacity: "500Gi",
        access_modes: ["ReadWriteMany"],
        host_path: "/data/jellyfin/media",
      },
    ]),
    gitops: GitOpsSchema.default({}),
    timeouts: TimeoutsSchema.default({}),
    lock_path: z.string().min(1).default("~/.homelab/converge.lock"),
    outputs_path: z.string().min(1).default("./outputs.json"),
    sudo: z.boolean().optional(),
    logging: LoggingSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.namespaces.forEach((ns, index) => {
      if (seen.has(ns.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["namespaces", index, "name"], message: `duplicate namespace '${ns.name}'` });
      }
      seen.add(ns.name);
    });
    const volumes = new Set<string>();
    config.storage.forEach((pv, index) => {
      if (volumes.has(pv.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["storage", index, "name"], message: `duplicate volume '${pv.name}'` });
      }
      volumes.add(pv.name);
    });
  });

// Export types
export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;
export type ProvisionConfigInput = z.input<typeof ProvisionConfigSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;
export type GpuConfig = z.infer<typeof GpuSchema>;
export type NamespaceConfig = z.infer<typeof NamespaceSchema>;
export type StorageConfig = z.infer<typeof StorageSchema>;
export type GitOpsConfig = z.infer<typeof GitOpsSchema>;
export type TimeoutsConfig = z.infer<typeof TimeoutsSchema>;

// Validation helpers
export const validateConfigSafe = (data: unknown) => {
  return ProvisionConfigSchema.safeParse(data);
};

export function parseDuration(value: string): number {
  const match = /^(\d+)(ms|s|m|h)$/.exec(value);
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }
  const amount = Number(match[1]);
  switch (match[2]) {
    case "ms":
      return amount;
    case "s":
      return amount * 1000;
    case "m":
      return amount * 60 * 1000;
    default:
      return amount * 60 * 60 * 1000;
  }
}

export function defaultManifestSource(version: string): string {
  return `https://raw.githubusercontent.com/argoproj/argo-cd/${version}/manifests/install.yaml`;
}
