import YAML from "yaml";
import { z } from "zod";
import { ConnectivityError } from "../core/errors";

/**
 * Typed hand-off from the kubeconfig host operation to the cluster client
 * factory. Only valid until the host is re-provisioned.
 */
export interface ClusterCredential {
  kubeconfigPath: string;
  /** sha256 of the kubeconfig content when it was published. */
  digest: string;
  context?: string;
}

export interface ClusterConnection {
  server: string;
  namespace?: string;
  caPem?: string;
  certPem?: string;
  keyPem?: string;
  token?: string;
  insecureSkipTlsVerify: boolean;
  /** File references still to be read by the caller. */
  files: { ca?: string; cert?: string; key?: string };
}

const KubeconfigSchema = z.object({
  "current-context": z.string().optional(),
  clusters: z
    .array(
      z.object({
        name: z.string(),
        cluster: z.object({
          server: z.string().url(),
          "certificate-authority-data": z.string().optional(),
          "certificate-authority": z.string().optional(),
          "insecure-skip-tls-verify": z.boolean().optional(),
        }),
      }),
    )
    .min(1),
  users: z
    .array(
      z.object({
        name: z.string(),
        user: z
          .object({
            "client-certificate-data": z.string().optional(),
            "client-key-data": z.string().optional(),
            "client-certificate": z.string().optional(),
            "client-key": z.string().optional(),
            token: z.string().optional(),
          })
          .default({}),
      }),
    )
    .default([]),
  contexts: z
    .array(
      z.object({
        name: z.string(),
        context: z.object({ cluster: z.string(), user: z.string().optional(), namespace: z.string().optional() }),
      }),
    )
    .default([]),
});

export type Kubeconfig = z.infer<typeof KubeconfigSchema>;

/**
 * Resolve the connection settings of a context (the current one by default).
 * A kubeconfig without contexts uses its first cluster and user.
 */
export function parseKubeconfig(text: string, contextName?: string): ClusterConnection {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConnectivityError(`Kubeconfig is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = KubeconfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConnectivityError(`Kubeconfig is invalid: ${issues}`);
  }
  const config = parsed.data;

  const wanted = contextName ?? config["current-context"];
  const context = wanted ? config.contexts.find((c) => c.name === wanted) : config.contexts[0];
  if (wanted && !context) {
    throw new ConnectivityError(`Kubeconfig has no context named '${wanted}'`);
  }

  const cluster = context ? config.clusters.find((c) => c.name === context.context.cluster) : config.clusters[0];
  if (!cluster) {
    throw new ConnectivityError(`Kubeconfig context '${context?.name}' references unknown cluster '${context?.context.cluster}'`);
  }
  const userName = context?.context.user;
  const user = userName ? config.users.find((u) => u.name === userName) : config.users[0];

  return {
    server: cluster.cluster.server.replace(/\/+$/, ""),
    namespace: context?.context.namespace,
    caPem: decode(cluster.cluster["certificate-authority-data"]),
    certPem: decode(user?.user["client-certificate-data"]),
    keyPem: decode(user?.user["client-key-data"]),
    token: user?.user.token,
    insecureSkipTlsVerify: cluster.cluster["insecure-skip-tls-verify"] ?? false,
    files: {
      ca: cluster.cluster["certificate-authority"],
      cert: user?.user["client-certificate"],
      key: user?.user["client-key"],
    },
  };
}

function decode(data: string | undefined): string | undefined {
  return data === undefined ? undefined : Buffer.from(data, "base64").toString("utf8");
}
