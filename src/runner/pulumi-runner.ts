import { LocalWorkspace } from "@pulumi/pulumi/automation";
import { errorMessage } from "../core/errors";
import { ManifestLoader } from "../gitops/manifests";
import type { KubeObject } from "../cluster/types";
import { currentIdentity } from "../index";
import { defaultManifestSource, parseDuration, ProvisionConfig } from "../types/schemas";
import { declarePulumiStack } from "./pulumi-program";

export interface PulumiOptions {
  preview?: boolean;
  stack?: string;
  destroy?: boolean;
}

export const PROJECT_NAME = "homelab-provisioner";

export async function runPulumi(config: ProvisionConfig, opts: PulumiOptions = {}) {
  const stackName = opts.stack || "dev";

  // Local backends need a passphrase for the stack's secrets provider
  process.env.PULUMI_CONFIG_PASSPHRASE = process.env.PULUMI_CONFIG_PASSPHRASE || "homelab-dev";

  const program = async () => {
    console.log(`🚀 Declaring k3s ${config.runtime.version} homelab`);
    let manifests: KubeObject[] = [];
    if (config.gitops.enabled) {
      const loader = new ManifestLoader({ timeoutMs: parseDuration(config.timeouts.api_request) });
      manifests = await loader.load(config.gitops.manifests ?? defaultManifestSource(config.gitops.version));
    }
    return declarePulumiStack(config, currentIdentity(), manifests).outputs;
  };

  try {
    const stack = await LocalWorkspace.createOrSelectStack({ stackName, projectName: PROJECT_NAME, program });
    console.log(`📋 Using Pulumi stack: ${stackName}`);

    await stack.setConfig("homelab:runtime_version", { value: config.runtime.version });

    if (opts.destroy) {
      console.log("🔥 Destroying stack...");
      const result = await stack.destroy({ onOutput: console.log });
      console.log(`✅ Destroy completed. Resources destroyed: ${result.summary.resourceChanges?.delete || 0}`);
      return result;
    }

    if (opts.preview) {
      console.log("👁️ Previewing changes...");
      const result = await stack.preview({ onOutput: console.log });
      console.log(
        `📊 Preview completed. Changes: +${result.changeSummary.create || 0} ~${result.changeSummary.update || 0} -${result.changeSummary.delete || 0}`,
      );
      return result;
    }

    console.log("🔄 Applying changes...");
    const result = await stack.up({ onOutput: console.log });
    console.log(`✅ Deployment completed. Resources created: ${result.summary.resourceChanges?.create || 0}`);

    const outputs = Object.entries(result.outputs);
    if (outputs.length > 0) {
      console.log("\n📋 Stack Outputs:");
      outputs.forEach(([key, output]) => {
        console.log(`   ${key}: ${output.secret ? "[secret]" : JSON.stringify(output.value)}`);
      });
    }
    return result;
  } catch (error) {
    console.error(`❌ Pulumi execution failed: ${errorMessage(error)}`);
    throw error;
  }
}
