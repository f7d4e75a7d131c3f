import * as automation from "@pulumi/pulumi/automation";
import { NetworkAclModule } from "../core/network-acl";
import { ErrorHandler, ErrorLevel } from "../logging/error-handler";
import type { RunnerSettings } from "../config/settings";
import { FingerprintSchema, type Fingerprint, type NaclModuleConfig } from "../types/schemas";

export interface PulumiOptions {
  preview?: boolean;
  destroy?: boolean;
  logger?: ErrorHandler;
}

/** Reads the fingerprint the last update exported, so unchanged rules keep their salt. */
export async function readPreviousFingerprint(stack: automation.Stack): Promise<Fingerprint | undefined> {
  const outputs = await stack.outputs();
  const parsed = FingerprintSchema.safeParse(outputs.fingerprint?.value);
  return parsed.success ? parsed.data : undefined;
}

export async function runPulumi(config: NaclModuleConfig, settings: RunnerSettings, opts: PulumiOptions = {}) {
  const logger = opts.logger ?? new ErrorHandler(settings.logLevel);
  const onOutput = (out: string) => logger.log(ErrorLevel.DEBUG, out.trimEnd());

  process.env.PULUMI_CONFIG_PASSPHRASE = settings.passphrase;

  let previousFingerprint: Fingerprint | undefined;

  const program = async () => {
    const nacl = new NetworkAclModule(config.name, { config, previousFingerprint, logger });
    return {
      networkAclId: nacl.networkAclId,
      networkAclArn: nacl.networkAclArn,
      networkAclName: nacl.networkAclName,
      ruleIds: nacl.ruleIds,
      fingerprint: nacl.fingerprint,
    };
  };

  try {
    const stack = await automation.LocalWorkspace.createOrSelectStack({
      stackName: settings.stack,
      projectName: settings.projectName,
      program,
    });

    logger.log(ErrorLevel.INFO, `📋 Using Pulumi stack: ${settings.stack}`);

    if (config.region) {
      await stack.setConfig("aws:region", { value: config.region });
    }

    if (opts.destroy) {
      logger.log(ErrorLevel.INFO, "🔥 Destroying stack...");
      const result = await stack.destroy({ onOutput });
      logger.log(ErrorLevel.INFO, `✅ Destroy completed. Resources destroyed: ${result.summary.resourceChanges?.delete ?? 0}`);
      return result;
    }

    previousFingerprint = await readPreviousFingerprint(stack);
    if (previousFingerprint) {
      logger.log(ErrorLevel.DEBUG, `Previous rule fingerprint ${previousFingerprint.digest} (salt ${previousFingerprint.salt})`);
    }

    if (opts.preview) {
      logger.log(ErrorLevel.INFO, "👁️ Previewing changes...");
      const result = await stack.preview({ onOutput });
      const changes = result.changeSummary;
      logger.log(
        ErrorLevel.INFO,
        `📊 Preview completed. Changes: +${changes.create ?? 0} ~${changes.update ?? 0} -${changes.delete ?? 0} +-${changes.replace ?? 0}`
      );
      return result;
    }

    logger.log(ErrorLevel.INFO, "🔄 Applying changes...");
    const result = await stack.up({ onOutput });
    logger.log(ErrorLevel.INFO, `✅ Deployment completed. Resources created: ${result.summary.resourceChanges?.create ?? 0}`);
    for (const [key, output] of Object.entries(result.outputs)) {
      logger.log(ErrorLevel.INFO, `   ${key}: ${JSON.stringify(output.value)}`);
    }
    return result;
  } catch (error) {
    logger.log(ErrorLevel.ERROR, "❌ Pulumi execution failed", error instanceof Error ? error : undefined);
    throw error;
  }
}
