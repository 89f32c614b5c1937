import { ZodError } from "zod";
import { type Config, loadConfig } from "../config/index.js";
import { configureLogger, logger } from "../config/logger.js";
import { createInstaller } from "../installers/index.js";
import { loadCatalog, overlayTargetBlock } from "../provisioning/catalog-loader.js";
import { parseConfigJson, resolveTargetConfig } from "../provisioning/config-resolver.js";
import { ConfigInvalidError, isProvisioningError } from "../provisioning/errors.js";
import { EXIT_OK, ExitCoordinator } from "../provisioning/exit-coordinator.js";
import type { HttpProbe } from "../provisioning/health-checker.js";
import { LifecycleOrchestrator, type ProvisionPlan } from "../provisioning/lifecycle-orchestrator.js";
import type { Sleep } from "../provisioning/retry-policy.js";
import { PctRuntimeClient } from "../runtime/pct-client.js";
import type { RuntimeClient } from "../runtime/runtime-client.js";
import { type CliCommand, parseArgs, USAGE } from "./args.js";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  runtime?: RuntimeClient;
  hostProbe?: HttpProbe;
  sleep?: Sleep;
  /** Where usage text goes. */
  write?: (text: string) => void;
}

function readConfig(env: NodeJS.ProcessEnv): Config {
  try {
    return loadConfig(env);
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      throw new ConfigInvalidError(`env.${issue?.path.join(".") ?? ""}`, issue?.message ?? "invalid value");
    }
    throw err;
  }
}

/** Turn a parsed command into an orchestrator plan. */
export function buildPlan(cmd: Exclude<CliCommand, { command: "help" }>, config: Config, runtime: RuntimeClient): ProvisionPlan {
  const resolveOptions = { defaultBridge: config.runtime.defaultBridge };

  switch (cmd.command) {
    case "clone": {
      const catalog = loadCatalog(cmd.configFile);
      const block = parseConfigJson(cmd.targetJson);
      const target = resolveTargetConfig(overlayTargetBlock(catalog, cmd.targetCtid, block), cmd.targetCtid, resolveOptions);
      return { config: target, source: { sourceCtid: cmd.sourceCtid, snapshotName: cmd.snapshotName } };
    }

    case "provision": {
      const catalog = loadCatalog(cmd.catalogPath ?? config.catalogPath);
      const target = resolveTargetConfig(catalog, cmd.ctid, resolveOptions);
      return {
        config: target,
        source: target.cloneFrom,
        installer: target.workload ? createInstaller(target.workload, runtime) : undefined,
        finalizeSnapshot: target.templateSnapshotName,
      };
    }

    case "finalize": {
      const catalog = loadCatalog(cmd.catalogPath ?? config.catalogPath);
      const target = resolveTargetConfig(catalog, cmd.ctid, resolveOptions);
      const finalizeSnapshot = cmd.snapshotName ?? target.templateSnapshotName;
      if (!finalizeSnapshot) {
        throw new ConfigInvalidError(
          `lxc_configs.${cmd.ctid}.template_snapshot_name`,
          "finalize needs a snapshot name (--snapshot or template_snapshot_name)",
        );
      }
      return {
        config: target,
        installer: target.workload ? createInstaller(target.workload, runtime) : undefined,
        finalizeSnapshot,
      };
    }
  }
}

/** Run one CLI invocation and return its exit code; never throws. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  let cmd: CliCommand;
  try {
    cmd = parseArgs(argv);
  } catch (err) {
    if (isProvisioningError(err)) {
      write(USAGE);
    }
    return new ExitCoordinator("lxc-provision").finish({ ok: false, error: err });
  }
  if (cmd.command === "help") {
    write(USAGE);
    return 0;
  }

  const coordinator = new ExitCoordinator(cmd.command);
  try {
    const config = readConfig(deps.env ?? process.env);
    configureLogger({ level: config.logLevel, file: config.logFile });

    const runtime =
      deps.runtime ??
      new PctRuntimeClient({ pctBin: config.runtime.pctBin, commandTimeoutMs: config.runtime.commandTimeoutMs });
    const plan = buildPlan(cmd, config, runtime);
    const orchestrator = new LifecycleOrchestrator(runtime, {
      healthCheck: config.healthCheck,
      shutdownTimeoutSeconds: config.waits.shutdownTimeoutSeconds,
      startTimeoutSeconds: config.waits.startTimeoutSeconds,
      pollIntervalSeconds: config.waits.pollIntervalSeconds,
      hostProbe: deps.hostProbe,
      sleep: deps.sleep,
    });

    if (cmd.dryRun) {
      for (const step of orchestrator.planSteps(plan)) {
        logger.info(`Dry run: ${step}`, { ctid: plan.config.ctid });
      }
      logger.info(`Dry run of ${cmd.command} finished; nothing was changed`, { ctid: plan.config.ctid });
      return EXIT_OK;
    }

    logger.info(`Running ${cmd.command}`, { ctid: plan.config.ctid });
    const report = await orchestrator.run(plan);
    return coordinator.finish({ ok: true, report });
  } catch (err) {
    return coordinator.finish({ ok: false, error: err });
  }
}
