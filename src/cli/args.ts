import { UsageError } from "../provisioning/errors.js";

export type CliCommand =
  | {
      command: "clone";
      sourceCtid: number;
      snapshotName: string;
      targetCtid: number;
      configFile: string;
      targetJson: string;
      dryRun: boolean;
    }
  | { command: "provision"; ctid: number; catalogPath?: string; dryRun: boolean }
  | { command: "finalize"; ctid: number; catalogPath?: string; snapshotName?: string; dryRun: boolean }
  | { command: "help" };

export const USAGE = `Usage: lxc-provision <command> [options]

Commands:
  clone <sourceCtid> <snapshot> <targetCtid> <configFile> <targetJson> [--dry-run]
                                 Clone a container from a template snapshot and apply its network
  provision <ctid> [--catalog <path>] [--dry-run]
                                 Run the full pipeline for a catalog entry
  finalize <ctid> [--catalog <path>] [--snapshot <name>] [--dry-run]
                                 Install, verify and snapshot an existing template container
  help                           Show this help

Options:
  --dry-run                      Resolve the configuration and log the planned steps without running them

Exit codes:
  0 success or nothing to do     4 clone or install failed
  1 unexpected error             5 post-clone configuration, service or snapshot failed
  2 invalid arguments or config  6 shutdown, start or health check timed out
  3 source or container missing
`;

export function parseCtid(value: string | undefined, name: string): number {
  if (value === undefined) {
    throw new UsageError(`Missing <${name}>`);
  }
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new UsageError(`<${name}> must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

const SWITCHES = ["dry-run"] as const;

/**
 * Split `--flag value` pairs and bare switches from positionals. Only the
 * flags in `allowed` and the switches in SWITCHES are accepted.
 */
function splitFlags(
  args: readonly string[],
  allowed: readonly string[],
): { positionals: string[]; flags: Map<string, string>; switches: Set<string> } {
  const positionals: string[] = [];
  const flags = new Map<string, string>();
  const switches = new Set<string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (SWITCHES.some((name) => name === flag)) {
      if (eq !== -1) {
        throw new UsageError(`Option --${flag} takes no value`);
      }
      switches.add(flag);
      continue;
    }
    if (!allowed.includes(flag)) {
      throw new UsageError(`Unknown option ${arg}`);
    }
    const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
    if (value === undefined || value === "") {
      throw new UsageError(`Option --${flag} needs a value`);
    }
    flags.set(flag, value);
  }
  return { positionals, flags, switches };
}

function expectPositionals(command: string, positionals: readonly string[], count: number): void {
  if (positionals.length > count) {
    throw new UsageError(`Too many arguments for ${command}: ${positionals.slice(count).join(" ")}`);
  }
}

export function parseArgs(argv: readonly string[]): CliCommand {
  const command: string | undefined = argv[0];
  const rest = argv.slice(1);
  switch (command) {
    case undefined:
    case "help":
    case "-h":
    case "--help":
      return { command: "help" };

    case "clone": {
      const { positionals, switches } = splitFlags(rest, []);
      if (positionals.length < 5) {
        throw new UsageError("clone needs <sourceCtid> <snapshot> <targetCtid> <configFile> <targetJson>");
      }
      expectPositionals(command, positionals, 5);
      const [source, snapshotName, target, configFile, targetJson] = positionals;
      if (!snapshotName || !configFile || !targetJson) {
        throw new UsageError("clone arguments must not be empty");
      }
      return {
        command,
        sourceCtid: parseCtid(source, "sourceCtid"),
        snapshotName,
        targetCtid: parseCtid(target, "targetCtid"),
        configFile,
        targetJson,
        dryRun: switches.has("dry-run"),
      };
    }

    case "provision": {
      const { positionals, flags, switches } = splitFlags(rest, ["catalog"]);
      expectPositionals(command, positionals, 1);
      return {
        command,
        ctid: parseCtid(positionals[0], "ctid"),
        catalogPath: flags.get("catalog"),
        dryRun: switches.has("dry-run"),
      };
    }

    case "finalize": {
      const { positionals, flags, switches } = splitFlags(rest, ["catalog", "snapshot"]);
      expectPositionals(command, positionals, 1);
      return {
        command,
        ctid: parseCtid(positionals[0], "ctid"),
        catalogPath: flags.get("catalog"),
        snapshotName: flags.get("snapshot"),
        dryRun: switches.has("dry-run"),
      };
    }

    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}
