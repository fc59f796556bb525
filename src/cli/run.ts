/**
 * Flag parsing and dispatch
 */

import { parseArgs } from "node:util";
import { getErrorMessage } from "../core";
import { isDockerAvailable } from "../docker/client";
import { setLogLevel } from "../utils";
import { backupCommand, interactiveBackupCommand } from "./commands/backup";
import { configureCommand } from "./commands/configure";
import { listCommand } from "./commands/list";
import { restoreCommand } from "./commands/restore";
import { type CommandContext, createDockerServices } from "./context";
import { APP_NAME, color, VERSION } from "./ui";

export type Mode = "backup" | "interactive" | "restore" | "configure" | "list" | "help" | "version";

export interface ParsedCli {
  mode: Mode;
  configPath?: string;
  verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseFlags(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        interactive: { type: "boolean", short: "i", default: false },
        restore: { type: "boolean", short: "r", default: false },
        configure: { type: "boolean", short: "c", default: false },
        list: { type: "boolean", short: "l", default: false },
        config: { type: "string" },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", default: false },
      },
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new UsageError(getErrorMessage(error));
  }
}

export function parseCli(args: string[]): ParsedCli {
  const values = parseFlags(args);

  const base = { configPath: values.config, verbose: values.verbose ?? false };

  if (values.help) return { mode: "help", ...base };
  if (values.version) return { mode: "version", ...base };

  const modes: Mode[] = [];
  if (values.interactive) modes.push("interactive");
  if (values.restore) modes.push("restore");
  if (values.configure) modes.push("configure");
  if (values.list) modes.push("list");

  const [mode, ...rest] = modes;
  if (rest.length > 0) {
    throw new UsageError(`Options ${modes.map((m) => `--${m}`).join(", ")} cannot be combined`);
  }

  return { mode: mode ?? "backup", ...base };
}

const COMMANDS: Record<Exclude<Mode, "help" | "version">, (ctx: CommandContext) => Promise<number>> = {
  backup: backupCommand,
  interactive: interactiveBackupCommand,
  restore: (ctx) => restoreCommand(ctx),
  configure: configureCommand,
  list: listCommand,
};

export function printHelp(): void {
  console.log(`
${color.bold(APP_NAME)} ${color.dim(`v${VERSION}`)} - Docker volume backup and restore

${color.dim("USAGE:")}
  ${APP_NAME} [OPTIONS]

${color.dim("MODES:")}
  (no flag)             Back up the volumes listed in the config file
  -i, --interactive     Pick volumes used by running containers and back them up
  -r, --restore         Pick a backup and restore it into its volume
  -c, --configure       Edit the configuration file interactively
  -l, --list            List existing backups

${color.dim("OPTIONS:")}
      --config <path>   Config file (default: backup_config.json, .yaml or .yml in the current directory)
  -v, --verbose         Verbose output
  -h, --help            Show this help message
      --version         Show version

${color.dim("EXAMPLES:")}
  ${APP_NAME}                             # Unattended backup (cron friendly)
  ${APP_NAME} -i                          # Interactive backup
  ${APP_NAME} -r                          # Interactive restore
  ${APP_NAME} --config /etc/backups.yaml  # Use a specific config file
`);
}

export async function run(
  args: string[],
  createContext: (cli: ParsedCli) => CommandContext = (cli) => ({
    configPath: cli.configPath,
    cwd: process.cwd(),
    verbose: cli.verbose,
    services: createDockerServices(),
  }),
  dockerCheck: () => Promise<boolean> = isDockerAvailable,
): Promise<number> {
  let cli: ParsedCli;
  try {
    cli = parseCli(args);
  } catch (error) {
    console.error(`${color.red("Error:")} ${getErrorMessage(error)}`);
    console.error(`Run ${color.cyan(`${APP_NAME} --help`)} for usage information.`);
    return 1;
  }

  if (cli.verbose) {
    setLogLevel("debug");
  }

  const { mode } = cli;

  if (mode === "help") {
    printHelp();
    return 0;
  }

  if (mode === "version") {
    console.log(VERSION);
    return 0;
  }

  if (mode !== "list" && !(await dockerCheck())) {
    console.error(`${color.red("Error:")} Docker is not available. Is the daemon running?`);
    return 1;
  }

  return COMMANDS[mode](createContext(cli));
}
