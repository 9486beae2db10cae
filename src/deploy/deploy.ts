import { basename, posix } from "path";
import { type CommandResult, type CommandRunner, CommandError, runChecked, shellQuote } from "../utils/commands";
import { log } from "../utils/log";

export class DeployError extends Error {
  readonly command?: string;
  readonly exitCode?: number;

  constructor(message: string, failed?: CommandError) {
    super(message, { cause: failed });
    this.name = "DeployError";
    this.command = failed?.command;
    this.exitCode = failed?.exitCode;
  }
}

const SSH_OPTIONS = ["-o", "StrictHostKeyChecking=no"];

const DEFAULT_DATA_DIR = "/srv/factorio";
const DEFAULT_SYSTEMD_PREFIX = "factorio";

export interface DeployOptions {
  zipPath: string;
  remote: string;
  runner: CommandRunner;
  dataDir?: string;
  // user:group to chown the uploaded zip to
  owner?: string;
  restart?: boolean;
  // Runner only prints; auto-detected units become a `<prefix>-<auto>.service` placeholder.
  dryRun?: boolean;
  // Comma-separated instance names; auto-detected from systemd when omitted.
  instances?: string;
  systemdPrefix?: string;
}

export interface DeployResult {
  remotePath: string;
  restarted: string[];
}

export function unitNames(instances: string, prefix: string = DEFAULT_SYSTEMD_PREFIX): string[] {
  return instances
    .split(",")
    .map((name) => name.replace(/\s+/g, ""))
    .filter(Boolean)
    .map((name) => `${prefix}-${name}.service`);
}

export function listUnitsCommand(prefix: string): string {
  return `systemctl list-units --type=service --no-legend ${shellQuote(`${prefix}-*.service`)} | awk '{print $1}'`;
}

export function restartCommand(unit: string): string {
  const quoted = shellQuote(unit);
  return `sudo -n systemctl restart ${quoted} || systemctl restart ${quoted}`;
}

async function step(runner: CommandRunner, command: string, args: string[]): Promise<CommandResult> {
  try {
    return await runChecked(runner, command, args);
  } catch (error) {
    if (error instanceof CommandError) {
      throw new DeployError(error.message, error);
    }
    throw error;
  }
}

function ssh(runner: CommandRunner, remote: string, command: string) {
  return step(runner, "ssh", [...SSH_OPTIONS, remote, command]);
}

async function detectUnits(runner: CommandRunner, remote: string, prefix: string): Promise<string[]> {
  const { stdout } = await ssh(runner, remote, listUnitsCommand(prefix));
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function deployMod(options: DeployOptions): Promise<DeployResult> {
  const { runner, remote, zipPath } = options;
  const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
  const prefix = options.systemdPrefix ?? DEFAULT_SYSTEMD_PREFIX;
  const modsDir = posix.join(dataDir, "mods");
  const remotePath = posix.join(modsDir, basename(zipPath));

  await ssh(runner, remote, `mkdir -p ${shellQuote(modsDir)}`);
  await step(runner, "scp", [zipPath, `${remote}:${remotePath}`]);
  if (options.owner) {
    await ssh(runner, remote, `chown ${shellQuote(options.owner)} ${shellQuote(remotePath)}`);
  }
  log.info(`Deployed to ${remote}:${remotePath}`);

  const restarted: string[] = [];
  if (options.restart ?? true) {
    let units = options.instances
      ? unitNames(options.instances, prefix)
      : await detectUnits(runner, remote, prefix);
    if (!options.instances && options.dryRun && units.length === 0) {
      units = [`${prefix}-<auto>.service`];
    }

    if (units.length === 0) {
      log.warn(`No ${prefix}-* systemd units found to restart on ${remote}`);
    } else {
      log.step(`Restarting units on ${remote}: ${units.join(" ")}`);
      for (const unit of units) {
        await ssh(runner, remote, restartCommand(unit));
        restarted.push(unit);
      }
    }
  }

  return { remotePath, restarted };
}
