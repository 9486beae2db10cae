import { spawn } from "child_process";
import { log } from "./log";

export class CommandError extends Error {
  constructor(message: string, readonly command?: string, readonly exitCode?: number) {
    super(message);
    this.name = "CommandError";
  }
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[], env?: NodeJS.ProcessEnv): Promise<CommandResult>;
}

// Single-quote for display and for remote shells; ssh joins its argv with spaces.
export function shellQuote(arg: string): string {
  return /^[A-Za-z0-9_./:@%+=,-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(shellQuote).join(" ");
}

export const spawnRunner: CommandRunner = {
  run(command, args, env) {
    log.debug(formatCommand(command, args));
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { env: env ?? process.env, stdio: ["ignore", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";
      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.on("error", reject);
      child.on("close", (code) => resolve({ code: code ?? 1, stdout, stderr }));
    });
  },
};

// Long-running commands whose output belongs on the terminal.
export const inheritRunner: CommandRunner = {
  run(command, args, env) {
    log.debug(formatCommand(command, args));
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { env: env ?? process.env, stdio: "inherit" });
      child.on("error", reject);
      child.on("close", (code) => resolve({ code: code ?? 1, stdout: "", stderr: "" }));
    });
  },
};

/** Prints each command instead of running it; every command "succeeds" with no output. */
export class DryRunRunner implements CommandRunner {
  readonly commands: string[] = [];

  async run(command: string, args: string[]): Promise<CommandResult> {
    const line = formatCommand(command, args);
    this.commands.push(line);
    console.log(line);
    return { code: 0, stdout: "", stderr: "" };
  }
}

export async function commandExists(name: string, runner: CommandRunner = spawnRunner): Promise<boolean> {
  const result = await runner.run("sh", ["-c", `command -v ${shellQuote(name)}`]);
  return result.code === 0;
}

export async function requireCommands(names: string[], runner: CommandRunner = spawnRunner): Promise<void> {
  for (const name of names) {
    if (!(await commandExists(name, runner))) {
      throw new CommandError(`Missing dependency: ${name}`);
    }
  }
}

export async function runChecked(runner: CommandRunner, command: string, args: string[]): Promise<CommandResult> {
  const result = await runner.run(command, args);
  if (result.code !== 0) {
    const line = formatCommand(command, args);
    const detail = result.stderr.trim();
    throw new CommandError(
      `Command failed (exit ${result.code}): ${line}${detail ? `\n${detail}` : ""}`,
      line,
      result.code
    );
  }
  return result;
}
