import { readFile } from "fs/promises";
import { resolve } from "path";
import { Command, CommanderError, InvalidArgumentError } from "@commander-js/extra-typings";
import { AgentClient } from "./agent/remote";
import { ExecuteArgsSchema, type ExecuteArgs } from "./agent/schemas";
import { latestSnapshot, listSnapshots, screenshotPath, snapshotDir, summarizeSnapshot } from "./agent/snapshots";
import { getAgentConfig, getRCONConfig, validateRCONConfig } from "./config";
import { deployMod } from "./deploy/deploy";
import { resolveRemote } from "./deploy/inventory";
import { SERVER_VERSION, startMCPServer } from "./mcp/server";
import type { ToolContext } from "./mcp/tools";
import { packageMod } from "./mod/package";
import { RCONClient } from "./rcon/client";
import { StreamPreflightError, runPipeline } from "./stream/hailo";
import { type CommandRunner, DryRunRunner, requireCommands, spawnRunner } from "./utils/commands";
import { errorMessage, log } from "./utils/log";

export interface AgentSession {
  agent: ToolContext["agent"];
  close(): Promise<void>;
}

export interface CliDeps {
  openAgent(): AgentSession;
  runner: CommandRunner;
  // stdout: results only, so output can be piped
  print(text: string): void;
  readInput(path: string): Promise<string>;
}

function openRconAgent(): AgentSession {
  const rconConfig = getRCONConfig();
  validateRCONConfig(rconConfig);
  const agentConfig = getAgentConfig();
  const rcon = new RCONClient({ ...rconConfig, commandTimeoutMs: agentConfig.commandTimeoutMs });
  const agent = new AgentClient(rcon, { interfaceName: agentConfig.interfaceName, jsonHelper: agentConfig.jsonHelper });
  return { agent, close: () => rcon.disconnect() };
}

async function readInput(path: string): Promise<string> {
  if (path !== "-") return readFile(path, "utf-8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

const defaultDeps: CliDeps = {
  openAgent: openRconAgent,
  runner: spawnRunner,
  print: (text) => console.log(text),
  readInput,
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

/** Accepts `{ "ops": [...] }` or a bare array of ops. */
export function parseOpsDocument(text: string): ExecuteArgs {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new Error("ops file is not valid JSON");
  }
  return ExecuteArgsSchema.parse(Array.isArray(value) ? { ops: value } : value);
}

export function createProgram(deps: CliDeps = defaultDeps) {
  const program = new Command()
    .name("factorio-agent")
    .description("Package, deploy and drive the Factorio agent mod")
    .version(SERVER_VERSION)
    .showHelpAfterError()
    .exitOverride();

  const withAgent = async <T>(action: (agent: AgentSession["agent"]) => Promise<T>): Promise<void> => {
    const session = deps.openAgent();
    try {
      deps.print(JSON.stringify(await action(session.agent), null, 2));
    } finally {
      await session.close();
    }
  };

  program
    .command("package")
    .description("Zip a mod folder into <name>_<version>.zip and copy it to the output directory")
    .option("-s, --source <dir>", "Source mod directory (default: newest folder with info.json under --mods-dir)")
    .option("--mods-dir <dir>", "Where to look for mod sources", "mods")
    .option("-o, --output-dir <dir>", "Local output directory", "ansible/files/mods")
    .option("--build-dir <dir>", "Staging directory for the zip", ".dist/mod_build")
    .option("--dry-run", "Print actions without executing", false)
    .action(async (options) => {
      const result = await packageMod({
        source: options.source && resolve(options.source),
        modsDir: resolve(options.modsDir),
        outputDir: resolve(options.outputDir),
        stagingDir: resolve(options.buildDir),
        dryRun: options.dryRun,
      });
      deps.print(result.outputZip);
    });

  program
    .command("deploy")
    .description("Package the mod, copy it to a remote server and restart the Factorio units")
    .requiredOption("--remote <target>", "user@host, or 'auto' to read it from the Ansible inventory")
    .option("-s, --source <dir>", "Source mod directory (default: newest folder with info.json under --mods-dir)")
    .option("--mods-dir <dir>", "Where to look for mod sources", "mods")
    .option("-o, --output-dir <dir>", "Local output directory", "ansible/files/mods")
    .option("--inventory <file>", "Ansible inventory used by --remote auto", "ansible/inventory.yml")
    .option("--data-dir <dir>", "Remote Factorio data directory", "/srv/factorio")
    .option("--owner <user:group>", "chown the uploaded zip on the remote")
    .option("--instances <names>", "Comma-separated instance names to restart (default: auto-detect)")
    .option("--systemd-prefix <prefix>", "Unit name prefix", "factorio")
    .option("--no-restart", "Do not restart services on the remote")
    .option("--build-dir <dir>", "Staging directory for the zip", ".dist/mod_build")
    .option("--dry-run", "Print actions without executing", false)
    .action(async (options) => {
      const remote = await resolveRemote(options.remote, resolve(options.inventory));
      if (!options.dryRun) {
        await requireCommands(["ssh", "scp"], deps.runner);
      }

      const packaged = await packageMod({
        source: options.source && resolve(options.source),
        modsDir: resolve(options.modsDir),
        outputDir: resolve(options.outputDir),
        stagingDir: resolve(options.buildDir),
        dryRun: options.dryRun,
      });

      const result = await deployMod({
        zipPath: packaged.stagedZip,
        remote,
        runner: options.dryRun ? new DryRunRunner() : deps.runner,
        dataDir: options.dataDir,
        owner: options.owner,
        restart: options.restart,
        dryRun: options.dryRun,
        instances: options.instances,
        systemdPrefix: options.systemdPrefix,
      });
      if (!options.dryRun) {
        deps.print(`${remote}:${result.remotePath}`);
      }
    });

  const agent = program.command("agent").description("Call the agent mod's remote interface over RCON");

  agent
    .command("status")
    .description("Check that the interface is loaded")
    .action(() =>
      withAgent(async (client) => {
        if (!(await client.hasInterface())) return { loaded: false };
        return { loaded: true, tick: (await client.ping()).tick };
      })
    );

  agent
    .command("ping")
    .description("Ping the mod and print the game tick")
    .action(() => withAgent((client) => client.ping()));

  agent
    .command("snapshot")
    .description("Write an entity snapshot around the player")
    .option("-r, --radius <tiles>", "Window half-width", parseNumber)
    .option("-p, --player <index>", "Player index", parseInteger)
    .action((options) =>
      withAgent((client) => client.snapshot({ radius: options.radius, player_index: options.player }))
    );

  agent
    .command("interval")
    .description("Set the periodic snapshot interval; 0 disables it")
    .argument("<ticks>", "Interval in ticks", parseInteger)
    .action((ticks) => withAgent((client) => client.setInterval({ ticks })));

  agent
    .command("screenshot")
    .description("Take a screenshot around the player")
    .option("--width <px>", "Width", parseInteger, 1280)
    .option("--height <px>", "Height", parseInteger, 720)
    .option("-z, --zoom <level>", "Zoom", parseNumber)
    .option("--gui", "Include the GUI", false)
    .option("-p, --player <index>", "Player index", parseInteger)
    .option("--script-output <dir>", "Local script-output directory (default: $FACTORIO_SCRIPT_OUTPUT)")
    .action((options) =>
      withAgent(async (client) => {
        const result = await client.screenshot({
          res: { x: options.width, y: options.height },
          zoom: options.zoom,
          gui: options.gui,
          player_index: options.player,
        });
        const root = options.scriptOutput ?? getAgentConfig().scriptOutput;
        return { ...result, file: screenshotPath(root, result.path) };
      })
    );

  agent
    .command("execute")
    .description("Apply a JSON list of ops, rolled back as a whole on failure")
    .argument("<file>", "JSON file with { ops: [...] } or an array of ops; '-' reads stdin")
    .action(async (file) => {
      const args = parseOpsDocument(await deps.readInput(file));
      await withAgent((client) => client.execute(args));
    });

  const snapshots = program.command("snapshots").description("Inspect snapshot files written by the mod");

  snapshots
    .command("list")
    .description("List snapshot files by tick")
    .option("--dir <dir>", "script-output directory (default: $FACTORIO_SCRIPT_OUTPUT)")
    .action(async (options) => {
      const dir = snapshotDir(options.dir ?? getAgentConfig().scriptOutput);
      for (const file of await listSnapshots(dir)) {
        deps.print(`${file.tick}\t${file.path}`);
      }
    });

  snapshots
    .command("latest")
    .description("Summarize the newest snapshot")
    .option("--dir <dir>", "script-output directory (default: $FACTORIO_SCRIPT_OUTPUT)")
    .action(async (options) => {
      const dir = snapshotDir(options.dir ?? getAgentConfig().scriptOutput);
      const doc = await latestSnapshot(dir);
      if (!doc) {
        throw new Error(`No snapshots found in ${dir}`);
      }
      deps.print(JSON.stringify(summarizeSnapshot(doc), null, 2));
    });

  program
    .command("stream")
    .description("Run Hailo inference on the game's RTSP stream with GStreamer")
    .argument("<rtsp-url>", "RTSP stream, e.g. rtsp://127.0.0.1:8554/factorio")
    .argument("<hef-path>", "Compiled Hailo model (.hef)")
    .option("--decoder <element>", "H.264 decoder element", "avdec_h264")
    .option("--sink <element>", "Video sink (fakesink when headless)", "autovideosink")
    .action(async (rtspUrl, hefPath, options) => {
      process.exitCode = await runPipeline({ rtspUrl, hefPath, decoder: options.decoder, sink: options.sink }, deps.runner);
    });

  program
    .command("mcp")
    .description("Serve the agent tools over MCP (stdio)")
    .action(async () => {
      await startMCPServer();
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed the message; 0 for --help and --version
      process.exit(error.exitCode === 0 ? 0 : 2);
    }
    if (error instanceof StreamPreflightError) {
      log.error(error.message);
      process.exit(error.exitCode);
    }
    log.error(errorMessage(error));
    process.exit(1);
  }
}
