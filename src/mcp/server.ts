import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { AgentClient } from "../agent/remote";
import { type AgentConfig, type RCONConfig, getAgentConfig, getRCONConfig, validateRCONConfig } from "../config";
import { RCONClient } from "../rcon/client";
import { errorMessage, log } from "../utils/log";
import { TOOLS, type ToolContext, generateToolSchemas } from "./tools";

export const SERVER_NAME = "factorio-agent";
export const SERVER_VERSION = "0.3.0";

export function createAgentServer(ctx: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: generateToolSchemas(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const toolName = request.params.name;
    const tool = TOOLS[toolName];
    if (!tool) {
      throw new Error(`Unknown tool: ${toolName}`);
    }

    try {
      const result = await tool.call(request.params.arguments, ctx);
      return { content: [{ type: "text" as const, text: JSON.stringify(result) }] };
    } catch (error) {
      log.error(`${toolName} failed:`, errorMessage(error));
      return { content: [{ type: "text" as const, text: `Error: ${errorMessage(error)}` }], isError: true };
    }
  });

  return server;
}

export class FactorioAgentMCPServer {
  private readonly server: Server;
  private readonly rcon: RCONClient;

  constructor(rconConfig: RCONConfig, agentConfig: AgentConfig) {
    this.rcon = new RCONClient({ ...rconConfig, commandTimeoutMs: agentConfig.commandTimeoutMs });
    const agent = new AgentClient(this.rcon, {
      interfaceName: agentConfig.interfaceName,
      jsonHelper: agentConfig.jsonHelper,
    });
    this.server = createAgentServer({ agent, scriptOutput: agentConfig.scriptOutput });
  }

  async start() {
    log.step("Starting Factorio agent MCP server...");
    await this.rcon.connect();
    log.info("RCON connected");

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log.info("MCP server running on stdio");
  }

  async stop() {
    await this.server.close();
    await this.rcon.disconnect();
  }
}

export async function startMCPServer(): Promise<FactorioAgentMCPServer> {
  const rconConfig = getRCONConfig();
  validateRCONConfig(rconConfig);

  const server = new FactorioAgentMCPServer(rconConfig, getAgentConfig());
  await server.start();

  process.once("SIGINT", () => {
    log.step("Shutting down...");
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("Shutdown failed:", error);
        process.exit(1);
      }
    );
  });

  return server;
}
