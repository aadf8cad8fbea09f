import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createConnector } from "./connectors/index.js";
import { packageVersion, type ServerConfig } from "./config.js";
import {
  runCommandSchema,
  condenseOutputSchema,
  readSourceSchema,
  listProfilesSchema,
  usageStatsSchema,
} from "./schemas/tools.js";
import type { HandlerDeps } from "./handlers/types.js";
import { handleRunCommand } from "./handlers/run-command.js";
import { handleCondenseOutput } from "./handlers/condense-output.js";
import { handleReadSource } from "./handlers/read-source.js";
import { describeProfile, handleListProfiles } from "./handlers/list-profiles.js";
import { handleUsageStats } from "./handlers/usage-stats.js";
import { ToolRegistry } from "./tools/registry.js";
import { UsageTracker } from "./state/usage.js";

export type { ServerConfig };
export * from "./engine/index.js";

export async function createServer(config: ServerConfig) {
  const server = new McpServer(
    {
      name: "tokenslim",
      version: packageVersion(),
    },
    {
      instructions:
        "Run build, test, lint and VCS commands through run_command instead of a plain shell: " +
        "output is parsed per tool and condensed to the failures, diagnostics and summaries. " +
        "When a parse fails the response tier is 'degraded' or 'passthrough' and the raw output is kept. " +
        "Use read_source to read code with comments stripped, or with function bodies elided at level 'aggressive'.",
    },
  );

  const connector = await createConnector(config);
  const registry = new ToolRegistry();

  const deps: HandlerDeps = {
    connector,
    config: {
      mode: config.mode,
      cwd: config.cwd,
      timeout: config.timeout,
      maxOutputChars: config.maxOutputChars,
      level: config.level,
      verbose: config.verbose,
    },
    registry,
    usage: new UsageTracker(),
  };

  // Tool: run_command - Execute a command and condense its output
  server.tool(
    "run_command",
    "Run a shell command and return condensed output. The parser is chosen from the command " +
    "(e.g., 'cargo test', 'pytest', 'git status', 'tsc --noEmit') or forced with 'tool'.",
    runCommandSchema.shape,
    (args) => handleRunCommand(deps, args)
  );

  // Tool: condense_output - Condense output captured elsewhere
  server.tool(
    "condense_output",
    "Condense output you already have, using a named profile (see list_profiles).",
    condenseOutputSchema.shape,
    (args) => handleCondenseOutput(deps, args)
  );

  // Tool: read_source - Read a source file with comments and bodies reduced
  server.tool(
    "read_source",
    "Read a source file with comments removed ('minimal') or function bodies elided ('aggressive'). " +
    "String literals are never changed. Unknown languages are returned unchanged.",
    readSourceSchema.shape,
    (args) => handleReadSource(deps, args)
  );

  // Tool: list_profiles - Show the known output profiles
  server.tool(
    "list_profiles",
    "List the output profiles: name, parsing strategy, renderer and matching commands.",
    listProfilesSchema.shape,
    (args) => handleListProfiles(deps, args)
  );

  // Tool: usage_stats - Characters and tokens saved this session
  server.tool(
    "usage_stats",
    "Characters and estimated tokens saved by this server since it started, per profile.",
    usageStatsSchema.shape,
    () => handleUsageStats(deps)
  );

  // ── MCP Resources: Profiles ─────────────────────────────────────────────

  server.resource(
    "profiles",
    "tokenslim://profiles",
    { description: "All output profiles", mimeType: "application/json" },
    (uri: URL) => ({
      contents: [{
        uri: uri.href,
        mimeType: "application/json",
        text: JSON.stringify(registry.all().map(describeProfile), null, 2),
      }],
    }),
  );

  server.resource(
    "profile-by-name",
    new ResourceTemplate("tokenslim://profiles/{name}", {
      list: () => ({
        resources: registry.all().map((p) => ({
          uri: `tokenslim://profiles/${p.name}`,
          name: p.name,
          description: p.description,
        })),
      }),
    }),
    { description: "Single output profile by name" },
    (uri: URL) => {
      const name = uri.pathname.split("/").pop() ?? "";
      const profile = registry.get(name);
      if (!profile) {
        return { contents: [{ uri: uri.href, mimeType: "text/plain", text: `Profile "${name}" not found` }] };
      }
      return {
        contents: [{
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(describeProfile(profile), null, 2),
        }],
      };
    },
  );

  return { server, connector };
}

export async function startServer(config: ServerConfig) {
  const { server, connector } = await createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async () => {
    try {
      await server.close();
      await connector.disconnect();
    } catch (error) {
      console.error("Error during shutdown:", error);
    }
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  const target = config.mode === "docker" ? ` (container ${config.container ?? "?"})`
    : config.mode === "ssh" ? ` (${config.user ?? ""}@${config.host ?? "?"})` : "";
  console.error(`tokenslim MCP server started in ${config.mode} mode${target}`);
}
