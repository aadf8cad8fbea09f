#!/usr/bin/env node

import { packageVersion, parseArgs, type CliCommand } from "./config.js";
import { startServer } from "./index.js";

function printHelp() {
  console.log(`
tokenslim - MCP server that runs developer commands and returns condensed output

USAGE:
  tokenslim [OPTIONS]

OPTIONS:
  --mode <mode>           Where commands run: local, docker, or ssh (default: local)
  --container <name>      Docker container name/ID (docker mode)
  --host <host>           SSH host (ssh mode)
  --user <user>           SSH user (default: $USER)
  --port <port>           SSH port (default: 22)
  --password <pass>       SSH password (also reads TOKENSLIM_SSH_PASSWORD; SSH agent if omitted)
  --cwd <path>            Default working directory for commands
  --timeout <seconds>     Default command timeout (default: 300)
  --max-output <chars>    Raw output ceiling when parsing fails (default: 65536, env TOKENSLIM_MAX_OUTPUT)
  --level <level>         Default read_source filter: none, minimal, aggressive (default: minimal)
  --verbose               Log one line per command to stderr
  -h, --help              Show this help message
  -v, --version           Show version

EXAMPLES:
  # Local mode (default)
  tokenslim --cwd=/work/project

  # Docker mode (toolchain in a container)
  tokenslim --mode=docker --container=devbox

  # SSH mode (remote build host)
  tokenslim --mode=ssh --host=build.internal --user=ci
`);
}

let command: CliCommand;
try {
  command = parseArgs(process.argv.slice(2));
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  console.error("Run with --help for usage.");
  process.exit(2);
}

switch (command.action) {
  case "help":
    printHelp();
    break;
  case "version":
    console.log(`tokenslim v${packageVersion()}`);
    break;
  case "serve":
    startServer(command.config).catch((error: unknown) => {
      console.error("Failed to start server:", error);
      process.exit(1);
    });
    break;
}
