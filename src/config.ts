/**
 * Command-line and environment configuration.
 */

import { createRequire } from "node:module";
import type { ConnectorConfig } from "./connectors/index.js";
import { DEFAULT_MAX_OUTPUT_CHARS } from "./engine/controller.js";
import { FILTER_LEVELS, type FilterLevel } from "./engine/source-filter.js";

export interface ServerConfig extends ConnectorConfig {
  /** Default working directory for commands */
  cwd?: string;
  /** Default command timeout in seconds */
  timeout: number;
  /** Passthrough ceiling in characters */
  maxOutputChars: number;
  /** Default read_source filter level */
  level: FilterLevel;
  verbose: boolean;
}

export type CliCommand =
  | { action: "serve"; config: ServerConfig }
  | { action: "help" }
  | { action: "version" };

export const DEFAULT_TIMEOUT_SECONDS = 300;

export function packageVersion(): string {
  const require = createRequire(import.meta.url);
  const { version } = require("../package.json") as { version: string };
  return version;
}

function positiveInt(flag: string, value: string | undefined): number {
  const n = Number.parseInt(value ?? "", 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${flag} expects a positive integer, got: ${value ?? "(nothing)"}`);
  }
  return n;
}

function isFilterLevel(value: string | undefined): value is FilterLevel {
  return FILTER_LEVELS.some((level) => level === value);
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const config: ServerConfig = {
    mode: "local",
    timeout: DEFAULT_TIMEOUT_SECONDS,
    maxOutputChars: DEFAULT_MAX_OUTPUT_CHARS,
    level: "minimal",
    verbose: false,
  };

  if (env.TOKENSLIM_MAX_OUTPUT) {
    config.maxOutputChars = positiveInt("TOKENSLIM_MAX_OUTPUT", env.TOKENSLIM_MAX_OUTPUT);
  }

  for (let i = 0; i < argv.length; i++) {
    let arg = argv[i] ?? "";
    let value = argv[i + 1];
    let usedEqualsSyntax = false;

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIndex = arg.indexOf("=");
      value = arg.slice(eqIndex + 1);
      arg = arg.slice(0, eqIndex);
      usedEqualsSyntax = true;
    }

    // Only skip the next arg when the value came from it
    const consumeValue = () => {
      if (!usedEqualsSyntax) i++;
    };

    switch (arg) {
      case "--mode":
        if (value !== "docker" && value !== "ssh" && value !== "local") {
          throw new Error(`--mode must be local, docker or ssh, got: ${value ?? "(nothing)"}`);
        }
        config.mode = value;
        consumeValue();
        break;
      case "--container":
        config.container = value;
        consumeValue();
        break;
      case "--host":
        config.host = value;
        consumeValue();
        break;
      case "--user":
        config.user = value;
        consumeValue();
        break;
      case "--port":
        config.port = positiveInt("--port", value);
        consumeValue();
        break;
      case "--password":
        config.password = value;
        consumeValue();
        break;
      case "--cwd":
        config.cwd = value;
        consumeValue();
        break;
      case "--timeout":
        config.timeout = positiveInt("--timeout", value);
        consumeValue();
        break;
      case "--max-output":
        config.maxOutputChars = positiveInt("--max-output", value);
        consumeValue();
        break;
      case "--level":
        if (!isFilterLevel(value)) {
          throw new Error(`--level must be one of ${FILTER_LEVELS.join(", ")}, got: ${value ?? "(nothing)"}`);
        }
        config.level = value;
        consumeValue();
        break;
      case "--verbose":
        config.verbose = true;
        break;
      case "--help":
      case "-h":
        return { action: "help" };
      case "--version":
      case "-v":
        return { action: "version" };
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (!config.password && env.TOKENSLIM_SSH_PASSWORD) {
    config.password = env.TOKENSLIM_SSH_PASSWORD;
  }

  return { action: "serve", config };
}
