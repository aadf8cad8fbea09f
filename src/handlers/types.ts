import type { Connector, ConnectorMode } from "../connectors/index.js";
import type { FilterLevel } from "../engine/source-filter.js";
import type { UsageTracker } from "../state/usage.js";
import type { ToolRegistry } from "../tools/registry.js";

export interface HandlerConfig {
  mode: ConnectorMode;
  /** Default working directory for commands and file reads */
  cwd?: string;
  /** Default command timeout in seconds */
  timeout: number;
  /** Passthrough ceiling in characters */
  maxOutputChars: number;
  /** Default source filter level for read_source */
  level: FilterLevel;
  verbose: boolean;
}

export interface HandlerDeps {
  connector: Connector;
  config: HandlerConfig;
  registry: ToolRegistry;
  usage: UsageTracker;
}
