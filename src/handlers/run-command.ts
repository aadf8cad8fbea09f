import type { HandlerDeps } from "./types.js";
import type { ExecOptions } from "../connectors/index.js";
import type { RunCommandArgs } from "../schemas/tools.js";
import { condense, profileByName } from "./condense.js";
import { formatError } from "../response.js";
import { toProxyError } from "../errors/error-mapper.js";

export async function handleRunCommand(deps: HandlerDeps, args: RunCommandArgs) {
  const startTime = Date.now();
  const { connector, config, registry } = deps;

  try {
    // An explicit profile wins over resolution from the command words
    const profile = args.tool !== undefined ? profileByName(deps, args.tool) : registry.resolve(args.command);

    const execOptions: ExecOptions = {
      timeout: (args.timeout ?? config.timeout) * 1000,
    };
    const cwd = args.cwd ?? config.cwd;
    if (cwd) {
      execOptions.cwd = cwd;
    }

    const result = await connector.executeShell(args.command, execOptions);

    return condense(
      deps,
      { tool: "run_command", startTime },
      profile,
      { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode, toolId: profile.name },
      args.command,
    );
  } catch (error) {
    return formatError("run_command", toProxyError(error, config.mode), startTime);
  }
}
