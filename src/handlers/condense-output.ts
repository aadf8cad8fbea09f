import type { HandlerDeps } from "./types.js";
import type { CondenseOutputArgs } from "../schemas/tools.js";
import { condense, profileByName } from "./condense.js";
import { formatError } from "../response.js";
import { toProxyError } from "../errors/error-mapper.js";

/**
 * Run the engine on output the client captured itself.
 */
export async function handleCondenseOutput(deps: HandlerDeps, args: CondenseOutputArgs) {
  const startTime = Date.now();

  try {
    const profile = profileByName(deps, args.tool);
    const raw = {
      stdout: args.stdout,
      stderr: args.stderr ?? "",
      exitCode: args.exit_code ?? 0,
      toolId: profile.name,
    };
    return condense(deps, { tool: "condense_output", startTime }, profile, raw, "");
  } catch (error) {
    return formatError("condense_output", toProxyError(error), startTime);
  }
}
