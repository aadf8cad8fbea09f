import type { HandlerDeps } from "./types.js";
import { formatResponse } from "../response.js";

export async function handleUsageStats(deps: HandlerDeps) {
  const startTime = Date.now();
  return formatResponse("usage_stats", { ...deps.usage.summary() }, startTime);
}
