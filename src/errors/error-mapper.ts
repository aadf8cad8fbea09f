/**
 * Maps raw errors from connectors and the filesystem into ProxyError.
 */

import type { ConnectorMode } from "../connectors/index.js";
import { ProxyError } from "./proxy-error.js";

export function toProxyError(raw: unknown, mode?: ConnectorMode): ProxyError {
  if (raw instanceof ProxyError) {
    return raw;
  }

  const msg = raw instanceof Error ? raw.message : String(raw);

  if (/is not running|no such container/i.test(msg)) {
    return new ProxyError(
      msg,
      "CONNECTION_FAILED",
      "connection",
      mode === "docker"
        ? "Start the container or check the --container name"
        : "Check that the target environment is up",
    );
  }

  if (/ECONNREFUSED|EHOSTUNREACH|ENOTFOUND|All configured authentication methods failed/i.test(msg)) {
    return new ProxyError(msg, "CONNECTION_FAILED", "connection", "Check --host, --port and --user");
  }

  if (/timed out|timeout/i.test(msg)) {
    return new ProxyError(msg, "COMMAND_TIMEOUT", "timeout", "Increase --timeout or narrow the command");
  }

  if (/ENOENT|No such file or directory/i.test(msg)) {
    return new ProxyError(
      msg,
      "NOT_FOUND",
      "not_found",
      mode === "local" ? "Check that the command exists and PATH is correct" : undefined,
    );
  }

  return new ProxyError(msg, "UNKNOWN_ERROR", "tool_failure");
}
