/**
 * Structured error type for the proxy's MCP tools.
 *
 * Carries a machine-readable code, category, and optional remediation
 * hint so clients can tell a bad request from a broken connection.
 */

export type ErrorCategory =
  | "validation"
  | "connection"
  | "timeout"
  | "not_found"
  | "tool_failure";

export class ProxyError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(message: string, code: string, category: ErrorCategory, remediation?: string) {
    super(message);
    this.name = "ProxyError";
    this.code = code;
    this.category = category;
    this.remediation = remediation;
  }
}
