/**
 * Tool results.
 *
 * Every tool answers with a one-line JSON envelope { success, tool, data,
 * metadata }. Tools whose payload is text (condensed output, filtered
 * source) send that text unescaped in a first content block and the
 * envelope after it, so the text costs no JSON quoting.
 */

import type { ErrorCategory } from "./errors/proxy-error.js";
import { ProxyError } from "./errors/proxy-error.js";

export interface ToolResponse {
  success: boolean;
  tool: string;
  data: Record<string, unknown>;
  error?: string;
  error_code?: string;
  error_category?: ErrorCategory;
  remediation?: string;
  metadata: {
    elapsed_ms: number;
  };
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export interface TextReply {
  result: ToolResult;
  /** Characters of every content block, envelope included */
  sentChars: number;
}

const MAX_SIZING_ROUNDS = 8;

function envelope(tool: string, data: Record<string, unknown>, startTime: number): ToolResponse {
  return { success: true, tool, data, metadata: { elapsed_ms: Date.now() - startTime } };
}

export function formatResponse(tool: string, data: Record<string, unknown>, startTime: number): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(envelope(tool, data, startTime)) }],
  };
}

/**
 * Text payload plus envelope. `data` receives the total characters sent
 * so the envelope can report them; it is rebuilt until the count it holds
 * matches its own length.
 */
export function formatText(
  tool: string,
  text: string,
  data: (sentChars: number) => Record<string, unknown>,
  startTime: number,
): TextReply {
  const { metadata } = envelope(tool, {}, startTime);
  const line = (sent: number) => JSON.stringify({ success: true, tool, data: data(sent), metadata });

  let sent = text.length;
  let meta = line(sent);
  for (let round = 0; round < MAX_SIZING_ROUNDS && text.length + meta.length !== sent; round++) {
    sent = text.length + meta.length;
    meta = line(sent);
  }

  return {
    result: {
      content: [
        { type: "text", text },
        { type: "text", text: meta },
      ],
    },
    sentChars: text.length + meta.length,
  };
}

/**
 * Build an error response envelope. Sets `isError: true` on the MCP result.
 *
 * A ProxyError adds error_code, error_category and remediation.
 */
export function formatError(tool: string, error: string | ProxyError, startTime: number): ToolResult & { isError: true } {
  const response: ToolResponse = {
    success: false,
    tool,
    data: {},
    error: error instanceof ProxyError ? error.message : error,
    metadata: { elapsed_ms: Date.now() - startTime },
  };

  if (error instanceof ProxyError) {
    response.error_code = error.code;
    response.error_category = error.category;
    if (error.remediation) {
      response.remediation = error.remediation;
    }
  }

  return {
    content: [{ type: "text", text: JSON.stringify(response) }],
    isError: true,
  };
}
