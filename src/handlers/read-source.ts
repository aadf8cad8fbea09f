import type { HandlerDeps } from "./types.js";
import type { ExecOptions } from "../connectors/index.js";
import type { ReadSourceArgs } from "../schemas/tools.js";
import { filterSource } from "../engine/source-filter.js";
import { findLanguage, languageForPath } from "../engine/tokenizer/languages.js";
import { splitLines } from "../engine/text.js";
import { ProxyError } from "../errors/proxy-error.js";
import { toProxyError } from "../errors/error-mapper.js";
import { formatError, formatText } from "../response.js";
import { logUsage } from "./condense.js";

/** Cap and optionally number the lines of filtered text. */
export function presentLines(text: string, maxLines?: number, lineNumbers = false): { content: string; shown: number; total: number } {
  const lines = splitLines(text);
  const kept = maxLines !== undefined ? lines.slice(0, maxLines) : lines;
  const width = String(kept.length).length;
  const out = lineNumbers ? kept.map((line, i) => `${String(i + 1).padStart(width)} | ${line}`) : [...kept];
  if (kept.length < lines.length) {
    out.push(`... +${lines.length - kept.length} more lines`);
  }
  return { content: out.join("\n"), shown: kept.length, total: lines.length };
}

export async function handleReadSource(deps: HandlerDeps, args: ReadSourceArgs) {
  const startTime = Date.now();
  const { connector, config } = deps;

  try {
    const execOptions: ExecOptions = { timeout: config.timeout * 1000 };
    if (config.cwd) {
      execOptions.cwd = config.cwd;
    }
    const result = await connector.execute(["cat", "--", args.path], execOptions);
    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || `cat exited with code ${result.exitCode}`;
      throw new ProxyError(
        reason,
        "FILE_READ_FAILED",
        /No such file|not found/i.test(reason) ? "not_found" : "tool_failure",
        "Check the path; relative paths resolve against the server --cwd",
      );
    }

    const syntax = args.language !== undefined ? findLanguage(args.language) : languageForPath(args.path);
    const level = args.level ?? config.level;
    const filtered = filterSource(result.stdout, syntax?.name, level);
    const { content, shown, total } = presentLines(filtered, args.max_lines, args.line_numbers ?? false);

    const inputChars = result.stdout.length;
    const { result: reply, sentChars } = formatText("read_source", content, (sent) => ({
      path: args.path,
      language: syntax?.name ?? null,
      level: syntax ? level : "none",
      shown_lines: shown,
      total_lines: total,
      input_chars: inputChars,
      output_chars: sent,
    }), startTime);

    deps.usage.record({
      toolId: "read_source",
      command: `cat ${args.path}`,
      inputChars,
      outputChars: sentChars,
      exitCode: 0,
      strategy: "source",
      tier: "full",
    });
    logUsage(deps, "read_source", syntax ? `${syntax.name}/${level}` : "unfiltered", inputChars, sentChars);

    return reply;
  } catch (error) {
    return formatError("read_source", toProxyError(error, config.mode), startTime);
  }
}
