/**
 * Output capture shared by the connectors.
 */

export const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
export const TRUNCATION_NOTICE = "[output truncated: exceeded 10 MiB]";
export const DEFAULT_TIMEOUT_MS = 300_000;

/** Collects one stream's bytes up to a limit and decodes them once at the end. */
export class StreamCapture {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit = MAX_OUTPUT_BYTES) {}

  push(chunk: Buffer): void {
    if (chunk.length === 0) return;
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size = this.limit;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  get wasTruncated(): boolean {
    return this.truncated;
  }

  text(): string {
    const bytes = Buffer.concat(this.chunks);
    if (!this.truncated) return bytes.toString("utf8");
    // The cut may land inside a character; drop its leading bytes
    const decoded = bytes.subarray(0, completeUtf8Length(bytes)).toString("utf8");
    return `${decoded}\n${TRUNCATION_NOTICE}`;
  }
}

/** Length of the longest prefix that does not end in a partial UTF-8 sequence. */
export function completeUtf8Length(bytes: Buffer): number {
  let lead = bytes.length - 1;
  while (lead >= 0 && bytes.length - lead < 4 && (bytes[lead] & 0xc0) === 0x80) lead--;
  if (lead < 0) return bytes.length;
  const first = bytes[lead];
  const width = first >= 0xf0 ? 4 : first >= 0xe0 ? 3 : first >= 0xc0 ? 2 : 1;
  return bytes.length - lead < width ? lead : bytes.length;
}

export function timeoutError(timeoutMs: number): Error {
  return new Error(`Command timed out after ${timeoutMs / 1000} seconds`);
}

/** Quote one argument for a POSIX shell. */
export function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}
