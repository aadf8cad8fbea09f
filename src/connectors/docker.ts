import Docker from "dockerode";
import type { Connector, ExecOptions, ExecResult } from "./index.js";
import { DEFAULT_TIMEOUT_MS, StreamCapture, timeoutError } from "./output.js";

const STDOUT_FRAME = 1;
const STDERR_FRAME = 2;
const FRAME_HEADER = 8;

/**
 * Splits Docker's multiplexed exec stream. Each frame is an 8-byte header
 * (stream type, three zero bytes, big-endian payload size) then the payload.
 * Returns the bytes of an incomplete trailing frame.
 */
export function demuxFrames(buffer: Buffer, stdout: StreamCapture, stderr: StreamCapture): Buffer {
  let rest = buffer;
  while (rest.length >= FRAME_HEADER) {
    const type = rest[0];
    const size = rest.readUInt32BE(4);
    if (rest.length < FRAME_HEADER + size) break;
    const payload = rest.subarray(FRAME_HEADER, FRAME_HEADER + size);
    if (type === STDOUT_FRAME) stdout.push(payload);
    else if (type === STDERR_FRAME) stderr.push(payload);
    rest = rest.subarray(FRAME_HEADER + size);
  }
  return rest;
}

/**
 * A multiplexed stream starts with a header whose type byte is stdin, stdout
 * or stderr followed by three zero bytes. TTY execs send raw bytes instead.
 */
export function looksFramed(head: Buffer): boolean {
  return head.length >= FRAME_HEADER && head[0] <= STDERR_FRAME && head[1] === 0 && head[2] === 0 && head[3] === 0;
}

export class DockerConnector implements Connector {
  private readonly docker: Docker;
  private readonly containerName: string;

  constructor(containerName: string, docker: Docker = new Docker()) {
    // Docker container names can only contain [a-zA-Z0-9][a-zA-Z0-9_.-]*
    if (!/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/.test(containerName)) {
      throw new Error(`Invalid container name: ${containerName}`);
    }
    this.docker = docker;
    this.containerName = containerName;
  }

  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const container = this.docker.getContainer(this.containerName);
    const info = await container.inspect();
    if (!info.State.Running) {
      throw new Error(`Container '${this.containerName}' is not running`);
    }

    const exec = await container.exec({
      Cmd: command,
      AttachStdout: true,
      AttachStderr: true,
      ...(options.cwd ? { WorkingDir: options.cwd } : {}),
    });
    const timeout = options.timeout || DEFAULT_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      let timedOut = false;
      let activeStream: NodeJS.ReadWriteStream | undefined;

      const timer = setTimeout(() => {
        timedOut = true;
        if (activeStream && "destroy" in activeStream && typeof activeStream.destroy === "function") {
          activeStream.destroy();
        }
        reject(timeoutError(timeout));
      }, timeout);

      exec.start({ hijack: true, stdin: false }, (err, stream) => {
        if (err) {
          clearTimeout(timer);
          reject(err);
          return;
        }
        if (!stream) {
          clearTimeout(timer);
          reject(new Error("No stream returned from exec"));
          return;
        }
        activeStream = stream;

        const stdout = new StreamCapture();
        const stderr = new StreamCapture();
        let pending: Buffer = Buffer.alloc(0);
        let mode: "unknown" | "framed" | "raw" = "unknown";

        stream.on("data", (chunk: Buffer) => {
          if (mode === "raw") {
            stdout.push(chunk);
            return;
          }
          pending = Buffer.concat([pending, chunk]);
          if (mode === "unknown") {
            if (pending.length < FRAME_HEADER) return;
            mode = looksFramed(pending) ? "framed" : "raw";
            if (mode === "raw") {
              stdout.push(pending);
              pending = Buffer.alloc(0);
              return;
            }
          }
          pending = demuxFrames(pending, stdout, stderr);
        });

        stream.on("end", () => {
          if (timedOut) return;
          clearTimeout(timer);
          // Fewer bytes than one header: not a frame
          if (mode === "unknown") stdout.push(pending);

          exec
            .inspect()
            .then((result) => {
              resolve({ stdout: stdout.text(), stderr: stderr.text(), exitCode: result.ExitCode ?? -1 });
            })
            .catch(() => {
              resolve({ stdout: stdout.text(), stderr: stderr.text(), exitCode: -1 });
            });
        });

        stream.on("error", (streamErr: Error) => {
          clearTimeout(timer);
          reject(streamErr);
        });
      });
    });
  }

  async executeShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    return this.execute(["bash", "-c", command], options);
  }

  async disconnect(): Promise<void> {
    // Docker client doesn't maintain persistent connections
  }
}
