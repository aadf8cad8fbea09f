import { spawn } from "node:child_process";
import type { Connector, ExecOptions, ExecResult } from "./index.js";
import { DEFAULT_TIMEOUT_MS, StreamCapture, timeoutError } from "./output.js";

// Only these variables reach the child; toolchains find their homes through them
const ALLOWED_ENV_VARS = [
  "PATH",
  "HOME",
  "USER",
  "SHELL",
  "TERM",
  "LANG",
  "LC_ALL",
  "TZ",
  "TMPDIR",
  "CARGO_HOME",
  "RUSTUP_HOME",
  "GOPATH",
  "GOROOT",
  "GOCACHE",
  "GOFLAGS",
  "NODE_PATH",
  "PYTHONPATH",
  "VIRTUAL_ENV",
  "JAVA_HOME",
  "KUBECONFIG",
  "DOCKER_HOST",
];

export function filteredEnv(source: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const key of ALLOWED_ENV_VARS) {
    const value = source[key];
    if (value) env[key] = value;
  }
  return env;
}

export class LocalConnector implements Connector {
  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const [cmd, ...args] = command;
    if (cmd === undefined) {
      throw new Error("Command array cannot be empty");
    }
    const timeout = options.timeout || DEFAULT_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      let timedOut = false;
      const stdout = new StreamCapture();
      const stderr = new StreamCapture();

      const proc = spawn(cmd, args, {
        cwd: options.cwd,
        env: filteredEnv(),
        stdio: ["ignore", "pipe", "pipe"],
      });

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGKILL");
        reject(timeoutError(timeout));
      }, timeout);

      proc.stdout.on("data", (data: Buffer) => stdout.push(data));
      proc.stderr.on("data", (data: Buffer) => stderr.push(data));

      proc.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });

      proc.on("close", (code) => {
        if (timedOut) return;
        clearTimeout(timer);
        resolve({
          stdout: stdout.text(),
          stderr: stderr.text(),
          exitCode: code ?? 1,
        });
      });
    });
  }

  async executeShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    return this.execute(["bash", "-c", command], options);
  }

  async disconnect(): Promise<void> {
    // No persistent connection for local mode
  }
}
