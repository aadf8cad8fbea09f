import { Client } from "ssh2";
import type { Connector, ExecOptions, ExecResult } from "./index.js";
import { DEFAULT_TIMEOUT_MS, StreamCapture, shellQuote, timeoutError } from "./output.js";

export interface SSHConfig {
  host: string;
  user: string;
  port: number;
  privateKey?: string;
  password?: string;
}

/** `cd <cwd> && <command>` when a working directory is given. */
export function withCwd(command: string, cwd: string | undefined): string {
  return cwd ? `cd ${shellQuote(cwd)} && ${command}` : command;
}

function socketDestroyed(client: Client): boolean {
  // ssh2 keeps the socket on a private field; a destroyed one means reconnect
  const sock: unknown = Reflect.get(client, "_sock");
  return typeof sock === "object" && sock !== null && Reflect.get(sock, "destroyed") === true;
}

export class SSHConnector implements Connector {
  private readonly config: SSHConfig;
  private client: Client | null = null;

  constructor(config: SSHConfig) {
    this.config = config;
  }

  private async connect(): Promise<Client> {
    if (this.client) {
      if (!socketDestroyed(this.client)) return this.client;
      this.client = null;
    }

    return new Promise((resolve, reject) => {
      const client = new Client();

      client.on("ready", () => {
        this.client = client;
        resolve(client);
      });

      client.on("error", (err) => {
        this.client = null;
        reject(err);
      });

      client.on("close", () => {
        this.client = null;
      });

      const connectConfig: Parameters<Client["connect"]>[0] = {
        host: this.config.host,
        port: this.config.port,
        username: this.config.user,
      };

      if (this.config.privateKey) {
        connectConfig.privateKey = this.config.privateKey;
      } else if (this.config.password) {
        connectConfig.password = this.config.password;
      } else {
        connectConfig.agent = process.env.SSH_AUTH_SOCK;
      }

      client.connect(connectConfig);
    });
  }

  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }
    return this.run(withCwd(command.map(shellQuote).join(" "), options.cwd), options);
  }

  async executeShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    return this.run(withCwd(command, options.cwd), options);
  }

  private async run(fullCmd: string, options: ExecOptions): Promise<ExecResult> {
    const client = await this.connect();
    const timeout = options.timeout || DEFAULT_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        this.client?.end();
        this.client = null;
        reject(timeoutError(timeout));
      }, timeout);

      client.exec(fullCmd, (err, stream) => {
        if (err) {
          clearTimeout(timer);
          reject(err);
          return;
        }

        const stdout = new StreamCapture();
        const stderr = new StreamCapture();

        stream.on("data", (data: Buffer) => stdout.push(data));
        stream.stderr.on("data", (data: Buffer) => stderr.push(data));

        stream.on("close", (code: number | null) => {
          if (timedOut) return;
          clearTimeout(timer);
          resolve({ stdout: stdout.text(), stderr: stderr.text(), exitCode: code ?? 1 });
        });
      });
    });
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      this.client.end();
      this.client = null;
    }
  }
}
