/**
 * Connectors run commands in the target environment: this machine, a
 * running container, or a host over SSH. Output comes back decoded, each
 * stream capped at MAX_OUTPUT_BYTES.
 */

export type ConnectorMode = "local" | "docker" | "ssh";

export interface ExecOptions {
  /** Milliseconds before the command is abandoned */
  timeout?: number;
  cwd?: string;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface Connector {
  execute(command: string[], options?: ExecOptions): Promise<ExecResult>;
  executeShell(command: string, options?: ExecOptions): Promise<ExecResult>;
  disconnect(): Promise<void>;
}

export interface ConnectorConfig {
  mode: ConnectorMode;
  container?: string;
  host?: string;
  user?: string;
  port?: number;
  password?: string;
}

export async function createConnector(config: ConnectorConfig): Promise<Connector> {
  switch (config.mode) {
    case "docker": {
      if (!config.container) throw new Error("Docker mode requires --container");
      const { DockerConnector } = await import("./docker.js");
      return new DockerConnector(config.container);
    }

    case "ssh": {
      if (!config.host) throw new Error("SSH mode requires --host");
      const { SSHConnector } = await import("./ssh.js");
      return new SSHConnector({
        host: config.host,
        user: config.user || process.env.USER || "root",
        port: config.port || 22,
        ...(config.password ? { password: config.password } : {}),
      });
    }

    case "local": {
      const { LocalConnector } = await import("./local.js");
      return new LocalConnector();
    }
  }
}
