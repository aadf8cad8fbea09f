import { describe, it, expect, vi, beforeEach } from "vitest";

const state = vi.hoisted(() => ({
  running: true,
  chunks: [] as Buffer[],
  exitCode: 0 as number | null,
  execOptions: undefined as Record<string, unknown> | undefined,
}));

vi.mock("dockerode", async () => {
  const { EventEmitter } = await import("node:events");
  const exec = {
    start(_opts: unknown, cb: (err: Error | null, stream?: NodeJS.EventEmitter) => void) {
      const stream = new EventEmitter();
      cb(null, stream);
      queueMicrotask(() => {
        for (const chunk of state.chunks) stream.emit("data", chunk);
        stream.emit("end");
      });
    },
    inspect: async () => ({ ExitCode: state.exitCode }),
  };
  const container = {
    inspect: async () => ({ State: { Running: state.running } }),
    exec: async (options: Record<string, unknown>) => {
      state.execOptions = options;
      return exec;
    },
  };
  return {
    default: class {
      getContainer() {
        return container;
      }
    },
  };
});

import { DockerConnector, demuxFrames, looksFramed } from "../docker.js";
import { MAX_OUTPUT_BYTES, StreamCapture, TRUNCATION_NOTICE } from "../output.js";

function frame(type: number, text: string): Buffer {
  const payload = Buffer.from(text);
  const header = Buffer.alloc(8);
  header[0] = type;
  header.writeUInt32BE(payload.length, 4);
  return Buffer.concat([header, payload]);
}

describe("demuxFrames", () => {
  it("routes frames by stream type and returns the incomplete tail", () => {
    const stdout = new StreamCapture();
    const stderr = new StreamCapture();
    const whole = Buffer.concat([frame(1, "out\n"), frame(2, "err\n"), frame(1, "more")]);
    const rest = demuxFrames(whole.subarray(0, whole.length - 2), stdout, stderr);

    expect(stdout.text()).toBe("out\n");
    expect(stderr.text()).toBe("err\n");
    expect(rest.length).toBe(10);
  });
});

describe("looksFramed", () => {
  it("accepts a frame header and rejects text", () => {
    expect(looksFramed(frame(2, "x"))).toBe(true);
    expect(looksFramed(Buffer.from("plain output\n"))).toBe(false);
    expect(looksFramed(Buffer.from([1, 0, 0]))).toBe(false);
  });
});

describe("DockerConnector", () => {
  beforeEach(() => {
    state.running = true;
    state.chunks = [];
    state.exitCode = 0;
    state.execOptions = undefined;
  });

  it("rejects invalid container names", () => {
    expect(() => new DockerConnector("bad name;rm")).toThrow("Invalid container name: bad name;rm");
  });

  it("demultiplexes frames split across chunks", async () => {
    const data = Buffer.concat([frame(1, "hello\n"), frame(2, "warn\n")]);
    state.chunks = [data.subarray(0, 17), data.subarray(17)];
    state.exitCode = 3;

    const result = await new DockerConnector("devbox").execute(["cargo", "build"], { cwd: "/src" });
    expect(result).toEqual({ stdout: "hello\n", stderr: "warn\n", exitCode: 3 });
    expect(state.execOptions).toEqual({
      Cmd: ["cargo", "build"],
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: "/src",
    });
  });

  it("treats unframed output as stdout", async () => {
    state.chunks = [Buffer.from("plain output\n")];
    const result = await new DockerConnector("devbox").executeShell("echo plain output");
    expect(result.stdout).toBe("plain output\n");
    expect(state.execOptions?.Cmd).toEqual(["bash", "-c", "echo plain output"]);
  });

  it("treats output shorter than a frame header as stdout", async () => {
    state.chunks = [Buffer.from("ok\n")];
    const result = await new DockerConnector("devbox").execute(["true"]);
    expect(result).toEqual({ stdout: "ok\n", stderr: "", exitCode: 0 });
  });

  it("caps unframed output like framed output", async () => {
    state.chunks = [Buffer.from("building\n"), Buffer.alloc(MAX_OUTPUT_BYTES, 0x61)];
    const result = await new DockerConnector("devbox").execute(["make"]);
    expect(result.stdout.length).toBe(MAX_OUTPUT_BYTES + 1 + TRUNCATION_NOTICE.length);
    expect(result.stdout.startsWith("building\naaa")).toBe(true);
    expect(result.stdout.endsWith(`a\n${TRUNCATION_NOTICE}`)).toBe(true);
  });

  it("reports -1 when the exit code is unknown", async () => {
    state.exitCode = null;
    const result = await new DockerConnector("devbox").execute(["true"]);
    expect(result.exitCode).toBe(-1);
  });

  it("refuses to run in a stopped container", async () => {
    state.running = false;
    await expect(new DockerConnector("devbox").execute(["ls"])).rejects.toThrow(
      "Container 'devbox' is not running",
    );
  });
});
