import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// --- Mocks ---

const spawnMock = vi.hoisted(() => vi.fn());
vi.mock("node-pty", () => ({ spawn: spawnMock }));

import { BinaryLocator, type ShellRunner } from "./binary-locator.js";
import { CliRunError } from "./cli-run-error.js";
import { PtyExecutor, type PtyExecutorOptions } from "./pty-executor.js";

type Listener<T> = (value: T) => void;

class FakePty {
  pid = 4242;
  written: string[] = [];
  signals: string[] = [];
  private dataListeners = new Set<Listener<string>>();
  private exitListeners = new Set<Listener<{ exitCode: number }>>();

  onData = (listener: Listener<string>) => {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  };

  onExit = (listener: Listener<{ exitCode: number }>) => {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  };

  write = (data: string) => {
    this.written.push(data);
  };

  kill = (signal: string) => {
    this.signals.push(signal);
  };

  emitData(data: string): void {
    for (const listener of [...this.dataListeners]) listener(data);
  }

  emitExit(exitCode: number): void {
    for (const listener of [...this.exitListeners]) listener({ exitCode });
  }
}

const shellRun: ShellRunner = async (_shell, args) => {
  const command = args[2] ?? "";
  if (command.startsWith("which missing")) throw new Error("exit 1");
  if (command.startsWith("which ")) return `/usr/local/bin/${command.slice(6)}\n`;
  return "/usr/bin:/bin";
};

function makeExecutor(options: PtyExecutorOptions = {}): PtyExecutor {
  return new PtyExecutor({
    locator: new BinaryLocator({ shell: "/bin/sh", run: shellRun }),
    inputDelayMs: 5,
    quietMs: 1_000,
    defaultTimeoutMs: 5_000,
    ...options,
  });
}

async function spawned(): Promise<FakePty> {
  await vi.waitFor(() => expect(spawnMock).toHaveBeenCalled());
  const fake = spawnMock.mock.results[0]?.value;
  if (!(fake instanceof FakePty)) throw new Error("spawn did not return the fake");
  return fake;
}

describe("PtyExecutor", () => {
  beforeEach(() => {
    spawnMock.mockReset();
    spawnMock.mockImplementation(() => new FakePty());
  });

  afterEach(() => {
    delete process.env.USAGEBAR_TEST_SECRET;
  });

  it("returns output and exit code when the process exits", async () => {
    const run = makeExecutor().execute({ binary: "claude", args: ["/usage"] });
    const pty = await spawned();

    pty.emitData("hello ");
    pty.emitData("world");
    pty.emitExit(0);

    await expect(run).resolves.toEqual({ output: "hello world", exitCode: 0 });
    expect(pty.signals).toEqual([]);
    expect(spawnMock.mock.calls[0]?.[0]).toBe("/usr/local/bin/claude");
    expect(spawnMock.mock.calls[0]?.[1]).toEqual(["/usage"]);
  });

  it("passes non-zero exit codes through", async () => {
    const run = makeExecutor().execute({ binary: "amp", args: ["usage"] });
    const pty = await spawned();
    pty.emitData("error");
    pty.emitExit(1);
    await expect(run).resolves.toEqual({ output: "error", exitCode: 1 });
  });

  it("types the input and answers each prompt once", async () => {
    const run = makeExecutor().execute({
      binary: "claude",
      input: "/usage\r",
      autoResponses: { "Do you trust the files": "\r" },
    });
    const pty = await spawned();
    await vi.waitFor(() => expect(pty.written).toEqual(["/usage\r"]));

    pty.emitData("Do you trust the files in this folder?");
    pty.emitData(" (y/n)");
    pty.emitExit(0);

    await run;
    expect(pty.written).toEqual(["/usage\r", "\r"]);
  });

  it("finishes after a quiet period and stops the process", async () => {
    const run = makeExecutor({ quietMs: 30 }).execute({ binary: "kimi", input: "/usage\n" });
    const pty = await spawned();
    await vi.waitFor(() => expect(pty.written).toEqual(["/usage\n"]));
    pty.emitData("Weekly limit 80% left");

    await expect(run).resolves.toEqual({ output: "Weekly limit 80% left", exitCode: null });
    expect(pty.signals).toEqual(["SIGTERM"]);
  });

  it("does not treat silence as done while a prompt is still unanswered", async () => {
    const run = makeExecutor({ quietMs: 30 }).execute({ binary: "kimi", autoResponses: { "💫": "/usage\r" } });
    let settled = false;
    run.then(
      () => (settled = true),
      () => (settled = true),
    );
    const pty = await spawned();

    await new Promise((resolve) => setTimeout(resolve, 120));
    expect(settled).toBe(false);

    pty.emitData("💫 ");
    expect(pty.written).toEqual(["/usage\r"]);
    pty.emitData("Weekly limit 80% left");

    await expect(run).resolves.toEqual({ output: "💫 Weekly limit 80% left", exitCode: null });
    expect(pty.signals).toEqual(["SIGTERM"]);
  });

  it("kills the process and discards output on timeout", async () => {
    const run = makeExecutor({ quietMs: 60_000 }).execute({ binary: "gemini", input: "/stats\n", timeoutMs: 50 });
    const pty = await spawned();
    pty.emitData("partial");

    const error = await run.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CliRunError);
    expect(error).toMatchObject({ failure: "timedOut", binary: "gemini" });
    expect(pty.signals).toEqual(["SIGTERM"]);
  });

  it("fails before spawning when the binary cannot be found", async () => {
    await expect(makeExecutor().execute({ binary: "missing" })).rejects.toMatchObject({
      failure: "binaryNotFound",
    });
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it("reports launch failures", async () => {
    spawnMock.mockImplementation(() => {
      throw new Error("posix_spawnp failed");
    });
    await expect(makeExecutor().execute({ binary: "codex" })).rejects.toMatchObject({
      failure: "launchFailed",
      message: "Failed to launch codex: posix_spawnp failed",
    });
  });

  it("strips excluded variables and uses the login shell PATH", async () => {
    process.env.USAGEBAR_TEST_SECRET = "test-secret";
    const run = makeExecutor({ environmentExclusions: ["USAGEBAR_TEST_SECRET"] }).execute({ binary: "claude" });
    const pty = await spawned();
    pty.emitExit(0);
    await run;

    const options = spawnMock.mock.calls[0]?.[2];
    expect(options.env.USAGEBAR_TEST_SECRET).toBeUndefined();
    expect(options.env.PATH).toBe("/usr/bin:/bin");
    expect(options.name).toBe("xterm-256color");
  });

  it("stops the process when the caller cancels", async () => {
    const controller = new AbortController();
    const run = makeExecutor().execute({ binary: "claude", signal: controller.signal });
    const pty = await spawned();

    controller.abort();

    await expect(run).rejects.toMatchObject({ failure: "cancelled" });
    expect(pty.signals).toEqual(["SIGTERM"]);
  });

  it("never spawns when the caller cancels during startup", async () => {
    const controller = new AbortController();
    const run = makeExecutor().execute({ binary: "claude", input: "/usage\r", signal: controller.signal });
    controller.abort();

    await expect(run).rejects.toMatchObject({ failure: "cancelled", binary: "claude" });
    expect(spawnMock).not.toHaveBeenCalled();
  });
});
