import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { describe, it, expect, vi, beforeEach } from "vitest";

const spawnMock = vi.hoisted(() => vi.fn());
vi.mock("node:child_process", () => ({ spawn: spawnMock }));

import { rejection } from "../../testing/helpers.js";
import { StdioRpcTransport } from "./rpc-transport.js";

class FakeChild extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  killed = false;
  readonly kill = vi.fn((_signal?: string) => {
    this.killed = true;
    return true;
  });
}

function start(): { transport: StdioRpcTransport; child: FakeChild } {
  const child = new FakeChild();
  spawnMock.mockReturnValue(child);
  const transport = new StdioRpcTransport("/usr/local/bin/codex", ["app-server"], { receiveTimeoutMs: 5_000 });
  return { transport, child };
}

describe("StdioRpcTransport", () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it("writes newline-delimited requests and decodes replies", async () => {
    const { transport, child } = start();
    const written: string[] = [];
    child.stdin.on("data", (chunk: Buffer) => written.push(chunk.toString()));

    await transport.send({ id: 1, method: "initialize" });
    child.stdout.write('not json\n{"id":1,"result":{}}\n');

    await expect(transport.receive()).resolves.toEqual({ id: 1, result: {} });
    expect(written).toEqual(['{"id":1,"method":"initialize"}\n']);
    expect(spawnMock).toHaveBeenCalledWith("/usr/local/bin/codex", ["app-server"], expect.objectContaining({ stdio: ["pipe", "pipe", "pipe"] }));
  });

  it("turns a broken stdin pipe into a failed receive", async () => {
    const { transport, child } = start();
    const pending = transport.receive();

    child.stdin.emit("error", Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));

    expect(await rejection(pending)).toMatchObject({
      code: "executionFailed",
      message: "Probe failed: RPC write failed: write EPIPE",
    });
    expect(await rejection(transport.send({ id: 2 }))).toMatchObject({ code: "executionFailed" });
  });

  it("rejects waiting receives and stops the server on close", async () => {
    const { transport, child } = start();
    const pending = transport.receive();

    transport.close();

    expect(await rejection(pending)).toMatchObject({ message: "Probe failed: RPC transport closed" });
    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
  });
});
