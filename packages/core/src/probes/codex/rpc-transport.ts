/**
 * Newline-delimited JSON-RPC over a child process's stdio.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { createInterface, type Interface } from "node:readline";
import { debug } from "../../utils/debug.js";
import { ProbeError } from "../probe-error.js";

export interface RpcTransport {
  send(message: Record<string, unknown>): Promise<void>;
  /** Next decoded message; rejects with timeout when nothing arrives in time */
  receive(): Promise<unknown>;
  /** Terminates the server and rejects anything still waiting on it */
  close(): void;
}

export type RpcTransportFactory = (executable: string, args: string[]) => RpcTransport;

interface Waiter {
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class StdioRpcTransport implements RpcTransport {
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly lines: Interface;
  private readonly receiveTimeoutMs: number;
  private readonly queue: unknown[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: Error | null = null;
  private stderr = "";

  constructor(executable: string, args: string[], options: { receiveTimeoutMs?: number; env?: NodeJS.ProcessEnv } = {}) {
    this.receiveTimeoutMs = options.receiveTimeoutMs ?? 15_000;
    this.child = spawn(executable, args, {
      env: options.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
    });

    this.lines = createInterface({ input: this.child.stdout });
    this.lines.on("line", (line) => this.onLine(line));

    this.child.stderr.on("data", (chunk: Buffer) => {
      this.stderr = (this.stderr + chunk.toString()).slice(-4096);
    });
    // EPIPE and friends surface here as well as in the write callback
    this.child.stdin.on("error", (err) => {
      debug("codex-rpc", "stdin error:", err.message);
      this.fail(ProbeError.executionFailed(`RPC write failed: ${err.message}`));
    });
    this.child.on("error", (err) => {
      this.fail(ProbeError.executionFailed(`Failed to start ${executable}: ${err.message}`));
    });
    this.child.on("exit", (code) => {
      const detail = this.stderr.trim().split("\n").pop() ?? "";
      this.fail(ProbeError.executionFailed(`${executable} exited with code ${code ?? "null"}${detail ? `: ${detail}` : ""}`));
    });
  }

  send(message: Record<string, unknown>): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.child.stdin.write(`${JSON.stringify(message)}\n`, (err) => {
        if (err) reject(ProbeError.executionFailed(`RPC write failed: ${err.message}`));
        else resolve();
      });
    });
  }

  receive(): Promise<unknown> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters.splice(this.waiters.indexOf(waiter), 1);
          reject(ProbeError.of("timeout"));
        }, this.receiveTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Stops the server; pending and later receives reject */
  close(): void {
    this.fail(ProbeError.executionFailed("RPC transport closed"));
    this.lines.close();
    this.child.stdin.end();
    if (this.child.exitCode === null && !this.child.killed) {
      this.child.kill("SIGTERM");
      const timer = setTimeout(() => {
        if (this.child.exitCode === null) this.child.kill("SIGKILL");
      }, 3000);
      timer.unref();
    }
  }

  private onLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;
    let message: unknown;
    try {
      message = JSON.parse(trimmed);
    } catch {
      debug("codex-rpc", "skipping non-JSON line:", trimmed.slice(0, 200));
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(message);
    } else {
      this.queue.push(message);
    }
  }

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }
}

export const stdioTransportFactory: RpcTransportFactory = (executable, args) => new StdioRpcTransport(executable, args);
