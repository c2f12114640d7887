/**
 * Runs interactive CLIs inside a pseudo-terminal.
 *
 * The executor spawns the binary through node-pty, feeds it the initial
 * input, answers scripted prompts via {@link AutoResponder} and returns the
 * raw terminal stream once the process exits or goes quiet. Every path out
 * of {@link PtyExecutor.execute} terminates the child.
 */

import type { IDisposable, IPty } from "node-pty";
import { AutoResponder } from "./auto-responder.js";
import { BinaryLocator } from "./binary-locator.js";
import { CliRunError } from "./cli-run-error.js";
import { debug } from "../utils/debug.js";
import { DEFAULT_SCREEN_SIZE, type ScreenSize } from "../utils/terminal.js";

/** Ring buffer size for captured output (~100KB) */
const RING_BUFFER_SIZE = 100 * 1024;

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 3000;

export interface CliRequest {
  binary: string;
  args?: string[];
  /** Written to the terminal once the process has had time to start */
  input?: string;
  timeoutMs?: number;
  workingDirectory?: string;
  /** Trigger substring -> reply, each sent at most once */
  autoResponses?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CliResult {
  output: string;
  /** Null when the run ended on quiescence and the process was stopped by us */
  exitCode: number | null;
}

export interface CliExecutor {
  locate(binary: string): Promise<string | null>;
  execute(request: CliRequest): Promise<CliResult>;
}

export interface PtyExecutorOptions {
  locator?: BinaryLocator;
  /** Variables removed from the child environment */
  environmentExclusions?: string[];
  screen?: ScreenSize;
  defaultTimeoutMs?: number;
  /** Delay before the initial input is typed */
  inputDelayMs?: number;
  /** Silence after which a run with its input sent and its prompts answered is done */
  quietMs?: number;
}

export class PtyExecutor implements CliExecutor {
  private readonly locator: BinaryLocator;
  private readonly exclusions: ReadonlySet<string>;
  private readonly screen: ScreenSize;
  private readonly defaultTimeoutMs: number;
  private readonly inputDelayMs: number;
  private readonly quietMs: number;

  constructor(options: PtyExecutorOptions = {}) {
    this.locator = options.locator ?? new BinaryLocator();
    this.exclusions = new Set(options.environmentExclusions ?? []);
    this.screen = options.screen ?? DEFAULT_SCREEN_SIZE;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 20_000;
    this.inputDelayMs = options.inputDelayMs ?? 500;
    this.quietMs = options.quietMs ?? 2_000;
  }

  locate(binary: string): Promise<string | null> {
    return this.locator.locate(binary);
  }

  async execute(request: CliRequest): Promise<CliResult> {
    const { binary } = request;
    const label = `PTY:${binary}`;

    if (request.signal?.aborted) throw new CliRunError("cancelled", binary);

    const executable = await this.locate(binary);
    if (!executable) throw new CliRunError("binaryNotFound", binary);

    const env = await this.buildEnvironment();

    // Dynamic import to avoid loading native module at module init
    let ptyProcess: IPty;
    try {
      const nodePty = await import("node-pty");
      if (request.signal?.aborted) throw new CliRunError("cancelled", binary);
      ptyProcess = nodePty.spawn(executable, request.args ?? [], {
        name: "xterm-256color",
        cols: this.screen.cols,
        rows: this.screen.rows,
        cwd: request.workingDirectory ?? process.cwd(),
        env,
      });
    } catch (err) {
      if (err instanceof CliRunError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[${label}] Launch failed:`, message);
      throw new CliRunError("launchFailed", binary, message);
    }

    debug(label, `spawned pid ${ptyProcess.pid} args=${JSON.stringify(request.args ?? [])}`);
    return this.supervise(ptyProcess, request, label);
  }

  private supervise(ptyProcess: IPty, request: CliRequest, label: string): Promise<CliResult> {
    const responder = new AutoResponder(request.autoResponses);
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
    const timers: NodeJS.Timeout[] = [];
    const subscriptions: IDisposable[] = [];
    let ringBuffer = "";
    let inputSent = request.input === undefined;
    let exited = false;
    let quietTimer: NodeJS.Timeout | null = null;

    return new Promise<CliResult>((resolve, reject) => {
      let settled = false;

      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        for (const timer of timers) clearTimeout(timer);
        if (quietTimer) clearTimeout(quietTimer);
        for (const sub of subscriptions) sub.dispose();
        request.signal?.removeEventListener("abort", onAbort);
        if (!exited) this.terminate(ptyProcess, label);
        outcome();
      };

      // Quiescence only counts once the input is typed and every trigger has been answered
      const armQuietTimer = () => {
        if (quietTimer) clearTimeout(quietTimer);
        quietTimer = null;
        if (!inputSent || responder.pendingTriggers.length > 0) return;
        quietTimer = setTimeout(() => {
          debug(label, `quiet for ${this.quietMs}ms`);
          finish(() => resolve({ output: ringBuffer, exitCode: null }));
        }, this.quietMs);
      };

      const write = (data: string) => {
        try {
          ptyProcess.write(data);
        } catch (err) {
          debug(label, "write failed:", err instanceof Error ? err.message : err);
        }
      };

      const onAbort = () => {
        console.warn(`[${label}] Cancelled by caller`);
        finish(() => reject(new CliRunError("cancelled", request.binary)));
      };
      request.signal?.addEventListener("abort", onAbort, { once: true });
      if (request.signal?.aborted) {
        onAbort();
        return;
      }

      subscriptions.push(
        ptyProcess.onData((data: string) => {
          // Append to ring buffer (trim to size)
          ringBuffer += data;
          if (ringBuffer.length > RING_BUFFER_SIZE) {
            ringBuffer = ringBuffer.slice(-RING_BUFFER_SIZE);
          }

          for (const reply of responder.scan(ringBuffer)) {
            debug(label, `auto-responding with ${JSON.stringify(reply)}`);
            write(reply);
          }
          armQuietTimer();
        }),
      );

      subscriptions.push(
        ptyProcess.onExit(({ exitCode }) => {
          exited = true;
          debug(label, `exited with code ${exitCode}`);
          finish(() => resolve({ output: ringBuffer, exitCode }));
        }),
      );

      timers.push(
        setTimeout(() => {
          console.warn(`[${label}] Timed out after ${timeoutMs}ms`);
          finish(() => reject(new CliRunError("timedOut", request.binary, `after ${timeoutMs}ms`)));
        }, timeoutMs),
      );

      if (request.input !== undefined) {
        const input = request.input;
        timers.push(
          setTimeout(() => {
            write(input);
            inputSent = true;
            armQuietTimer();
          }, this.inputDelayMs),
        );
      } else {
        armQuietTimer();
      }
    });
  }

  /** SIGTERM now, SIGKILL if the process is still around after the grace period */
  private terminate(ptyProcess: IPty, label: string): void {
    let gone = false;
    const exitSub = ptyProcess.onExit(() => {
      gone = true;
    });
    try {
      ptyProcess.kill("SIGTERM");
    } catch (err) {
      debug(label, "SIGTERM failed (already exited?):", err instanceof Error ? err.message : err);
      exitSub.dispose();
      return;
    }

    const forceKill = setTimeout(() => {
      exitSub.dispose();
      if (gone) return;
      try {
        ptyProcess.kill("SIGKILL");
      } catch (err) {
        debug(label, "SIGKILL failed:", err instanceof Error ? err.message : err);
      }
    }, KILL_GRACE_MS);
    forceKill.unref();
  }

  private async buildEnvironment(): Promise<Record<string, string>> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined && !this.exclusions.has(key)) env[key] = value;
    }
    const shellPath = await this.locator.shellPath();
    if (shellPath) env.PATH = shellPath;
    env.TERM = "xterm-256color";
    return env;
  }
}
