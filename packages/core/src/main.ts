import "dotenv/config";
import { runOnce } from "./run-once.js";

runOnce().then(
  (cycle) => {
    process.exitCode = cycle.results.every((r) => r.ok) ? 0 : 1;
  },
  (err: unknown) => {
    console.error("[usagebar] Fatal:", err instanceof Error ? err.message : err);
    process.exitCode = 2;
  },
);
