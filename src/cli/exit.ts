/**
 * Process exit once a run is over.
 */
import { Logger } from "../logger.js";

export type ExitFn = (code: number) => void;

/**
 * Set the exit code and let the event loop drain. When a worker missed the
 * shutdown deadline it may hold the loop open (a running command, a stream),
 * so exit at once instead.
 */
export function settleExit(code: number, workersStopped: boolean, exit: ExitFn = (c) => process.exit(c)): void {
  process.exitCode = code;
  if (workersStopped) return;
  Logger.warn("workers did not stop before the shutdown deadline, exiting now");
  exit(code);
}
