/**
 * One-shot worker isolation for hook callbacks.
 *
 * The callback's source is evaluated again inside a fresh worker thread, so a
 * callback stuck in a synchronous loop can still be cut off: the worker is
 * terminated when the deadline passes.
 */

import { Worker } from "node:worker_threads";
import { ErrorCode } from "@helmsman/shared";
import { z } from "zod";
import { HookExecutionError, HookTimeoutError } from "./errors.js";
import type { HookEvent } from "./types.js";

const WORKER_SOURCE = `
const { parentPort, workerData } = require("node:worker_threads");
(async () => {
  try {
    const callback = (0, eval)("(" + workerData.source + ")");
    const value = await callback(...workerData.args);
    parentPort.postMessage({ ok: true, value });
  } catch (error) {
    parentPort.postMessage({ ok: false, error: error instanceof Error ? error.message : String(error) });
  }
})();
`;

const WorkerMessageSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export interface IsolationOptions {
  /** ms */
  timeout: number;
  hookName: string;
  event?: HookEvent;
}

/**
 * Run `callback(...args)` in a worker thread and resolve with its result.
 *
 * @throws HookTimeoutError when the deadline passes (the worker is terminated)
 * @throws HookExecutionError when the callback throws or cannot be evaluated
 */
export async function runIsolated(
  callback: (...args: never[]) => unknown,
  args: readonly unknown[],
  options: IsolationOptions
): Promise<unknown> {
  const { timeout, hookName, event } = options;
  const worker = new Worker(WORKER_SOURCE, {
    eval: true,
    workerData: { source: callback.toString(), args },
  });
  let timer: NodeJS.Timeout | undefined;

  try {
    const message = await new Promise<unknown>((resolve, reject) => {
      timer = setTimeout(() => reject(new HookTimeoutError(hookName, timeout, event)), timeout);
      worker.once("message", resolve);
      worker.once("error", reject);
      worker.once("exit", (code) => {
        reject(
          new HookExecutionError(`Hook worker exited with code ${code}`, ErrorCode.HOOK_EXECUTION_FAILED, {
            hookName,
            event,
          })
        );
      });
    });

    const parsed = WorkerMessageSchema.safeParse(message);
    if (!parsed.success) {
      throw new HookExecutionError("Malformed message from hook worker", ErrorCode.HOOK_EXECUTION_FAILED, {
        hookName,
        event,
      });
    }
    if (!parsed.data.ok) {
      throw new HookExecutionError(parsed.data.error, ErrorCode.HOOK_EXECUTION_FAILED, { hookName, event });
    }
    return parsed.data.value;
  } finally {
    clearTimeout(timer);
    await worker.terminate();
  }
}
