import { setTimeout as delay } from "timers/promises";
import type { BackendKind } from "../core/backend.js";
import { SubmissionError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { describeFailure, type ToolInvocationResult, type ToolRunner } from "./toolRunner.js";

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export const DEFAULT_SUBMIT_RETRY: RetryPolicy = { maxAttempts: 5, delayMs: 1000 };

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Invokes a submission tool until it exits 0. Only a non-zero exit counts as
 * transient; a tool that cannot be spawned fails on the first attempt.
 */
export async function invokeWithRetry(input: {
  backend: BackendKind;
  runner: ToolRunner;
  command: string;
  args: string[];
  policy: RetryPolicy;
  sleep: Sleep;
  log: Logger;
}): Promise<ToolInvocationResult> {
  const { backend, runner, command, args, policy, sleep, log } = input;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let last: ToolInvocationResult | null = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const res = await runner.run(command, args);
    if (res.error) {
      throw new SubmissionError(describeFailure(command, res), { backend, tool: command, attempts: attempt });
    }
    if (res.status === 0) return res;

    last = res;
    log.warn({ backend, command, attempt, maxAttempts, status: res.status }, "submission attempt failed");
    if (attempt < maxAttempts) await sleep(policy.delayMs);
  }

  const reason = last ? describeFailure(command, last) : `${command} was not invoked`;
  throw new SubmissionError(`${reason} after ${maxAttempts} attempts`, {
    backend,
    tool: command,
    attempts: maxAttempts
  });
}
