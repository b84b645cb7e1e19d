import type { Logger } from "../../core/logger.js";
import { DEFAULT_SUBMIT_RETRY, defaultSleep, invokeWithRetry, type RetryPolicy, type Sleep } from "../retry.js";
import type { ToolRunner } from "../toolRunner.js";

export interface PbsSubmitResult {
  pbsJobId: string;
  stdout: string;
}

export function qsubArgs(scriptPath: string, dependencyIds: readonly string[]): string[] {
  if (!dependencyIds.length) return [scriptPath];
  return ["-W", `depend=${dependencyIds.map((id) => `afterok:${id}`).join(",")}`, scriptPath];
}

/** qsub prints `<id>.<server>`; the id is the first dot-delimited token. */
export function parseQsubJobId(stdout: string): string | null {
  const first = stdout.trim().split(".")[0] ?? "";
  return /^\d+$/.test(first) ? first : null;
}

export class QsubSubmitter {
  constructor(
    private readonly deps: {
      runner: ToolRunner;
      retry?: RetryPolicy;
      sleep?: Sleep;
      log: Logger;
    }
  ) {}

  async submit(scriptPath: string, dependencyIds: readonly string[]): Promise<PbsSubmitResult> {
    const res = await invokeWithRetry({
      backend: "pbs-style",
      runner: this.deps.runner,
      command: "qsub",
      args: qsubArgs(scriptPath, dependencyIds),
      policy: this.deps.retry ?? DEFAULT_SUBMIT_RETRY,
      sleep: this.deps.sleep ?? defaultSleep,
      log: this.deps.log
    });

    const jobId = parseQsubJobId(res.stdout);
    if (!jobId) {
      throw new Error(`unable to parse qsub job id from output: ${res.stdout || res.stderr}`);
    }
    return { pbsJobId: jobId, stdout: res.stdout };
  }
}
