import type { Logger } from "../../core/logger.js";
import { DEFAULT_SUBMIT_RETRY, defaultSleep, invokeWithRetry, type RetryPolicy, type Sleep } from "../retry.js";
import type { ToolRunner } from "../toolRunner.js";

export interface SlurmSubmitResult {
  slurmJobId: string;
  stdout: string;
}

export function sbatchArgs(scriptPath: string, dependencyIds: readonly string[]): string[] {
  if (!dependencyIds.length) return [scriptPath];
  return [`--dependency=afterok:${dependencyIds.join(":")}`, scriptPath];
}

/** "Submitted batch job 4242" -> "4242". */
export function parseSbatchJobId(stdout: string): string | null {
  const last = stdout.trim().split(/\s+/).pop() ?? "";
  return /^\d+$/.test(last) ? last : null;
}

export class SbatchSubmitter {
  constructor(
    private readonly deps: {
      runner: ToolRunner;
      retry?: RetryPolicy;
      sleep?: Sleep;
      log: Logger;
    }
  ) {}

  async submit(scriptPath: string, dependencyIds: readonly string[]): Promise<SlurmSubmitResult> {
    const res = await invokeWithRetry({
      backend: "slurm-style",
      runner: this.deps.runner,
      command: "sbatch",
      args: sbatchArgs(scriptPath, dependencyIds),
      policy: this.deps.retry ?? DEFAULT_SUBMIT_RETRY,
      sleep: this.deps.sleep ?? defaultSleep,
      log: this.deps.log
    });

    const jobId = parseSbatchJobId(res.stdout);
    if (!jobId) {
      throw new Error(`unable to parse sbatch job id from output: ${res.stdout || res.stderr}`);
    }
    return { slurmJobId: jobId, stdout: res.stdout };
  }
}
