import { cleanSuffixes } from "../../core/backend.js";
import { ConfigError } from "../../core/errors.js";
import { toSchedulerJobIds, type JobRef, type SchedulerJobHandle } from "../../core/handle.js";
import type { JobSpecFields } from "../../core/jobSpec.js";
import { silentLogger, type Logger } from "../../core/logger.js";
import type { ClusterBackend, JobArtifact, ScriptOptions, SubmitOptions } from "../backends/types.js";
import { cleanDirectory } from "../cleaner.js";
import { DEFAULT_SCRIPT_OPTIONS, buildJobArtifact } from "../jobArtifact.js";
import { defaultSleep, type RetryPolicy, type Sleep } from "../retry.js";
import { SystemToolRunner, type ToolRunner } from "../toolRunner.js";
import { SLURM_TERMINAL_STATES, SqueueScheduler } from "./scheduler.js";
import { SbatchSubmitter } from "./submitter.js";

export interface SlurmPollOptions {
  initialDelayMs: number;
  intervalMs: number;
}

export const DEFAULT_SLURM_POLL: SlurmPollOptions = { initialDelayMs: 2000, intervalMs: 2000 };

export interface SlurmBackendOptions {
  runner?: ToolRunner;
  retry?: RetryPolicy;
  poll?: Partial<SlurmPollOptions>;
  sleep?: Sleep;
  script?: ScriptOptions;
  log?: Logger;
}

export class SlurmBackend implements ClusterBackend<"slurm-style"> {
  readonly kind = "slurm-style" as const;
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private readonly poll: SlurmPollOptions;
  private readonly submitter: SbatchSubmitter;
  private readonly scheduler: SqueueScheduler;

  constructor(private readonly options: SlurmBackendOptions = {}) {
    this.log = options.log ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.poll = { ...DEFAULT_SLURM_POLL, ...options.poll };
    const runner = options.runner ?? new SystemToolRunner();
    this.submitter = new SbatchSubmitter({ runner, retry: options.retry, sleep: this.sleep, log: this.log });
    this.scheduler = new SqueueScheduler(runner);
  }

  build(spec: JobSpecFields): Promise<JobArtifact> {
    return buildJobArtifact(spec, this.kind, this.options.script ?? DEFAULT_SCRIPT_OPTIONS);
  }

  async submit(artifact: JobArtifact, options: SubmitOptions = {}): Promise<SchedulerJobHandle<"slurm-style">> {
    if (artifact.backend !== this.kind) {
      throw new ConfigError(`artifact ${artifact.scriptPath} was built for ${artifact.backend}`, {
        backend: this.kind,
        value: artifact.backend
      });
    }
    const dependencyIds = toSchedulerJobIds(this.kind, options.dependencies ?? []);
    const res = await this.submitter.submit(artifact.scriptPath, dependencyIds);
    this.log.info({ backend: this.kind, jobId: res.slurmJobId, name: artifact.name, dependencyIds }, "job submitted");
    return { backend: this.kind, jobId: res.slurmJobId };
  }

  /** squeue forgets finished jobs quickly, so a job missing from the listing is done. */
  async wait(handles: readonly JobRef[]): Promise<void> {
    const pending = new Set(toSchedulerJobIds(this.kind, handles));
    if (!pending.size) return;

    await this.sleep(this.poll.initialDelayMs);
    for (;;) {
      const states = await this.scheduler.list();
      for (const jobId of [...pending]) {
        const state = states.get(jobId);
        if (state === undefined || SLURM_TERMINAL_STATES.has(state)) pending.delete(jobId);
      }

      this.log.debug({ backend: this.kind, pending: [...pending] }, "poll cycle");
      if (!pending.size) return;
      await this.sleep(this.poll.intervalMs);
    }
  }

  clean(directory: string = process.cwd()): Promise<Set<string>> {
    return cleanDirectory(directory, cleanSuffixes(this.kind), this.log);
  }
}
