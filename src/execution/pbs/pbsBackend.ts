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
import { PBS_COMPLETED_STATE, QstatScheduler } from "./scheduler.js";
import { QsubSubmitter } from "./submitter.js";

export interface PbsPollOptions {
  initialDelayMs: number;
  intervalMs: number;
  /** `pending` keeps waiting on jobs qstat no longer lists; `terminal` drops them. */
  missingJobs: "pending" | "terminal";
}

export const DEFAULT_PBS_POLL: PbsPollOptions = { initialDelayMs: 5000, intervalMs: 2000, missingJobs: "pending" };

export interface PbsBackendOptions {
  runner?: ToolRunner;
  retry?: RetryPolicy;
  poll?: Partial<PbsPollOptions>;
  sleep?: Sleep;
  script?: ScriptOptions;
  log?: Logger;
}

export class PbsBackend implements ClusterBackend<"pbs-style"> {
  readonly kind = "pbs-style" as const;
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private readonly poll: PbsPollOptions;
  private readonly submitter: QsubSubmitter;
  private readonly scheduler: QstatScheduler;

  constructor(private readonly options: PbsBackendOptions = {}) {
    this.log = options.log ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.poll = { ...DEFAULT_PBS_POLL, ...options.poll };
    const runner = options.runner ?? new SystemToolRunner();
    this.submitter = new QsubSubmitter({ runner, retry: options.retry, sleep: this.sleep, log: this.log });
    this.scheduler = new QstatScheduler(runner);
  }

  build(spec: JobSpecFields): Promise<JobArtifact> {
    return buildJobArtifact(spec, this.kind, this.options.script ?? DEFAULT_SCRIPT_OPTIONS);
  }

  async submit(artifact: JobArtifact, options: SubmitOptions = {}): Promise<SchedulerJobHandle<"pbs-style">> {
    if (artifact.backend !== this.kind) {
      throw new ConfigError(`artifact ${artifact.scriptPath} was built for ${artifact.backend}`, {
        backend: this.kind,
        value: artifact.backend
      });
    }
    const dependencyIds = toSchedulerJobIds(this.kind, options.dependencies ?? []);
    const res = await this.submitter.submit(artifact.scriptPath, dependencyIds);
    this.log.info({ backend: this.kind, jobId: res.pbsJobId, name: artifact.name, dependencyIds }, "job submitted");
    return { backend: this.kind, jobId: res.pbsJobId };
  }

  async wait(handles: readonly JobRef[]): Promise<void> {
    const pending = new Set(toSchedulerJobIds(this.kind, handles));
    if (!pending.size) return;

    // qsub returns before the server lists the job.
    await this.sleep(this.poll.initialDelayMs);
    for (;;) {
      const rows = await this.scheduler.list();
      const states = new Map(rows.map((r) => [r.jobId, r.state]));

      for (const jobId of [...pending]) {
        const state = states.get(jobId);
        if (state === PBS_COMPLETED_STATE) pending.delete(jobId);
        else if (state === undefined && this.poll.missingJobs === "terminal") pending.delete(jobId);
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
