import os from "os";
import path from "path";
import { cleanSuffixes, stderrFileName, stdoutFileName } from "../../core/backend.js";
import { ConfigError } from "../../core/errors.js";
import { toLocalJobHandles, type JobRef, type LocalJobHandle, type LocalJobResult } from "../../core/handle.js";
import { newLocalJobId, type LocalJobId } from "../../core/ids.js";
import type { JobSpecFields } from "../../core/jobSpec.js";
import { silentLogger, type Logger } from "../../core/logger.js";
import type { ClusterBackend, JobArtifact, ScriptOptions, SubmitOptions } from "../backends/types.js";
import { cleanDirectory } from "../cleaner.js";
import { DEFAULT_SCRIPT_OPTIONS, buildJobArtifact } from "../jobArtifact.js";
import { runLocalScript } from "./localProcess.js";
import { WorkerPool } from "./workerPool.js";

export interface LocalBackendOptions {
  /** Pool size when neither the first submit nor this sets one: all cores. */
  threads?: number | null;
  shell?: string;
  script?: ScriptOptions;
  log?: Logger;
}

export class LocalBackend implements ClusterBackend<"local"> {
  readonly kind = "local" as const;
  private pool: WorkerPool | null = null;
  private readonly log: Logger;

  constructor(private readonly options: LocalBackendOptions = {}) {
    this.log = options.log ?? silentLogger;
  }

  /** The shared pool, or null until the first submission creates it. */
  get workerPool(): WorkerPool | null {
    return this.pool;
  }

  build(spec: JobSpecFields): Promise<JobArtifact> {
    return buildJobArtifact(spec, this.kind, this.options.script ?? DEFAULT_SCRIPT_OPTIONS);
  }

  async submit(artifact: JobArtifact, options: SubmitOptions = {}): Promise<LocalJobHandle> {
    if (artifact.backend !== this.kind) {
      throw new ConfigError(`artifact ${artifact.scriptPath} was built for ${artifact.backend}`, {
        backend: this.kind,
        value: artifact.backend
      });
    }
    const dependencies = toLocalJobHandles(options.dependencies ?? []);
    const pool = this.ensurePool(options.threads);
    const jobId = newLocalJobId();

    const result = this.awaitDependencies(dependencies).then((failed) =>
      failed ? this.dependencyFailed(jobId, artifact, failed) : pool.run(() => this.execute(jobId, artifact))
    );

    this.log.info(
      { backend: this.kind, jobId, name: artifact.name, dependencies: dependencies.map((d) => d.jobId) },
      "job queued"
    );
    return { backend: this.kind, jobId, name: artifact.name, result };
  }

  async wait(handles: readonly JobRef[]): Promise<void> {
    const local = toLocalJobHandles(handles);
    for (const handle of local) {
      await handle.result;
    }
  }

  clean(directory: string = process.cwd()): Promise<Set<string>> {
    return cleanDirectory(directory, cleanSuffixes(this.kind), this.log);
  }

  private ensurePool(threads: number | undefined): WorkerPool {
    if (this.pool) return this.pool;
    const size = threads ?? this.options.threads ?? os.availableParallelism();
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigError(`threads must be an integer >= 1, got ${size}`, { backend: this.kind, value: size });
    }
    this.pool = new WorkerPool(size);
    this.log.debug({ backend: this.kind, size }, "worker pool created");
    return this.pool;
  }

  /** Resolves with the first dependency that did not succeed, or null. */
  private async awaitDependencies(dependencies: readonly LocalJobHandle[]): Promise<LocalJobResult | null> {
    for (const dep of dependencies) {
      const res = await dep.result;
      if (res.status !== "succeeded") return res;
    }
    return null;
  }

  private dependencyFailed(jobId: LocalJobId, artifact: JobArtifact, failed: LocalJobResult): LocalJobResult {
    this.log.warn({ backend: this.kind, jobId, dependency: failed.jobId }, "dependency did not succeed, job skipped");
    return {
      jobId,
      name: artifact.name,
      status: "dependency_failed",
      exitCode: null,
      startedAt: null,
      finishedAt: null,
      error: `dependency ${failed.jobId} (${failed.name}) ended with status ${failed.status}`
    };
  }

  private async execute(jobId: LocalJobId, artifact: JobArtifact): Promise<LocalJobResult> {
    const base = { jobId, name: artifact.name };
    try {
      const run = await runLocalScript({
        shell: this.options.shell ?? "bash",
        scriptPath: artifact.scriptPath,
        cwd: artifact.directory,
        stdoutPath: path.join(artifact.directory, stdoutFileName(artifact.name)),
        stderrPath: path.join(artifact.directory, stderrFileName(artifact.name))
      });
      const status = run.exitCode === 0 ? "succeeded" : "failed";
      this.log.info({ backend: this.kind, jobId, exitCode: run.exitCode }, `job ${status}`);
      return { ...base, status, ...run };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.log.error({ backend: this.kind, jobId, err: e }, "job could not be run");
      return { ...base, status: "failed", exitCode: null, startedAt: null, finishedAt: null, error: message };
    }
  }
}
