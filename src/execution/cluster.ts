import type { ClusterConfig } from "../config/clusterConfig.js";
import type { BackendKind } from "../core/backend.js";
import type { JobHandle, JobRef, LocalJobResult } from "../core/handle.js";
import type { JobSpec } from "../core/jobSpec.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { createBackend, type BackendDeps } from "./backends/index.js";
import type { ClusterBackend, JobArtifact, SubmitOptions } from "./backends/types.js";
import { detectBackend, type ToolProbe } from "./environment.js";

export interface ClusterDeps extends BackendDeps {
  probe?: ToolProbe;
}

/**
 * The active backend for this process plus the handles submitted through it.
 * Handles are kept in memory only; nothing survives a restart.
 */
export class Cluster {
  private readonly jobs = new Map<string, JobHandle>();

  constructor(
    readonly backend: ClusterBackend,
    private readonly log: Logger = silentLogger
  ) {}

  static fromConfig(config: ClusterConfig, deps: ClusterDeps = {}): Cluster {
    const log = deps.log ?? silentLogger;
    const kind = config.backend === "auto" ? detectBackend({ probe: deps.probe, log }) : config.backend;
    return new Cluster(createBackend(kind, config, { ...deps, log }), log);
  }

  get kind(): BackendKind {
    return this.backend.kind;
  }

  build(spec: JobSpec): Promise<JobArtifact> {
    return this.backend.build(spec);
  }

  async submit(artifact: JobArtifact, options: SubmitOptions = {}): Promise<JobHandle> {
    const handle = await this.backend.submit(artifact, {
      ...options,
      dependencies: this.resolve(options.dependencies ?? [])
    });
    this.jobs.set(handle.jobId, handle);
    return handle;
  }

  /** Build and submit in one step, using the spec's own dependencies. */
  async run(spec: JobSpec, options: Omit<SubmitOptions, "dependencies"> = {}): Promise<JobHandle> {
    const artifact = await this.build(spec);
    return this.submit(artifact, { ...options, dependencies: spec.dependencies ?? [] });
  }

  async wait(handles: readonly JobRef[]): Promise<void> {
    const refs = this.resolve(handles);
    this.log.debug({ backend: this.kind, count: refs.length }, "waiting for jobs");
    await this.backend.wait(refs);
  }

  clean(directory?: string): Promise<Set<string>> {
    return this.backend.clean(directory);
  }

  lookup(jobId: string): JobHandle | null {
    return this.jobs.get(jobId) ?? null;
  }

  /** Settled result of a local job, or null for scheduler jobs and unknown ids. */
  async localResult(jobId: string): Promise<LocalJobResult | null> {
    const handle = this.jobs.get(jobId);
    if (!handle || handle.backend !== "local") return null;
    return handle.result;
  }

  /** Bare ids of jobs submitted here become their handles. */
  private resolve(refs: readonly JobRef[]): JobRef[] {
    return refs.map((ref) => (typeof ref === "string" ? (this.jobs.get(ref) ?? ref) : ref));
  }
}
