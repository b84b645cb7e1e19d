import type { BackendKind } from "../../core/backend.js";
import type { JobHandle, JobRef, LocalJobHandle, SchedulerJobHandle } from "../../core/handle.js";
import type { JobSpecFields } from "../../core/jobSpec.js";

export interface ScriptOptions {
  /** Environment variable naming the node-local scratch directory. */
  scratchEnvVar: string;
}

export interface RenderedJobFile {
  path: string;
  content: string;
  /** The file handed to the submission mechanism. */
  primary: boolean;
}

export interface JobArtifact {
  backend: BackendKind;
  name: string;
  directory: string;
  scriptPath: string;
  files: string[];
}

export interface SubmitOptions {
  dependencies?: readonly JobRef[];
  /** Local worker pool size; only read when the pool is first created. */
  threads?: number;
}

type HandleFor<K extends BackendKind> = K extends "local"
  ? LocalJobHandle
  : K extends "pbs-style" | "slurm-style"
    ? SchedulerJobHandle<K>
    : JobHandle;

export interface ClusterBackend<K extends BackendKind = BackendKind> {
  readonly kind: K;
  build(spec: JobSpecFields): Promise<JobArtifact>;
  submit(artifact: JobArtifact, options?: SubmitOptions): Promise<HandleFor<K>>;
  wait(handles: readonly JobRef[]): Promise<void>;
  clean(directory?: string): Promise<Set<string>>;
}
