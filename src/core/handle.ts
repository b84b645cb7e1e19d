import type { BackendKind } from "./backend.js";
import { ConfigError } from "./errors.js";
import type { LocalJobId } from "./ids.js";

export type SchedulerBackendKind = Exclude<BackendKind, "local">;

export type LocalJobStatus = "succeeded" | "failed" | "dependency_failed";

export interface LocalJobResult {
  jobId: LocalJobId;
  name: string;
  status: LocalJobStatus;
  exitCode: number | null;
  startedAt: string | null;
  finishedAt: string | null;
  error?: string;
}

export interface LocalJobHandle {
  backend: "local";
  jobId: LocalJobId;
  name: string;
  /** Resolves once the job is terminal; never rejects. */
  result: Promise<LocalJobResult>;
}

export interface SchedulerJobHandle<K extends SchedulerBackendKind = SchedulerBackendKind> {
  backend: K;
  jobId: string;
}

export type JobHandle = LocalJobHandle | SchedulerJobHandle;

/** A handle, or a bare scheduler job id. */
export type JobRef = JobHandle | string | number;

export function isJobHandle(value: unknown): value is JobHandle {
  if (!value || typeof value !== "object") return false;
  return "jobId" in value && typeof value.jobId === "string" && "backend" in value && typeof value.backend === "string";
}

export function isLocalJobHandle(value: unknown): value is LocalJobHandle {
  return isJobHandle(value) && value.backend === "local" && value.result instanceof Promise;
}

const SCHEDULER_ID_RE = /^\d+$/;
// qstat and qsub print "<id>.<server>"; only the numeric part is tracked.
const PBS_ID_RE = /^(\d+)(?:\.[A-Za-z0-9._-]+)?$/;

function normalizeSchedulerId(backend: SchedulerBackendKind, raw: string): string | null {
  const trimmed = raw.trim();
  if (backend === "pbs-style") {
    const m = PBS_ID_RE.exec(trimmed);
    return m && m[1] ? m[1] : null;
  }
  return SCHEDULER_ID_RE.test(trimmed) ? trimmed : null;
}

export function toSchedulerJobId(backend: SchedulerBackendKind, ref: unknown): string {
  if (typeof ref === "number") {
    if (Number.isSafeInteger(ref) && ref >= 0) return String(ref);
    throw new ConfigError(`job id must be a non-negative integer, got ${ref}`, { backend, value: ref });
  }
  if (typeof ref === "string") {
    const id = normalizeSchedulerId(backend, ref);
    if (id !== null) return id;
    throw new ConfigError(`malformed job id: ${JSON.stringify(ref)}`, { backend, value: ref });
  }
  if (isJobHandle(ref)) {
    if (ref.backend !== backend) {
      throw new ConfigError(`job ${ref.jobId} belongs to backend ${ref.backend}`, { backend, value: ref.jobId });
    }
    return ref.jobId;
  }
  throw new ConfigError(`job reference must be a string, integer or job handle, got ${typeof ref}`, {
    backend,
    value: ref
  });
}

export function toSchedulerJobIds(backend: SchedulerBackendKind, refs: readonly unknown[]): string[] {
  return refs.map((ref) => toSchedulerJobId(backend, ref));
}

export function toLocalJobHandles(refs: readonly unknown[]): LocalJobHandle[] {
  return refs.map((ref) => {
    if (isLocalJobHandle(ref)) return ref;
    if (isJobHandle(ref)) {
      throw new ConfigError(`job ${ref.jobId} belongs to backend ${ref.backend}`, { backend: "local", value: ref.jobId });
    }
    throw new ConfigError(`local jobs are tracked by handle, got ${JSON.stringify(ref)}`, {
      backend: "local",
      value: ref
    });
  });
}
