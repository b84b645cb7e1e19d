import path from "path";
import * as z from "zod/v4";
import type { BackendKind } from "./backend.js";
import { ConfigError } from "./errors.js";
import type { JobRef } from "./handle.js";

export const JOB_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;
export const TIME_LIMIT_RE = /^(\d+-)?\d{1,3}:[0-5]\d:[0-5]\d$/;
// #PBS/#SBATCH directive values cannot be quoted.
export const DIRECTIVE_PATH_RE = /^[A-Za-z0-9._/+@,=:~-]+$/;

export const zJobName = z.string().regex(JOB_NAME_RE, "invalid job name");
export const zTimeLimit = z.union([
  z.number().int().min(1),
  z.string().regex(TIME_LIMIT_RE, "time limit must be [D-]HH:MM:SS")
]);
export const zPartition = z.string().regex(/^[A-Za-z0-9._@-]+$/, "invalid partition");
export const zModuleName = z.string().regex(/^[A-Za-z0-9._+/-]+$/, "invalid module name");

export const zJobSpecFields = z.object({
  command: z.string().min(1),
  name: zJobName,
  timeLimit: zTimeLimit.optional(),
  cores: z.number().int().min(1).default(1),
  memoryMb: z.number().int().min(1).optional(),
  partition: zPartition.optional(),
  modules: z.array(zModuleName).default([]),
  workdir: z.string().min(1).optional()
});

export type JobSpecFields = z.input<typeof zJobSpecFields>;

export interface JobSpec extends JobSpecFields {
  dependencies?: readonly JobRef[];
}

export interface ResolvedJobSpec {
  command: string;
  name: string;
  timeLimit: number | string | null;
  cores: number;
  memoryMb: number | null;
  partition: string | null;
  modules: string[];
  workdir: string;
}

export function resolveJobSpec(spec: JobSpecFields, backend?: BackendKind): ResolvedJobSpec {
  const parsed = zJobSpecFields.safeParse(spec);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "spec"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid job spec: ${detail}`, { backend, value: spec });
  }
  const s = parsed.data;
  const workdir = path.resolve(s.workdir ?? process.cwd());
  if (backend !== undefined && backend !== "local" && !DIRECTIVE_PATH_RE.test(workdir)) {
    throw new ConfigError(`workdir ${JSON.stringify(workdir)} cannot be used in scheduler directives`, {
      backend,
      value: workdir
    });
  }
  return {
    command: s.command,
    name: s.name,
    timeLimit: s.timeLimit ?? null,
    cores: s.cores,
    memoryMb: s.memoryMb ?? null,
    partition: s.partition ?? null,
    modules: s.modules,
    workdir
  };
}
