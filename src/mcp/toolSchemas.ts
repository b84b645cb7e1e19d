import * as z from "zod/v4";
import { zJobName, zModuleName, zPartition, zTimeLimit } from "../core/jobSpec.js";

export const zBackendKind = z.enum(["local", "pbs-style", "slurm-style"]);
export const zJobId = z.union([z.string().min(1).max(128), z.number().int().min(0)]);

export const zClusterInfoInput = z.object({});

export const zClusterInfoOutput = z.object({
  backend: zBackendKind
});

export const zClusterSubmitInput = z.object({
  command: z.string().min(1).max(65536),
  name: zJobName,
  time_limit: zTimeLimit.optional(),
  cores: z.number().int().min(1).max(4096).optional(),
  mem_mb: z.number().int().min(1).optional(),
  partition: zPartition.optional(),
  modules: z.array(zModuleName).max(64).optional(),
  workdir: z.string().min(1).optional(),
  dependencies: z.array(zJobId).max(256).optional(),
  threads: z.number().int().min(1).max(1024).optional()
});

export const zClusterSubmitOutput = z.object({
  backend: zBackendKind,
  job_id: z.string(),
  script_path: z.string(),
  files: z.array(z.string())
});

export const zClusterWaitInput = z.object({
  job_ids: z.array(zJobId).min(1).max(1024)
});

export const zLocalJobResult = z.object({
  job_id: z.string(),
  name: z.string(),
  status: z.enum(["succeeded", "failed", "dependency_failed"]),
  exit_code: z.number().int().nullable(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  error: z.string().nullable()
});

export const zClusterWaitOutput = z.object({
  backend: zBackendKind,
  job_ids: z.array(z.string()),
  local_results: z.array(zLocalJobResult)
});

export const zClusterCleanInput = z.object({
  directory: z.string().min(1).optional()
});

export const zClusterCleanOutput = z.object({
  backend: zBackendKind,
  deleted: z.array(z.string())
});
