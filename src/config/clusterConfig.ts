import { promises as fs } from "fs";
import { parse as parseYaml } from "yaml";
import * as z from "zod/v4";
import { ConfigError } from "../core/errors.js";

const zEnvVarName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "invalid env var name");

const zPollConfig = (initialDelayMs: number) =>
  z.object({
    initial_delay_ms: z.number().int().min(0).default(initialDelayMs),
    poll_interval_ms: z.number().int().min(0).default(2000)
  });

export const zClusterConfig = z.object({
  version: z.literal(1).default(1),
  backend: z.enum(["auto", "local", "pbs-style", "slurm-style"]).default("auto"),
  scratch_env_var: zEnvVarName.default("LOCAL_SCRATCH"),
  local: z
    .object({
      threads: z.number().int().min(1).nullable().default(null),
      shell: z.string().min(1).default("bash")
    })
    .default({ threads: null, shell: "bash" }),
  submit_retry: z
    .object({
      max_attempts: z.number().int().min(1).default(5),
      delay_ms: z.number().int().min(0).default(1000)
    })
    .default({ max_attempts: 5, delay_ms: 1000 }),
  pbs: zPollConfig(5000)
    .extend({ missing_jobs: z.enum(["pending", "terminal"]).default("pending") })
    .default({ initial_delay_ms: 5000, poll_interval_ms: 2000, missing_jobs: "pending" }),
  slurm: zPollConfig(2000).default({ initial_delay_ms: 2000, poll_interval_ms: 2000 })
});

export type ClusterConfig = z.output<typeof zClusterConfig>;

export function parseClusterConfig(value: unknown, source = "config"): ClusterConfig {
  const parsed = zClusterConfig.safeParse(value ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid cluster config at ${source}: ${detail}`, { value });
  }
  return parsed.data;
}

export function defaultClusterConfig(): ClusterConfig {
  return parseClusterConfig({});
}

export async function loadClusterConfig(filePath: string): Promise<ClusterConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed: unknown = parseYaml(raw);
  return parseClusterConfig(parsed, filePath);
}
