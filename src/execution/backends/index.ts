import type { ClusterConfig } from "../../config/clusterConfig.js";
import { parseBackendKind } from "../../core/backend.js";
import { silentLogger, type Logger } from "../../core/logger.js";
import { LocalBackend } from "../local/localBackend.js";
import { PbsBackend } from "../pbs/pbsBackend.js";
import type { Sleep } from "../retry.js";
import { SlurmBackend } from "../slurm/slurmBackend.js";
import type { ToolRunner } from "../toolRunner.js";
import type { ClusterBackend } from "./types.js";

export interface BackendDeps {
  runner?: ToolRunner;
  sleep?: Sleep;
  log?: Logger;
}

/** Unknown kinds fail with ConfigError before anything else happens. */
export function createBackend(kind: string, config: ClusterConfig, deps: BackendDeps = {}): ClusterBackend {
  const backend = parseBackendKind(kind);
  const log = deps.log ?? silentLogger;
  const script = { scratchEnvVar: config.scratch_env_var };
  const retry = { maxAttempts: config.submit_retry.max_attempts, delayMs: config.submit_retry.delay_ms };

  switch (backend) {
    case "local":
      return new LocalBackend({ threads: config.local.threads, shell: config.local.shell, script, log });
    case "pbs-style":
      return new PbsBackend({
        runner: deps.runner,
        sleep: deps.sleep,
        retry,
        script,
        log,
        poll: {
          initialDelayMs: config.pbs.initial_delay_ms,
          intervalMs: config.pbs.poll_interval_ms,
          missingJobs: config.pbs.missing_jobs
        }
      });
    case "slurm-style":
      return new SlurmBackend({
        runner: deps.runner,
        sleep: deps.sleep,
        retry,
        script,
        log,
        poll: { initialDelayMs: config.slurm.initial_delay_ms, intervalMs: config.slurm.poll_interval_ms }
      });
  }
}
