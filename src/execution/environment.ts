import type { BackendKind } from "../core/backend.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { isExecutableAvailable } from "./toolRunner.js";

export type ToolProbe = (command: string) => boolean;

/** Slurm wins over PBS when both are installed; neither means the local pool. */
export function detectBackend(deps: { probe?: ToolProbe; log?: Logger } = {}): BackendKind {
  const probe = deps.probe ?? isExecutableAvailable;
  const log = deps.log ?? silentLogger;

  let backend: BackendKind = "local";
  if (probe("sbatch")) backend = "slurm-style";
  else if (probe("qsub")) backend = "pbs-style";

  if (backend === "local") {
    log.debug({ backend }, "no cluster environment detected, using the local worker pool");
  } else {
    log.debug({ backend }, `${backend} detected, using it for cluster submissions`);
  }
  return backend;
}
