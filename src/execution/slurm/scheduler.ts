import { ConfigError, StatusQueryError } from "../../core/errors.js";
import { describeFailure, type ToolRunner } from "../toolRunner.js";

/** squeue compact state codes that end tracking; absence ends it too. */
export const SLURM_TERMINAL_STATES: ReadonlySet<string> = new Set(["CD", "F"]);

export const SQUEUE_ARGS = ["-h", "-o", "%A,%t"];

export function parseSqueueListing(stdout: string): Map<string, string> {
  const states = new Map<string, string>();
  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim().replace(/^'|'$/g, "");
    if (!line) continue;
    const comma = line.indexOf(",");
    if (comma < 1) {
      throw new ConfigError(`unrecognized squeue line: ${JSON.stringify(raw)}`, { backend: "slurm-style", value: raw });
    }
    states.set(line.slice(0, comma).trim(), line.slice(comma + 1).trim());
  }
  return states;
}

export class SqueueScheduler {
  constructor(private readonly runner: ToolRunner) {}

  async list(): Promise<Map<string, string>> {
    const res = await this.runner.run("squeue", [...SQUEUE_ARGS]);
    if (res.error || res.status !== 0) {
      throw new StatusQueryError(describeFailure("squeue", res), { backend: "slurm-style", tool: "squeue" });
    }
    if (res.truncated) {
      throw new StatusQueryError("squeue output exceeded the capture limit; job states would be incomplete", {
        backend: "slurm-style",
        tool: "squeue"
      });
    }
    return parseSqueueListing(res.stdout);
  }
}
