import { ConfigError, StatusQueryError } from "../../core/errors.js";
import { describeFailure, type ToolRunner } from "../toolRunner.js";

// Layout of `qstat -a`: a blank line, the server name and a "Req'd" banner
// precede the column header; a dashed rule separates it from the rows.
const HEADER_ROW = 3;
const FIRST_DATA_ROW = 5;
const STATE_COLUMN = 9;

export const PBS_COMPLETED_STATE = "C";

export interface PbsJobStatus {
  jobId: string;
  state: string;
}

export function parseQstatTable(stdout: string): PbsJobStatus[] {
  const text = stdout.trimEnd();
  if (!text.trim()) return [];

  const lines = text.split(/\r?\n/);
  const header = lines[HEADER_ROW];
  const headerFields = header === undefined ? [] : header.trim().split(/ {2,}/);
  if (headerFields[STATE_COLUMN] !== "S") {
    throw new ConfigError(`unrecognized qstat -a format, header row: ${JSON.stringify(header ?? "")}`, {
      backend: "pbs-style",
      value: header ?? null
    });
  }

  const rows: PbsJobStatus[] = [];
  for (const line of lines.slice(FIRST_DATA_ROW)) {
    const fields = line.trim().split(/\s+/);
    const jobField = fields[0];
    const state = fields[STATE_COLUMN];
    if (!jobField) continue;
    if (state === undefined) {
      throw new ConfigError(`unrecognized qstat -a row: ${JSON.stringify(line)}`, { backend: "pbs-style", value: line });
    }
    rows.push({ jobId: jobField.split(".")[0] ?? jobField, state });
  }
  return rows;
}

export class QstatScheduler {
  constructor(private readonly runner: ToolRunner) {}

  /** One status query; failures surface as StatusQueryError, never retried here. */
  async list(): Promise<PbsJobStatus[]> {
    const res = await this.runner.run("qstat", ["-a"]);
    if (res.error || res.status !== 0) {
      throw new StatusQueryError(describeFailure("qstat", res), { backend: "pbs-style", tool: "qstat" });
    }
    if (res.truncated) {
      throw new StatusQueryError("qstat output exceeded the capture limit; job states would be incomplete", {
        backend: "pbs-style",
        tool: "qstat"
      });
    }
    return parseQstatTable(res.stdout);
  }
}
