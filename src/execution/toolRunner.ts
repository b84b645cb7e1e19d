import { spawn } from "child_process";
import { accessSync, constants, statSync } from "fs";
import path from "path";

export const MAX_CAPTURE_BYTES = 1024 * 1024;

export interface ToolInvocationResult {
  /** null when the process could not be started or was killed by a signal. */
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
  /** Set when stdout or stderr went past the capture limit and was cut. */
  truncated?: boolean;
}

/** Runs scheduler command-line tools (sbatch, qsub, squeue, qstat). */
export interface ToolRunner {
  run(command: string, args: string[]): Promise<ToolInvocationResult>;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export class SystemToolRunner implements ToolRunner {
  async run(command: string, args: string[]): Promise<ToolInvocationResult> {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] as const });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    const outcome = await new Promise<{ status: number | null; error?: Error }>((resolve) => {
      child.on("error", (error: Error) => resolve({ status: null, error }));
      child.on("close", (code: number | null) => resolve({ status: code }));
    });

    const stdout = Buffer.concat(stdoutChunks).toString("utf8");
    const stderr = Buffer.concat(stderrChunks).toString("utf8");
    const truncated = stdoutState.truncated || stderrState.truncated;
    return outcome.error
      ? { status: null, stdout, stderr, error: outcome.error, truncated }
      : { status: outcome.status, stdout, stderr, truncated };
  }
}

export function describeFailure(command: string, res: ToolInvocationResult): string {
  if (res.error) return `${command} could not be started: ${res.error.message}`;
  const stderr = res.stderr.trim();
  return `${command} failed (exit ${res.status ?? "signal"})${stderr ? `: ${stderr}` : ""}`;
}

function isExecutableFile(file: string): boolean {
  try {
    if (!statSync(file).isFile()) return false;
    accessSync(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** True when an executable named `command` is on the search path; nothing is run. */
export function isExecutableAvailable(command: string, searchPath: string = process.env.PATH ?? ""): boolean {
  if (command.includes(path.sep)) return isExecutableFile(command);
  return searchPath
    .split(path.delimiter)
    .filter((dir) => dir.length > 0)
    .some((dir) => isExecutableFile(path.join(dir, command)));
}
