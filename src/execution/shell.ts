import type { ResolvedJobSpec } from "../core/jobSpec.js";

export const SHEBANG = "#!/bin/bash";

const TIMESTAMP = "date '+%Y-%m-%dT%H:%M:%S'";

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\"'\"'`)}'`;
}

function splitSeconds(seconds: number): { days: number; hours: number; minutes: number; secs: number } {
  if (!Number.isInteger(seconds) || seconds < 1) throw new Error(`invalid time limit seconds: ${seconds}`);
  const days = Math.floor(seconds / 86400);
  const rem = seconds - days * 86400;
  const hours = Math.floor(rem / 3600);
  const rem2 = rem - hours * 3600;
  const minutes = Math.floor(rem2 / 60);
  return { days, hours, minutes, secs: rem2 - minutes * 60 };
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** Slurm accepts `D-HH:MM:SS`; strings are taken as already formatted. */
export function formatSlurmTimeLimit(limit: number | string): string {
  if (typeof limit === "string") return limit;
  const { days, hours, minutes, secs } = splitSeconds(limit);
  const hms = `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
  return days > 0 ? `${days}-${hms}` : hms;
}

/** PBS walltime has no day field, so hours run past 24. */
export function formatPbsWalltime(limit: number | string): string {
  if (typeof limit === "string") return limit;
  const { days, hours, minutes, secs } = splitSeconds(limit);
  return `${pad2(days * 24 + hours)}:${pad2(minutes)}:${pad2(secs)}`;
}

export function renderScratchSetup(scratchEnvVar: string): string[] {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(scratchEnvVar)) {
    throw new Error(`invalid env var name: ${scratchEnvVar}`);
  }
  return [`if [[ -n "\${${scratchEnvVar}:-}" ]]; then mkdir -p "$${scratchEnvVar}"; fi`];
}

export function renderModuleLoads(modules: readonly string[]): string[] {
  return modules.map((m) => `module load ${m}`);
}

export function renderPreamble(spec: Pick<ResolvedJobSpec, "name" | "workdir">): string[] {
  return [`cd ${bashSingleQuote(spec.workdir)}`, TIMESTAMP, `echo "Running ${spec.name}"`];
}

/** Must directly follow the user command so `$?` is its exit status. */
export function renderPostamble(): string[] {
  return [
    "exitcode=$?",
    "echo Done",
    TIMESTAMP,
    "if [[ $exitcode != 0 ]]; then",
    '    echo "Exited with code: $exitcode" >&2',
    "    exit $exitcode",
    "fi"
  ];
}

export function renderJobBody(spec: ResolvedJobSpec): string[] {
  return [...renderPreamble(spec), spec.command, ...renderPostamble()];
}

export function joinLines(lines: readonly string[]): string {
  return lines.join("\n") + "\n";
}
