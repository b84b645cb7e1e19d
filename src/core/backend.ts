import { ConfigError } from "./errors.js";

export type BackendKind = "local" | "pbs-style" | "slurm-style";
export type BackendSelection = BackendKind | "auto";

export const BACKEND_KINDS: readonly BackendKind[] = ["local", "pbs-style", "slurm-style"];

export function isBackendKind(value: unknown): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

export function parseBackendKind(value: unknown): BackendKind {
  if (isBackendKind(value)) return value;
  throw new ConfigError(`backend ${JSON.stringify(value)} is not recognized, should be one of: ${BACKEND_KINDS.join(", ")}`, {
    value
  });
}

export function parseBackendSelection(value: unknown): BackendSelection {
  if (value === "auto") return "auto";
  return parseBackendKind(value);
}

export const CLUSTER_SUFFIX = ".cluster";

export function stdoutFileName(name: string): string {
  return `${name}${CLUSTER_SUFFIX}.out`;
}

export function stderrFileName(name: string): string {
  return `${name}${CLUSTER_SUFFIX}.err`;
}

/** File name suffixes a backend writes; `clean` deletes exactly these. */
export function cleanSuffixes(kind: BackendKind): string[] {
  const common = [`${CLUSTER_SUFFIX}.err`, `${CLUSTER_SUFFIX}.out`];
  switch (kind) {
    case "local":
      return [...common, CLUSTER_SUFFIX];
    case "pbs-style":
      return [...common, `${CLUSTER_SUFFIX}.qsub`];
    case "slurm-style":
      return [...common, `${CLUSTER_SUFFIX}.sbatch`, `${CLUSTER_SUFFIX}.script`];
  }
}
