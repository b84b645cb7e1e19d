import { promises as fs } from "fs";
import path from "path";
import { parseBackendKind, type BackendKind } from "../core/backend.js";
import { ConfigError } from "../core/errors.js";
import { resolveJobSpec, type JobSpecFields, type ResolvedJobSpec } from "../core/jobSpec.js";
import type { JobArtifact, RenderedJobFile, ScriptOptions } from "./backends/types.js";
import { renderLocalScript } from "./local/localScript.js";
import { renderPbsScript } from "./pbs/pbsScript.js";
import { renderSlurmScripts } from "./slurm/slurmScript.js";

export const DEFAULT_SCRIPT_OPTIONS: ScriptOptions = { scratchEnvVar: "LOCAL_SCRATCH" };

export function renderJobFiles(spec: ResolvedJobSpec, backend: BackendKind, options: ScriptOptions): RenderedJobFile[] {
  switch (backend) {
    case "local":
      return renderLocalScript(spec);
    case "pbs-style":
      return renderPbsScript(spec, options);
    case "slurm-style":
      return renderSlurmScripts(spec, options);
  }
}

/**
 * Renders and writes the job files for `backend` into the job's working
 * directory, replacing any existing files of the same name.
 */
export async function buildJobArtifact(
  spec: JobSpecFields,
  backend: string,
  options: ScriptOptions = DEFAULT_SCRIPT_OPTIONS
): Promise<JobArtifact> {
  const kind = parseBackendKind(backend);
  const resolved = resolveJobSpec(spec, kind);
  const files = renderJobFiles(resolved, kind, options);

  const primary = files.find((f) => f.primary);
  if (!primary) throw new ConfigError(`no submittable file rendered for ${resolved.name}`, { backend: kind });

  await fs.mkdir(resolved.workdir, { recursive: true });
  for (const file of files) {
    await fs.writeFile(file.path, file.content, { encoding: "utf8", mode: 0o755 });
    // writeFile only applies `mode` when it creates the file.
    await fs.chmod(file.path, 0o755);
  }

  return {
    backend: kind,
    name: resolved.name,
    directory: resolved.workdir,
    scriptPath: path.resolve(primary.path),
    files: files.map((f) => path.resolve(f.path))
  };
}
