import path from "path";
import { stderrFileName, stdoutFileName } from "../../core/backend.js";
import type { ResolvedJobSpec } from "../../core/jobSpec.js";
import type { RenderedJobFile, ScriptOptions } from "../backends/types.js";
import {
  SHEBANG,
  bashSingleQuote,
  formatSlurmTimeLimit,
  joinLines,
  renderJobBody,
  renderModuleLoads,
  renderScratchSetup
} from "../shell.js";

/**
 * Two files: the sbatch file only carries directives and hands the work to
 * `srun`, which runs the companion script on the allocated node.
 */
export function renderSlurmScripts(spec: ResolvedJobSpec, options: ScriptOptions): RenderedJobFile[] {
  const sbatchPath = path.join(spec.workdir, `${spec.name}.cluster.sbatch`);
  const scriptPath = path.join(spec.workdir, `${spec.name}.cluster.script`);

  const directives: string[] = [SHEBANG, `#SBATCH --job-name=${spec.name}`];
  if (spec.partition) directives.push(`#SBATCH -p ${spec.partition}`);
  directives.push("#SBATCH --ntasks=1");
  directives.push(`#SBATCH --cpus-per-task=${spec.cores}`);
  if (spec.timeLimit !== null) directives.push(`#SBATCH --time=${formatSlurmTimeLimit(spec.timeLimit)}`);
  if (spec.memoryMb !== null) directives.push(`#SBATCH --mem=${spec.memoryMb}M`);
  directives.push(`#SBATCH -o ${path.join(spec.workdir, stdoutFileName(spec.name))}`);
  directives.push(`#SBATCH -e ${path.join(spec.workdir, stderrFileName(spec.name))}`);

  const sbatch = [...directives, `cd ${bashSingleQuote(spec.workdir)}`, `srun bash ${bashSingleQuote(scriptPath)}`];

  const script = [
    SHEBANG,
    ...renderScratchSetup(options.scratchEnvVar),
    ...renderModuleLoads(spec.modules),
    ...renderJobBody(spec)
  ];

  return [
    { path: sbatchPath, content: joinLines(sbatch), primary: true },
    { path: scriptPath, content: joinLines(script), primary: false }
  ];
}
