import path from "path";
import { stderrFileName, stdoutFileName } from "../../core/backend.js";
import type { ResolvedJobSpec } from "../../core/jobSpec.js";
import type { RenderedJobFile, ScriptOptions } from "../backends/types.js";
import { SHEBANG, formatPbsWalltime, joinLines, renderJobBody, renderModuleLoads, renderScratchSetup } from "../shell.js";

export function renderPbsScript(spec: ResolvedJobSpec, options: ScriptOptions): RenderedJobFile[] {
  const directives: string[] = [SHEBANG, `#PBS -N ${spec.name}`];
  if (spec.partition) directives.push(`#PBS -q ${spec.partition}`);
  directives.push(`#PBS -l nodes=1:ppn=${spec.cores}`);
  if (spec.timeLimit !== null) directives.push(`#PBS -l walltime=${formatPbsWalltime(spec.timeLimit)}`);
  if (spec.memoryMb !== null) directives.push(`#PBS -l mem=${spec.memoryMb}MB`);
  directives.push(`#PBS -o ${path.join(spec.workdir, stdoutFileName(spec.name))}`);
  directives.push(`#PBS -e ${path.join(spec.workdir, stderrFileName(spec.name))}`);

  const lines = [
    ...directives,
    "",
    ...renderScratchSetup(options.scratchEnvVar),
    ...renderModuleLoads(spec.modules),
    ...renderJobBody(spec)
  ];

  return [{ path: path.join(spec.workdir, `${spec.name}.cluster.qsub`), content: joinLines(lines), primary: true }];
}
