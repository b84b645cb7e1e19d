import path from "path";
import type { ResolvedJobSpec } from "../../core/jobSpec.js";
import { SHEBANG, joinLines, renderJobBody } from "../shell.js";
import type { RenderedJobFile } from "../backends/types.js";

export function localScriptPath(spec: Pick<ResolvedJobSpec, "name" | "workdir">): string {
  return path.join(spec.workdir, `${spec.name}.cluster`);
}

/** Modules and scratch space are cluster concepts; the local script has neither. */
export function renderLocalScript(spec: ResolvedJobSpec): RenderedJobFile[] {
  return [{ path: localScriptPath(spec), content: joinLines([SHEBANG, ...renderJobBody(spec)]), primary: true }];
}
