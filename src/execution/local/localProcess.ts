import { spawn } from "child_process";
import { promises as fs } from "fs";

export interface LocalScriptRun {
  exitCode: number | null;
  startedAt: string;
  finishedAt: string;
}

/** Runs `shell script` in `cwd` with stdout and stderr written to files. */
export async function runLocalScript(input: {
  shell: string;
  scriptPath: string;
  cwd: string;
  stdoutPath: string;
  stderrPath: string;
}): Promise<LocalScriptRun> {
  const stdout = await fs.open(input.stdoutPath, "w");
  try {
    const stderr = await fs.open(input.stderrPath, "w");
    try {
      const startedAt = new Date().toISOString();
      const child = spawn(input.shell, [input.scriptPath], {
        cwd: input.cwd,
        env: process.env,
        stdio: ["ignore", stdout.fd, stderr.fd]
      });

      const exitCode = await new Promise<number | null>((resolve, reject) => {
        child.on("error", reject);
        child.on("close", (code: number | null) => resolve(code));
      });

      return { exitCode, startedAt, finishedAt: new Date().toISOString() };
    } finally {
      await stderr.close();
    }
  } finally {
    await stdout.close();
  }
}
