import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { MAX_CAPTURE_BYTES, SystemToolRunner, isExecutableAvailable } from "../src/execution/toolRunner.js";

describe("SystemToolRunner", () => {
  it("captures output and exit status", async () => {
    const res = await new SystemToolRunner().run("sh", ["-c", "printf abc; printf err >&2; exit 3"]);
    expect(res).toEqual({ status: 3, stdout: "abc", stderr: "err", truncated: false });
  });

  it("flags output cut at the capture limit", async () => {
    const res = await new SystemToolRunner().run("sh", ["-c", `head -c ${MAX_CAPTURE_BYTES + 4096} /dev/zero`]);
    expect(res.status).toBe(0);
    expect(res.truncated).toBe(true);
    expect(res.stdout.length).toBe(MAX_CAPTURE_BYTES);
  });

  it("reports a command that cannot be started", async () => {
    const res = await new SystemToolRunner().run("cluster-submit-no-such-tool", []);
    expect(res.status).toBeNull();
    expect(res.error).toBeInstanceOf(Error);
  });
});

describe("isExecutableAvailable", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "cluster-path-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("finds an executable file on the search path without running it", async () => {
    const tool = path.join(dir, "sbatch");
    // Would hang detection if it were executed.
    await writeFile(tool, "#!/bin/sh\nsleep 60\n");
    await chmod(tool, 0o755);

    expect(isExecutableAvailable("sbatch", ["/nonexistent", dir].join(path.delimiter))).toBe(true);
    expect(isExecutableAvailable("qsub", dir)).toBe(false);
  });

  it("ignores non-executable files and directories", async () => {
    await writeFile(path.join(dir, "qsub"), "#!/bin/sh\n");
    await chmod(path.join(dir, "qsub"), 0o644);
    await mkdir(path.join(dir, "squeue"));

    expect(isExecutableAvailable("qsub", dir)).toBe(false);
    expect(isExecutableAvailable("squeue", dir)).toBe(false);
    expect(isExecutableAvailable("sbatch", "")).toBe(false);
  });
});
