import { describe, it, expect } from "vitest";

import { PbsBackend } from "../src/execution/pbs/pbsBackend.js";
import { SlurmBackend } from "../src/execution/slurm/slurmBackend.js";
import { parseQsubJobId, qsubArgs } from "../src/execution/pbs/submitter.js";
import { parseSbatchJobId, sbatchArgs } from "../src/execution/slurm/submitter.js";
import type { JobArtifact } from "../src/execution/backends/types.js";
import { ConfigError, SubmissionError } from "../src/core/errors.js";
import { newLocalJobId } from "../src/core/ids.js";
import { FakeToolRunner, failed, ok, recordingSleep } from "./fakes.js";

function artifactFor(backend: JobArtifact["backend"], scriptPath: string): JobArtifact {
  return { backend, name: "job1", directory: "/work", scriptPath, files: [scriptPath] };
}

const SBATCH_FILE = "/work/job1.cluster.sbatch";
const QSUB_FILE = "/work/job1.cluster.qsub";

describe("sbatch submission", () => {
  it("parses the job id from the last token of sbatch output", async () => {
    const runner = new FakeToolRunner([ok("Submitted batch job 4242\n")]);
    const backend = new SlurmBackend({ runner, sleep: recordingSleep().sleep });

    const handle = await backend.submit(artifactFor("slurm-style", SBATCH_FILE));

    expect(handle).toEqual({ backend: "slurm-style", jobId: "4242" });
    expect(runner.calls).toEqual([{ command: "sbatch", args: [SBATCH_FILE] }]);
  });

  it("joins dependencies into one afterok flag", async () => {
    const runner = new FakeToolRunner([ok("Submitted batch job 7\n")]);
    const backend = new SlurmBackend({ runner });

    await backend.submit(artifactFor("slurm-style", SBATCH_FILE), {
      dependencies: [{ backend: "slurm-style", jobId: "5" }, "6", 8]
    });

    expect(runner.calls[0]?.args).toEqual(["--dependency=afterok:5:6:8", SBATCH_FILE]);
  });

  it("invokes a failing sbatch exactly 5 times before raising SubmissionError", async () => {
    const runner = new FakeToolRunner([failed(1, "sbatch: error: Batch job submission failed")]);
    const { sleep, sleeps } = recordingSleep();
    const backend = new SlurmBackend({ runner, sleep });

    const err = await backend.submit(artifactFor("slurm-style", SBATCH_FILE)).catch((e: unknown) => e);

    if (!(err instanceof SubmissionError)) throw new Error("expected SubmissionError");
    expect(runner.calls).toHaveLength(5);
    expect(sleeps).toEqual([1000, 1000, 1000, 1000]);
    expect(err.attempts).toBe(5);
    expect(err.tool).toBe("sbatch");
    expect(err.backend).toBe("slurm-style");
    expect(err.message).toBe(
      "[slurm-style] sbatch failed (exit 1): sbatch: error: Batch job submission failed after 5 attempts"
    );
  });

  it("succeeds after transient failures", async () => {
    const runner = new FakeToolRunner([failed(1, "busy"), failed(1, "busy"), ok("Submitted batch job 11\n")]);
    const { sleep, sleeps } = recordingSleep();
    const backend = new SlurmBackend({ runner, sleep, retry: { maxAttempts: 5, delayMs: 250 } });

    const handle = await backend.submit(artifactFor("slurm-style", SBATCH_FILE));

    expect(handle.jobId).toBe("11");
    expect(runner.calls).toHaveLength(3);
    expect(sleeps).toEqual([250, 250]);
  });

  it("does not retry when a successful invocation prints no job id", async () => {
    const runner = new FakeToolRunner([ok("something unexpected\n")]);
    const backend = new SlurmBackend({ runner, sleep: recordingSleep().sleep });

    await expect(backend.submit(artifactFor("slurm-style", SBATCH_FILE))).rejects.toThrow(
      "unable to parse sbatch job id from output: something unexpected\n"
    );
    expect(runner.calls).toHaveLength(1);
  });

  it("fails at once when sbatch cannot be started", async () => {
    const runner = new FakeToolRunner([{ status: null, stdout: "", stderr: "", error: new Error("spawn sbatch ENOENT") }]);
    const backend = new SlurmBackend({ runner, sleep: recordingSleep().sleep });

    await expect(backend.submit(artifactFor("slurm-style", SBATCH_FILE))).rejects.toBeInstanceOf(SubmissionError);
    expect(runner.calls).toHaveLength(1);
  });

  it("rejects dependencies from another backend", async () => {
    const runner = new FakeToolRunner([ok("Submitted batch job 1\n")]);
    const backend = new SlurmBackend({ runner });

    await expect(
      backend.submit(artifactFor("slurm-style", SBATCH_FILE), { dependencies: [{ backend: "pbs-style", jobId: "3" }] })
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(
      backend.submit(artifactFor("slurm-style", SBATCH_FILE), {
        dependencies: [{ backend: "local", jobId: newLocalJobId(), name: "x", result: new Promise(() => {}) }]
      })
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(
      backend.submit(artifactFor("slurm-style", SBATCH_FILE), { dependencies: ["12;34"] })
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(
      backend.submit(artifactFor("slurm-style", SBATCH_FILE), { dependencies: [1.5] })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(runner.calls).toHaveLength(0);
  });

  it("rejects artifacts built for another backend", async () => {
    const runner = new FakeToolRunner([ok("Submitted batch job 1\n")]);
    const backend = new SlurmBackend({ runner });
    await expect(backend.submit(artifactFor("pbs-style", QSUB_FILE))).rejects.toBeInstanceOf(ConfigError);
    expect(runner.calls).toHaveLength(0);
  });

  it("builds sbatch arguments and parses ids", () => {
    expect(sbatchArgs("a.sbatch", [])).toEqual(["a.sbatch"]);
    expect(sbatchArgs("a.sbatch", ["1", "2"])).toEqual(["--dependency=afterok:1:2", "a.sbatch"]);
    expect(parseSbatchJobId("Submitted batch job 99")).toBe("99");
    expect(parseSbatchJobId("")).toBeNull();
  });
});

describe("qsub submission", () => {
  it("parses the numeric id before the server name", async () => {
    const runner = new FakeToolRunner([ok("1234.head.cluster.example\n")]);
    const backend = new PbsBackend({ runner, sleep: recordingSleep().sleep });

    const handle = await backend.submit(artifactFor("pbs-style", QSUB_FILE));

    expect(handle).toEqual({ backend: "pbs-style", jobId: "1234" });
    expect(runner.calls).toEqual([{ command: "qsub", args: [QSUB_FILE] }]);
  });

  it("writes one depend clause with an afterok relation per job", async () => {
    const runner = new FakeToolRunner([ok("20.server\n")]);
    const backend = new PbsBackend({ runner });

    await backend.submit(artifactFor("pbs-style", QSUB_FILE), {
      dependencies: [{ backend: "pbs-style", jobId: "18" }, "19.server"]
    });

    expect(runner.calls[0]?.args).toEqual(["-W", "depend=afterok:18,afterok:19", QSUB_FILE]);
  });

  it("invokes a failing qsub exactly 5 times before raising SubmissionError", async () => {
    const runner = new FakeToolRunner([failed(2, "qsub: Bad UID for job execution")]);
    const { sleep, sleeps } = recordingSleep();
    const backend = new PbsBackend({ runner, sleep });

    await expect(backend.submit(artifactFor("pbs-style", QSUB_FILE))).rejects.toBeInstanceOf(SubmissionError);
    expect(runner.calls).toHaveLength(5);
    expect(sleeps).toHaveLength(4);
  });

  it("treats non-numeric qsub output as a defect without retrying", async () => {
    const runner = new FakeToolRunner([ok("server busy\n")]);
    const backend = new PbsBackend({ runner, sleep: recordingSleep().sleep });

    await expect(backend.submit(artifactFor("pbs-style", QSUB_FILE))).rejects.toThrow(/unable to parse qsub job id/);
    expect(runner.calls).toHaveLength(1);
  });

  it("builds qsub arguments and parses ids", () => {
    expect(qsubArgs("a.qsub", [])).toEqual(["a.qsub"]);
    expect(parseQsubJobId("77.pbs01\n")).toBe("77");
    expect(parseQsubJobId("pbs01.77")).toBeNull();
  });
});
