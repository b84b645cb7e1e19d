import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";

import { parseClusterConfig } from "../src/config/clusterConfig.js";
import { ConfigError } from "../src/core/errors.js";
import { Cluster } from "../src/execution/cluster.js";
import { LocalBackend } from "../src/execution/local/localBackend.js";
import { FakeToolRunner, ok, recordingSleep } from "./fakes.js";

describe("Cluster", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "cluster-facade-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves local job ids through its registry", async () => {
    const cluster = new Cluster(new LocalBackend({ threads: 2 }));
    const first = await cluster.run({ command: "echo a > a.txt", name: "first", workdir: dir });
    const second = await cluster.run({ command: "cat a.txt", name: "second", workdir: dir, dependencies: [first.jobId] });

    expect(cluster.lookup(first.jobId)).toBe(first);
    await cluster.wait([first.jobId, second.jobId]);

    const res = await cluster.localResult(second.jobId);
    expect(res?.status).toBe("succeeded");
    expect(await cluster.localResult("local_unknown")).toBeNull();
  });

  it("rejects local ids it never issued", async () => {
    const cluster = new Cluster(new LocalBackend({ threads: 1 }));
    await expect(cluster.wait(["local_unknown"])).rejects.toBeInstanceOf(ConfigError);
  });

  it("passes scheduler dependencies through and polls with the configured delays", async () => {
    const runner = new FakeToolRunner([
      ok("Submitted batch job 41\n"),
      ok("Submitted batch job 42\n"),
      ok("42,R\n"),
      ok("")
    ]);
    const { sleep, sleeps } = recordingSleep();
    const config = parseClusterConfig({ backend: "slurm-style", slurm: { initial_delay_ms: 100, poll_interval_ms: 50 } });
    const cluster = Cluster.fromConfig(config, { runner, sleep });

    const first = await cluster.run({ command: "true", name: "first", workdir: dir });
    const second = await cluster.run({ command: "true", name: "second", workdir: dir, dependencies: [first] });
    expect(second).toEqual({ backend: "slurm-style", jobId: "42" });
    expect(runner.calls[1]?.args).toEqual(["--dependency=afterok:41", path.join(dir, "second.cluster.sbatch")]);

    await cluster.wait(["41", "42"]);
    expect(sleeps).toEqual([100, 50]);
    expect(await cluster.localResult("42")).toBeNull();
  });
});
