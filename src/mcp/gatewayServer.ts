import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { BackendError, ConfigError } from "../core/errors.js";
import type { LocalJobResult } from "../core/handle.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { Cluster } from "../execution/cluster.js";
import {
  zClusterCleanInput,
  zClusterCleanOutput,
  zClusterInfoInput,
  zClusterInfoOutput,
  zClusterSubmitInput,
  zClusterSubmitOutput,
  zClusterWaitInput,
  zClusterWaitOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  cluster: Cluster;
  log?: Logger;
}

export function toMcpError(e: unknown): Error {
  if (e instanceof McpError) return e;
  if (e instanceof ConfigError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof BackendError) return new McpError(ErrorCode.InternalError, e.message);
  if (e instanceof Error) return e;
  return new Error("unknown error");
}

function toLocalResultSummary(r: LocalJobResult) {
  return {
    job_id: r.jobId,
    name: r.name,
    status: r.status,
    exit_code: r.exitCode,
    started_at: r.startedAt,
    finished_at: r.finishedAt,
    error: r.error ?? null
  };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const { cluster } = deps;
  const log = deps.log ?? silentLogger;

  const mcp = new McpServer({
    name: "cluster-submit-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "cluster_info",
    {
      description: "Report the batch backend jobs are submitted to.",
      inputSchema: zClusterInfoInput,
      outputSchema: zClusterInfoOutput
    },
    async () => {
      const structured = { backend: cluster.kind };
      return {
        content: [{ type: "text", text: `backend ${cluster.kind}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "cluster_submit",
    {
      description: "Write a job script for a shell command and submit it to the active backend.",
      inputSchema: zClusterSubmitInput,
      outputSchema: zClusterSubmitOutput
    },
    async (args) => {
      try {
        const artifact = await cluster.build({
          command: args.command,
          name: args.name,
          timeLimit: args.time_limit,
          cores: args.cores,
          memoryMb: args.mem_mb,
          partition: args.partition,
          modules: args.modules,
          workdir: args.workdir
        });
        const handle = await cluster.submit(artifact, {
          dependencies: args.dependencies ?? [],
          threads: args.threads
        });

        const structured = {
          backend: cluster.kind,
          job_id: handle.jobId,
          script_path: artifact.scriptPath,
          files: artifact.files
        };
        return {
          content: [{ type: "text", text: `Submitted ${artifact.name} as ${handle.jobId} (${cluster.kind})` }],
          structuredContent: structured
        };
      } catch (e) {
        log.error({ err: e, name: args.name }, "cluster_submit failed");
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "cluster_wait",
    {
      description: "Block until every listed job has reached a terminal state.",
      inputSchema: zClusterWaitInput,
      outputSchema: zClusterWaitOutput
    },
    async (args) => {
      try {
        const jobIds = args.job_ids.map((id) => String(id));
        await cluster.wait(jobIds);

        const localResults: LocalJobResult[] = [];
        for (const jobId of jobIds) {
          const res = await cluster.localResult(jobId);
          if (res) localResults.push(res);
        }

        const structured = {
          backend: cluster.kind,
          job_ids: jobIds,
          local_results: localResults.map(toLocalResultSummary)
        };
        return {
          content: [{ type: "text", text: `${jobIds.length} job(s) finished` }],
          structuredContent: structured
        };
      } catch (e) {
        log.error({ err: e, jobIds: args.job_ids }, "cluster_wait failed");
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "cluster_clean",
    {
      description: "Delete the job scripts and .cluster.out/.cluster.err files of the active backend in a directory.",
      inputSchema: zClusterCleanInput,
      outputSchema: zClusterCleanOutput
    },
    async (args) => {
      try {
        const deleted = await cluster.clean(args.directory);
        const structured = { backend: cluster.kind, deleted: [...deleted].sort() };
        return {
          content: [{ type: "text", text: `Deleted ${structured.deleted.length} file(s)` }],
          structuredContent: structured
        };
      } catch (e) {
        log.error({ err: e, directory: args.directory ?? null }, "cluster_clean failed");
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
