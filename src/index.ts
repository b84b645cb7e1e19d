#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadClusterConfig } from "./config/clusterConfig.js";
import { parseBackendSelection } from "./core/backend.js";
import { createLogger } from "./core/logger.js";
import { Cluster } from "./execution/cluster.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";

async function main(): Promise<void> {
  const configPath = process.env.CLUSTER_CONFIG_PATH ?? "config/default.cluster.yaml";
  const log = createLogger();

  const config = await loadClusterConfig(configPath);
  const backendOverride = process.env.CLUSTER_BACKEND;
  const effective = backendOverride ? { ...config, backend: parseBackendSelection(backendOverride) } : config;

  const cluster = Cluster.fromConfig(effective, { log });
  const server = createGatewayServer({ cluster, log });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ backend: cluster.kind, configPath }, "cluster-submit gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
