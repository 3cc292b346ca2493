import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { z } from "zod";
import { createApplication } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { IndexingWorkerPool } from "./services/indexingWorkerPool.js";
import { registerAskWithCitationsTool } from "./tools/askWithCitations.js";
import { registerIngestDocumentTools } from "./tools/ingestDocuments.js";
import { registerDocumentManagementTools } from "./tools/manageDocuments.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";
import { jsonResult } from "./tools/toolResult.js";
import { ConsoleLogger } from "./utils/logger.js";

const SERVER_NAME = "doc-index-rag";
const SERVER_VERSION = "0.1.0";

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel, "server");
  const app = await createApplication(config, logger);
  const shutdownTasks: Array<() => Promise<void>> = [app.close];

  // The in-memory queue lives in this process, so it needs workers here too.
  if (config.queueBackend === "memory") {
    const pool = new IndexingWorkerPool(app.pipeline, {
      concurrency: config.workerConcurrency,
      pollIntervalMs: config.workerPollIntervalMs,
      logger: logger.child("worker"),
    });
    pool.start();
    shutdownTasks.unshift(() => pool.stop());
  }

  const server = createAppServer(app.service);
  await server.connect(new StdioServerTransport());
  logger.info(`${SERVER_NAME} listening on stdio`, {
    queue: config.queueBackend,
    pgvector: config.enablePgvector,
  });

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

function createAppServer(service: DocumentQaService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status and document counts.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const documents = await service.listDocuments();
      const byStatus: Record<string, number> = {};
      for (const document of documents) {
        byStatus[document.status] = (byStatus[document.status] ?? 0) + 1;
      }
      return jsonResult({
        server: SERVER_NAME,
        caller: name?.trim() || "anonymous",
        documents: byStatus,
      });
    },
  );

  registerIngestDocumentTools(server, service);
  registerDocumentManagementTools(server, service);
  registerSearchChunksTool(server, service);
  registerAskWithCitationsTool(server, service);

  return server;
}

main().catch((error) => {
  console.error(`Failed to start MCP server: ${describeError(error)}`);
  process.exit(1);
});
