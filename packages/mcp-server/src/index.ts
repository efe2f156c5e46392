#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  APP_VERSION,
  SalesService,
  assertStartupReady,
  createAppContext,
  createLogger,
  loadSettings,
  logDomainEvents,
} from "@sales-insight/agent";
import { registerTools } from "./tools/define.js";
import { analysisTools } from "./tools/analysis.js";
import { dataTools } from "./tools/data.js";

const log = createLogger("McpServer");

const settings = loadSettings();
assertStartupReady(settings);
const ctx = await createAppContext(settings);
logDomainEvents(ctx.events);
const service = new SalesService(ctx);

const server = new McpServer({
  name: "sales-insight-mcp",
  version: APP_VERSION,
});

registerTools(server, analysisTools(service));
registerTools(server, dataTools(service));

const shutdown = (): void => {
  void server
    .close()
    .then(() => ctx.close())
    .catch((err: unknown) => log.error("Shutdown failed", { error: String(err) }))
    .finally(() => process.exit(0));
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

const transport = new StdioServerTransport();
await server.connect(transport);
log.info("Sales insight MCP server listening on stdio");
