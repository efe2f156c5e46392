import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { z } from "zod";
import type { ApiResponse, SalesService } from "@sales-insight/agent";
import { wrapResponse, type ToolResponse } from "../formatters/response.js";

/** The service operations the tools call */
export type SalesOperations = Pick<
  SalesService,
  | "query"
  | "analyzeCustomer"
  | "recommendProducts"
  | "analyzeTerritory"
  | "generatePitch"
  | "getInsights"
  | "topCustomers"
  | "topProducts"
  | "territoryInsights"
  | "stats"
  | "health"
  | "rebuildIndex"
>;

export interface SalesTool {
  name: string;
  description: string;
  shape: z.ZodRawShape;
  run(params: unknown): Promise<ToolResponse>;
}

export function defineTool<S extends z.ZodRawShape, T>(
  name: string,
  description: string,
  schema: z.ZodObject<S>,
  call: (input: z.output<z.ZodObject<S>>) => Promise<ApiResponse<T>>,
): SalesTool {
  return {
    name,
    description,
    shape: schema.shape,
    async run(params) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
        return wrapResponse(new Error(`Invalid parameters: ${issues.join("; ")}`));
      }
      return wrapResponse(await call(parsed.data));
    },
  };
}

export function registerTools(server: McpServer, tools: readonly SalesTool[]): void {
  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.shape, async (params) => tool.run(params));
  }
}
