import { NoParamsSchema, TopNSchema } from "../schemas/data.js";
import { defineTool, type SalesOperations, type SalesTool } from "./define.js";

export function dataTools(service: SalesOperations): SalesTool[] {
  return [
    defineTool(
      "top_customers",
      "Customers ranked by total sales with order count, average order value, territory and status",
      TopNSchema,
      (p) => service.topCustomers(p.limit),
    ),
    defineTool(
      "top_products",
      "Products ranked by performance score (weighted sales, order count and quantity)",
      TopNSchema,
      (p) => service.topProducts(p.limit),
    ),
    defineTool(
      "territory_insights",
      "Territory breakdown by total sales with market share, top products and deal-size distribution",
      NoParamsSchema,
      () => service.territoryInsights(),
    ),
    defineTool(
      "system_stats",
      "Customer, product and territory counts plus vector store point counts per entity type",
      NoParamsSchema,
      () => service.stats(),
    ),
    defineTool("health_check", "Vector store reachability and collection status", NoParamsSchema, () =>
      service.health(),
    ),
    defineTool(
      "rebuild_index",
      "Reload the transaction source, regenerate entity descriptions and embeddings, and replace the vector store contents with them. Concurrent rebuilds run one at a time",
      NoParamsSchema,
      () => service.rebuildIndex(),
    ),
  ];
}
