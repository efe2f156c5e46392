import { z } from "zod";

export const ScopeSchema = z
  .enum(["all", "customer", "product", "territory"])
  .default("all")
  .describe("Entity types to retrieve context from");

export const LimitSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(100)
  .default(10)
  .describe("Number of entries to return");

export const NameSchema = z.string().trim().min(1);
