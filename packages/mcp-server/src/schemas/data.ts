import { z } from "zod";
import { LimitSchema } from "./common.js";

export const TopNSchema = z.object({
  limit: LimitSchema,
});

export const NoParamsSchema = z.object({});
