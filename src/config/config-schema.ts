import { z } from "zod";

const positiveMs = z.number().int().positive();
const pageSize = z.number().int().min(1);

export const widgetDriverConfigSchema = z.object({
  // Timeouts
  requestTimeoutMs: positiveMs.optional(),
  openIdTimeoutMs: positiveMs.optional(),

  // Read paging
  defaultMessageLimit: pageSize.optional(),
  defaultStateLimit: pageSize.optional(),
  maxReadLimit: pageSize.optional(),
});

export const widgetSettingsSchema = z.object({
  id: z.string().min(1),
  initOnContentLoad: z.boolean(),
});
