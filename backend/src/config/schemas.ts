import { z } from "zod";

import { isValidTimeZone } from "@tariff-monitor/domain";

const retryTierSchema = z.object({
  attempts: z.number().int().min(0).optional(),
  interval_seconds: z.number().positive().optional(),
});

export const configDocumentSchema = z.object({
  source: z
    .object({
      url: z.string().url().optional(),
      timeout_seconds: z.number().positive().optional(),
      verify_on_startup: z.boolean().optional(),
    })
    .optional(),
  refresh: z
    .object({
      interval_hours: z.number().min(0.5).max(24).optional(),
    })
    .optional(),
  retry: z
    .object({
      fast: retryTierSchema.optional(),
      extended: retryTierSchema.optional(),
    })
    .optional(),
  timezone: z.string().refine(isValidTimeZone, {message: "unknown IANA timezone"}).optional(),
  logging: z
    .object({
      level: z.string().optional(),
    })
    .optional(),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  // An empty YAML file parses to null; treat it as "all defaults".
  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}
