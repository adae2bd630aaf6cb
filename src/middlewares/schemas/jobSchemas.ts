/**
 * Job Validation Schemas
 * Zod schemas for link submission and job creation.
 */

import { z } from "zod";
import { QUALITIES } from "../../services/business/types.js";

export const submitLinkSchema = z.object({
  text: z.string().trim().min(1, "Message text is required").max(2000),
});

const callbackUrlSchema = z.string().url().optional();

/** Either key + quality, or the "quality|key" payload a chat button carries. */
export const createJobSchema = z.union([
  z.object({
    key: z.string().regex(/^[0-9a-f]{10}$/, "Key must be 10 hex characters"),
    quality: z.enum(QUALITIES),
    callbackUrl: callbackUrlSchema,
  }),
  z.object({
    callbackData: z.string().min(3).max(64),
    callbackUrl: callbackUrlSchema,
  }),
]);

export type SubmitLinkBody = z.infer<typeof submitLinkSchema>;
export type CreateJobBody = z.infer<typeof createJobSchema>;

export const jobIdParamsSchema = z.object({
  jobId: z.string().uuid("Invalid job ID"),
});
