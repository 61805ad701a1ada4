/**
 * Fetch settings schema.
 *
 * Settings are validated once per run and frozen; every worker reads the same
 * values for the whole run.
 */

import { z } from "zod";

export const FetchSettingsSchema = z
  .object({
    /** Root directory of the artifact store */
    storeRoot: z.string().min(1).describe("Directory that receives <topic>/<title>.pdf files"),

    /** Maximum downloads in flight */
    concurrency: z
      .number()
      .int()
      .min(1)
      .max(64)
      .describe("Number of work items fetched at the same time"),

    /** Netscape cookies.txt file; ignored when it does not exist */
    cookieFile: z
      .string()
      .min(1)
      .optional()
      .describe("Cookie store sent with the primary and search-referer attempts"),

    /** User agent for the primary and search-referer attempts */
    userAgent: z.string().min(1),

    /** Referer for the second attempt */
    fallbackReferer: z.string().url().describe("Referer simulating search-engine traffic"),

    /** Referer for the last attempt */
    publisherReferer: z.string().url().describe("Referer pointing at a publisher site"),

    /** User agent for the last attempt */
    fallbackUserAgent: z.string().min(1),

    /** Transport timeout for headers and body, per attempt */
    requestTimeoutMs: z.number().int().min(1000),

    /** Redirects followed per attempt */
    maxRedirects: z.number().int().min(0).max(20),

    /** Reject bodies that don't start with %PDF */
    verifyPdf: z.boolean(),
  })
  .strict();

export type FetchSettings = z.infer<typeof FetchSettingsSchema>;
