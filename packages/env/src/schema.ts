/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (server, tests).
 */

import { z } from "zod"

/**
 * Custom validators for common patterns
 *
 * IMPORTANT: Do NOT use .refine() here. It wraps the schema in ZodEffects
 * which breaks type inference in @t3-oss/env-core.
 * Use .regex() or other ZodString chainable methods instead.
 */
export const httpsUrl = z
  .string()
  .url()
  .regex(/^https:\/\//, "Must use HTTPS")

export const positiveInt = z.coerce.number().int().positive()

/**
 * Official EdgeOne Pages API endpoints, probed in order when no explicit
 * EDGEONE_PAGES_API_URL is configured. The first accepts China-region tokens,
 * the second international ones.
 */
export const PAGES_API_BASE_URLS = ["https://pages-api.cloud.tencent.com/v1", "https://pages-api.edgeone.ai/v1"] as const

export const DEFAULT_HTML_BASE_URL_ENDPOINT = "https://mcp.edgeone.site/get_base_url"

/**
 * Server-side environment variables schema
 */
export const serverSchema = {
  // Credentials (stored by the host platform's settings UI)
  EDGEONE_PAGES_API_TOKEN: z.string().min(1).optional(),
  // Existing project to update; unset means every ZIP deploy creates a new project
  EDGEONE_PAGES_PROJECT_NAME: z.string().min(1).optional(),

  // Directory deploy_zip may read local archives from; unset accepts download URLs only
  EDGEONE_PAGES_LOCAL_FILE_ROOT: z.string().min(1).optional(),

  // Skips endpoint probing when set
  EDGEONE_PAGES_API_URL: httpsUrl.optional(),
  EDGEONE_PAGES_HTML_BASE_URL_ENDPOINT: httpsUrl.default(DEFAULT_HTML_BASE_URL_ENDPOINT),

  // Timing
  EDGEONE_PAGES_REQUEST_TIMEOUT_MS: positiveInt.default(30_000),
  EDGEONE_PAGES_POLL_INTERVAL_MS: positiveInt.default(5_000),
  EDGEONE_PAGES_MAX_POLL_ATTEMPTS: positiveInt.default(60),
} as const

export type ServerEnvKey = keyof typeof serverSchema
