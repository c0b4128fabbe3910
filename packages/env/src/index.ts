/**
 * @edgeone-deploy/env
 *
 * Centralized environment variable validation using @t3-oss/env-core
 *
 * ## Usage
 *
 * ### Server-side
 * ```typescript
 * import { readDeployEnv } from "@edgeone-deploy/env/server"
 *
 * const timeoutMs = readDeployEnv().EDGEONE_PAGES_REQUEST_TIMEOUT_MS
 * ```
 *
 * ### Schemas only (tests, type generation)
 * ```typescript
 * import { serverSchema } from "@edgeone-deploy/env"
 * ```
 *
 * ## Architecture
 *
 * - `/server` - Validation and credential stores, can use node:fs for dotenv loading
 * - `/` (this file) - Schema exports only, safe for any context
 */

// Export ONLY schemas - no env object, no side effects
export {
  serverSchema,
  httpsUrl,
  positiveInt,
  PAGES_API_BASE_URLS,
  DEFAULT_HTML_BASE_URL_ENDPOINT,
  type ServerEnvKey,
} from "./schema.js"
