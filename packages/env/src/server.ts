/**
 * Server-side environment validation
 *
 * This file can safely use Node.js built-ins (fs, path, etc.)
 *
 * @example
 * ```typescript
 * import { envCredentialStore, loadEnvFile, readDeployEnv } from "@edgeone-deploy/env/server"
 *
 * // Optional: explicitly load .env file (call once at app entry)
 * loadEnvFile()
 *
 * const { EDGEONE_PAGES_REQUEST_TIMEOUT_MS } = readDeployEnv()
 * const { apiToken, projectName } = envCredentialStore.getCredentials()
 * ```
 */

import { existsSync } from "node:fs"
import { join } from "node:path"
import { createEnv } from "@t3-oss/env-core"
import { config as loadDotenv } from "dotenv"
import { serverSchema } from "./schema.js"

type RuntimeEnv = Record<string, string | undefined>

/**
 * Explicitly load environment file
 *
 * Call this at your app's entry point if you need dotenv loading.
 * This is NOT called automatically on import (no side effects).
 *
 * @param nodeEnv - Environment name (defaults to NODE_ENV or "development")
 * @returns true if file was loaded, false if not found
 */
export function loadEnvFile(nodeEnv?: string): boolean {
  const envName = nodeEnv || process.env.NODE_ENV || "development"
  const envFile = join(process.cwd(), `.env.${envName}`)

  if (existsSync(envFile)) {
    loadDotenv({ path: envFile, override: true })
    return true
  }

  return false
}

/**
 * Validate deploy settings against the schema.
 *
 * Reads the given env on every call: the host platform may update the stored
 * token or project name between tool invocations.
 */
export function readDeployEnv(runtimeEnv: RuntimeEnv = process.env) {
  return createEnv({
    server: serverSchema,
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: error => {
      console.error("❌ Invalid environment variables:")
      console.error(error.flatten().fieldErrors)
      throw new Error("Invalid environment variables")
    },
  })
}

export type DeployEnv = ReturnType<typeof readDeployEnv>

/**
 * Credentials the ZIP deploy handler consults before every deployment
 */
export interface DeployCredentials {
  apiToken?: string
  projectName?: string
}

export interface CredentialStore {
  getCredentials(): DeployCredentials
}

/**
 * Default store backed by EDGEONE_PAGES_API_TOKEN / EDGEONE_PAGES_PROJECT_NAME
 */
export const envCredentialStore: CredentialStore = {
  getCredentials() {
    const env = readDeployEnv()
    return {
      apiToken: env.EDGEONE_PAGES_API_TOKEN,
      projectName: env.EDGEONE_PAGES_PROJECT_NAME,
    }
  },
}

/**
 * Fixed credentials, for hosts that keep settings outside the environment
 */
export function staticCredentialStore(credentials: DeployCredentials): CredentialStore {
  const frozen = Object.freeze({ ...credentials })
  return {
    getCredentials: () => frozen,
  }
}
