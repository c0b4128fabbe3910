/**
 * Pages Deploy ZIP Tool
 *
 * Deploy a ZIP archive of static site files to EdgeOne Pages.
 * Requires an API token; updates the configured project when a project name
 * is set, otherwise creates a new project per deploy.
 */

import { tool } from "@anthropic-ai/claude-agent-sdk"
import { type CredentialStore, envCredentialStore, readDeployEnv } from "@edgeone-deploy/env/server"
import { type ErrorLogger, errorLogger } from "@edgeone-deploy/error-logger"
import { z } from "zod"
import { deployErrorResult, successResult, type ToolResult } from "../../lib/api-client.js"
import { DeployError, toDeployError } from "../../lib/deploy-error.js"
import { type FileReference, loadFileBytes } from "../../lib/file-source.js"
import { DEFAULT_ZIP_LIMITS, hasZipExtension, validateZipArchive, type ZipLimits } from "../../lib/zip-validator.js"
import type { ArchiveUploader } from "./cos-uploader.js"
import { PAGES_ENVIRONMENTS, type PagesEnvironment, type ZipDeployResult } from "./types.js"
import { ZipDeployer } from "./zip-deployer.js"

export const deployZipParamsSchema = {
  zip_file: z
    .object({
      filename: z.string().min(1).describe("File name, must end in .zip"),
      url: z.string().url().optional().describe("Download URL of the uploaded file"),
      path: z
        .string()
        .min(1)
        .optional()
        .describe("Path of the file on this machine. Only read inside the host's EDGEONE_PAGES_LOCAL_FILE_ROOT"),
    })
    .refine(file => Boolean(file.url || file.path), { message: "zip_file needs either a url or a path" })
    .describe("The ZIP archive to deploy (static HTML/CSS/JS, images, fonts, JSON/XML/TXT/MD)"),
  environment: z
    .enum(PAGES_ENVIRONMENTS)
    .optional()
    .default("Production")
    .describe("Deployment target: Production (live) or Preview (staging). Default: Production"),
}

export type DeployZipParams = {
  zip_file: FileReference
  environment?: PagesEnvironment
}

export interface DeployZipOptions {
  credentials?: CredentialStore
  uploader?: ArchiveUploader
  limits?: ZipLimits
  logger?: ErrorLogger
}

/**
 * Validate the archive locally, then run the Pages upload/deploy flow.
 *
 * Checks run in this order so the cheap ones fail first:
 * token → extension → archive size → ZIP structure → per-file size.
 * No network call happens before the extension check passes.
 */
export async function deployZip(params: DeployZipParams, options: DeployZipOptions = {}): Promise<ToolResult> {
  const { zip_file, environment = "Production" } = params
  const filename = zip_file.filename.trim()
  const logger = (options.logger ?? errorLogger).withContext({
    component: "deploy-zip",
    tool: "deploy_zip",
    environment,
  })
  const limits = options.limits ?? DEFAULT_ZIP_LIMITS

  try {
    const { apiToken, projectName } = (options.credentials ?? envCredentialStore).getCredentials()
    if (!apiToken) {
      throw DeployError.missingCredential()
    }
    if (!hasZipExtension(filename)) {
      throw DeployError.invalidFile()
    }

    const env = readDeployEnv()
    await logger.info("Starting ZIP deployment", { filename, projectName })

    const data = await loadFileBytes({ ...zip_file, filename }, {
      limits,
      timeout: env.EDGEONE_PAGES_REQUEST_TIMEOUT_MS,
      localRoot: env.EDGEONE_PAGES_LOCAL_FILE_ROOT,
    })
    const summary = validateZipArchive(data, limits)

    const deployer = new ZipDeployer({
      apiToken,
      projectName,
      apiBaseUrl: env.EDGEONE_PAGES_API_URL,
      requestTimeoutMs: env.EDGEONE_PAGES_REQUEST_TIMEOUT_MS,
      pollIntervalMs: env.EDGEONE_PAGES_POLL_INTERVAL_MS,
      maxPollAttempts: env.EDGEONE_PAGES_MAX_POLL_ATTEMPTS,
      uploader: options.uploader,
      logger: options.logger,
    })
    const { url } = await deployer.deploy({ filename, data }, environment)

    const result: ZipDeployResult = {
      success: true,
      url,
      environment,
      type: "zip_deployment",
      message: `ZIP file ${filename} deployed successfully to EdgeOne Pages`,
    }
    await logger.info("ZIP deployment completed", { filename, files: summary.fileCount })

    return successResult(
      `Deployment completed successfully!\n\n**Public URL:** ${url}\n**Environment:** ${environment}\n**Files:** ${summary.fileCount}`,
      { ...result },
    )
  } catch (error) {
    const deployError = toDeployError(error)
    await logger.error("ZIP deployment failed", deployError, { code: deployError.code })
    return deployErrorResult(deployError, "zip_deployment")
  }
}

const TOOL_DESCRIPTION = `Deploy a ZIP archive of a static website to EdgeOne Pages and get a public URL.

Requires an EdgeOne Pages API token in the plugin settings. If a project name is
configured, that project is updated; otherwise a new project is created.

Pass the download URL the host gives for an uploaded file. Local paths are read
only when the host sets EDGEONE_PAGES_LOCAL_FILE_ROOT, and only inside that directory.

**Limits:** 50MB per archive, 25MB per file inside it.
**Supported content:** HTML/CSS/JS, images, fonts, JSON/XML/TXT/MD.

**Example:**
deploy_zip({ zip_file: { filename: "site.zip", url: "https://files.example.com/site.zip" }, environment: "Preview" })`

export function createDeployZipTool(options: DeployZipOptions = {}) {
  return tool("deploy_zip", TOOL_DESCRIPTION, deployZipParamsSchema, async args => {
    return deployZip(args, options)
  })
}

export const deployZipTool = createDeployZipTool()
