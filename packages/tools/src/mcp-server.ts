import { createSdkMcpServer } from "@anthropic-ai/claude-agent-sdk"
import type { CredentialStore } from "@edgeone-deploy/env/server"
import type { ErrorLogger } from "@edgeone-deploy/error-logger"
import type { ZipLimits } from "./lib/zip-validator.js"
import { PAGES_SERVER_NAME } from "./tool-names.js"
import type { ArchiveUploader } from "./tools/pages/cos-uploader.js"
import { createDeployHtmlTool } from "./tools/pages/deploy-html.js"
import { createDeployZipTool } from "./tools/pages/deploy-zip.js"

export interface PagesMcpServerOptions {
  /** Where deploy_zip reads the API token and project name (default: environment) */
  credentials?: CredentialStore
  uploader?: ArchiveUploader
  limits?: ZipLimits
  logger?: ErrorLogger
}

/**
 * EdgeOne Pages MCP Server
 *
 * Tools for publishing static content to EdgeOne Pages edge delivery.
 *
 * **Available Tools:**
 * - deploy_html: Publish a single HTML document, no credentials needed
 * - deploy_zip: Publish a ZIP archive to Production or Preview (API token required)
 *
 * Tool names follow MCP pattern: mcp__edgeone-pages__<tool_name>
 */
export function createPagesMcpServer(options: PagesMcpServerOptions = {}) {
  const { credentials, uploader, limits, logger } = options

  return createSdkMcpServer({
    name: PAGES_SERVER_NAME,
    version: "1.0.0",
    tools: [createDeployHtmlTool({ logger }), createDeployZipTool({ credentials, uploader, limits, logger })],
  })
}

export const pagesInternalMcp = createPagesMcpServer()
