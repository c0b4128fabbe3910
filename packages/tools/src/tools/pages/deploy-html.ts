/**
 * Pages Deploy HTML Tool
 *
 * Publish a single HTML document to EdgeOne Pages edge delivery.
 * No credentials needed.
 */

import { tool } from "@anthropic-ai/claude-agent-sdk"
import { readDeployEnv } from "@edgeone-deploy/env/server"
import { type ErrorLogger, errorLogger } from "@edgeone-deploy/error-logger"
import { z } from "zod"
import { deployErrorResult, successResult, type ToolResult } from "../../lib/api-client.js"
import { toDeployError } from "../../lib/deploy-error.js"
import { deployHtmlContent } from "./html-client.js"

export const deployHtmlParamsSchema = {
  html_content: z
    .string()
    .min(1, "HTML content must not be empty")
    .describe("Complete HTML document to publish, including <html>, <head> and <body>. Inline CSS and JS."),
}

export type DeployHtmlParams = {
  html_content: string
}

export interface DeployHtmlOptions {
  logger?: ErrorLogger
}

export async function deployHtml(params: DeployHtmlParams, options: DeployHtmlOptions = {}): Promise<ToolResult> {
  const logger = (options.logger ?? errorLogger).withContext({ component: "deploy-html", tool: "deploy_html" })

  try {
    const env = readDeployEnv()
    await logger.info("Starting HTML deployment", { bytes: Buffer.byteLength(params.html_content) })

    const { url } = await deployHtmlContent(params.html_content, {
      baseUrlEndpoint: env.EDGEONE_PAGES_HTML_BASE_URL_ENDPOINT,
      timeout: env.EDGEONE_PAGES_REQUEST_TIMEOUT_MS,
    })

    await logger.info("HTML deployment completed", { url })
    return successResult(`HTML deployed successfully!\n\n**Public URL:** ${url}`, {
      success: true,
      url,
      type: "html_deployment",
    })
  } catch (error) {
    const deployError = toDeployError(error)
    await logger.error("HTML deployment failed", deployError)
    return deployErrorResult(deployError, "html_deployment")
  }
}

const TOOL_DESCRIPTION = `Deploy HTML content to EdgeOne Pages and get a public URL.

The page is served from edge nodes close to visitors. No account or token needed.

**Usage:**
- Pass one complete HTML document (inline any CSS and JavaScript)
- Returns a public URL like https://<id>.edgeone.app

**Example:**
deploy_html({ html_content: "<html><body><h1>Hello</h1></body></html>" })`

export function createDeployHtmlTool(options: DeployHtmlOptions = {}) {
  return tool("deploy_html", TOOL_DESCRIPTION, deployHtmlParamsSchema, async args => {
    return deployHtml(args, options)
  })
}

export const deployHtmlTool = createDeployHtmlTool()
