/**
 * @edgeone-deploy/tools
 *
 * MCP tools for deploying static content to EdgeOne Pages.
 *
 * @example
 * ```typescript
 * import { pagesInternalMcp, PAGES } from "@edgeone-deploy/tools"
 *
 * const claudeOptions = {
 *   mcpServers: {
 *     "edgeone-pages": pagesInternalMcp
 *   },
 *   allowedTools: [PAGES.DEPLOY_HTML, PAGES.DEPLOY_ZIP]
 * }
 * ```
 */

// MCP server
export { createPagesMcpServer, pagesInternalMcp, type PagesMcpServerOptions } from "./mcp-server.js"

// Tool name constants
export { PAGES, PAGES_SERVER_NAME, PAGES_TOOLS, qualifiedToolName } from "./tool-names.js"
export type { PagesTool, PagesToolName } from "./tool-names.js"

// Tools and clients
export * from "./tools/pages/index.js"

// Errors and validation
export { DeployError, type DeployErrorCode, toDeployError } from "./lib/deploy-error.js"
export { type FileReference, loadFileBytes } from "./lib/file-source.js"
export {
  DEFAULT_ZIP_LIMITS,
  hasZipExtension,
  validateZipArchive,
  ZIP_LIMITS,
  type ZipLimits,
  type ZipSummary,
} from "./lib/zip-validator.js"
export type { ToolResult } from "./lib/api-client.js"
