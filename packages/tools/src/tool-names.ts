/**
 * Shared Tool Name Constants
 *
 * Single source of truth for the Pages tool names.
 * Import these instead of hardcoding strings.
 *
 * @example
 * ```typescript
 * import { PAGES } from "@edgeone-deploy/tools"
 *
 * const allowedTools = [PAGES.DEPLOY_HTML, PAGES.DEPLOY_ZIP]
 * ```
 */

export const PAGES_SERVER_NAME = "edgeone-pages"

// Bare names, as registered on the MCP server
export const PAGES_TOOLS = {
  DEPLOY_HTML: "deploy_html",
  DEPLOY_ZIP: "deploy_zip",
} as const

export type PagesToolName = (typeof PAGES_TOOLS)[keyof typeof PAGES_TOOLS]

/**
 * Fully-qualified name the agent runtime exposes: mcp__<server>__<tool>
 */
export function qualifiedToolName<T extends PagesToolName>(name: T): `mcp__${typeof PAGES_SERVER_NAME}__${T}` {
  return `mcp__${PAGES_SERVER_NAME}__${name}`
}

export const PAGES = {
  DEPLOY_HTML: qualifiedToolName(PAGES_TOOLS.DEPLOY_HTML),
  DEPLOY_ZIP: qualifiedToolName(PAGES_TOOLS.DEPLOY_ZIP),
} as const

export type PagesTool = (typeof PAGES)[keyof typeof PAGES]
