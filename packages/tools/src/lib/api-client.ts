/**
 * Shared HTTP + tool-result helpers for the Pages tools
 *
 * Every outbound request goes through fetchWithTimeout so a stalled provider
 * never blocks an invocation past its timeout. Tool handlers convert whatever
 * happened into a ToolResult; they never throw back into the host.
 */

import type { DeployError } from "./deploy-error.js"

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>
  isError: boolean
  [key: string]: unknown
}

export interface FetchWithTimeoutOptions extends RequestInit {
  timeout?: number
}

export const DEFAULT_TIMEOUT_MS = 30_000

/**
 * fetch() with an AbortController deadline that covers the body as well.
 *
 * `read` consumes the response before the timer is cleared, so a server that
 * sends headers and then stalls still fails with an AbortError.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: FetchWithTimeoutOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const { timeout = DEFAULT_TIMEOUT_MS, signal, ...init } = options

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeout)
  const onCallerAbort = () => controller.abort()
  signal?.addEventListener("abort", onCallerAbort, { once: true })

  try {
    const response = await fetch(url, { ...init, signal: controller.signal })
    return await read(response)
  } finally {
    clearTimeout(timeoutId)
    signal?.removeEventListener("abort", onCallerAbort)
  }
}

/**
 * Read an error body as text, preferring a JSON `message`/`error`/`Message` field
 */
export async function readErrorMessage(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}: ${response.statusText}`
  const errorText = await response.text().catch(() => "")
  if (!errorText) return fallback

  try {
    const errorData: unknown = JSON.parse(errorText)
    if (errorData && typeof errorData === "object") {
      for (const key of ["message", "error", "Message"]) {
        const value = key in errorData ? Reflect.get(errorData, key) : undefined
        if (typeof value === "string" && value) return value
      }
    }
  } catch {
    // Not JSON: fall through to the raw text
  }

  return errorText.length > 500 ? `${errorText.slice(0, 500)}…` : errorText
}

/**
 * Helper to create success result
 */
export function successResult(message: string, data?: Record<string, unknown>): ToolResult {
  const content: ToolResult["content"] = [{ type: "text", text: `✓ ${message}` }]
  if (data) {
    content.push({ type: "text", text: JSON.stringify(data, null, 2) })
  }
  return { content, isError: false }
}

/**
 * Error result carrying the categorized code in a JSON block
 */
export function deployErrorResult(error: DeployError, type: string): ToolResult {
  return {
    content: [
      { type: "text", text: `✗ ${error.message}` },
      {
        type: "text",
        text: JSON.stringify({ success: false, error: error.message, code: error.code, type }, null, 2),
      },
    ],
    isError: true,
  }
}
