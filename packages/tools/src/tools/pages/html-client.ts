/**
 * EdgeOne Pages HTML deploy client
 *
 * Anonymous two-call contract:
 * 1. GET the discovery endpoint → { baseUrl }
 * 2. POST { value: html } to baseUrl → { url } | { error }
 */

import { DEFAULT_HTML_BASE_URL_ENDPOINT } from "@edgeone-deploy/env"
import { DEFAULT_TIMEOUT_MS, fetchWithTimeout, readErrorMessage } from "../../lib/api-client.js"
import { DeployError, isAbortError } from "../../lib/deploy-error.js"
import type { DeployResult } from "./types.js"

export interface HtmlClientOptions {
  baseUrlEndpoint?: string
  timeout?: number
}

function failed(detail: string, cause?: unknown): DeployError {
  return DeployError.upstream(`Deployment failed: ${detail}`, cause)
}

async function requestJson(url: string, init: RequestInit, timeout: number): Promise<Record<string, unknown>> {
  try {
    return await fetchWithTimeout(url, { ...init, timeout }, parseJsonObject)
  } catch (error) {
    if (error instanceof DeployError) throw error
    if (isAbortError(error)) throw DeployError.timeout(error)
    throw failed(error instanceof Error ? error.message : String(error), error)
  }
}

async function parseJsonObject(response: Response): Promise<Record<string, unknown>> {
  if (!response.ok) {
    throw failed(await readErrorMessage(response))
  }

  let data: unknown
  try {
    data = await response.json()
  } catch (error) {
    // Body reads fail with the abort reason once the deadline passes
    if (isAbortError(error)) throw error
    throw failed("invalid JSON response", error)
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw failed("unexpected response shape")
  }
  return Object.fromEntries(Object.entries(data))
}

export async function getHtmlBaseUrl(options: HtmlClientOptions = {}): Promise<string> {
  const endpoint = options.baseUrlEndpoint ?? DEFAULT_HTML_BASE_URL_ENDPOINT
  const data = await requestJson(endpoint, { method: "GET" }, options.timeout ?? DEFAULT_TIMEOUT_MS)

  if (typeof data.baseUrl !== "string" || !data.baseUrl) {
    throw failed("no base URL returned by the deploy service")
  }
  return data.baseUrl
}

/**
 * Publish a single HTML document and return its public URL
 */
export async function deployHtmlContent(html: string, options: HtmlClientOptions = {}): Promise<DeployResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS
  const baseUrl = await getHtmlBaseUrl(options)

  const data = await requestJson(
    baseUrl,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ value: html }),
    },
    timeout,
  )

  if (typeof data.url === "string" && data.url) {
    return { url: data.url }
  }
  if (typeof data.error === "string" && data.error) {
    throw failed(data.error)
  }
  throw failed("no URL returned by the deploy service")
}
