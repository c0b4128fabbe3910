import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest"
import type { ToolResult } from "../src/lib/api-client.js"
import { deployHtml } from "../src/tools/pages/deploy-html.js"
import { jsonResponse, silentLogger, stalledBodyFetch } from "./helpers/pages-api.js"

const DISCOVERY_URL = "https://mcp.edgeone.site/get_base_url"
const UPLOAD_URL = "https://upload.example.com/html"
const PAGE = "<html><body><h1>Hello</h1></body></html>"

function jsonBlock(result: ToolResult): unknown {
  return JSON.parse(result.content[1]?.text ?? "null")
}

/**
 * Discovery returns UPLOAD_URL; the upload answers with `upload()`
 */
function stubHtmlService(upload: () => Response): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>(async input =>
    String(input) === DISCOVERY_URL ? jsonResponse({ baseUrl: UPLOAD_URL }) : upload(),
  )
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

describe("deployHtml", () => {
  afterEach(() => {
    vi.unstubAllGlobals()
    delete process.env.EDGEONE_PAGES_REQUEST_TIMEOUT_MS
  })

  it("publishes the page anonymously and returns its URL", async () => {
    const fetchMock = stubHtmlService(() => jsonResponse({ url: "https://abc123.edgeone.app" }))

    const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

    expect(result.isError).toBe(false)
    expect(result.content[0]?.text).toBe("✓ HTML deployed successfully!\n\n**Public URL:** https://abc123.edgeone.app")
    expect(jsonBlock(result)).toEqual({ success: true, url: "https://abc123.edgeone.app", type: "html_deployment" })

    expect(fetchMock).toHaveBeenCalledTimes(2)
    const [discoveryUrl, discoveryInit] = fetchMock.mock.calls[0]
    expect(discoveryUrl).toBe(DISCOVERY_URL)
    expect(discoveryInit?.method).toBe("GET")

    const [uploadUrl, uploadInit] = fetchMock.mock.calls[1]
    expect(uploadUrl).toBe(UPLOAD_URL)
    expect(uploadInit?.method).toBe("POST")
    expect(JSON.parse(String(uploadInit?.body))).toEqual({ value: PAGE })
    expect(new Headers(uploadInit?.headers).get("authorization")).toBeNull()
  })

  it("runs under any NODE_ENV the host sets", async () => {
    const nodeEnv = process.env.NODE_ENV
    process.env.NODE_ENV = "staging"
    stubHtmlService(() => jsonResponse({ url: "https://abc123.edgeone.app" }))

    try {
      const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

      expect(result.isError).toBe(false)
    } finally {
      if (nodeEnv === undefined) delete process.env.NODE_ENV
      else process.env.NODE_ENV = nodeEnv
    }
  })

  it("reports an error returned by the deploy service", async () => {
    stubHtmlService(() => jsonResponse({ error: "rate limited" }))

    const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

    expect(result.isError).toBe(true)
    expect(result.content[0]?.text).toBe("✗ Deployment failed: rate limited")
    expect(jsonBlock(result)).toEqual({
      success: false,
      error: "Deployment failed: rate limited",
      code: "UPSTREAM_ERROR",
      type: "html_deployment",
    })
  })

  it("reports a non-2xx upload response", async () => {
    stubHtmlService(() => new Response(null, { status: 500, statusText: "Internal Server Error" }))

    const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

    expect(result.content[0]?.text).toBe("✗ Deployment failed: HTTP 500: Internal Server Error")
  })

  it("fails when discovery returns no base URL", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({}))
    vi.stubGlobal("fetch", fetchMock)

    const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

    expect(result.content[0]?.text).toBe("✗ Deployment failed: no base URL returned by the deploy service")
    expect(fetchMock).toHaveBeenCalledOnce()
  })

  it("fails when the upload returns neither url nor error", async () => {
    stubHtmlService(() => jsonResponse({ ok: true }))

    const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

    expect(result.content[0]?.text).toBe("✗ Deployment failed: no URL returned by the deploy service")
  })

  describe("with a short request timeout", () => {
    beforeEach(() => {
      process.env.EDGEONE_PAGES_REQUEST_TIMEOUT_MS = "5"
    })

    it("maps a stalled request to a deployment timeout", async () => {
      const fetchMock = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason))
          }),
      )
      vi.stubGlobal("fetch", fetchMock)

      const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

      expect(result.content[0]?.text).toBe("✗ Deployment timeout")
      expect(jsonBlock(result)).toMatchObject({ code: "DEPLOYMENT_TIMEOUT" })
    })

    it("times out when the response body stalls after the headers", async () => {
      const fetchMock = stalledBodyFetch()
      vi.stubGlobal("fetch", fetchMock)

      const result = await deployHtml({ html_content: PAGE }, { logger: silentLogger })

      expect(result.content[0]?.text).toBe("✗ Deployment timeout")
      expect(jsonBlock(result)).toMatchObject({ code: "DEPLOYMENT_TIMEOUT" })
      expect(fetchMock).toHaveBeenCalledOnce()
    })
  })
})
