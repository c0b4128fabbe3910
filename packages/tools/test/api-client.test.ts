import { afterEach, describe, expect, it, vi } from "vitest"
import { deployErrorResult, fetchWithTimeout, readErrorMessage, successResult } from "../src/lib/api-client.js"
import { DeployError, isAbortError } from "../src/lib/deploy-error.js"
import { stalledBodyFetch } from "./helpers/pages-api.js"

/**
 * SHARED HTTP + RESULT HELPER TESTS
 *
 * Every Pages request goes through fetchWithTimeout, and every tool answers
 * through successResult/deployErrorResult. Regressions here reach both tools.
 */

afterEach(() => {
  vi.unstubAllGlobals()
})

describe("fetchWithTimeout", () => {
  /**
   * THE HANGING REQUEST BUG TEST
   * A provider that never answers must not hold the invocation forever
   */
  it("aborts the request once the timeout passes (THE HANGING REQUEST BUG)", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason))
        }),
    )
    vi.stubGlobal("fetch", fetchMock)

    const error = await fetchWithTimeout("https://api.example.com/slow", { timeout: 5 }, response => response.text()).catch(
      (e: unknown) => e,
    )

    expect(isAbortError(error)).toBe(true)
  })

  it("passes method, headers and body through with its own signal", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("ok"))
    vi.stubGlobal("fetch", fetchMock)

    const text = await fetchWithTimeout(
      "https://api.example.com/v1",
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{}",
      },
      response => response.text(),
    )

    expect(text).toBe("ok")

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe("https://api.example.com/v1")
    expect(init?.method).toBe("POST")
    expect(init?.body).toBe("{}")
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  /**
   * THE STALLED BODY BUG TEST
   * Headers arriving in time must not end the deadline: a body that never
   * finishes still has to fail
   */
  it("keeps the deadline running while the body is read (THE STALLED BODY BUG)", async () => {
    vi.stubGlobal("fetch", stalledBodyFetch())

    const error = await fetchWithTimeout("https://api.example.com/stalled", { timeout: 5 }, response =>
      response.json(),
    ).catch((e: unknown) => e)

    expect(isAbortError(error)).toBe(true)
  })

  /**
   * THE CALLER CANCEL BUG TEST
   * A caller's own signal must still cancel the request
   */
  it("forwards an abort from the caller's signal (THE CALLER CANCEL BUG)", async () => {
    let seen: AbortSignal | undefined
    const fetchMock = vi.fn<typeof fetch>(async (_input, init) => {
      seen = init?.signal ?? undefined
      return new Response("ok")
    })
    vi.stubGlobal("fetch", fetchMock)
    const caller = new AbortController()

    const pending = fetchWithTimeout("https://api.example.com/v1", { signal: caller.signal }, async () => undefined)
    caller.abort()
    await pending

    expect(seen?.aborted).toBe(true)
  })
})

describe("readErrorMessage", () => {
  it("prefers a JSON message field", async () => {
    const response = new Response(JSON.stringify({ message: "quota exceeded" }), { status: 429 })

    await expect(readErrorMessage(response)).resolves.toBe("quota exceeded")
  })

  it("reads the provider's capitalized Message field", async () => {
    const response = new Response(JSON.stringify({ Message: "InvalidParameter" }), { status: 400 })

    await expect(readErrorMessage(response)).resolves.toBe("InvalidParameter")
  })

  it("falls back to the raw body", async () => {
    const response = new Response("Bad Gateway from edge", { status: 502 })

    await expect(readErrorMessage(response)).resolves.toBe("Bad Gateway from edge")
  })

  it("falls back to the status line for an empty body", async () => {
    const response = new Response(null, { status: 503, statusText: "Service Unavailable" })

    await expect(readErrorMessage(response)).resolves.toBe("HTTP 503: Service Unavailable")
  })

  /**
   * THE HTML ERROR PAGE BUG TEST
   * A full HTML error page must not flood the tool result
   */
  it("truncates long bodies (THE HTML ERROR PAGE BUG)", async () => {
    const response = new Response("x".repeat(600), { status: 500 })

    const message = await readErrorMessage(response)

    expect(message).toBe(`${"x".repeat(500)}…`)
  })
})

describe("tool results", () => {
  it("prefixes success text and appends the data as JSON", () => {
    const result = successResult("Done", { success: true, url: "https://abc.edgeone.app" })

    expect(result).toEqual({
      content: [
        { type: "text", text: "✓ Done" },
        { type: "text", text: JSON.stringify({ success: true, url: "https://abc.edgeone.app" }, null, 2) },
      ],
      isError: false,
    })
  })

  it("omits the JSON block when there is no data", () => {
    expect(successResult("Done").content).toEqual([{ type: "text", text: "✓ Done" }])
  })

  it("carries the error code in the JSON block", () => {
    const result = deployErrorResult(DeployError.projectNotFound("my-site"), "zip_deployment")

    expect(result.isError).toBe(true)
    expect(result.content[0]?.text).toBe("✗ Project my-site not found")
    expect(JSON.parse(result.content[1]?.text ?? "null")).toEqual({
      success: false,
      error: "Project my-site not found",
      code: "PROJECT_NOT_FOUND",
      type: "zip_deployment",
    })
  })
})
