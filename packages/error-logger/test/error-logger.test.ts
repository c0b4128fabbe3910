import { describe, expect, it, vi } from "vitest"
import { createErrorLogger, type ErrorLogEntry, redact } from "../src/index.js"

function collectingLogger() {
  const entries: ErrorLogEntry[] = []
  const logger = createErrorLogger(entry => {
    entries.push(entry)
  })
  return { entries, logger }
}

describe("redact", () => {
  it("masks bearer tokens", () => {
    expect(redact("Authorization: Bearer test-secret")).toBe("Authorization: Bearer [redacted]")
  })

  it("masks signed preview tokens but keeps the rest of the URL", () => {
    expect(redact("https://site-1.edgeone.app?eo_token=abc123&eo_time=1700000000")).toBe(
      "https://site-1.edgeone.app?eo_token=[redacted]&eo_time=1700000000",
    )
  })

  it("leaves ordinary text alone", () => {
    expect(redact("Deployment completed")).toBe("Deployment completed")
  })
})

describe("createErrorLogger", () => {
  it("writes level, message and timestamp to the sink", async () => {
    const { entries, logger } = collectingLogger()

    await logger.info("Starting deployment")

    expect(entries).toHaveLength(1)
    expect(entries[0]?.level).toBe("info")
    expect(entries[0]?.message).toBe("Starting deployment")
    expect(entries[0]?.context).toBeUndefined()
    expect(Number.isNaN(Date.parse(entries[0]?.timestamp ?? ""))).toBe(false)
  })

  it("passes errors through for warn/error/fatal", async () => {
    const { entries, logger } = collectingLogger()
    const err = new Error("boom")

    await logger.error("Deployment failed", err, { component: "deploy-zip" })

    expect(entries[0]?.error).toBe(err)
    expect(entries[0]?.context).toEqual({ component: "deploy-zip" })
  })

  it("redacts credential-looking context keys", async () => {
    const { entries, logger } = collectingLogger()

    await logger.debug("Calling provider", { apiToken: "test-secret", projectName: "my-site" })

    expect(entries[0]?.context).toEqual({ apiToken: "[redacted]", projectName: "my-site" })
  })

  it("withContext merges bound context with per-call context", async () => {
    const { entries, logger } = collectingLogger()
    const scoped = logger.withContext({ component: "deploy-zip", environment: "Preview" })

    await scoped.warn("Slow deployment", undefined, { deploymentId: "dep-1", environment: "Production" })

    expect(entries[0]?.context).toEqual({
      component: "deploy-zip",
      environment: "Production",
      deploymentId: "dep-1",
    })
  })

  it("default sink writes JSON to stderr with the error serialized", async () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {})
    const logger = createErrorLogger()

    await logger.error("Upload failed", new Error("Bearer test-secret rejected"))

    expect(consoleSpy).toHaveBeenCalledOnce()
    const [prefix, json] = consoleSpy.mock.calls[0] ?? []
    expect(prefix).toBe("[edgeone-deploy]")
    const payload = JSON.parse(String(json))
    expect(payload.level).toBe("error")
    expect(payload.error).toEqual({ name: "Error", message: "Bearer [redacted] rejected" })

    consoleSpy.mockRestore()
  })
})
