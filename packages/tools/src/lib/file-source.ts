/**
 * Resolve a host file reference to bytes.
 *
 * Hosts hand tools a download URL for files uploaded through the host UI.
 * Local paths are read only when the host names a root directory, and only
 * for files that resolve inside it. Both sources stop reading as soon as the
 * archive limit is passed, so an oversized upload never sits fully in memory.
 */

import { readFile, realpath, stat } from "node:fs/promises"
import { isAbsolute, relative, resolve, sep } from "node:path"
import { fetchWithTimeout, readErrorMessage } from "./api-client.js"
import { DeployError, isAbortError } from "./deploy-error.js"
import { assertArchiveSize, DEFAULT_ZIP_LIMITS, type ZipLimits } from "./zip-validator.js"

export interface FileReference {
  filename: string
  url?: string
  path?: string
}

export interface LoadFileOptions {
  limits?: ZipLimits
  /** Download deadline in ms (default: 30s) */
  timeout?: number
  /** Directory local paths must resolve inside; unset disables local paths */
  localRoot?: string
}

const DOWNLOAD_TIMEOUT_MS = 30_000

export async function loadFileBytes(file: FileReference, options: LoadFileOptions = {}): Promise<Buffer> {
  const limits = options.limits ?? DEFAULT_ZIP_LIMITS

  if (file.path && options.localRoot) {
    return readLocalFile(await resolveInsideRoot(file.path, options.localRoot), file.path, limits)
  }
  if (file.url) {
    return downloadFile(file.url, limits, options.timeout ?? DOWNLOAD_TIMEOUT_MS)
  }
  if (file.path) {
    throw DeployError.invalidFile("Local file paths are not enabled; provide a download URL")
  }
  throw DeployError.upstream("File URL not provided")
}

/**
 * Resolve `path` against `root`, following symlinks on both sides.
 *
 * @throws DeployError INVALID_FILE when the target lies outside root
 */
async function resolveInsideRoot(path: string, root: string): Promise<string> {
  let resolvedRoot: string
  let resolved: string
  try {
    resolvedRoot = await realpath(root)
    resolved = await realpath(resolve(resolvedRoot, path))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw DeployError.upstream(`Failed to read ${path}: ${message}`, error)
  }

  const rel = relative(resolvedRoot, resolved)
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw DeployError.invalidFile(`Path is outside the allowed directory: ${path}`)
  }
  return resolved
}

async function readLocalFile(resolved: string, path: string, limits: ZipLimits): Promise<Buffer> {
  let size: number
  try {
    const info = await stat(resolved)
    if (!info.isFile()) {
      throw DeployError.upstream(`Not a file: ${path}`)
    }
    size = info.size
  } catch (error) {
    if (error instanceof DeployError) throw error
    const message = error instanceof Error ? error.message : String(error)
    throw DeployError.upstream(`Failed to read ${path}: ${message}`, error)
  }

  assertArchiveSize(size, limits)
  return readFile(resolved)
}

async function downloadFile(url: string, limits: ZipLimits, timeout: number): Promise<Buffer> {
  try {
    return await fetchWithTimeout(url, { method: "GET", timeout }, response => readDownload(response, limits))
  } catch (error) {
    if (error instanceof DeployError) throw error
    if (isAbortError(error)) {
      throw DeployError.upstream(`File download timed out after ${timeout / 1000}s`, error)
    }
    const message = error instanceof Error ? error.message : String(error)
    throw DeployError.upstream(`File download failed: ${message}`, error)
  }
}

async function readDownload(response: Response, limits: ZipLimits): Promise<Buffer> {
  if (!response.ok) {
    throw DeployError.upstream(`File download failed: ${await readErrorMessage(response)}`)
  }

  const declared = Number.parseInt(response.headers.get("content-length") ?? "", 10)
  if (Number.isFinite(declared)) {
    assertArchiveSize(declared, limits)
  }

  if (!response.body) {
    const data = Buffer.from(await response.arrayBuffer())
    assertArchiveSize(data.length, limits)
    return data
  }

  const chunks: Buffer[] = []
  let received = 0
  const reader = response.body.getReader()
  try {
    for (;;) {
      const { done, value } = await reader.read()
      if (done) break
      received += value.byteLength
      assertArchiveSize(received, limits)
      chunks.push(Buffer.from(value))
    }
  } catch (error) {
    await reader.cancel().catch(() => undefined)
    throw error
  }

  return Buffer.concat(chunks, received)
}
