/**
 * ZIP archive checks run before anything is uploaded.
 *
 * The provider enforces the same limits server-side; checking locally turns
 * an opaque upstream rejection into a SizeLimitExceeded/InvalidFile error and
 * skips the upload entirely.
 */

import AdmZip from "adm-zip"
import { DeployError } from "./deploy-error.js"

const MIB = 1024 * 1024

export const ZIP_LIMITS = {
  /** Whole archive */
  MAX_ARCHIVE_BYTES: 50 * MIB,
  /** Any single entry, uncompressed */
  MAX_ENTRY_BYTES: 25 * MIB,
} as const

export interface ZipLimits {
  maxArchiveBytes: number
  maxEntryBytes: number
}

export const DEFAULT_ZIP_LIMITS: ZipLimits = {
  maxArchiveBytes: ZIP_LIMITS.MAX_ARCHIVE_BYTES,
  maxEntryBytes: ZIP_LIMITS.MAX_ENTRY_BYTES,
}

export interface ZipSummary {
  fileCount: number
  totalUncompressedBytes: number
}

export function hasZipExtension(filename: string): boolean {
  return filename.trim().toLowerCase().endsWith(".zip")
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / MIB).toFixed(1)}MB`
}

export function assertArchiveSize(bytes: number, limits: ZipLimits = DEFAULT_ZIP_LIMITS): void {
  if (bytes > limits.maxArchiveBytes) {
    throw DeployError.sizeLimitExceeded(
      `ZIP file is ${formatMegabytes(bytes)}, which exceeds the ${formatMegabytes(limits.maxArchiveBytes)} limit`,
    )
  }
}

/**
 * Parse the archive's central directory and enforce per-entry limits.
 *
 * @throws DeployError INVALID_FILE when the bytes are not a ZIP
 * @throws DeployError SIZE_LIMIT_EXCEEDED when the archive or an entry is too large
 */
export function validateZipArchive(data: Buffer, limits: ZipLimits = DEFAULT_ZIP_LIMITS): ZipSummary {
  assertArchiveSize(data.length, limits)

  let entries: AdmZip.IZipEntry[]
  try {
    entries = new AdmZip(data).getEntries()
  } catch (error) {
    throw new DeployError("INVALID_FILE", DeployError.invalidFile().message, { cause: error })
  }

  const files = entries.filter(entry => !entry.isDirectory)
  if (files.length === 0) {
    throw new DeployError("INVALID_FILE", "ZIP archive contains no files")
  }

  let totalUncompressedBytes = 0

  for (const entry of files) {
    const size = entry.header.size
    if (size > limits.maxEntryBytes) {
      throw DeployError.sizeLimitExceeded(
        `${entry.entryName} is ${formatMegabytes(size)}, which exceeds the ${formatMegabytes(limits.maxEntryBytes)} per-file limit`,
      )
    }
    totalUncompressedBytes += size
  }

  return { fileCount: files.length, totalUncompressedBytes }
}
