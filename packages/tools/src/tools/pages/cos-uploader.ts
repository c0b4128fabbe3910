/**
 * Object-storage upload for ZIP deployments
 *
 * The Pages API hands out short-lived COS credentials scoped to a
 * TargetPath; the archive goes straight to that bucket and the deployment
 * then references it by key.
 */

import COS from "cos-nodejs-sdk-v5"
import { DEFAULT_TIMEOUT_MS } from "../../lib/api-client.js"
import { DeployError } from "../../lib/deploy-error.js"
import type { CosTempToken } from "./types.js"

export interface ArchiveUploader {
  /** Store `body` under `key` and return the key */
  upload(token: CosTempToken, key: string, body: Buffer): Promise<string>
}

export function uploadKey(token: CosTempToken, filename: string): string {
  const base = filename.split(/[\\/]/).pop() || "upload.zip"
  return `${token.TargetPath.replace(/\/+$/, "")}/${base}`
}

export interface CosUploaderOptions {
  /** Upload deadline in ms (default: 30s) */
  timeout?: number
}

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT", "ECONNABORTED"])

export function toUploadError(err: { code?: string; message?: unknown }): DeployError {
  const detail = String(err.message || err.code || "unknown error")
  if ((err.code && TIMEOUT_CODES.has(err.code)) || /timed? ?out/i.test(detail)) {
    return DeployError.timeout(err)
  }
  return DeployError.upstream(`Failed to upload archive: ${detail}`, err)
}

export function createCosUploader(options: CosUploaderOptions = {}): ArchiveUploader {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS

  return {
    upload(token, key, body) {
      const cos = new COS({
        SecretId: token.Credentials.TmpSecretId,
        SecretKey: token.Credentials.TmpSecretKey,
        SecurityToken: token.Credentials.Token,
        Timeout: timeout,
      })

      return new Promise((resolve, reject) => {
        cos.putObject(
          {
            Bucket: token.Bucket,
            Region: token.Region,
            Key: key,
            Body: body,
          },
          err => {
            if (err) {
              reject(toUploadError(err))
              return
            }
            resolve(key)
          },
        )
      })
    },
  }
}
