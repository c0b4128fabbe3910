export type DeployErrorCode =
  | "MISSING_CREDENTIAL"
  | "INVALID_FILE"
  | "SIZE_LIMIT_EXCEEDED"
  | "INVALID_TOKEN"
  | "PROJECT_NOT_FOUND"
  | "DEPLOYMENT_TIMEOUT"
  | "UPSTREAM_ERROR"

export class DeployError extends Error {
  readonly code: DeployErrorCode

  constructor(code: DeployErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "DeployError"
    this.code = code
  }

  static missingCredential(): DeployError {
    return new DeployError("MISSING_CREDENTIAL", "API token is required for ZIP deployment")
  }

  static invalidFile(message = "Only ZIP files are supported for deployment"): DeployError {
    return new DeployError("INVALID_FILE", message)
  }

  static sizeLimitExceeded(detail: string): DeployError {
    return new DeployError("SIZE_LIMIT_EXCEEDED", detail)
  }

  static invalidToken(cause?: unknown): DeployError {
    return new DeployError("INVALID_TOKEN", "Invalid EdgeOne Pages API token", { cause })
  }

  static projectNotFound(projectName: string): DeployError {
    return new DeployError("PROJECT_NOT_FOUND", `Project ${projectName} not found`)
  }

  static timeout(cause?: unknown): DeployError {
    return new DeployError("DEPLOYMENT_TIMEOUT", "Deployment timeout", { cause })
  }

  static upstream(message: string, cause?: unknown): DeployError {
    return new DeployError("UPSTREAM_ERROR", message, { cause })
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")
}

/**
 * Normalize anything thrown during a deployment into a DeployError.
 * Aborted requests count as timeouts; everything else is an upstream failure.
 */
export function toDeployError(error: unknown): DeployError {
  if (error instanceof DeployError) {
    return error
  }
  if (isAbortError(error)) {
    return DeployError.timeout(error)
  }
  const message = error instanceof Error ? error.message : String(error)
  return DeployError.upstream(message, error)
}
