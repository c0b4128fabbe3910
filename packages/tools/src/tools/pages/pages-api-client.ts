/**
 * EdgeOne Pages management API client
 *
 * Action-style API: every call is a POST of `{ Action, ...params }` to a single
 * endpoint with a bearer token. A call succeeds only when the HTTP status is
 * 2xx AND the envelope's `Code` is 0.
 */

import { PAGES_API_BASE_URLS } from "@edgeone-deploy/env"
import type { z } from "zod"
import { type ErrorLogger, errorLogger } from "@edgeone-deploy/error-logger"
import { DEFAULT_TIMEOUT_MS, fetchWithTimeout, readErrorMessage } from "../../lib/api-client.js"
import { DeployError, isAbortError } from "../../lib/deploy-error.js"
import {
  apiEnvelopeSchema,
  type CosTempToken,
  cosTempTokenSchema,
  encipherTokenSchema,
  type PagesDeployment,
  pagesDeploymentSchema,
  type PagesEnvironment,
  type PagesProject,
  pagesProjectSchema,
} from "./types.js"

const PROBE_TIMEOUT_MS = 10_000

const AUTH_FAILURE = /AuthFailure|Unauthori[sz]ed|invalid.*token|token.*invalid/i

export interface PagesApiClientOptions {
  /** Skip probing and use this endpoint */
  baseUrl?: string
  /** Endpoints tried in order when baseUrl is unset */
  candidateBaseUrls?: readonly string[]
  /** Per-request deadline in ms (default: 30s) */
  timeout?: number
  logger?: ErrorLogger
}

export type ApiParams = Record<string, unknown> & { Action: string }

export class PagesApiClient {
  private baseUrl: string | undefined
  private readonly candidates: readonly string[]
  private readonly timeout: number
  private readonly logger: ErrorLogger

  constructor(
    private readonly apiToken: string,
    options: PagesApiClientOptions = {},
  ) {
    this.baseUrl = options.baseUrl
    this.candidates = options.candidateBaseUrls ?? PAGES_API_BASE_URLS
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS
    this.logger = (options.logger ?? errorLogger).withContext({ component: "pages-api" })
  }

  /**
   * Find the endpoint that accepts this token.
   * Tokens are region-bound, so a token only authenticates against one of the
   * candidate endpoints.
   *
   * @throws DeployError INVALID_TOKEN when no endpoint accepts the token
   */
  async resolveBaseUrl(): Promise<string> {
    if (this.baseUrl) return this.baseUrl

    let lastError: unknown
    for (const candidate of this.candidates) {
      try {
        await this.post(candidate, { Action: "DescribePagesProjects", PageNumber: 1, PageSize: 10 }, PROBE_TIMEOUT_MS)
        this.baseUrl = candidate
        return candidate
      } catch (error) {
        lastError = error
        await this.logger.debug("API endpoint rejected token", { operation: "probe", endpoint: candidate })
      }
    }

    throw DeployError.invalidToken(lastError)
  }

  /**
   * Call an action and return `Data.Response`
   */
  async request(params: ApiParams): Promise<Record<string, unknown>> {
    const baseUrl = await this.resolveBaseUrl()
    return this.post(baseUrl, params, this.timeout)
  }

  async describeProjects(filter: { projectId?: string; projectName?: string }): Promise<PagesProject[]> {
    const filters: Array<{ Name: string; Values: string[] }> = []
    if (filter.projectId) filters.push({ Name: "ProjectId", Values: [filter.projectId] })
    if (filter.projectName) filters.push({ Name: "Name", Values: [filter.projectName] })

    const response = await this.request({
      Action: "DescribePagesProjects",
      Filters: filters,
      Offset: 0,
      Limit: 10,
      OrderBy: "CreatedOn",
    })

    return parseList(response.Projects, pagesProjectSchema, "DescribePagesProjects")
  }

  async findProjectByName(projectName: string): Promise<PagesProject | undefined> {
    const projects = await this.describeProjects({ projectName })
    return projects[0]
  }

  async createProject(name: string): Promise<string> {
    const response = await this.request({
      Action: "CreatePagesProject",
      Name: name,
      Provider: "Upload",
      Channel: "Custom",
      Area: "global",
    })

    if (typeof response.ProjectId !== "string" || !response.ProjectId) {
      throw DeployError.upstream("Failed to create project")
    }
    return response.ProjectId
  }

  /**
   * Temporary object-storage credentials scoped to one upload.
   * Pass the project id when updating an existing project, or the name a new
   * project will get.
   */
  async getCosTempToken(target: { projectId: string } | { projectName: string }): Promise<CosTempToken> {
    const response = await this.request({
      Action: "DescribePagesCosTempToken",
      ...("projectId" in target ? { ProjectId: target.projectId } : { ProjectName: target.projectName }),
    })

    const parsed = cosTempTokenSchema.safeParse(response)
    if (!parsed.success) {
      throw DeployError.upstream("Failed to get COS token: incomplete credentials in response")
    }
    return parsed.data
  }

  async createDeployment(params: {
    projectId: string
    targetPath: string
    environment: PagesEnvironment
  }): Promise<string> {
    const response = await this.request({
      Action: "CreatePagesDeployment",
      ProjectId: params.projectId,
      ViaMeta: "Upload",
      Provider: "Upload",
      Env: params.environment,
      DistType: "Zip",
      TempBucketPath: params.targetPath,
    })

    if (typeof response.DeploymentId !== "string" || !response.DeploymentId) {
      throw DeployError.upstream("Failed to create deployment")
    }
    return response.DeploymentId
  }

  async describeDeployments(projectId: string): Promise<PagesDeployment[]> {
    const response = await this.request({
      Action: "DescribePagesDeployments",
      ProjectId: projectId,
      Offset: 0,
      Limit: 50,
      OrderBy: "CreatedOn",
      Order: "Desc",
    })

    return parseList(response.Deployments, pagesDeploymentSchema, "DescribePagesDeployments")
  }

  /**
   * Signed access token for a preview domain
   */
  async getEncipherToken(domain: string): Promise<{ token: string; timestamp: string }> {
    const response = await this.request({ Action: "DescribePagesEncipherToken", Text: domain })

    const parsed = encipherTokenSchema.safeParse(response)
    if (!parsed.success) {
      throw DeployError.upstream("Failed to get access token")
    }
    return { token: parsed.data.Token, timestamp: String(parsed.data.Timestamp) }
  }

  private async post(baseUrl: string, params: ApiParams, timeout: number): Promise<Record<string, unknown>> {
    try {
      return await fetchWithTimeout(
        baseUrl,
        {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.apiToken}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(params),
          timeout,
        },
        response => readEnvelope(response, params.Action),
      )
    } catch (error) {
      if (error instanceof DeployError) throw error
      if (isAbortError(error)) throw DeployError.timeout(error)
      const message = error instanceof Error ? error.message : String(error)
      throw DeployError.upstream(`API request failed (${params.Action}): ${message}`, error)
    }
  }
}

async function readEnvelope(response: Response, action: string): Promise<Record<string, unknown>> {
  if (response.status === 401 || response.status === 403) {
    throw DeployError.invalidToken(new Error(`HTTP ${response.status}`))
  }
  if (!response.ok) {
    throw DeployError.upstream(`API error: ${await readErrorMessage(response)}`)
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    if (isAbortError(error)) throw error
    throw DeployError.upstream(`API error: invalid JSON response to ${action}`, error)
  }

  const envelope = apiEnvelopeSchema.safeParse(body)
  if (!envelope.success) {
    throw DeployError.upstream(`API error: unexpected response to ${action}`)
  }

  const { Code, Message } = envelope.data
  if (Code !== 0) {
    const message = Message || "Unknown error"
    if (AUTH_FAILURE.test(message)) {
      throw DeployError.invalidToken(new Error(message))
    }
    throw DeployError.upstream(`API error: ${message}`)
  }

  return envelope.data.Data?.Response ?? {}
}

function parseList<T>(value: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, action: string): T[] {
  if (value === undefined || value === null) return []
  if (!Array.isArray(value)) {
    throw DeployError.upstream(`API error: unexpected response to ${action}`)
  }
  return value.map(item => {
    const parsed = schema.safeParse(item)
    if (!parsed.success) {
      throw DeployError.upstream(`API error: unexpected response to ${action}`)
    }
    return parsed.data
  })
}
