/**
 * ZIP deployment against EdgeOne Pages
 *
 * Flow:
 * 1. Resolve the API endpoint that accepts the token
 * 2. Get temporary COS credentials (existing project or new project name)
 * 3. Upload the archive
 * 4. Reuse the configured project or create one
 * 5. Create the deployment
 * 6. Poll until the deployment leaves the "Process" state
 * 7. Resolve the public URL (verified custom domain or signed preview URL)
 */

import { type ErrorLogger, errorLogger } from "@edgeone-deploy/error-logger"
import { DeployError } from "../../lib/deploy-error.js"
import { type ArchiveUploader, createCosUploader, uploadKey } from "./cos-uploader.js"
import { PagesApiClient } from "./pages-api-client.js"
import type { DeployResult, PagesDeployment, PagesEnvironment, PagesProject } from "./types.js"

export interface ZipDeployerOptions {
  apiToken: string
  /** Existing project to update; unset creates a new project per deploy */
  projectName?: string
  apiBaseUrl?: string
  requestTimeoutMs?: number
  pollIntervalMs?: number
  maxPollAttempts?: number
  uploader?: ArchiveUploader
  logger?: ErrorLogger
  /** Clock for temp project names */
  now?: () => number
}

export interface ZipArchive {
  filename: string
  data: Buffer
}

const sleep = (ms: number) => new Promise(r => setTimeout(r, ms))

export function tempProjectName(now: number): string {
  return `pages-upload-${Math.floor(now / 1000)}`
}

export class ZipDeployer {
  private readonly client: PagesApiClient
  private readonly projectName: string | undefined
  private readonly tempName: string
  private readonly pollIntervalMs: number
  private readonly maxPollAttempts: number
  private readonly uploader: ArchiveUploader
  private readonly logger: ErrorLogger

  constructor(options: ZipDeployerOptions) {
    this.logger = (options.logger ?? errorLogger).withContext({ component: "zip-deployer" })
    this.client = new PagesApiClient(options.apiToken, {
      baseUrl: options.apiBaseUrl,
      timeout: options.requestTimeoutMs,
      logger: options.logger,
    })
    this.projectName = options.projectName || undefined
    this.tempName = tempProjectName((options.now ?? Date.now)())
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000
    this.maxPollAttempts = options.maxPollAttempts ?? 60
    this.uploader = options.uploader ?? createCosUploader({ timeout: options.requestTimeoutMs })
  }

  async deploy(archive: ZipArchive, environment: PagesEnvironment = "Production"): Promise<DeployResult> {
    await this.client.resolveBaseUrl()

    const existing = await this.findConfiguredProject()

    const token = await this.client.getCosTempToken(
      existing ? { projectId: existing.ProjectId } : { projectName: this.tempName },
    )
    const key = await this.uploader.upload(token, uploadKey(token, archive.filename), archive.data)
    await this.logger.info("Archive uploaded", { operation: "upload", bucket: token.Bucket, key })

    const projectId = existing?.ProjectId ?? (await this.client.createProject(this.tempName))

    const deploymentId = await this.client.createDeployment({ projectId, targetPath: key, environment })
    await this.logger.info("Deployment created", { operation: "create", projectId, deploymentId, environment })

    const deployment = await this.waitForDeployment(projectId, deploymentId)
    return { url: await this.resolveUrl(deployment, projectId, environment) }
  }

  /**
   * @throws DeployError PROJECT_NOT_FOUND when a project name is configured but absent
   */
  private async findConfiguredProject(): Promise<PagesProject | undefined> {
    if (!this.projectName) return undefined

    const project = await this.client.findProjectByName(this.projectName)
    if (!project) {
      throw DeployError.projectNotFound(this.projectName)
    }
    return project
  }

  private async waitForDeployment(projectId: string, deploymentId: string): Promise<PagesDeployment> {
    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      const deployments = await this.client.describeDeployments(projectId)
      const deployment = deployments.find(d => d.DeploymentId === deploymentId)
      if (!deployment) {
        throw DeployError.upstream(`Deployment ${deploymentId} not found`)
      }

      if (deployment.Status !== "Process") {
        return deployment
      }

      if (attempt < this.maxPollAttempts) {
        await sleep(this.pollIntervalMs)
      }
    }

    throw DeployError.timeout()
  }

  private async resolveUrl(deployment: PagesDeployment, projectId: string, environment: PagesEnvironment) {
    if (deployment.Status !== "Success") {
      throw DeployError.upstream(`Deployment failed with status: ${deployment.Status}`)
    }

    const [project] = await this.client.describeProjects({ projectId })
    if (!project) {
      throw DeployError.upstream("Failed to get project details")
    }

    // Production traffic goes to a verified custom domain when one exists
    if (environment === "Production") {
      const verified = project.CustomDomains?.find(d => d.Status === "Pass")
      if (verified) {
        return `https://${verified.Domain}`
      }
    }

    const domain = deployment.PreviewUrl?.replace(/^https?:\/\//, "").replace(/\/+$/, "") || project.PresetDomain
    if (!domain) {
      throw DeployError.upstream("Failed to get deployment domain")
    }

    const { token, timestamp } = await this.client.getEncipherToken(domain)
    return `https://${domain}?eo_token=${encodeURIComponent(token)}&eo_time=${encodeURIComponent(timestamp)}`
  }
}
