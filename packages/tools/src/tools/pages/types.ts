import { z } from "zod"

export const PAGES_ENVIRONMENTS = ["Production", "Preview"] as const

export type PagesEnvironment = (typeof PAGES_ENVIRONMENTS)[number]

export interface DeployResult {
  url: string
}

export interface ZipDeployResult extends DeployResult {
  success: true
  environment: PagesEnvironment
  type: "zip_deployment"
  message: string
}

// ============================================================
// PAGES API RESPONSES
// Only the fields the deploy flow reads; providers add more.
// ============================================================

export const apiEnvelopeSchema = z.object({
  Code: z.number(),
  Message: z.string().optional(),
  Data: z.object({ Response: z.record(z.unknown()).nullish() }).passthrough().nullish(),
})

export type ApiEnvelope = z.infer<typeof apiEnvelopeSchema>

export const customDomainSchema = z
  .object({
    Domain: z.string(),
    Status: z.string().optional(),
  })
  .passthrough()

export const pagesProjectSchema = z
  .object({
    ProjectId: z.string(),
    Name: z.string().optional(),
    PresetDomain: z.string().optional(),
    CustomDomains: z.array(customDomainSchema).nullish(),
  })
  .passthrough()

export type PagesProject = z.infer<typeof pagesProjectSchema>

export const pagesDeploymentSchema = z
  .object({
    DeploymentId: z.string(),
    Status: z.string(),
    PreviewUrl: z.string().optional(),
  })
  .passthrough()

export type PagesDeployment = z.infer<typeof pagesDeploymentSchema>

export const cosTempTokenSchema = z.object({
  Bucket: z.string(),
  Region: z.string(),
  TargetPath: z.string(),
  Credentials: z.object({
    TmpSecretId: z.string(),
    TmpSecretKey: z.string(),
    Token: z.string(),
  }),
})

export type CosTempToken = z.infer<typeof cosTempTokenSchema>

export const encipherTokenSchema = z.object({
  Token: z.string().min(1),
  Timestamp: z.union([z.number(), z.string().min(1)]),
})
