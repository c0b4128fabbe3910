/**
 * EdgeOne Pages Tools
 *
 * Available tools:
 * - deploy_html: Publish an HTML document (no credentials)
 * - deploy_zip: Publish a ZIP archive of a static site (API token required)
 */

export {
  createDeployHtmlTool,
  type DeployHtmlOptions,
  type DeployHtmlParams,
  deployHtml,
  deployHtmlParamsSchema,
  deployHtmlTool,
} from "./deploy-html.js"
export {
  createDeployZipTool,
  type DeployZipOptions,
  type DeployZipParams,
  deployZip,
  deployZipParamsSchema,
  deployZipTool,
} from "./deploy-zip.js"
export { deployHtmlContent, getHtmlBaseUrl, type HtmlClientOptions } from "./html-client.js"
export { PagesApiClient, type PagesApiClientOptions } from "./pages-api-client.js"
export {
  type ArchiveUploader,
  type CosUploaderOptions,
  createCosUploader,
  toUploadError,
  uploadKey,
} from "./cos-uploader.js"
export { tempProjectName, type ZipArchive, ZipDeployer, type ZipDeployerOptions } from "./zip-deployer.js"
export {
  type DeployResult,
  PAGES_ENVIRONMENTS,
  type PagesDeployment,
  type PagesEnvironment,
  type PagesProject,
  type ZipDeployResult,
} from "./types.js"
