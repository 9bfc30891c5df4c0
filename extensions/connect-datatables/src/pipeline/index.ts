export {
  DeploymentPipeline,
  createDeploymentPipeline,
  type DeployOptions,
  type DeploymentReport,
  type TableDeploymentResult,
  type ValuesOutcome,
} from "./deploy.js";
export { verifyTables, VALUE_SAMPLE_SIZE, type TableVerification } from "./verify.js";
export { cleanupTables, type TableCleanupResult } from "./cleanup.js";
export {
  createPipelineServices,
  type AttributeProvisioner,
  type PipelineServices,
  type TableProvisioner,
  type ValueService,
} from "./services.js";
