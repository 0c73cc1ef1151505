export { runProcess } from "./process.js";
export { buildSkill, createBuildJob } from "./build.js";
export { introspectCommands, introspectBinary, binaryHelpSource, type IntrospectOptions } from "./introspect.js";
export { deploySkill, createDeployJob, type DeployOptions } from "./deploy.js";
export type {
  BuildJob,
  BuildResult,
  DeployJob,
  DeployResult,
  HelpSource,
  ProcessResult,
  RunProcessOptions
} from "./types.js";
