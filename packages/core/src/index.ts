export * from "./types.js";
export {
  parseManifest,
  normalizeManifest,
  skillDescription,
  firstMissingRequired,
  MANIFEST_FILE
} from "./manifest.js";
export { lintManifest, lintSkill } from "./lint.js";
export { discoverSkills, loadSkill } from "./registry.js";
export {
  parseSubcommands,
  parseDescription,
  parseUsage,
  parseFlags,
  parseFlagLine,
  formatFlagNames,
  FLAG_TYPES
} from "./help-parser.js";
export {
  renderSkillDocs,
  renderCommandDocs,
  renderCommand,
  renderFrontmatter,
  renderSkeleton,
  renderJsonTable,
  stripFrontmatter,
  tablePlaceholder,
  PLACEHOLDERS,
  type RenderDocsInput
} from "./docs.js";
export { renderEnvFile, renderWrapperScript, hasLineBreak, ENV_FILE_HEADER } from "./env-file.js";
export {
  resolveDeployPath,
  deployBinDir,
  deployedBinaryPath,
  envFilePath,
  docsPath,
  wrapperPath,
  stagedBinaryPath,
  ENV_FILE,
  type DeployTarget
} from "./layout.js";
export {
  loadConfig,
  findProjectRoot,
  SkillforgeConfigSchema,
  CONFIG_FILE,
  DEFAULT_BUILD_COMMAND,
  type ResolvedConfig,
  type SkillforgeConfig,
  type ConfigOverrides
} from "./config.js";
export {
  createLogger,
  configureLogging,
  getLogLevel,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogSink
} from "./logger.js";
export { safeResolve } from "./utils/pathSafe.js";
