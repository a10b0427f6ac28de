/**
 * Utility exports
 */

// Document utilities
export { parseFrontmatter } from "./parse-frontmatter";
export { renderMarkdown } from "./render-markdown";
export { buildBreadcrumbs, renderBreadcrumbs } from "./breadcrumbs";
export {
  substituteTokens,
  formatDateToken,
  BUILT_IN_TOKENS,
} from "./substitute-tokens";
export { rewriteAssetReferences } from "./rewrite-asset-references";
export type { RewriteOptions } from "./rewrite-asset-references";

// Path/string utilities
export { toPosixPath, escapeHtml, upLevels, isInside } from "./string";

// Filesystem utilities
export { fileExists, isDirectory, writeOutput, copyOutput } from "./fs";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Errors
export {
  FrontmatterError,
  TemplateNotFoundError,
  TemplateRegistryError,
} from "./errors";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./conversion-tracker";
export { TemplateRegistry } from "./template-registry";
export { RebuildScheduler } from "./rebuild-scheduler";
export type { RebuildSchedulerOptions } from "./rebuild-scheduler";
