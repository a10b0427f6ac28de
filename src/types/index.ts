/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  TemplatesConfig,
  MarkdownConfig,
  TokensConfig,
  BreadcrumbsConfig,
  FilesConfig,
  WatchConfig,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Files
export type {
  FileDescriptor,
  PageDescriptor,
  AssetDescriptor,
  Frontmatter,
  ParsedDocument,
  Template,
  TemplateAsset,
  BreadcrumbEntry,
  TokenValues,
} from "./files";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  FileStage,
  ProcessingStats,
} from "./context";
