/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { FileDescriptor } from "./files";
import type { Tracker } from "../utils/conversion-tracker";
import type { Logger } from "../utils/logger";
import type { TemplateRegistry } from "../utils/template-registry";

// Re-export types from conversion-tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  FileStage,
  ProcessingStats,
} from "../utils/conversion-tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  logger: Logger;

  // Unified tracking for stats and errors (one per run)
  tracker: Tracker;

  dryRun?: boolean;
  verbose?: boolean;

  files?: FileDescriptor[]; // Pages and assets (flat list, sorted) - written by scanner
  templates?: TemplateRegistry; // Read-only once loaded - written by template loader
}
