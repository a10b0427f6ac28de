/**
 * Conversion Tracker
 * Unified tracking for stats and issues of a single build run
 */

import { ZodError } from "zod";
import { FrontmatterError, TemplateNotFoundError } from "./errors";

// ============================================================================
// Types
// ============================================================================

// Stage a file was in when it failed
export type FileStage = "read" | "parse" | "write";

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "read-error"
  | "parse-error"
  | "template-error"
  | "write-error"
  | "output-conflict";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Page counts
  totalPages: number;
  renderedPages: number;

  // Asset counts
  totalAssets: number;
  copiedAssets: number;
  copiedTemplateAssets: number;

  failedFiles: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.map(String).join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFileError(
  error: unknown,
  stage: FileStage = "parse",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof TemplateNotFoundError) {
    return { reason: "template-error", details };
  }
  if (error instanceof FrontmatterError) {
    return { reason: "parse-error", details };
  }

  // Filesystem errors carry a code; the stage tells reads from writes
  if (error instanceof Error && "code" in error) {
    return {
      reason: stage === "write" ? "write-error" : "read-error",
      details,
    };
  }

  switch (stage) {
    case "read":
      return { reason: "read-error", details };
    case "write":
      return { reason: "write-error", details };
    case "parse":
      return { reason: "parse-error", details };
  }
}

// ============================================================================
// Tracker - Main tracker class
// ============================================================================

export class Tracker {
  private totalPages = 0;
  private renderedPages = 0;
  private totalAssets = 0;
  private copiedAssets = 0;
  private copiedTemplateAssets = 0;
  private failedFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotals(pages: number, assets: number): void {
    this.totalPages = pages;
    this.totalAssets = assets;
  }

  incrementRendered(): void {
    this.renderedPages++;
  }

  incrementCopied(): void {
    this.copiedAssets++;
  }

  incrementTemplateAssets(): void {
    this.copiedTemplateAssets++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(
    path: string,
    error: unknown,
    type: IssueType,
    stage?: FileStage,
  ): Issue {
    const issue: Issue =
      type === "file"
        ? { type: "file", path, ...mapFileError(error, stage) }
        : { type: "resource", path, ...mapResourceError(error) };
    this.issues.push(issue);
    return issue;
  }

  /**
   * Track a file whose output is replaced by another one. Not a failure
   */
  trackConflict(path: string, details: string): FileIssue {
    const issue: FileIssue = {
      type: "file",
      path,
      reason: "output-conflict",
      details,
    };
    this.issues.push(issue);
    return issue;
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues(type: "file"): FileIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  /**
   * True when at least one page or asset could not be produced
   */
  hasFailures(): boolean {
    return this.failedFiles > 0;
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalPages: this.totalPages,
      renderedPages: this.renderedPages,
      totalAssets: this.totalAssets,
      copiedAssets: this.copiedAssets,
      copiedTemplateAssets: this.copiedTemplateAssets,
      failedFiles: this.failedFiles,
      issues: this.issues,
      duration,
    };
  }
}
