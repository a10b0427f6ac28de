/**
 * File-related type definitions
 */

interface BaseFileDescriptor {
  sourcePath: string; // Absolute path to the source file
  relativePath: string; // Path from the input root, always with "/" separators
  outputPath: string; // Absolute target path under the output root
}

export interface PageDescriptor extends BaseFileDescriptor {
  kind: "page";
  depth: number; // Number of folders between the input root and the page
}

export interface AssetDescriptor extends BaseFileDescriptor {
  kind: "asset";
}

export type FileDescriptor = PageDescriptor | AssetDescriptor;

/**
 * Frontmatter values are normalized to strings by the parser.
 * Keys other than the recognized three are kept but unused.
 */
export interface Frontmatter {
  title?: string;
  date?: string;
  template?: string;
  [key: string]: string | undefined;
}

export interface ParsedDocument {
  data: Frontmatter;
  body: string;
}

export interface Template {
  readonly name: string; // File stem, e.g. "page" for page.html
  readonly sourcePath: string;
  readonly content: string;
}

export interface TemplateAsset {
  readonly sourcePath: string;
  readonly relativePath: string; // Relative to the templates folder
  readonly destRelativePath: string; // Relative to the output root
}

export interface BreadcrumbEntry {
  label: string;
  path: string; // Folder (or page) path from the input root, e.g. "a/b"
  link: string; // Relative to the page's own output folder
}

/**
 * Per-page values for the built-in tokens
 */
export interface TokenValues {
  title: string;
  date: string;
  content: string;
  breadcrumbs: string;
}
