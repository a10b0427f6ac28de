/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const TemplatesConfigSchema = z.object({
  // Folder under the input root holding the page templates
  directory: z.string().min(1),
  // Folder under the output root receiving the template assets
  assetDirectory: z.string().min(1),
  // Template used by pages without a `template` frontmatter key
  defaultTemplate: z.string().min(1),
});

export const MarkdownConfigSchema = z.object({
  gfm: z.boolean(),
  breaks: z.boolean(),
});

export const TokensConfigSchema = z.object({
  // Prepended to $$DOC_DATE$$ when the page has a date (e.g. "Written ")
  datePrefix: z.string(),
});

export const BreadcrumbsConfigSchema = z.object({
  rootLabel: z.string(),
  separator: z.string(),
});

export const FilesConfigSchema = z.object({
  // Extra glob patterns (relative to the input root) excluded from the walk
  ignore: z.array(z.string()),
});

export const WatchConfigSchema = z.object({
  debounce: z.number().int().nonnegative(), // In milliseconds
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: z.string(),
  output: z.string(),
  templates: TemplatesConfigSchema,
  markdown: MarkdownConfigSchema,
  tokens: TokensConfigSchema,
  breadcrumbs: BreadcrumbsConfigSchema,
  files: FilesConfigSchema,
  watch: WatchConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    templates: TemplatesConfigSchema.partial().optional(),
    markdown: MarkdownConfigSchema.partial().optional(),
    tokens: TokensConfigSchema.partial().optional(),
    breadcrumbs: BreadcrumbsConfigSchema.partial().optional(),
    files: FilesConfigSchema.partial().optional(),
    watch: WatchConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type TokensConfig = z.infer<typeof TokensConfigSchema>;
export type BreadcrumbsConfig = z.infer<typeof BreadcrumbsConfigSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type WatchConfig = z.infer<typeof WatchConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
