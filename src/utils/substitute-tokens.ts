/**
 * Token Substitutor
 * Replaces the built-in $$TOKEN$$ placeholders of a template
 */

import type { TokenValues } from "../types";

export const BUILT_IN_TOKENS = [
  "$$BREADCRUMBS$$",
  "$$DOC_TITLE$$",
  "$$DOC_CONTENT$$",
  "$$DOC_DATE$$",
] as const;

const TOKEN_VALUES = new Map<string, keyof TokenValues>([
  ["BREADCRUMBS", "breadcrumbs"],
  ["DOC_TITLE", "title"],
  ["DOC_CONTENT", "content"],
  ["DOC_DATE", "date"],
]);

const TOKEN_PATTERN = /\$\$(BREADCRUMBS|DOC_TITLE|DOC_CONTENT|DOC_DATE)\$\$/g;

/**
 * Replace every built-in token in one pass over the template.
 * Inserted values are not scanned again, so a title that happens to contain
 * "$$DOC_CONTENT$$" is written out literally.
 */
export function substituteTokens(
  template: string,
  values: TokenValues,
): string {
  return template.replace(TOKEN_PATTERN, (match, name: string) => {
    const key = TOKEN_VALUES.get(name);
    return key ? values[key] : match;
  });
}

/**
 * Format the $$DOC_DATE$$ value
 *
 * @example
 * formatDateToken("2024-01-01", "Written ") // "Written 2024-01-01"
 * formatDateToken(undefined, "Written ") // ""
 */
export function formatDateToken(
  date: string | undefined,
  prefix: string,
): string {
  return date ? `${prefix}${date}` : "";
}
