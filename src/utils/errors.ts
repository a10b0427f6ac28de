/**
 * Error types raised by the build pipeline
 */

/**
 * The YAML header block at the top of a markdown file could not be parsed
 */
export class FrontmatterError extends Error {
  name = "FrontmatterError";
}

/**
 * A page names a template that is not in the registry
 */
export class TemplateNotFoundError extends Error {
  name = "TemplateNotFoundError";

  constructor(
    readonly templateName: string,
    available: string[],
  ) {
    const known = available.length > 0 ? available.join(", ") : "none";
    super(`Template "${templateName}" not found (available: ${known})`);
  }
}

/**
 * The templates folder is missing or unreadable; aborts the whole run
 */
export class TemplateRegistryError extends Error {
  name = "TemplateRegistryError";
}
