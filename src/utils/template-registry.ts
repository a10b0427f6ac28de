/**
 * Template Registry
 * Immutable lookup of the templates and template assets of one run
 */

import { TemplateNotFoundError } from "./errors";
import type { Template, TemplateAsset } from "../types";

export class TemplateRegistry {
  private readonly templates: ReadonlyMap<string, Template>;
  private readonly assets: readonly TemplateAsset[];
  private readonly assetPaths: ReadonlySet<string>;

  constructor(templates: Template[], assets: TemplateAsset[]) {
    this.templates = new Map(
      templates.map(
        (template) => [template.name, Object.freeze(template)] as const,
      ),
    );
    this.assets = Object.freeze(assets.map((asset) => Object.freeze(asset)));
    this.assetPaths = new Set(assets.map((asset) => asset.relativePath));
    Object.freeze(this);
  }

  /**
   * Find a template by exact name
   */
  lookup(name: string): Template | undefined {
    return this.templates.get(name);
  }

  /**
   * Find a template by exact name, throwing when it is not registered
   */
  require(name: string): Template {
    const template = this.lookup(name);
    if (!template) {
      throw new TemplateNotFoundError(name, this.names());
    }
    return template;
  }

  names(): string[] {
    return [...this.templates.keys()].sort();
  }

  /**
   * Files to copy into the shared output asset folder
   */
  templateAssetPaths(): readonly TemplateAsset[] {
    return this.assets;
  }

  /**
   * Whether a path relative to the templates folder is a template asset
   */
  hasAsset(relativePath: string): boolean {
    return this.assetPaths.has(relativePath);
  }
}
