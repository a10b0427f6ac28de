/**
 * Markdown Renderer
 * Converts a markdown body into an HTML fragment using marked
 */

import { Marked } from "marked";
import type { MarkdownConfig } from "../types";

export function renderMarkdown(body: string, config: MarkdownConfig): string {
  // A fresh instance keeps options from leaking between calls
  const marked = new Marked({ gfm: config.gfm, breaks: config.breaks });
  const html = marked.parse(body, { async: false });
  if (typeof html !== "string") {
    throw new Error("Markdown renderer returned a promise");
  }
  return html;
}
