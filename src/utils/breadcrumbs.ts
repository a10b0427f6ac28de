/**
 * Breadcrumb Builder
 * Derives the ancestor link chain of a page from its place in the input tree
 */

import path from "node:path";
import { escapeHtml, upLevels } from "./string";
import type { BreadcrumbEntry, BreadcrumbsConfig } from "../types";

/**
 * Build the breadcrumb entries for a page
 *
 * Every addressable folder is expected to hold an index.md, so each folder
 * between the root and the page links to its index.html. Pages other than
 * index.md get a final entry for themselves. The root page has no entries.
 *
 * @param relativePath - Page path from the input root, "/" separated
 *
 * @example
 * buildBreadcrumbs("a/b/index.md")
 * // [
 * //   { label: "a", path: "a", link: "../index.html" },
 * //   { label: "b", path: "a/b", link: "index.html" },
 * // ]
 */
export function buildBreadcrumbs(relativePath: string): BreadcrumbEntry[] {
  const { dir, name } = path.posix.parse(relativePath);
  const folders = dir ? dir.split("/") : [];
  const depth = folders.length;

  const entries: BreadcrumbEntry[] = folders.map((label, index) => ({
    label,
    path: folders.slice(0, index + 1).join("/"),
    link: `${upLevels(depth - index - 1)}index.html`,
  }));

  if (name !== "index") {
    entries.push({
      label: name,
      path: dir ? `${dir}/${name}` : name,
      link: `${encodeURIComponent(name)}.html`,
    });
  }

  return entries;
}

/**
 * Render breadcrumb entries as a <nav> of links, prefixed with a root link
 * Returns an empty string when there is nothing above the page
 *
 * @param depth - Number of folders between the input root and the page
 */
export function renderBreadcrumbs(
  entries: BreadcrumbEntry[],
  depth: number,
  config: BreadcrumbsConfig,
): string {
  if (entries.length === 0) return "";

  const links = [
    { label: config.rootLabel, link: `${upLevels(depth)}index.html` },
    ...entries,
  ].map(
    ({ label, link }) =>
      `<a href="${escapeHtml(link)}">${escapeHtml(label)}</a>`,
  );

  return `<nav class="breadcrumbs">${links.join(config.separator)}</nav>`;
}
