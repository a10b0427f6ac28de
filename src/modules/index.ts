/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { loadTemplates } from "./templates";
export { render, renderPage } from "./processor";
export type { RenderPageOptions } from "./processor";
export { copy } from "./copier";
export { stats } from "./stats";
export { watch } from "./watcher";
export type { WatchOptions, SiteWatcher } from "./watcher";
