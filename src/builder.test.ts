import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Builder } from "./builder";
import {
  Logger,
  TemplateRegistryError,
  fileExists,
  loadDefaultConfig,
} from "./utils";
import type { ConversionConfig } from "./types";

const PAGE_TEMPLATE = [
  "<html><head><title>$$DOC_TITLE$$</title>",
  '<link rel="stylesheet" href="style.css"></head>',
  "<body>$$BREADCRUMBS$$<main>$$DOC_CONTENT$$</main></body></html>",
].join("");

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff, 0x10]);

async function put(root: string, file: string, content: string | Buffer) {
  const target = join(root, file);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content);
}

describe("Builder", () => {
  let root: string;
  let input: string;
  let output: string;
  let config: ConversionConfig;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "mdsite-build-"));
    input = join(root, "site");
    output = join(root, "public");
    config = { ...(await loadDefaultConfig()), input, output };

    await put(
      input,
      "index.md",
      "---\ntitle: Home\ndate: 2024-01-01\ntemplate: page\n---\n# Hello\n",
    );
    await put(input, "a/b/index.md", "---\ntitle: Deep\ntemplate: page\n---\nDeep page\n");
    await put(input, "a/broken.md", "---\ntemplate: missing\n---\nNope\n");
    await put(input, "css/site.css", "body { margin: 0; }\n");
    await put(input, "img/logo.png", PNG_BYTES);
    await put(input, "_templates/page.html", PAGE_TEMPLATE);
    await put(input, "_templates/style.css", "main { color: red; }\n");
    await put(input, "_templates/fonts/body.woff", "font");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createBuilder(overrides: Partial<ConversionConfig> = {}, dryRun = false) {
    return new Builder({
      config: { ...config, ...overrides },
      logger: new Logger("error"),
      dryRun,
    });
  }

  it("renders the root page through its template", async () => {
    await createBuilder().run();

    const html = await readFile(join(output, "index.html"), "utf-8");
    expect(html).toBe(
      "<html><head><title>Home</title>" +
        '<link rel="stylesheet" href="_template/style.css"></head>' +
        "<body><main><h1>Hello</h1>\n</main></body></html>",
    );
  });

  it("mirrors nested pages with breadcrumbs and rewritten assets", async () => {
    await createBuilder().run();

    const html = await readFile(join(output, "a/b/index.html"), "utf-8");
    expect(html).toContain('href="../../_template/style.css"');
    expect(html).toContain(
      '<nav class="breadcrumbs"><a href="../../index.html">root</a> / <a href="../index.html">a</a> / <a href="index.html">b</a></nav>',
    );
    expect(html).toContain("<main><p>Deep page</p>\n</main>");
  });

  it("reports a missing template and still builds the other pages", async () => {
    const ctx = await createBuilder().run();

    expect(await fileExists(join(output, "a/broken.html"))).toBe(false);
    expect(await fileExists(join(output, "index.html"))).toBe(true);
    expect(ctx.tracker.getIssues("file")).toEqual([
      {
        type: "file",
        path: "a/broken.md",
        reason: "template-error",
        details: 'Template "missing" not found (available: page)',
      },
    ]);
    expect(ctx.tracker.hasFailures()).toBe(true);
    expect(ctx.tracker.getStats()).toMatchObject({
      totalPages: 3,
      renderedPages: 2,
      totalAssets: 2,
      copiedAssets: 2,
      copiedTemplateAssets: 2,
      failedFiles: 1,
    });
  });

  it("lets a page replace a hand-written file with the same output path", async () => {
    await put(input, "about.md", "---\ntemplate: page\n---\n# Rendered\n");
    await put(input, "about.html", "<p>stale hand-written</p>");

    const ctx = await createBuilder().run();

    const html = await readFile(join(output, "about.html"), "utf-8");
    expect(html).toContain("<main><h1>Rendered</h1>\n</main>");
    expect(ctx.tracker.getIssues("file")).toContainEqual({
      type: "file",
      path: "about.html",
      reason: "output-conflict",
      details: "Overwritten by about.md",
    });
    expect(ctx.tracker.getStats().failedFiles).toBe(1);
  });

  it("copies assets byte for byte to the same relative path", async () => {
    await createBuilder().run();

    expect(await readFile(join(output, "img/logo.png"))).toEqual(PNG_BYTES);
    expect(await readFile(join(output, "css/site.css"), "utf-8")).toBe(
      "body { margin: 0; }\n",
    );
  });

  it("copies template assets into the shared folder, keeping structure", async () => {
    await createBuilder().run();

    expect(await readFile(join(output, "_template/style.css"), "utf-8")).toBe(
      "main { color: red; }\n",
    );
    expect(await readFile(join(output, "_template/fonts/body.woff"), "utf-8")).toBe(
      "font",
    );
    expect(await fileExists(join(output, "_template/page.html"))).toBe(false);
    expect(await fileExists(join(output, "_templates"))).toBe(false);
  });

  it("skips an output folder nested in the input folder", async () => {
    const nested = join(input, "_site");
    await createBuilder({ output: nested }).run();
    const ctx = await createBuilder({ output: nested }).run();

    expect(ctx.files?.some((file) => file.relativePath.startsWith("_site/"))).toBe(
      false,
    );
    expect(await fileExists(join(nested, "_site"))).toBe(false);
    expect(await fileExists(join(nested, "index.html"))).toBe(true);
  });

  it("writes nothing in dry-run mode", async () => {
    const ctx = await createBuilder({}, true).run();

    expect(await fileExists(output)).toBe(false);
    expect(ctx.tracker.getStats().renderedPages).toBe(2);
  });

  it("aborts when the templates folder is missing", async () => {
    await rm(join(input, "_templates"), { recursive: true });
    await expect(createBuilder().run()).rejects.toThrow(TemplateRegistryError);
    expect(await fileExists(output)).toBe(false);
  });

  it("aborts when the input folder is missing", async () => {
    await expect(
      createBuilder({ input: join(root, "nope") }).run(),
    ).rejects.toThrow("Input directory not found");
  });
});
