import { describe, it, expect, beforeAll } from "vitest";
import { renderPage } from "./processor";
import { TemplateRegistry, TemplateNotFoundError, loadDefaultConfig } from "../utils";
import type { ConversionConfig, PageDescriptor } from "../types";

let config: ConversionConfig;

beforeAll(async () => {
  config = await loadDefaultConfig();
});

function page(relativePath: string, depth: number): PageDescriptor {
  return {
    kind: "page",
    sourcePath: `/site/${relativePath}`,
    relativePath,
    outputPath: `/out/${relativePath.replace(/\.md$/, ".html")}`,
    depth,
  };
}

const registry = new TemplateRegistry(
  [
    {
      name: "page",
      sourcePath: "/site/_templates/page.html",
      content: "<title>$$DOC_TITLE$$</title><body>$$DOC_CONTENT$$</body>",
    },
    {
      name: "default",
      sourcePath: "/site/_templates/default.html",
      content: "<main>$$DOC_CONTENT$$</main><time>$$DOC_DATE$$</time>",
    },
    {
      name: "styled",
      sourcePath: "/site/_templates/styled.html",
      content: '<link href="style.css">$$BREADCRUMBS$$$$DOC_CONTENT$$',
    },
  ],
  [
    {
      sourcePath: "/site/_templates/style.css",
      relativePath: "style.css",
      destRelativePath: "_template/style.css",
    },
  ],
);

describe("renderPage", () => {
  it("renders a page through the template it names", () => {
    const html = renderPage({
      page: page("index.md", 0),
      source: "---\ntitle: Home\ndate: 2024-01-01\ntemplate: page\n---\n# Hello\n",
      templates: registry,
      config,
    });
    expect(html).toBe("<title>Home</title><body><h1>Hello</h1>\n</body>");
  });

  it("falls back to the default template", () => {
    const html = renderPage({
      page: page("notes.md", 0),
      source: "---\ndate: 2024-01-01\n---\nHi",
      templates: registry,
      config,
    });
    expect(html).toBe("<main><p>Hi</p>\n</main><time>2024-01-01</time>");
  });

  it("leaves title and date empty when missing", () => {
    const html = renderPage({
      page: page("index.md", 0),
      source: "---\ntemplate: page\n---\n",
      templates: registry,
      config,
    });
    expect(html).toBe("<title></title><body></body>");
  });

  it("applies the configured date prefix", () => {
    const html = renderPage({
      page: page("notes.md", 0),
      source: "---\ndate: 2024-01-01\n---\nHi",
      templates: registry,
      config: { ...config, tokens: { datePrefix: "Written " } },
    });
    expect(html).toContain("<time>Written 2024-01-01</time>");
  });

  it("rewrites template assets but not links in the markdown", () => {
    const html = renderPage({
      page: page("docs/index.md", 1),
      source: "---\ntemplate: styled\n---\n[css](style.css)",
      templates: registry,
      config,
    });
    expect(html).toBe(
      '<link href="../_template/style.css">' +
        '<nav class="breadcrumbs"><a href="../index.html">root</a> / <a href="index.html">docs</a></nav>' +
        '<p><a href="style.css">css</a></p>\n',
    );
  });

  it("throws for a template that does not exist", () => {
    expect(() =>
      renderPage({
        page: page("index.md", 0),
        source: "---\ntemplate: missing\n---\n# Hi",
        templates: registry,
        config,
      }),
    ).toThrow(TemplateNotFoundError);
  });
});
