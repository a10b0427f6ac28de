import { describe, it, expect } from "vitest";
import { parseFrontmatter } from "./parse-frontmatter";
import { FrontmatterError } from "./errors";

describe("parseFrontmatter", () => {
  it("treats a document without a header block as all body", () => {
    const source = "# Hello\n\nSome text\n";
    expect(parseFrontmatter(source)).toEqual({ data: {}, body: source });
  });

  it("returns empty data and body for an empty document", () => {
    expect(parseFrontmatter("")).toEqual({ data: {}, body: "" });
  });

  it("splits the recognized keys from the body", () => {
    const result = parseFrontmatter(
      "---\ntitle: Home\ndate: 2024-01-01\ntemplate: page\n---\n# Hello\n",
    );
    expect(result).toEqual({
      data: { title: "Home", date: "2024-01-01", template: "page" },
      body: "# Hello\n",
    });
  });

  it("keeps unknown scalar keys as strings and drops nested values", () => {
    const result = parseFrontmatter(
      "---\ntitle: Post\ndraft: true\norder: 3\ntags: [a, b]\n---\nBody",
    );
    expect(result.data).toEqual({ title: "Post", draft: "true", order: "3" });
    expect(result.body).toBe("Body");
  });

  it("turns an empty value into an empty string", () => {
    expect(parseFrontmatter("---\ntitle:\n---\nBody").data).toEqual({
      title: "",
    });
  });

  it("keeps dates exactly as written", () => {
    const { data } = parseFrontmatter(
      "---\ndate: 2024-03-05T10:30:00Z\nupdated: 2024-13-45\n---\n",
    );
    expect(data).toEqual({
      date: "2024-03-05T10:30:00Z",
      updated: "2024-13-45",
    });
  });

  it("throws FrontmatterError when the header is not a mapping", () => {
    expect(() => parseFrontmatter("---\n- a\n- b\n---\nBody")).toThrow(
      "Frontmatter must be a list of key: value pairs",
    );
  });

  it("throws FrontmatterError for malformed YAML", () => {
    expect(() =>
      parseFrontmatter("---\ntitle: [unclosed\n---\nBody"),
    ).toThrow(FrontmatterError);
  });
});
