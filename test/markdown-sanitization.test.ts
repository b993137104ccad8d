import { describe, expect, it } from "vitest";
import { renderMarkdownSafe } from "../src/security/markdown";

describe("renderMarkdownSafe", () => {
  it("escapes raw script tags while keeping markdown formatting", () => {
    const html = renderMarkdownSafe("<script>alert('xss')</script> **safe**");

    expect(html).not.toContain("<script>");
    expect(html).toContain("<strong>safe</strong>");
  });

  it("removes javascript links", () => {
    const html = renderMarkdownSafe("[click](javascript:alert(1))");

    expect(html).not.toContain("<a");
    expect(html).not.toContain("href=");
  });

  it("opens links in a new tab without an opener", () => {
    const html = renderMarkdownSafe("[docs](https://example.com)");

    expect(html).toBe('<p><a href="https://example.com" target="_blank" rel="noopener noreferrer">docs</a></p>\n');
  });

  it("keeps http images and drops data images", () => {
    expect(renderMarkdownSafe("![cover](https://example.com/cover.png)")).toBe(
      '<p><img src="https://example.com/cover.png" alt="cover" /></p>\n'
    );
    expect(renderMarkdownSafe("![pixel](data:image/png;base64,AAAA)")).not.toContain("data:");
  });

  it("renders headings and rules used in long-form posts", () => {
    expect(renderMarkdownSafe("##### Notes\n\n---")).toBe("<h5>Notes</h5>\n<hr />\n");
  });
});
