import { describe, it, expect } from "vitest";
import {
  autolink,
  buildTagLinks,
  decodeEntities,
  enableMarkdownInBlockquotes,
  prepareMarkdownInHtml,
  renderMarkdown,
  renderPost,
} from "../src/content";

// ============================================================================
// AUTOLINKING
// ============================================================================

describe("autolink", () => {
  it("should wrap a bare URL with query string", () => {
    expect(autolink("Check http://example.com/page?x=1 now")).toBe(
      "Check <http://example.com/page?x=1> now"
    );
  });

  it("should wrap URLs with a port and fragment", () => {
    expect(autolink("Served on http://localhost:8080/app#top ok")).toBe(
      "Served on <http://localhost:8080/app#top> ok"
    );
  });

  it("should wrap www hosts and email-like tokens", () => {
    expect(autolink("see www.example.com/docs")).toBe("see <www.example.com/docs>");
    expect(autolink("write to me@example.org today")).toBe("write to <me@example.org> today");
  });

  it("should keep non-ASCII path characters inside the link", () => {
    expect(autolink("see https://de.wikipedia.org/wiki/Straße now")).toBe(
      "see <https://de.wikipedia.org/wiki/Straße> now"
    );
  });

  it("should leave text without links untouched", () => {
    expect(autolink("Tom &amp; Jerry")).toBe("Tom &amp; Jerry");
  });

  it("should also wrap URLs that are already inside markup", () => {
    expect(autolink('<a href="https://example.com">x</a>')).toBe(
      '<a href="<https://example.com>">x</a>'
    );
  });
});

// ============================================================================
// ENTITIES & BLOCKQUOTES
// ============================================================================

describe("decodeEntities", () => {
  it("should decode exactly one layer of escaping", () => {
    expect(decodeEntities("&amp;amp;")).toBe("&amp;");
    expect(decodeEntities("Fish &amp; chips &lt;3")).toBe("Fish & chips <3");
  });
});

describe("enableMarkdownInBlockquotes", () => {
  it("should flag every blockquote opening tag", () => {
    expect(enableMarkdownInBlockquotes("<blockquote>a</blockquote><blockquote>b</blockquote>")).toBe(
      '<blockquote markdown="1">a</blockquote><blockquote markdown="1">b</blockquote>'
    );
  });
});

// ============================================================================
// MARKDOWN
// ============================================================================

describe("renderMarkdown", () => {
  it("should split flagged elements into their own blocks and drop the flag", () => {
    expect(prepareMarkdownInHtml('<div class="x" markdown="1">a</div>')).toBe(
      '\n\n<div class="x">\n\na\n\n</div>\n\n'
    );
  });

  it("should only split closing tags that belong to flagged elements", () => {
    expect(prepareMarkdownInHtml('<div markdown="1">a</div><div>b</div>')).toBe(
      "\n\n<div>\n\na\n\n</div>\n\n<div>b</div>"
    );
    expect(prepareMarkdownInHtml('<div markdown="1"><div>x</div></div>')).toBe(
      "\n\n<div>\n\n<div>x</div>\n\n</div>\n\n"
    );
  });

  it("should render markdown inside a flagged blockquote", () => {
    const html = renderMarkdown('<blockquote markdown="1">quoted *text*</blockquote>');

    expect(html).toContain("<blockquote>");
    expect(html).toContain("<p>quoted <em>text</em></p>");
    expect(html).not.toContain("markdown=");
  });

  it("should render autolinks as anchors", () => {
    expect(renderMarkdown("Check <http://example.com/page?x=1> now")).toBe(
      '<p>Check <a href="http://example.com/page?x=1">http://example.com/page?x=1</a> now</p>\n'
    );
  });

  it("should render www autolinks with an http scheme", () => {
    expect(renderMarkdown("see <www.example.com/docs>")).toBe(
      '<p>see <a href="http://www.example.com/docs">www.example.com/docs</a></p>\n'
    );
  });

  it("should render definition lists", () => {
    expect(renderMarkdown("Term\n: Definition")).toBe("<dl>\n<dt>Term</dt>\n<dd>Definition</dd>\n</dl>\n");
  });

  it("should render several terms and definitions with inline markup", () => {
    expect(renderMarkdown("Apple\nPomme\n: A *fruit*\n: A company")).toBe(
      "<dl>\n<dt>Apple</dt>\n<dt>Pomme</dt>\n<dd>A <em>fruit</em></dd>\n<dd>A company</dd>\n</dl>\n"
    );
  });
});

// ============================================================================
// TAGS
// ============================================================================

describe("buildTagLinks", () => {
  it("should link every tag under the prefix, in order, space separated", () => {
    expect(buildTagLinks(["rust", "go"], "https://x.example")).toBe(
      '<a class="delicioustag" href="https://x.example/t:rust">rust</a> ' +
        '<a class="delicioustag" href="https://x.example/t:go">go</a>'
    );
  });

  it("should return an empty fragment for no tags", () => {
    expect(buildTagLinks([], "https://x.example")).toBe("");
  });

  it("should escape markup characters in tags", () => {
    expect(buildTagLinks(["a&b"], "https://x.example")).toBe(
      '<a class="delicioustag" href="https://x.example/t:a&amp;b">a&amp;b</a>'
    );
  });
});

// ============================================================================
// POST ASSEMBLY
// ============================================================================

describe("renderPost", () => {
  it("should assemble title link, body and tag line", () => {
    const post = renderPost({
      title: "A post",
      rawContent: "Hello",
      link: "https://example.com/post",
      tags: ["rust", "go"],
      status: "publish",
      tagPrefix: "https://x.example",
    });

    expect(post.title).toBe("A post");
    expect(post.status).toBe("publish");
    expect(post.content).toBe(
      "<ul><li><p>\n" +
        '<a class="deliciouslink" href="https://example.com/post" title="A post">A post</a></p>' +
        "\n\n<p>Hello</p>\n\n\n" +
        '<p class="taglist">Tags: ' +
        '<a class="delicioustag" href="https://x.example/t:rust">rust</a> ' +
        '<a class="delicioustag" href="https://x.example/t:go">go</a>' +
        "</p></li></ul>"
    );
  });

  it("should still emit the title link and tag label for empty content", () => {
    const post = renderPost({
      title: "Empty",
      rawContent: "",
      link: "https://example.com/e",
      tags: [],
      status: "draft",
      tagPrefix: "https://x.example",
    });

    expect(post.content).toBe(
      "<ul><li><p>\n" +
        '<a class="deliciouslink" href="https://example.com/e" title="Empty">Empty</a></p>' +
        "\n\n\n\n" +
        '<p class="taglist">Tags: </p></li></ul>'
    );
  });

  it("should decode entities once before rendering", () => {
    const post = renderPost({
      title: "Escaped",
      rawContent: "&amp;lt;b&amp;gt;bold",
      link: "https://example.com/x",
      tags: [],
      status: "draft",
      tagPrefix: "https://x.example",
    });

    expect(post.content).toContain("<p>&lt;b&gt;bold</p>");
  });

  it("should autolink bare URLs in the body", () => {
    const post = renderPost({
      title: "Links",
      rawContent: "A post about https://example.com/a and more",
      link: "https://example.com/x",
      tags: [],
      status: "draft",
      tagPrefix: "https://x.example",
    });

    expect(post.content).toContain('<a href="https://example.com/a">https://example.com/a</a>');
  });

  it("should link bare www hosts in the body", () => {
    const post = renderPost({
      title: "Docs",
      rawContent: "see www.example.com/docs",
      link: "https://example.com/d",
      tags: [],
      status: "draft",
      tagPrefix: "https://x.example",
    });

    expect(post.content).toContain('<p>see <a href="http://www.example.com/docs">www.example.com/docs</a></p>');
  });

  it("should escape quotes in the title attribute but keep the raw post title", () => {
    const post = renderPost({
      title: 'Say "hi"',
      rawContent: "",
      link: "https://example.com/q",
      tags: [],
      status: "draft",
      tagPrefix: "https://x.example",
    });

    expect(post.title).toBe('Say "hi"');
    expect(post.content).toContain(
      '<a class="deliciouslink" href="https://example.com/q" title="Say &quot;hi&quot;">Say &quot;hi&quot;</a>'
    );
  });
});

// Kept last: footnote state lives in the shared renderer.
describe("footnotes", () => {
  it("should turn references and definitions into linked footnotes", () => {
    const html = renderMarkdown("Claim[^1].\n\n[^1]: The source.");

    expect(html).toContain('href="#footnote-1"');
    expect(html).toContain("The source.");
    expect(html).not.toContain("[^1]");
  });
});
