import { marked, type RendererExtension, type Tokens, type TokenizerExtension } from "marked";
import markedFootnote from "marked-footnote";
import { encode } from "html-entities";

// ============================================================================
// MARKDOWN IN HTML
// ============================================================================

// Any opening or closing tag; attributes containing ">" are not supported.
const HTML_TAG = /<(\/?)([A-Za-z][A-Za-z0-9-]*)([^>]*)>/g;
const MARKDOWN_FLAG = /\s+markdown=(["'])1\1/;

/**
 * Moves the body of every element flagged with markdown="1" into its own
 * block, so the renderer treats it as markdown instead of raw HTML.
 * The flag itself is dropped from the output. Closing tags are matched to
 * their openings per tag name, so unflagged elements are left alone.
 */
export function prepareMarkdownInHtml(source: string): string {
  // Per tag name: one entry per open element, true when it was flagged
  const open = new Map<string, boolean[]>();

  return source.replace(HTML_TAG, (tag, slash: string, name: string, attributes: string) => {
    const key = name.toLowerCase();
    const stack = open.get(key) ?? [];
    open.set(key, stack);

    if (slash) {
      return stack.pop() ? `\n\n${tag}\n\n` : tag;
    }
    if (attributes.endsWith("/")) {
      return tag;
    }

    const flagged = MARKDOWN_FLAG.test(attributes);
    stack.push(flagged);
    return flagged ? `\n\n<${name}${attributes.replace(MARKDOWN_FLAG, "")}>\n\n` : tag;
  });
}

// ============================================================================
// EXTENSIONS
// ============================================================================

// Term lines followed by ": definition" lines
const DEFINITION_LIST = /^((?:[^\s:][^\n]*\n)+)((?::[ \t]+[^\n]*(?:\n|$))+)/;

const definitionList: TokenizerExtension & RendererExtension = {
  name: "definitionList",
  level: "block",
  tokenizer(src) {
    const match = DEFINITION_LIST.exec(src);
    if (!match) return undefined;

    const children: Tokens.Generic[] = [];
    for (const line of match[1].split("\n").filter((l) => l.trim())) {
      children.push({ type: "definitionTerm", raw: line, tokens: this.lexer.inline(line.trim()) });
    }
    for (const line of match[2].split("\n").filter((l) => l.trim())) {
      const text = line.replace(/^:[ \t]+/, "").trim();
      children.push({ type: "definitionDescription", raw: line, tokens: this.lexer.inline(text) });
    }

    return { type: "definitionList", raw: match[0], tokens: children };
  },
  renderer(token) {
    return `<dl>\n${this.parser.parse(token.tokens ?? [])}</dl>\n`;
  },
};

const definitionTerm: RendererExtension = {
  name: "definitionTerm",
  renderer(token) {
    return `<dt>${this.parser.parseInline(token.tokens ?? [])}</dt>\n`;
  },
};

const definitionDescription: RendererExtension = {
  name: "definitionDescription",
  renderer(token) {
    return `<dd>${this.parser.parseInline(token.tokens ?? [])}</dd>\n`;
  },
};

// <www.example.com> has no scheme, so the built-in autolink rule skips it.
const wwwAutolink: TokenizerExtension & RendererExtension = {
  name: "wwwAutolink",
  level: "inline",
  start(src) {
    const index = src.indexOf("<www.");
    return index >= 0 ? index : undefined;
  },
  tokenizer(src) {
    const match = /^<www\.[^\s<>]+>/.exec(src);
    if (!match) return undefined;
    return { type: "wwwAutolink", raw: match[0] };
  },
  renderer(token) {
    const host = token.raw.slice(1, -1);
    return `<a href="${encode(`http://${host}`)}">${encode(host)}</a>`;
  },
};

marked.use(markedFootnote(), {
  extensions: [definitionList, definitionTerm, definitionDescription, wwwAutolink],
});

// ============================================================================
// RENDERING
// ============================================================================

/**
 * Renders a markdown/HTML hybrid to HTML: GFM tables and autolinks, plus
 * footnotes and definition lists.
 */
export function renderMarkdown(source: string): string {
  return marked.parse(prepareMarkdownInHtml(source), {
    async: false,
    gfm: true,
    breaks: false,
  });
}
