import { decode, encode } from "html-entities";
import type { PostStatus } from "../config";
import { autolink, enableMarkdownInBlockquotes } from "./autolink";
import { renderMarkdown } from "./markdown";

// ============================================================================
// TYPES
// ============================================================================

export interface RenderedPost {
  title: string;
  content: string; // Final HTML body
  status: PostStatus;
}

export interface RenderPostInput {
  title: string;
  rawContent: string;
  link: string;
  tags: string[];
  status: PostStatus;
  tagPrefix: string;
}

// ============================================================================
// TRANSFORMS
// ============================================================================

/**
 * Decodes HTML entities once. Some feeds double-escape, and the second layer
 * is kept: "&amp;amp;" becomes "&amp;".
 */
export function decodeEntities(raw: string): string {
  return decode(raw);
}

/**
 * Builds the tag line: one anchor per tag, space separated, in feed order.
 */
export function buildTagLinks(tags: string[], tagPrefix: string): string {
  return tags
    .map((tag) => {
      const safeTag = encode(tag);
      return `<a class="delicioustag" href="${tagPrefix}/t:${safeTag}">${safeTag}</a>`;
    })
    .join(" ");
}

/**
 * Turns a feed entry into the WordPress post body: a linked title, the
 * rendered entry text and the tag line, wrapped in a single list item.
 */
export function renderPost(input: RenderPostInput): RenderedPost {
  let body = decodeEntities(input.rawContent);
  body = autolink(body);
  body = enableMarkdownInBlockquotes(body);
  body = renderMarkdown(body);

  const tagHtml = buildTagLinks(input.tags, input.tagPrefix);
  const title = encode(input.title);

  const content =
    `<ul><li><p>\n` +
    `<a class="deliciouslink" href="${encode(input.link)}" title="${title}">${title}</a></p>` +
    `\n\n${body}\n\n<p class="taglist">Tags: ${tagHtml}</p></li></ul>`;

  return {
    title: input.title,
    content,
    status: input.status,
  };
}
