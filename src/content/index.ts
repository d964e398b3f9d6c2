export { autolink, enableMarkdownInBlockquotes } from "./autolink";
export { prepareMarkdownInHtml, renderMarkdown } from "./markdown";
export { buildTagLinks, decodeEntities, renderPost } from "./render-post";
export type { RenderedPost, RenderPostInput } from "./render-post";
