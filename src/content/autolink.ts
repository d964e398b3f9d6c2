// Matches scheme-prefixed URIs, www. hosts and user@host tokens, each with an
// optional path, query and fragment. Adapted from markdown-urlize; word
// characters are Unicode letters, digits and underscore.
const URL_FINDER =
  /((([A-Za-z]{3,9}:(?:\/\/)?)(?:[\-;:&=\+\$,\p{L}\p{N}_]+@)?[A-Za-z0-9\.\-]+(:[0-9]+)?|(?:www\.|[\-;:&=\+\$,\p{L}\p{N}_]+@)[A-Za-z0-9\.\-]+)((?:\/[\+~%\/\.\p{L}\p{N}_\-]*)?\??(?:[\-\+=&;%@\.\p{L}\p{N}_]*)#?(?:[\.!\/\\\p{L}\p{N}_]*))?)/gu;

/**
 * Wraps every bare URL or email-like token in markdown autolink brackets.
 *
 * URLs that already sit inside markup (an anchor's href, say) are wrapped as
 * well. Feeds we publish from deliver plain bookmark notes, so that is left as is.
 */
export function autolink(text: string): string {
  return text.replace(URL_FINDER, "<$1>");
}

/**
 * Marks every blockquote so its body is rendered as markdown.
 */
export function enableMarkdownInBlockquotes(html: string): string {
  return html.replace(/<blockquote>/g, '<blockquote markdown="1">');
}
