import Parser from "rss-parser";

// ============================================================================
// TYPES
// ============================================================================

export interface FeedEntry {
  link: string; // Ledger key
  title: string;
  rawContent: string; // HTML or plain text, entity-encoded as delivered
  publishedDate: string;
  tags: string[];
}

export type FeedFetchResult =
  | { ok: true; feedTitle?: string; entries: FeedEntry[] }
  | { ok: false; error: string };

export interface FeedReader {
  fetchFeed(feedUrl: string): Promise<FeedFetchResult>;
}

// Fields rss-parser does not map on its own. Values can be strings or
// xml2js nodes ({ _: text, $: attributes }) depending on the feed.
interface FeedItemExtras {
  description?: unknown;
  subjects?: unknown;
  dcDate?: unknown; // RSS 1.0 items carry dc:date instead of pubDate
  rawCategories?: unknown; // Atom <category term="..."/>
}

// ============================================================================
// FEED PARSER
// ============================================================================

const USER_AGENT = "feed-press/0.1 (+https://www.npmjs.com/package/rss-parser)";

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
  customFields: {
    item: [
      ["description", "description"],
      ["dc:subject", "subjects", { keepArray: true }],
      ["dc:date", "dcDate"],
      ["category", "rawCategories", { keepArray: true }],
    ],
  },
});

type ParsedItem = FeedItemExtras & Parser.Item;

/**
 * Fetches and parses an RSS, RDF or Atom feed.
 * Transport and parse problems come back as { ok: false }; an empty feed is not an error.
 */
export async function fetchFeed(feedUrl: string): Promise<FeedFetchResult> {
  let body: string;

  try {
    const response = await fetch(feedUrl, {
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "application/rss+xml, application/rdf+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
      },
    });

    if (!response.ok) {
      const error = `HTTP ${response.status}: ${response.statusText}`;
      console.error(`❌ [Feed] Error fetching feed ${feedUrl}: ${error}`);
      return { ok: false, error };
    }

    body = await response.text();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ [Feed] Error fetching feed ${feedUrl}: ${message}`);
    return { ok: false, error: message };
  }

  return parseFeed(body, feedUrl);
}

/**
 * Parses feed XML into entries, keeping the feed's own order.
 */
export async function parseFeed(xml: string, feedUrl: string = "<inline>"): Promise<FeedFetchResult> {
  try {
    const feed = await parser.parseString(xml);
    const entries = (feed.items || []).map((item) => toFeedEntry(item));

    console.log(`[Feed] Parsed ${entries.length} entries from ${feedUrl}`);
    return { ok: true, feedTitle: feed.title, entries };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ [Feed] Error parsing feed ${feedUrl}: ${message}`);
    return { ok: false, error: message };
  }
}

export const rssFeedReader: FeedReader = { fetchFeed };

// ============================================================================
// NORMALIZATION
// ============================================================================

function toFeedEntry(item: ParsedItem): FeedEntry {
  const rawContent =
    textOf(item.description) || item.summary || item.content || "";

  return {
    link: item.link || item.guid || "",
    title: item.title || "",
    rawContent,
    publishedDate: item.pubDate || item.isoDate || textOf(item.dcDate) || new Date().toISOString(),
    tags: extractTags(item),
  };
}

/**
 * Collects taxonomy terms from categories and dc:subject, splitting each on
 * whitespace. Pinboard puts every tag of a bookmark into one subject.
 */
export function extractTags(item: {
  categories?: unknown;
  rawCategories?: unknown;
  subjects?: unknown;
}): string[] {
  const terms: string[] = [];
  // rss-parser fills categories for RSS only; Atom terms come through rawCategories.
  const categories = Array.isArray(item.categories) ? item.categories : item.rawCategories;

  for (const source of [categories, item.subjects]) {
    if (!Array.isArray(source)) continue;

    for (const value of source) {
      const term = termOf(value);
      if (term) {
        terms.push(...term.split(/\s+/).filter((t) => t.length > 0));
      }
    }
  }

  return terms;
}

function termOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value !== "object" || value === null) return undefined;

  if ("term" in value && typeof value.term === "string") return value.term;
  if ("$" in value && typeof value.$ === "object" && value.$ !== null) {
    const attributes = value.$;
    if ("term" in attributes && typeof attributes.term === "string") return attributes.term;
  }
  return textOf(value);
}

function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null && "_" in value && typeof value._ === "string") {
    return value._;
  }
  return undefined;
}
