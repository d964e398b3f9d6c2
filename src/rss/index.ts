export { extractTags, fetchFeed, parseFeed, rssFeedReader } from "./feed-parser";
export type { FeedEntry, FeedFetchResult, FeedReader } from "./feed-parser";
