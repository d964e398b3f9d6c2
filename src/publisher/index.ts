export { FeedPublisher } from "./feed-publisher";
export type { FeedPublisherDeps, RunSummary } from "./feed-publisher";
export { createComponents, startPublisher } from "./bootstrap";
export type { PublisherComponents } from "./bootstrap";
