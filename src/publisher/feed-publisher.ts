import type { PostStatus } from "../config";
import { renderPost } from "../content";
import type { PublicationLedger } from "../ledger";
import type { FeedEntry, FeedReader } from "../rss";
import type { PostPublisher } from "../wordpress";

// ============================================================================
// TYPES
// ============================================================================

export interface FeedPublisherDeps {
  feedReader: FeedReader;
  ledger: Pick<PublicationLedger, "isPublished" | "record">;
  client: PostPublisher;
  tagPrefix: string;
  postStatus: PostStatus;
}

export interface RunSummary {
  aborted: boolean; // Feed could not be fetched or parsed
  fetched: number;
  skipped: number;
  published: number;
  failed: number;
  recordFailures: number;
  previewed: number; // Dry run only
}

type EntryOutcome = "skipped" | "published" | "published_unrecorded" | "previewed" | "failed";

// ============================================================================
// FEED PUBLISHER
// ============================================================================

export class FeedPublisher {
  constructor(private readonly deps: FeedPublisherDeps) {}

  /**
   * Publishes every entry of the feed that is not in the ledger yet, oldest
   * first. Failures are logged and counted; nothing is thrown.
   */
  async run(feedUrl: string): Promise<RunSummary> {
    const summary: RunSummary = {
      aborted: false,
      fetched: 0,
      skipped: 0,
      published: 0,
      failed: 0,
      recordFailures: 0,
      previewed: 0,
    };

    console.log(`[Publisher] Fetching feed: ${feedUrl}`);
    const result = await this.deps.feedReader.fetchFeed(feedUrl);

    if (!result.ok) {
      console.error(`❌ [Publisher] Aborting run, feed unavailable: ${result.error}`);
      return { ...summary, aborted: true };
    }

    summary.fetched = result.entries.length;

    // Feeds list newest first; publish in chronological order.
    for (const entry of [...result.entries].reverse()) {
      let outcome: EntryOutcome;

      try {
        outcome = await this.publishEntry(entry);
      } catch (error) {
        console.error(`❌ [Publisher] Unexpected error for "${entry.title}":`, error);
        outcome = "failed";
      }

      switch (outcome) {
        case "skipped":
          summary.skipped++;
          break;
        case "published":
          summary.published++;
          break;
        case "published_unrecorded":
          summary.published++;
          summary.recordFailures++;
          break;
        case "previewed":
          summary.previewed++;
          break;
        case "failed":
          summary.failed++;
          break;
      }
    }

    console.log(
      `✅ [Publisher] Run complete: ${summary.published} published, ` +
        `${summary.skipped} skipped, ${summary.failed} failed`
    );
    return summary;
  }

  private async publishEntry(entry: FeedEntry): Promise<EntryOutcome> {
    const { ledger, client } = this.deps;

    if (!entry.link) {
      console.warn(`⚠️  [Publisher] Skipping entry without a link: "${entry.title}"`);
      return "skipped";
    }

    if (await ledger.isPublished(entry.link)) {
      return "skipped";
    }

    console.log(`[Publisher] Extracted tags for "${entry.title}": ${JSON.stringify(entry.tags)}`);

    const post = renderPost({
      title: entry.title,
      rawContent: entry.rawContent,
      link: entry.link,
      tags: entry.tags,
      status: this.deps.postStatus,
      tagPrefix: this.deps.tagPrefix,
    });

    console.log(`[Publisher] Creating post: ${entry.title}`);
    const published = await client.createPost(post);

    if (!published.ok) {
      if (published.failure.kind === "dry_run") {
        return "previewed";
      }
      console.error(`❌ [Publisher] Failed to create post: ${entry.title} (${published.failure.message})`);
      return "failed";
    }

    console.log(`✅ [Publisher] Created post ${published.postId}: ${entry.title}`);

    const recorded = await ledger.record(entry.link, entry.title, entry.publishedDate, published.postId);
    if (!recorded.ok) {
      console.error(
        `⚠️  [Publisher] Post ${published.postId} is live but was not recorded; ` +
          `it may be posted again on the next run: ${entry.link}`
      );
      return "published_unrecorded";
    }

    return "published";
  }
}
