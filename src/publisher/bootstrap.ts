import type { PublisherConfig } from "../config";
import { createPublicationLedger, type PublicationLedger } from "../ledger";
import { rssFeedReader, type FeedReader } from "../rss";
import { WordPressClient } from "../wordpress";
import { FeedPublisher, type RunSummary } from "./feed-publisher";

export interface PublisherComponents {
  feedReader: FeedReader;
  ledger: PublicationLedger;
  client: WordPressClient;
}

export function createComponents(config: PublisherConfig): PublisherComponents {
  return {
    feedReader: rssFeedReader,
    ledger: createPublicationLedger({
      url: config.ledger.url,
      authToken: config.ledger.authToken,
      dryRun: config.dryRun,
    }),
    client: new WordPressClient({
      baseUrl: config.wordpress.baseUrl,
      username: config.wordpress.username,
      appPassword: config.wordpress.appPassword,
      dryRun: config.dryRun,
    }),
  };
}

/**
 * Prepares the ledger, checks the WordPress credentials and then runs the
 * pipeline once. Startup failures are thrown before the feed is touched.
 */
export async function startPublisher(
  config: PublisherConfig,
  components: PublisherComponents = createComponents(config)
): Promise<RunSummary> {
  if (config.dryRun) {
    console.log("⚠️  [Publisher] Dry run: nothing will be posted or recorded");
  }

  await components.ledger.initialize();
  await components.client.verifyCredentials();

  const publisher = new FeedPublisher({
    feedReader: components.feedReader,
    ledger: components.ledger,
    client: components.client,
    tagPrefix: config.tagPrefix,
    postStatus: config.postStatus,
  });

  return publisher.run(config.feedUrl);
}
