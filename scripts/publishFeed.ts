import "dotenv/config";
import { loadConfig, type PublisherConfig } from "../src/config";
import { startPublisher } from "../src/publisher";

// ============================================================================
// MAIN
// ============================================================================

async function publishFeed() {
  console.log("🔄 Starting feed publish run...");
  console.log(`📅 ${new Date().toISOString()}`);

  let config: PublisherConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error("❌ Invalid configuration:", error);
    process.exit(1);
  }

  try {
    const summary = await startPublisher(config);

    console.log("\n" + "=".repeat(60));
    console.log(summary.aborted ? "⚠️  Run aborted: feed unavailable" : "📊 Run complete!");
    console.log(`   Entries in feed: ${summary.fetched}`);
    console.log(`   Published: ${summary.published}`);
    console.log(`   Already published: ${summary.skipped}`);
    console.log(`   Failed: ${summary.failed}`);
    if (summary.recordFailures > 0) {
      console.log(`   Published but not recorded: ${summary.recordFailures}`);
    }
    if (config.dryRun) {
      console.log(`   Previewed (dry run): ${summary.previewed}`);
    }
    console.log("=".repeat(60));

    process.exit(0);
  } catch (error) {
    console.error("❌ Failed to initialize publisher:", error);
    process.exit(1);
  }
}

// ============================================================================
// RUN
// ============================================================================

publishFeed().catch((error) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
