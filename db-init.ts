import "dotenv/config";
import { toLibsqlUrl } from "./src/config";
import { createPublicationLedger } from "./src/ledger";

const dbPath = process.env.DB_PATH;

if (!dbPath) {
  throw new Error("Missing DB_PATH. Please set it in your .env file");
}

const url = toLibsqlUrl(dbPath);

console.log("🚀 Starting database migration...");
console.log(`📍 Database: ${url.replace(/\/\/.*@/, "//***@")}`);

async function migrate() {
  const ledger = createPublicationLedger({
    url,
    authToken: process.env.DB_AUTH_TOKEN || undefined,
    dryRun: false,
  });

  await ledger.initialize();
  console.log("✅ Created published_items table");
}

migrate().catch((error) => {
  console.error("❌ Migration failed:", error);
  process.exit(1);
});
