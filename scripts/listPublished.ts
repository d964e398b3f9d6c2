import "dotenv/config";
import { toLibsqlUrl } from "../src/config";
import { createPublicationLedger } from "../src/ledger";

async function main() {
  const dbPath = process.env.DB_PATH;
  if (!dbPath) {
    console.error("❌ Missing DB_PATH");
    process.exit(1);
  }

  const limit = Number.parseInt(process.argv[2] ?? "20", 10);
  const ledger = createPublicationLedger({
    url: toLibsqlUrl(dbPath),
    authToken: process.env.DB_AUTH_TOKEN || undefined,
    dryRun: false,
  });

  const rows = await ledger.listRecent(Number.isNaN(limit) ? 20 : limit);
  console.table(rows);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
