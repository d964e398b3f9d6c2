import { createClient, type Client } from "@libsql/client";
import { drizzle, LibSQLDatabase } from "drizzle-orm/libsql";
import { desc, eq, sql } from "drizzle-orm";
import {
  publishedItemsTable,
  PUBLISHED_ITEMS_DDL,
  type NewPublishedItem,
  type PublishedItem,
} from "../../schema";

// ============================================================================
// TYPES
// ============================================================================

export interface PublishedRecord {
  link: string;
  title: string | null;
  publishedDate: string | null;
  remotePostId: number | null;
  recordedAt: string | null;
}

export type RecordResult =
  | { ok: true }
  | { ok: false; reason: "duplicate" | "store_error"; error: string };

export interface PublicationLedger {
  initialize(): Promise<void>;
  isPublished(link: string): Promise<boolean>;
  record(
    link: string,
    title: string,
    publishedDate: string,
    remotePostId: number
  ): Promise<RecordResult>;
  listRecent(limit: number): Promise<PublishedRecord[]>;
}

export interface LedgerOptions {
  url: string;
  authToken?: string;
  /** Never report an item as published and never write. For previewing output. */
  dryRun: boolean;
}

// ============================================================================
// LEDGER IMPLEMENTATION
// ============================================================================

/**
 * Creates the publication ledger. A connection is opened and closed around
 * every operation, so nothing is held between calls.
 */
export function createPublicationLedger(options: LedgerOptions): PublicationLedger {
  async function withDatabase<T>(
    fn: (db: LibSQLDatabase<Record<string, never>>, client: Client) => Promise<T>
  ): Promise<T> {
    const client = createClient({
      url: options.url,
      authToken: options.authToken,
    });

    try {
      return await fn(drizzle(client), client);
    } finally {
      client.close();
    }
  }

  return {
    async initialize() {
      try {
        await withDatabase(async (_db, client) => {
          await client.execute(PUBLISHED_ITEMS_DDL);
        });
        console.log("✅ [Ledger] Database initialized");
      } catch (error) {
        console.error(`❌ [Ledger] Database initialization error: ${describeError(error)}`);
        throw error;
      }
    },

    async isPublished(link) {
      if (options.dryRun) {
        return false;
      }

      try {
        return await withDatabase(async (db) => {
          const rows = await db
            .select({ link: publishedItemsTable.link })
            .from(publishedItemsTable)
            .where(eq(publishedItemsTable.link, link))
            .limit(1);

          return rows.length > 0;
        });
      } catch (error) {
        // Treated as unpublished; the primary key still stops a second row.
        console.error(`[Ledger] Query error for ${link}: ${describeError(error)}`);
        return false;
      }
    },

    async record(link, title, publishedDate, remotePostId) {
      if (options.dryRun) {
        return { ok: true };
      }

      try {
        const row: NewPublishedItem = {
          link,
          title,
          publishedDate,
          wordpressPostId: remotePostId,
        };
        await withDatabase(async (db) => {
          await db.insert(publishedItemsTable).values(row);
        });
        console.log(`[Ledger] Recorded published item: ${title}`);
        return { ok: true };
      } catch (error) {
        const message = describeError(error);
        const reason = isUniqueViolation(error) ? "duplicate" : "store_error";
        console.error(`❌ [Ledger] Error recording published item (${reason}): ${message}`);
        return { ok: false, reason, error: message };
      }
    },

    async listRecent(limit) {
      const rows = await withDatabase((db) =>
        db
          .select()
          .from(publishedItemsTable)
          .orderBy(desc(publishedItemsTable.createdAt), sql`rowid desc`)
          .limit(limit)
      );

      return rows.map(toPublishedRecord);
    },
  };
}

// ============================================================================
// HELPERS
// ============================================================================

function toPublishedRecord(row: PublishedItem): PublishedRecord {
  return {
    link: row.link,
    title: row.title,
    publishedDate: row.publishedDate,
    remotePostId: row.wordpressPostId,
    recordedAt: row.createdAt,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drizzle may wrap the driver error, so the cause chain is searched too.
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;

  while (current instanceof Error) {
    const code = "code" in current ? String(current.code) : "";
    if (code.startsWith("SQLITE_CONSTRAINT") || current.message.includes("UNIQUE constraint failed")) {
      return true;
    }
    current = current.cause;
  }

  return false;
}
