export { createPublicationLedger, isUniqueViolation } from "./ledger";
export type { PublicationLedger, PublishedRecord, RecordResult, LedgerOptions } from "./ledger";
