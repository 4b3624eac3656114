export type { PgQueryable, PostgresLeadStoreOptions } from "./postgres-lead-store.js";
export { LEADS_TABLE, PostgresLeadStore, createPostgresLeadStore, ensureLeadSchema } from "./postgres-lead-store.js";
