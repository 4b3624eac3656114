import { randomUUID } from "node:crypto";

import type { Pool } from "pg";

import {
  createInfraError,
  err,
  ok,
  ShellpassErrorCodes,
  type AppendLeadInput,
  type LeadRecord,
  type LeadStorePort,
  type Result,
  type ShellpassError,
} from "@shellpass/contracts";
import {
  createShellpassLogger,
  getShellpassTracer,
  runWithSpan,
  type ShellpassLogger,
  type ShellpassTracer,
} from "@shellpass/telemetry";

export type PgQueryable = Pick<Pool, "query">;

export interface PostgresLeadStoreOptions {
  readonly idFactory?: () => string;
  readonly logger?: ShellpassLogger;
  readonly tracer?: ShellpassTracer;
}

type LeadRow = {
  readonly id: string;
  readonly email: string;
  readonly session_id: string;
  readonly captured_at: Date | string;
  readonly source: string;
  readonly ip: string | null;
};

export const LEADS_TABLE = "shellpass_leads";

export const ensureLeadSchema = async (queryable: PgQueryable): Promise<void> => {
  await queryable.query(`
    CREATE TABLE IF NOT EXISTS ${LEADS_TABLE} (
      seq serial PRIMARY KEY,
      id text NOT NULL UNIQUE,
      email text NOT NULL,
      session_id text NOT NULL,
      captured_at timestamptz NOT NULL,
      source text NOT NULL,
      ip text
    )
  `);
};

const toIsoString = (value: Date | string): string =>
  value instanceof Date ? value.toISOString() : new Date(value).toISOString();

const mapRow = (row: LeadRow): LeadRecord => ({
  id: row.id,
  email: row.email,
  sessionId: row.session_id,
  capturedAt: toIsoString(row.captured_at),
  source: "session",
  ...(row.ip ? { ip: row.ip } : {}),
});

export class PostgresLeadStore implements LeadStorePort {
  private readonly idFactory: () => string;
  private readonly logger: ShellpassLogger;
  private readonly tracer: ShellpassTracer;
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly queryable: PgQueryable, options: PostgresLeadStoreOptions = {}) {
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.logger = options.logger ?? createShellpassLogger({ name: "lead-postgres" });
    this.tracer = options.tracer ?? getShellpassTracer({ name: "lead-postgres" });
  }

  async append(input: AppendLeadInput): Promise<Result<LeadRecord, ShellpassError>> {
    try {
      return await runWithSpan(this.tracer, "lead_postgres.append", async (span) => {
        span.setAttribute("db.system", "postgresql");
        await this.ensureReady();
        const result = await this.queryable.query<LeadRow>(
          `INSERT INTO ${LEADS_TABLE} (id, email, session_id, captured_at, source, ip)
           VALUES ($1, $2, $3, $4, $5, $6)
           RETURNING id, email, session_id, captured_at, source, ip`,
          [this.idFactory(), input.email, input.sessionId, input.capturedAt, "session", input.ip ?? null],
        );
        const [row] = result.rows;
        if (!row) {
          throw new Error("insert returned no row");
        }
        return ok(mapRow(row));
      });
    } catch (error) {
      this.logger.error("lead_postgres.append_failed", { sessionId: input.sessionId, error: String(error) });
      return err(createInfraError(ShellpassErrorCodes.leadStoreFailed, "Lead could not be stored.", error));
    }
  }

  async list(): Promise<Result<ReadonlyArray<LeadRecord>, ShellpassError>> {
    try {
      return await runWithSpan(this.tracer, "lead_postgres.list", async (span) => {
        span.setAttribute("db.system", "postgresql");
        await this.ensureReady();
        const result = await this.queryable.query<LeadRow>(
          `SELECT id, email, session_id, captured_at, source, ip FROM ${LEADS_TABLE} ORDER BY seq ASC`,
        );
        span.setAttribute("db.rows_returned", result.rows.length);
        return ok(result.rows.map(mapRow));
      });
    } catch (error) {
      this.logger.error("lead_postgres.list_failed", { error: String(error) });
      return err(createInfraError(ShellpassErrorCodes.leadStoreFailed, "Leads could not be read.", error));
    }
  }

  private ensureReady(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = ensureLeadSchema(this.queryable).catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }
}

export const createPostgresLeadStore = (
  queryable: PgQueryable,
  options?: PostgresLeadStoreOptions,
): PostgresLeadStore => new PostgresLeadStore(queryable, options);
