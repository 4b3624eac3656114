import { describe, expect, it } from "vitest";

import { createSilentLogger } from "@shellpass/telemetry";

import { createPostgresLeadStore } from "./postgres-lead-store.js";

const createTestPool = async () => {
  const { newDb } = await import("pg-mem");
  const db = newDb();
  const adapter = db.adapters.createPg();
  return new adapter.Pool();
};

const sequentialIds = () => {
  let sequence = 0;
  return () => `lead-${++sequence}`;
};

describe("PostgresLeadStore", () => {
  it("creates the table on first use and lists leads in capture order", async () => {
    const pool = await createTestPool();
    const store = createPostgresLeadStore(pool, { idFactory: sequentialIds(), logger: createSilentLogger() });

    const appended = await store.append({
      email: "ada@acme.test",
      sessionId: "s1",
      capturedAt: "2024-05-01T10:00:00.000Z",
      ip: "203.0.113.7",
    });
    await store.append({ email: "lin@acme.test", sessionId: "s2", capturedAt: "2024-05-01T10:05:00.000Z" });

    expect(appended).toEqual({
      ok: true,
      value: {
        id: "lead-1",
        email: "ada@acme.test",
        sessionId: "s1",
        capturedAt: "2024-05-01T10:00:00.000Z",
        source: "session",
        ip: "203.0.113.7",
      },
    });

    const listed = await store.list();
    expect(listed.ok).toBe(true);
    if (listed.ok) {
      expect(listed.value.map((lead) => [lead.id, lead.email, lead.capturedAt])).toEqual([
        ["lead-1", "ada@acme.test", "2024-05-01T10:00:00.000Z"],
        ["lead-2", "lin@acme.test", "2024-05-01T10:05:00.000Z"],
      ]);
      expect(listed.value[1]?.ip).toBeUndefined();
    }
  });

  it("keeps leads across store instances sharing a database", async () => {
    const pool = await createTestPool();
    const first = createPostgresLeadStore(pool, { idFactory: () => "lead-a", logger: createSilentLogger() });
    await first.append({ email: "ada@acme.test", sessionId: "s1", capturedAt: "2024-05-01T10:00:00.000Z" });

    const second = createPostgresLeadStore(pool, { logger: createSilentLogger() });
    const listed = await second.list();

    expect(listed.ok && listed.value.map((lead) => lead.id)).toEqual(["lead-a"]);
  });

  it("turns query errors into a lead store failure", async () => {
    const { newDb } = await import("pg-mem");
    const db = newDb();
    db.public.none("CREATE TABLE shellpass_leads (seq serial PRIMARY KEY)");
    const pool = new (db.adapters.createPg().Pool)();
    const store = createPostgresLeadStore(pool, { logger: createSilentLogger() });

    const result = await store.append({
      email: "ada@acme.test",
      sessionId: "s1",
      capturedAt: "2024-05-01T10:00:00.000Z",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("leads.store_failed");
      expect(result.error.message).toBe("Lead could not be stored.");
    }
  });
});
