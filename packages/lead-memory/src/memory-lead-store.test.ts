import { describe, expect, it } from "vitest";

import { createMemoryLeadStore } from "./memory-lead-store.js";

describe("MemoryLeadStore", () => {
  it("appends leads in capture order", async () => {
    let sequence = 0;
    const store = createMemoryLeadStore({ idFactory: () => `lead-${++sequence}` });

    await store.append({ email: "ada@acme.test", sessionId: "s1", capturedAt: "2024-05-01T10:00:00.000Z" });
    await store.append({
      email: "lin@acme.test",
      sessionId: "s2",
      capturedAt: "2024-05-01T10:05:00.000Z",
      ip: "203.0.113.7",
    });

    const listed = await store.list();

    expect(listed).toEqual({
      ok: true,
      value: [
        {
          id: "lead-1",
          email: "ada@acme.test",
          sessionId: "s1",
          capturedAt: "2024-05-01T10:00:00.000Z",
          source: "session",
        },
        {
          id: "lead-2",
          email: "lin@acme.test",
          sessionId: "s2",
          capturedAt: "2024-05-01T10:05:00.000Z",
          source: "session",
          ip: "203.0.113.7",
        },
      ],
    });
  });

  it("hands out copies", async () => {
    const store = createMemoryLeadStore({ idFactory: () => "lead-1" });
    const appended = await store.append({
      email: "ada@acme.test",
      sessionId: "s1",
      capturedAt: "2024-05-01T10:00:00.000Z",
    });
    if (appended.ok) {
      Object.assign(appended.value, { email: "changed@acme.test" });
    }

    const listed = await store.list();

    expect(listed.ok && listed.value[0]?.email).toBe("ada@acme.test");
  });
});
