import { describe, expect, it } from "vitest";

import { createSilentLogger } from "@shellpass/telemetry";

import { FetchHttpClient, type HttpClient, type HttpRequest, type HttpResponse } from "../src/http-client.js";
import { SlackSessionNotifier, buildSlackMessage } from "../src/slack-notifier.js";

const WEBHOOK_URL = "https://hooks.slack.test/services/test-webhook";

const notification = {
  sessionId: "abcdef1234567890",
  email: "dev@acme.test",
  startedAt: "2024-05-01T10:05:30.000Z",
};

class RecordingHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly respond: (request: HttpRequest) => Promise<HttpResponse>) {}

  async execute(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.respond(request);
  }
}

const createNotifier = (httpClient: HttpClient) =>
  new SlackSessionNotifier({ webhookUrl: WEBHOOK_URL, httpClient, logger: createSilentLogger() });

describe("buildSlackMessage", () => {
  it("shows the email, a shortened session id and the start time in UTC", () => {
    expect(buildSlackMessage(notification)).toEqual({
      text: "New demo session",
      blocks: [
        {
          type: "section",
          text: {
            type: "mrkdwn",
            text: "*New Demo Session Started*\n\n*Email:* dev@acme.test\n*Session:* `abcdef12...`\n*Time:* 2024-05-01 10:05 UTC",
          },
        },
      ],
    });
  });
});

describe("SlackSessionNotifier", () => {
  it("posts the message as JSON to the webhook", async () => {
    const client = new RecordingHttpClient(async () => ({ status: 200, headers: {}, body: "ok" }));

    const result = await createNotifier(client).sessionStarted(notification);

    expect(result.ok).toBe(true);
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]).toEqual({
      url: WEBHOOK_URL,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(buildSlackMessage(notification)),
    });
  });

  it("reports a rejected delivery with the response status", async () => {
    const client = new RecordingHttpClient(async () => ({ status: 500, headers: {}, body: "invalid_payload" }));

    const result = await createNotifier(client).sessionStarted(notification);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      code: "notifier.delivery_failed",
      message: "Slack rejected the notification.",
      details: { status: 500 },
    });
  });

  it("reports a transport failure as retryable", async () => {
    const client = new RecordingHttpClient(async () => {
      throw new Error("socket hang up");
    });

    const result = await createNotifier(client).sessionStarted(notification);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      code: "notifier.delivery_failed",
      message: "Slack notification could not be sent.",
      details: { cause: "socket hang up" },
      retryable: true,
    });
  });
});

describe("FetchHttpClient", () => {
  it("sends the request through fetch and reads the response", async () => {
    const calls: Array<{ readonly input: string; readonly init?: RequestInit }> = [];
    const client = new FetchHttpClient(async (input, init) => {
      calls.push({ input, init });
      return new Response("accepted", { status: 202, headers: { "X-Request-Id": "req-1" } });
    });

    const response = await client.execute({ url: WEBHOOK_URL, body: "{}" });

    expect(calls).toEqual([{ input: WEBHOOK_URL, init: { method: "POST", headers: undefined, body: "{}" } }]);
    expect(response.status).toBe(202);
    expect(response.body).toBe("accepted");
    expect(response.headers["x-request-id"]).toBe("req-1");
  });
});
