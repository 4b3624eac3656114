import {
  createError,
  createInfraError,
  err,
  ok,
  ShellpassErrorCodes,
  type Result,
  type SessionNotifierPort,
  type SessionStartedNotification,
  type ShellpassError,
} from "@shellpass/contracts";
import { createShellpassLogger, type ShellpassLogger } from "@shellpass/telemetry";

import { FetchHttpClient, type HttpClient } from "./http-client.js";

export interface SlackNotifierOptions {
  readonly webhookUrl: string;
  readonly httpClient?: HttpClient;
  readonly logger?: ShellpassLogger;
}

const formatUtc = (iso: string): string => {
  const date = new Date(iso);
  const stamp = Number.isNaN(date.getTime()) ? iso : date.toISOString();
  return `${stamp.slice(0, 10)} ${stamp.slice(11, 16)} UTC`;
};

export const buildSlackMessage = (notification: SessionStartedNotification): Record<string, unknown> => ({
  text: "New demo session",
  blocks: [
    {
      type: "section",
      text: {
        type: "mrkdwn",
        text: [
          "*New Demo Session Started*",
          "",
          `*Email:* ${notification.email}`,
          `*Session:* \`${notification.sessionId.slice(0, 8)}...\``,
          `*Time:* ${formatUtc(notification.startedAt)}`,
        ].join("\n"),
      },
    },
  ],
});

/** Posts a message to a Slack incoming webhook whenever a session starts. */
export class SlackSessionNotifier implements SessionNotifierPort {
  private readonly webhookUrl: string;
  private readonly httpClient: HttpClient;
  private readonly logger: ShellpassLogger;

  constructor(options: SlackNotifierOptions) {
    this.webhookUrl = options.webhookUrl;
    this.httpClient = options.httpClient ?? new FetchHttpClient();
    this.logger = options.logger ?? createShellpassLogger({ name: "slack-notifier" });
  }

  async sessionStarted(notification: SessionStartedNotification): Promise<Result<void, ShellpassError>> {
    try {
      const response = await this.httpClient.execute({
        url: this.webhookUrl,
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(buildSlackMessage(notification)),
      });

      if (response.status < 200 || response.status > 299) {
        this.logger.warn("slack.notify_rejected", { sessionId: notification.sessionId, status: response.status });
        return err(
          createError(ShellpassErrorCodes.notifyFailed, "Slack rejected the notification.", {
            status: response.status,
          }),
        );
      }

      this.logger.debug("slack.notified", { sessionId: notification.sessionId });
      return ok(undefined);
    } catch (error) {
      this.logger.warn("slack.notify_failed", {
        sessionId: notification.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return err(createInfraError(ShellpassErrorCodes.notifyFailed, "Slack notification could not be sent.", error));
    }
  }
}

export const createSlackSessionNotifier = (options: SlackNotifierOptions): SlackSessionNotifier =>
  new SlackSessionNotifier(options);
