import { Dispatcher, fetch } from "undici";
import type { NotifierConfig } from "./config";
import { TelegramNotifier } from "./telegramNotifier";
import { logger } from "./logger";
import { errorMessage } from "./errors";

const WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * Outbound sink for alerts and escalations. Implementations log their own
 * delivery failures and resolve to false instead of throwing.
 */
export interface Notifier {
  readonly name: string;
  send(text: string): Promise<boolean>;
}

export class LogNotifier implements Notifier {
  readonly name = "log";

  async send(text: string): Promise<boolean> {
    logger.info(`[NOTIFY] ${text}`);
    return true;
  }
}

export interface WebhookNotifierOptions {
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/** Posts `{"text": ...}` to an incoming-webhook URL (Slack and compatible). */
export class WebhookNotifier implements Notifier {
  readonly name = "webhook";
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(
    private readonly url: string,
    options: WebhookNotifierOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? WEBHOOK_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async send(text: string): Promise<boolean> {
    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(this.timeoutMs),
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      // Drain the body so the connection is released
      await response.text();

      if (!response.ok) {
        logger.warn(`Webhook returned status ${response.status}`);
        return false;
      }

      logger.info("Webhook message sent successfully");
      return true;
    } catch (error) {
      logger.error(`Error sending webhook message: ${errorMessage(error)}`, error);
      return false;
    }
  }
}

export function createNotifier(config: NotifierConfig): Notifier {
  switch (config.kind) {
    case "webhook":
      return new WebhookNotifier(config.url);
    case "telegram":
      return new TelegramNotifier(config.botToken, config.chatId);
    case "log":
      return new LogNotifier();
  }
}
