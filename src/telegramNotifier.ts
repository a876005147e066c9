import TelegramBot from "node-telegram-bot-api";
import type { Notifier } from "./notifier";
import { logger } from "./logger";
import { errorMessage } from "./errors";

export class TelegramNotifier implements Notifier {
  readonly name = "telegram";
  private bot: TelegramBot;
  private chatId: string;

  constructor(botToken: string, chatId: string) {
    if (!botToken || !chatId) {
      throw new Error("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required");
    }
    this.chatId = chatId;
    this.bot = new TelegramBot(botToken, { polling: false });
    logger.info("TelegramNotifier initialized");
  }

  /**
   * Alerts are written with *bold* and _italic_ markers for the legacy
   * Markdown parse mode. Text Telegram cannot parse that way (a stray `_`
   * in a name or error message) is resent as plain text.
   */
  async send(text: string): Promise<boolean> {
    try {
      try {
        await this.bot.sendMessage(this.chatId, text, {
          parse_mode: "Markdown",
          disable_web_page_preview: true,
        });
      } catch (error) {
        if (!isEntityParseError(error)) {
          throw error;
        }
        logger.warn("Telegram could not parse the message as Markdown, resending as plain text");
        await this.bot.sendMessage(this.chatId, text, { disable_web_page_preview: true });
      }

      logger.info(`Successfully sent message to Telegram chat ${this.chatId}`);
      return true;
    } catch (error) {
      logger.error(`Failed to send message to Telegram: ${errorMessage(error)}`, error);
      return false;
    }
  }
}

function isEntityParseError(error: unknown): boolean {
  return errorMessage(error).includes("can't parse entities");
}
