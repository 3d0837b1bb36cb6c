import { errorMessage } from "../../shared/text-utils.js";
import { silentLogger, type MonitorLogger } from "../utils/logger.js";

/** Delivers a formatted message to the operator. Never throws. */
export interface Notifier {
  notify: (message: string) => Promise<boolean>;
}

interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: MonitorLogger;
}

const isObjectRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export class TelegramNotifier implements Notifier {
  private readonly botToken: string;

  private readonly chatId: string;

  private readonly apiBaseUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: typeof fetch;

  private readonly logger: MonitorLogger;

  constructor(options: TelegramNotifierOptions) {
    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.apiBaseUrl = (options.apiBaseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  private methodUrl(method: string): string {
    return `${this.apiBaseUrl}/bot${this.botToken}/${method}`;
  }

  async notify(message: string): Promise<boolean> {
    try {
      const response = await this.fetchImpl(this.methodUrl("sendMessage"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: message,
          parse_mode: "HTML",
          disable_web_page_preview: true
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        this.logger.error(
          `[telegram] sendMessage failed: HTTP ${response.status}${body ? ` - ${body.slice(0, 200)}` : ""}`
        );
        return false;
      }

      this.logger.info("[telegram] Notification sent");
      return true;
    } catch (error) {
      this.logger.error(`[telegram] Failed to send message: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Calls `getMe`; resolves to the bot username, or null when unreachable. */
  async verifyConnection(): Promise<string | null> {
    try {
      const response = await this.fetchImpl(this.methodUrl("getMe"), {
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        this.logger.error(`[telegram] getMe failed: HTTP ${response.status}`);
        return null;
      }

      const payload: unknown = await response.json();
      const result = isObjectRecord(payload) ? payload.result : undefined;
      const username = isObjectRecord(result) ? result.username : undefined;
      if (typeof username !== "string") {
        this.logger.error("[telegram] getMe returned no bot username");
        return null;
      }

      this.logger.info(`[telegram] Bot connected: ${username}`);
      return username;
    } catch (error) {
      this.logger.error(`[telegram] Connection test failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
