import { z } from "zod";

import { BackendHttpClient } from "../backends/http.js";
import { createLoggerFacade } from "../shared/logging/logger.js";
import type { ChatDelivery } from "./types.js";

export interface TelegramChatDeliveryOptions {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
}

const ApiResultSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional()
});

export function renderMentions(text: string, mentions: readonly string[] = []): string {
  const tags = mentions
    .map((mention) => mention.trim().replace(/^@/, ""))
    .filter((mention) => mention.length > 0)
    .map((mention) => `@${mention}`);
  return tags.length > 0 ? `${text}\n${tags.join(" ")}` : text;
}

/**
 * Telegram Bot API 投递（HTML 解析模式）
 */
export class TelegramChatDelivery implements ChatDelivery {
  private readonly http: BackendHttpClient;
  private readonly logger = createLoggerFacade("chat.telegram");

  constructor(options: TelegramChatDeliveryOptions) {
    const base = (options.apiBaseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    this.http = new BackendHttpClient({
      baseUrl: `${base}/bot${options.botToken}/`,
      timeoutMs: options.timeoutMs ?? 30_000,
      logCategory: "chat.telegram"
    });
  }

  async sendMessage(chatId: string, text: string, mentions: readonly string[] = []): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text: renderMentions(text, mentions),
      parse_mode: "HTML",
      disable_web_page_preview: true
    });
  }

  async updateMessage(chatId: string, messageId: string, text: string): Promise<void> {
    await this.call("editMessageText", {
      chat_id: chatId,
      message_id: Number(messageId),
      text,
      parse_mode: "HTML"
    });
  }

  private async call(method: string, payload: Record<string, unknown>): Promise<void> {
    const response = await this.http.request(method, { method: "POST", json: payload });
    const result = ApiResultSchema.safeParse(response.body);
    if (!result.success || !result.data.ok) {
      const description = result.success ? result.data.description : undefined;
      throw new Error(`Telegram ${method} 失败：${description ?? "响应格式错误"}`);
    }
    this.logger.info("Telegram message delivered", { method, chatId: payload.chat_id });
  }
}
