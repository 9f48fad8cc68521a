import pino, { Logger } from "pino";
import { z } from "zod";
import { ChatTransport, Notification, Notifier, Prompt } from "../types/contracts.js";

const ApiReply = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
});

const FileInfo = z.object({ file_path: z.string().optional() });

export type TelegramResult =
  | { ok: true; result: unknown }
  | { ok: true; dryRun: true }
  | { ok: false; error: "telegram_not_configured" | "telegram_call_failed"; status?: number; description?: string };

export class TelegramError extends Error {
  constructor(public readonly method: string, public readonly detail: Extract<TelegramResult, { ok: false }>) {
    super(`Telegram ${method} failed: ${detail.description ?? detail.error}`);
    this.name = "TelegramError";
  }
}

/**
 * Bot API client used both as the chat transport and as the notifier:
 * every prompt and alert ends up as a sendMessage to a chat id.
 */
export class TelegramTransport implements ChatTransport, Notifier {
  private token?: string;
  private apiBase: string;
  private dryRun?: boolean;
  private fetchImpl: typeof fetch;
  private log: Logger;

  constructor(args: { token?: string; dryRun?: boolean; apiBase?: string; fetchImpl?: typeof fetch; logger?: Logger }) {
    this.token = args.token;
    this.dryRun = args.dryRun;
    this.apiBase = args.apiBase ?? "https://api.telegram.org";
    this.fetchImpl = args.fetchImpl ?? fetch;
    this.log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "telegram" });
  }

  isConfigured() {
    return !!this.token;
  }

  async call(method: string, payload: Record<string, unknown>): Promise<TelegramResult> {
    if (!this.token) return { ok: false, error: "telegram_not_configured" };
    if (this.dryRun) {
      // safe mode: logs instead of sending
      this.log.info({ method, payload }, "telegram: dry run");
      return { ok: true, dryRun: true };
    }

    const r = await this.fetchImpl(`${this.apiBase}/bot${this.token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload)
    });
    const body = ApiReply.safeParse(await r.json().catch(() => null));
    if (!r.ok || !body.success || !body.data.ok) {
      return {
        ok: false,
        error: "telegram_call_failed",
        status: r.status,
        ...(body.success && body.data.description ? { description: body.data.description } : {})
      };
    }
    return { ok: true, result: body.data.result };
  }

  private async callOrThrow(method: string, payload: Record<string, unknown>): Promise<TelegramResult> {
    const res = await this.call(method, payload);
    if (!res.ok) throw new TelegramError(method, res);
    return res;
  }

  async sendText(chatId: string, text: string, choices?: Prompt["choices"]) {
    const payload: Record<string, unknown> = { chat_id: chatId, text };
    if (choices?.length) {
      payload.reply_markup = { inline_keyboard: choices.map((c) => [{ text: c.label, callback_data: c.token }]) };
    }
    await this.callOrThrow("sendMessage", payload);
  }

  async sendPrompt(sessionId: string, prompt: Prompt): Promise<void> {
    await this.sendText(sessionId, prompt.text, prompt.choices);
  }

  async notify(n: Notification): Promise<void> {
    await this.sendText(n.channel, n.text);
  }

  async answerCallback(callbackQueryId: string): Promise<void> {
    await this.callOrThrow("answerCallbackQuery", { callback_query_id: callbackQueryId });
  }

  /** Fetches an uploaded file's bytes through getFile. */
  async downloadDocument(fileId: string): Promise<Buffer> {
    const res = await this.callOrThrow("getFile", { file_id: fileId });
    if (!("result" in res)) throw new TelegramError("getFile", { ok: false, error: "telegram_call_failed", description: "file download is not available in dry run" });
    const info = FileInfo.safeParse(res.result);
    if (!info.success || !info.data.file_path) {
      throw new TelegramError("getFile", { ok: false, error: "telegram_call_failed", description: "no file_path" });
    }

    const r = await this.fetchImpl(`${this.apiBase}/file/bot${this.token}/${info.data.file_path}`);
    if (!r.ok) throw new TelegramError("downloadFile", { ok: false, error: "telegram_call_failed", status: r.status });
    return Buffer.from(await r.arrayBuffer());
  }
}
