import { z } from "zod";
import { TurnInput } from "../types/contracts.js";

/**
 * Telegram Bot API update: only the parts the desk reads.
 * - message text (commands included)
 * - message document
 * - callback_query data from inline buttons
 */
const Chat = z.object({ id: z.union([z.number(), z.string()]) });

const TGUpdate = z.object({
  update_id: z.number(),
  message: z.object({
    message_id: z.number(),
    chat: Chat,
    text: z.string().optional(),
    document: z.object({
      file_id: z.string(),
      file_name: z.string().optional(),
      mime_type: z.string().optional()
    }).optional()
  }).passthrough().optional(),
  callback_query: z.object({
    id: z.string(),
    data: z.string().optional(),
    message: z.object({ chat: Chat }).passthrough().optional()
  }).passthrough().optional()
}).passthrough();

export type TelegramTurn =
  | { chatId: string; input: Exclude<TurnInput, { kind: "document" }>; callbackQueryId?: string }
  | { chatId: string; document: { fileId: string; fileName?: string; mimeType?: string } };

const COMMANDS = ["start", "menu", "cancel"] as const;

function commandOf(text: string): (typeof COMMANDS)[number] | null {
  const m = /^\/([a-z]+)(@\w+)?\s*$/i.exec(text.trim());
  if (!m) return null;
  const name = m[1].toLowerCase();
  return COMMANDS.find((c) => c === name) ?? null;
}

/** Maps an update to a chat turn; null for updates the desk does not handle. */
export function telegramUpdateToTurn(body: unknown): TelegramTurn | null {
  const parsed = TGUpdate.safeParse(body);
  if (!parsed.success) return null;
  const u = parsed.data;

  if (u.callback_query) {
    const cq = u.callback_query;
    if (!cq.message || cq.data === undefined) return null;
    return { chatId: String(cq.message.chat.id), input: { kind: "choice", token: cq.data }, callbackQueryId: cq.id };
  }

  const msg = u.message;
  if (!msg) return null;
  const chatId = String(msg.chat.id);

  if (msg.document) {
    return {
      chatId,
      document: {
        fileId: msg.document.file_id,
        ...(msg.document.file_name ? { fileName: msg.document.file_name } : {}),
        ...(msg.document.mime_type ? { mimeType: msg.document.mime_type } : {})
      }
    };
  }

  if (msg.text === undefined) return null;
  const command = commandOf(msg.text);
  if (command) return { chatId, input: { kind: "command", command } };
  return { chatId, input: { kind: "text", text: msg.text } };
}
