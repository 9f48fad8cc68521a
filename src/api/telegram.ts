import { Router } from "express";
import { Logger } from "pino";
import { Workflow } from "../core/workflow.js";
import { TelegramTransport } from "../lib/telegram.js";
import { telegramUpdateToTurn } from "../adapters/telegram.js";
import { verifyTelegramSecret } from "./verify-telegram.js";
import { asyncRoute } from "./routes.js";

export function makeTelegramRoutes(args: {
  workflow: Pick<Workflow, "handleTurn">;
  telegram: Pick<TelegramTransport, "answerCallback" | "downloadDocument" | "sendText">;
  webhookSecret?: string;
  logger: Logger;
}) {
  const r = Router();
  const log = args.logger.child({ component: "telegram-webhook" });

  // Always 200 once the secret matches: Telegram redelivers anything else, out of order.
  r.post("/webhook", asyncRoute(log, async (req, res) => {
    const v = verifyTelegramSecret(req, args.webhookSecret);
    if (!v.ok) return res.status(401).json({ ok: false, error: v.error });

    const turn = telegramUpdateToTurn(req.body);
    if (!turn) return res.json({ ok: true, ignored: true });

    try {
      if ("document" in turn) {
        let bytes: Buffer;
        try {
          bytes = await args.telegram.downloadDocument(turn.document.fileId);
        } catch (err) {
          log.warn({ err, chatId: turn.chatId }, "telegram: document download failed");
          await args.telegram.sendText(turn.chatId, "The document could not be downloaded. Please send it again.");
          return res.json({ ok: true });
        }
        await args.workflow.handleTurn(turn.chatId, turn.chatId, {
          kind: "document",
          bytes,
          fileName: turn.document.fileName,
          mimeType: turn.document.mimeType
        });
      } else {
        if (turn.callbackQueryId) {
          // acknowledgement only stops the button spinner; the press is handled either way
          try {
            await args.telegram.answerCallback(turn.callbackQueryId);
          } catch (err) {
            log.warn({ err, chatId: turn.chatId }, "telegram: callback not acknowledged");
          }
        }
        await args.workflow.handleTurn(turn.chatId, turn.chatId, turn.input);
      }
    } catch (err) {
      log.error({ err, chatId: turn.chatId }, "telegram: update not delivered");
    }
    return res.json({ ok: true });
  }));

  return r;
}
