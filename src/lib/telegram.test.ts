import { describe, it } from "node:test";
import assert from "node:assert";
import pino from "pino";
import { TelegramError, TelegramTransport } from "./telegram.js";

const logger = pino({ level: "silent" });
const API = "https://api.test";

type Call = { url: string; body: unknown };

function fakeFetch(replies: Response[]) {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init) => {
    const raw = init?.body;
    const body: unknown = typeof raw === "string" ? JSON.parse(raw) : undefined;
    calls.push({ url: String(input), body });
    const next = replies.shift();
    if (!next) throw new Error("unexpected request");
    return next;
  };
  return { calls, impl };
}

const json = (body: unknown, status: number = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("TelegramTransport", () => {
  it("reports a missing token", async () => {
    const tg = new TelegramTransport({ logger });
    assert.strictEqual(tg.isConfigured(), false);
    assert.deepStrictEqual(await tg.call("sendMessage", {}), { ok: false, error: "telegram_not_configured" });
    await assert.rejects(tg.sendText("4242", "hello"), TelegramError);
  });

  it("logs instead of sending in dry run", async () => {
    const f = fakeFetch([]);
    const tg = new TelegramTransport({ token: "test-token", dryRun: true, apiBase: API, fetchImpl: f.impl, logger });
    assert.deepStrictEqual(await tg.call("sendMessage", { chat_id: "4242", text: "hello" }), { ok: true, dryRun: true });
    await tg.notify({ kind: "reminder", channel: "4242", text: "Reminder: hello", reminderId: "r1" });
    assert.strictEqual(f.calls.length, 0);
  });

  it("sends prompts with one button per row", async () => {
    const f = fakeFetch([json({ ok: true, result: { message_id: 1 } })]);
    const tg = new TelegramTransport({ token: "test-token", apiBase: API, fetchImpl: f.impl, logger });

    await tg.sendPrompt("4242", {
      text: "Choose Category:",
      choices: [{ label: "Corrective", token: "pick:Corrective" }, { label: "Cancel", token: "cancel" }]
    });

    assert.deepStrictEqual(f.calls, [{
      url: "https://api.test/bottest-token/sendMessage",
      body: {
        chat_id: "4242",
        text: "Choose Category:",
        reply_markup: {
          inline_keyboard: [
            [{ text: "Corrective", callback_data: "pick:Corrective" }],
            [{ text: "Cancel", callback_data: "cancel" }]
          ]
        }
      }
    }]);
  });

  it("turns API errors into TelegramError", async () => {
    const f = fakeFetch([json({ ok: false, description: "Bad Request: chat not found" }, 400)]);
    const tg = new TelegramTransport({ token: "test-token", apiBase: API, fetchImpl: f.impl, logger });
    await assert.rejects(
      tg.sendText("4242", "hello"),
      (err: unknown) => err instanceof TelegramError && err.message === "Telegram sendMessage failed: Bad Request: chat not found"
    );
  });

  it("downloads documents through getFile", async () => {
    const f = fakeFetch([
      json({ ok: true, result: { file_id: "file-1", file_path: "documents/file_1.txt" } }),
      new Response("Order number: 1001", { status: 200 })
    ]);
    const tg = new TelegramTransport({ token: "test-token", apiBase: API, fetchImpl: f.impl, logger });

    const bytes = await tg.downloadDocument("file-1");
    assert.strictEqual(bytes.toString("utf8"), "Order number: 1001");
    assert.deepStrictEqual(f.calls.map((c) => c.url), [
      "https://api.test/bottest-token/getFile",
      "https://api.test/file/bottest-token/documents/file_1.txt"
    ]);
  });
});
