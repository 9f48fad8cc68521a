import crypto from "crypto";

type HeaderSource = { header(name: string): string | undefined };

/**
 * Checks the secret Telegram echoes back in X-Telegram-Bot-Api-Secret-Token
 * (set through setWebhook). Without a configured secret every request passes.
 */
export function verifyTelegramSecret(req: HeaderSource, secret?: string): { ok: true } | { ok: false; error: string } {
  if (!secret) return { ok: true };

  const header = req.header("x-telegram-bot-api-secret-token") || "";
  if (!header) return { ok: false, error: "missing_secret_token" };

  const a = Buffer.from(secret);
  const b = Buffer.from(header);
  if (a.length !== b.length) return { ok: false, error: "invalid_secret_token" };

  return crypto.timingSafeEqual(a, b) ? { ok: true } : { ok: false, error: "invalid_secret_token" };
}
