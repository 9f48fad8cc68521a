import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { Logger } from "pino";
import { Repository } from "../store/repository.js";
import { ReminderScheduler } from "../core/reminders.js";
import { PersistenceError } from "../core/errors.js";
import { CategorySchema, OrderStatusSchema } from "../store/rows.js";
import { makeRateLimiter } from "./rate-limit.js";

const OrdersQuery = z.object({
  category: CategorySchema.optional(),
  status: OrderStatusSchema.optional(),
  open: z.enum(["0", "1"]).optional()
});

const RemindersQuery = z.object({ businessId: z.string().min(1).optional() });

type Handler = (req: Request, res: Response) => Promise<unknown>;

/** Express 4 does not await handlers; failures are answered here. */
export function asyncRoute(log: Logger, fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    void fn(req, res).catch((err: unknown) => {
      if (res.headersSent) return next(err);
      if (err instanceof PersistenceError) {
        log.error({ err, path: req.path }, "api: store unavailable");
        return res.status(503).json({ ok: false, error: err.code });
      }
      log.error({ err, path: req.path }, "api: request failed");
      return res.status(500).json({ ok: false, error: "internal_error" });
    });
  };
}

/** Read-only dashboard API over work orders, their audit trail and pending reminders. */
export function makeRoutes(args: {
  repository: Repository;
  scheduler: Pick<ReminderScheduler, "list">;
  rateLimit: { windowMs: number; max: number };
  logger: Logger;
}) {
  const r = Router();
  const log = args.logger.child({ component: "api" });

  r.get("/health", async (_req, res) => {
    res.json({ ok: true });
  });

  r.use(makeRateLimiter(args.rateLimit));

  r.get("/orders", asyncRoute(log, async (req, res) => {
    const q = OrdersQuery.safeParse(req.query);
    if (!q.success) return res.status(400).json({ ok: false, error: "invalid_query" });

    const items = await args.repository.query({
      category: q.data.category,
      status: q.data.status,
      openOnly: q.data.open === "1"
    });
    return res.json({ ok: true, items });
  }));

  r.get("/orders/:businessId", asyncRoute(log, async (req, res) => {
    const item = await args.repository.findByBusinessId(req.params.businessId);
    if (!item) return res.status(404).json({ ok: false, error: "not_found" });
    return res.json({ ok: true, item });
  }));

  r.get("/orders/:businessId/events", asyncRoute(log, async (req, res) => {
    const item = await args.repository.findByBusinessId(req.params.businessId);
    if (!item) return res.status(404).json({ ok: false, error: "not_found" });
    const events = await args.repository.events(item.id);
    return res.json({ ok: true, events });
  }));

  r.get("/reminders", asyncRoute(log, async (req, res) => {
    const q = RemindersQuery.safeParse(req.query);
    if (!q.success) return res.status(400).json({ ok: false, error: "invalid_query" });
    const items = await args.scheduler.list(q.data.businessId ? { businessId: q.data.businessId } : {});
    return res.json({ ok: true, items });
  }));

  return r;
}
