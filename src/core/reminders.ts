import pino, { Logger } from "pino";
import { nanoid } from "nanoid";
import { Store } from "../store/store.js";
import { Repository } from "../store/repository.js";
import { withStore } from "../store/guard.js";
import { SchedulingError, ValidationError } from "./errors.js";
import { normalizeFreeText, normalizeIdentifier } from "./normalize.js";
import { ManualReminder, Notifier } from "../types/contracts.js";

export const DEFAULT_GRACE_SECONDS = 300;

type ReminderStore = Pick<Store, "insertReminder" | "getReminder" | "listReminders" | "transitionReminder" | "retagReminders">;

export type ScheduleInput = {
  firesAt: Date;
  message: string;
  channel: string;
  businessId?: string;
};

export function reminderText(r: ManualReminder): string {
  return r.businessId ? `Reminder for work order ${r.businessId}: ${r.message}` : `Reminder: ${r.message}`;
}

export type ReminderScheduler = ReturnType<typeof createReminderScheduler>;

/**
 * One-shot reminders. A reminder is moved out of "pending" before it is
 * delivered, so repeated or overlapping ticks never send it twice.
 */
export function createReminderScheduler(args: {
  store: ReminderStore;
  notifier: Notifier;
  // orders the audit trail is written against; reminders without an order are not audited
  repository?: Pick<Repository, "findByBusinessId" | "recordEvent">;
  graceSeconds?: number;
  pollIntervalMs?: number;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "reminder-scheduler" });
  const clock = args.now ?? (() => new Date());
  const graceMs = (args.graceSeconds ?? DEFAULT_GRACE_SECONDS) * 1000;
  const store = args.store;
  let timer: NodeJS.Timeout | undefined;
  let ticking = false;

  // Called once the reminder write has committed; failures are logged only.
  async function audit(r: ManualReminder, type: string, actor: string) {
    if (!r.businessId || !args.repository) return;
    try {
      const order = await args.repository.findByBusinessId(r.businessId);
      if (!order) return;
      await args.repository.recordEvent(order, type, actor, { reminderId: r.id, firesAt: r.firesAt });
    } catch (err) {
      log.warn({ err, reminderId: r.id, type }, "reminder: audit failed");
    }
  }

  async function schedule(input: ScheduleInput, actor: string = "system"): Promise<ManualReminder> {
    const at = clock();
    if (Number.isNaN(input.firesAt.getTime())) throw new SchedulingError("The reminder time is not a valid date.");
    if (input.firesAt.getTime() < at.getTime() - graceMs) {
      throw new SchedulingError("The reminder time is in the past.");
    }
    const message = normalizeFreeText(input.message);
    if (!message) throw new ValidationError("The reminder message cannot be empty.", "message");

    const businessId = input.businessId !== undefined ? normalizeIdentifier(input.businessId) : "";
    const reminder: ManualReminder = {
      id: nanoid(),
      ...(businessId ? { businessId } : {}),
      firesAt: input.firesAt.toISOString(),
      message,
      channel: input.channel,
      status: "pending",
      createdAt: at.toISOString()
    };

    await withStore(log, "insertReminder", () => store.insertReminder(reminder));
    await audit(reminder, "reminder_scheduled", actor);
    log.info({ reminderId: reminder.id, businessId: reminder.businessId ?? null, firesAt: reminder.firesAt }, "reminder: scheduled");
    return reminder;
  }

  /** Idempotent: false when the reminder is unknown, already fired or already cancelled. */
  async function cancel(reminderId: string, actor: string = "system"): Promise<boolean> {
    const ok = await withStore(log, "cancelReminder", () =>
      store.transitionReminder(reminderId, "pending", "cancelled", clock().toISOString()));
    if (!ok) return false;
    let r: ManualReminder | null = null;
    try {
      r = await store.getReminder(reminderId);
    } catch (err) {
      log.warn({ err, reminderId }, "reminder: audit failed");
    }
    if (r) await audit(r, "reminder_cancelled", actor);
    log.info({ reminderId }, "reminder: cancelled");
    return true;
  }

  async function cancelAllFor(businessId: string, actor: string = "system"): Promise<number> {
    const pending = await withStore(log, "listReminders", () =>
      store.listReminders({ status: "pending", businessId: normalizeIdentifier(businessId) }));
    let n = 0;
    for (const r of pending) {
      if (await cancel(r.id, actor)) n++;
    }
    return n;
  }

  /** Moves pending reminders of a renamed order to its new business id. */
  async function retag(fromBusinessId: string, toBusinessId: string): Promise<number> {
    const n = await withStore(log, "retagReminders", () => store.retagReminders(fromBusinessId, toBusinessId));
    if (n > 0) log.info({ from: fromBusinessId, to: toBusinessId, count: n }, "reminder: retagged");
    return n;
  }

  async function list(q: { businessId?: string } = {}): Promise<ManualReminder[]> {
    return withStore(log, "listReminders", () => store.listReminders({ status: "pending", ...q }));
  }

  async function tick(at: Date = clock()): Promise<ManualReminder[]> {
    const due = await withStore(log, "listReminders", () =>
      store.listReminders({ status: "pending", dueBefore: at.toISOString() }));
    const fired: ManualReminder[] = [];

    for (const r of due) {
      let claimed: boolean;
      try {
        claimed = await store.transitionReminder(r.id, "pending", "fired", at.toISOString());
      } catch (err) {
        log.error({ err, reminderId: r.id }, "reminder: could not claim");
        continue;
      }
      if (!claimed) continue;

      try {
        await args.notifier.notify({
          kind: "reminder",
          channel: r.channel,
          text: reminderText(r),
          reminderId: r.id,
          ...(r.businessId ? { businessId: r.businessId } : {})
        });
        fired.push({ ...r, status: "fired", firedAt: at.toISOString() });
        log.info({ reminderId: r.id, businessId: r.businessId ?? null }, "reminder: fired");
      } catch (err) {
        // already consumed; at-most-once
        log.error({ err, reminderId: r.id }, "reminder: delivery failed");
        continue;
      }

      await audit(r, "reminder_fired", "system");
    }
    return fired;
  }

  function poll() {
    if (ticking) return;
    ticking = true;
    void tick()
      .catch((err) => log.error({ err }, "reminder: tick aborted"))
      .finally(() => { ticking = false; });
  }

  function start() {
    if (timer) return;
    poll();
    timer = setInterval(poll, args.pollIntervalMs ?? 30_000);
    timer.unref();
  }

  function stop() {
    if (timer) clearInterval(timer);
    timer = undefined;
  }

  return { schedule, cancel, cancelAllFor, retag, list, tick, start, stop };
}
