import pino, { Logger } from "pino";
import { Store } from "../store/store.js";
import { Repository } from "../store/repository.js";
import { alertKeyOf } from "./dedupe.js";
import { dueDateOf } from "./fields.js";
import { calendarDayIn, daysBetween, formatCalendarDate, isIsoCalendarDay } from "./dates.js";
import { fieldText } from "./render.js";
import { AlertClass, DeadlineAlert, Notifier, WorkOrder } from "../types/contracts.js";

export const DEFAULT_ALERT_CLASSES: readonly AlertClass[] = ["overdue", "dueTomorrow", "dueIn2Days"];

/** Alert class for a whole-day distance to the due date, or null when none applies. */
export function classify(daysUntilDue: number): AlertClass | null {
  if (daysUntilDue < 0) return "overdue";
  if (daysUntilDue === 0) return "dueToday";
  if (daysUntilDue === 1) return "dueTomorrow";
  if (daysUntilDue === 2) return "dueIn2Days";
  return null;
}

export function alertText(order: WorkOrder, alert: DeadlineAlert, daysUntilDue: number): string {
  const due = formatCalendarDate(dueDateOf(order) ?? alert.day);
  return `Work order ${order.businessId} ${whenDue(alert.alertClass, daysUntilDue)} (due ${due}).\n${fieldText(order, "description")}`;
}

function whenDue(alertClass: AlertClass, daysUntilDue: number): string {
  switch (alertClass) {
    case "overdue": {
      const late = -daysUntilDue;
      return `is overdue by ${late} day${late === 1 ? "" : "s"}`;
    }
    case "dueToday": return "is due today";
    case "dueTomorrow": return "is due tomorrow";
    case "dueIn2Days": return "is due in 2 days";
  }
}

export type SweepResult = {
  day: string;
  checked: number;
  notified: DeadlineAlert[];
  skipped: number;
  failed: number;
};

export type DeadlineMonitor = ReturnType<typeof createDeadlineMonitor>;

export function createDeadlineMonitor(args: {
  repository: Pick<Repository, "query">;
  marks: Pick<Store, "claimAlert">;
  notifier: Notifier;
  timezone: string;
  alertClasses?: readonly AlertClass[];
  fallbackChannel?: string;
  intervalMs?: number;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "deadline-monitor" });
  const clock = args.now ?? (() => new Date());
  const enabled = new Set<AlertClass>(args.alertClasses ?? DEFAULT_ALERT_CLASSES);
  let timer: NodeJS.Timeout | undefined;
  let running: Promise<SweepResult> | undefined;

  async function sweep(at: Date = clock()): Promise<SweepResult> {
    const today = calendarDayIn(args.timezone, at);
    const result: SweepResult = { day: today, checked: 0, notified: [], skipped: 0, failed: 0 };

    const orders = await args.repository.query({ openOnly: true });
    for (const order of orders) {
      result.checked++;

      const due = dueDateOf(order);
      if (!due || !isIsoCalendarDay(due)) {
        log.warn({ workOrderId: order.id, businessId: order.businessId, dueDate: due ?? null }, "sweep: unreadable due date, skipped");
        result.skipped++;
        continue;
      }

      const daysUntilDue = daysBetween(today, due);
      const alertClass = classify(daysUntilDue);
      if (!alertClass || !enabled.has(alertClass)) continue;

      const channel = order.channel ?? args.fallbackChannel;
      if (!channel) {
        log.warn({ businessId: order.businessId, alertClass }, "sweep: no delivery channel, skipped");
        result.skipped++;
        continue;
      }

      const alert: DeadlineAlert = { businessId: order.businessId, alertClass, day: today };

      // claimed before delivery: a failed send is not retried the same day
      let claimed: boolean;
      try {
        claimed = await args.marks.claimAlert(alertKeyOf(alert), at.toISOString());
      } catch (err) {
        log.error({ err, businessId: order.businessId, alertClass }, "sweep: could not record alert");
        result.failed++;
        continue;
      }
      if (!claimed) continue;

      try {
        await args.notifier.notify({ kind: "deadline", channel, text: alertText(order, alert, daysUntilDue), alert });
        result.notified.push(alert);
        log.info({ businessId: order.businessId, alertClass, day: today }, "sweep: alert sent");
      } catch (err) {
        log.error({ err, businessId: order.businessId, alertClass }, "sweep: delivery failed");
        result.failed++;
      }
    }

    log.debug({ ...result, notified: result.notified.length }, "sweep: done");
    return result;
  }

  function runOnce() {
    // overlapping sweeps would only race on the same claims
    if (running) return;
    running = sweep();
    void running
      .catch((err) => log.error({ err }, "sweep: aborted"))
      .finally(() => { running = undefined; });
  }

  function start() {
    if (timer) return;
    runOnce();
    timer = setInterval(runOnce, args.intervalMs ?? 60 * 60 * 1000);
    timer.unref();
  }

  function stop() {
    if (timer) clearInterval(timer);
    timer = undefined;
  }

  return { sweep, start, stop };
}
