import { describe, it } from "node:test";
import assert from "node:assert";
import pino from "pino";
import { classify, createDeadlineMonitor, alertText } from "./deadlines.js";
import { matchesQuery } from "./fields.js";
import { AlertClass, Notification, WorkOrder, WorkOrderQuery } from "../types/contracts.js";

const logger = pino({ level: "silent" });
const TZ = "America/Sao_Paulo";

function order(businessId: string, dueDate: string, status: string = "open", channel: string | null = "chat-1"): WorkOrder {
  return {
    id: `id-${businessId}`,
    businessId,
    fields: {
      description: { kind: "text", value: "Pump failure" },
      category: { kind: "choice", value: "Corrective" },
      dueDate: { kind: "date", value: dueDate },
      status: { kind: "choice", value: status }
    },
    ...(channel ? { channel } : {}),
    createdAt: "2026-10-17T12:00:00.000Z",
    updatedAt: "2026-10-17T12:00:00.000Z"
  };
}

function setup(orders: WorkOrder[], opts: { alertClasses?: AlertClass[]; failFor?: string; fallbackChannel?: string } = {}) {
  const sent: Notification[] = [];
  const keys = new Set<string>();
  const monitor = createDeadlineMonitor({
    repository: { query: async (q: WorkOrderQuery = {}) => orders.filter((o) => matchesQuery(o, q)) },
    marks: {
      claimAlert: async (key: string) => {
        if (keys.has(key)) return false;
        keys.add(key);
        return true;
      }
    },
    notifier: {
      notify: async (n: Notification) => {
        if (n.kind === "deadline" && n.alert.businessId === opts.failFor) throw new Error("chat unreachable");
        sent.push(n);
      }
    },
    timezone: TZ,
    alertClasses: opts.alertClasses,
    fallbackChannel: opts.fallbackChannel,
    logger
  });
  return { monitor, sent, keys };
}

describe("classify", () => {
  it("maps day distances to alert classes", () => {
    assert.strictEqual(classify(-3), "overdue");
    assert.strictEqual(classify(-1), "overdue");
    assert.strictEqual(classify(0), "dueToday");
    assert.strictEqual(classify(1), "dueTomorrow");
    assert.strictEqual(classify(2), "dueIn2Days");
    assert.strictEqual(classify(3), null);
    assert.strictEqual(classify(10), null);
  });
});

describe("alertText", () => {
  it("names the order, the distance and the due date", () => {
    const o = order("1001", "2026-10-16");
    assert.strictEqual(
      alertText(o, { businessId: "1001", alertClass: "overdue", day: "2026-10-19" }, -3),
      "Work order 1001 is overdue by 3 days (due 16/10/2026).\nDescription: Pump failure"
    );
    assert.strictEqual(
      alertText(o, { businessId: "1001", alertClass: "overdue", day: "2026-10-17" }, -1),
      "Work order 1001 is overdue by 1 day (due 16/10/2026).\nDescription: Pump failure"
    );
  });
});

describe("deadline monitor", () => {
  it("sends one dueIn2Days alert per order per day", async () => {
    const { monitor, sent } = setup([order("1001", "2026-10-29")]);

    const first = await monitor.sweep(new Date("2026-10-27T12:00:00.000Z"));
    assert.deepStrictEqual(first.notified, [{ businessId: "1001", alertClass: "dueIn2Days", day: "2026-10-27" }]);

    const second = await monitor.sweep(new Date("2026-10-27T18:00:00.000Z"));
    assert.deepStrictEqual(second.notified, []);
    assert.strictEqual(sent.length, 1);
    assert.strictEqual(sent[0].channel, "chat-1");
  });

  it("sends nothing while the due date is further out", async () => {
    const { monitor, sent } = setup([order("1001", "2026-10-29")]);
    const res = await monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.strictEqual(res.checked, 1);
    assert.deepStrictEqual(res.notified, []);
    assert.strictEqual(sent.length, 0);
  });

  it("counts days in the configured time zone", async () => {
    const { monitor } = setup([order("1001", "2026-10-29")]);
    // 23:00 on the 27th in São Paulo, already the 28th in UTC
    const res = await monitor.sweep(new Date("2026-10-28T02:00:00.000Z"));
    assert.deepStrictEqual(res.notified, [{ businessId: "1001", alertClass: "dueIn2Days", day: "2026-10-27" }]);
  });

  it("alerts again on the next day with the next class", async () => {
    const { monitor } = setup([order("1001", "2026-10-29")]);
    await monitor.sweep(new Date("2026-10-27T12:00:00.000Z"));
    const next = await monitor.sweep(new Date("2026-10-28T12:00:00.000Z"));
    assert.deepStrictEqual(next.notified, [{ businessId: "1001", alertClass: "dueTomorrow", day: "2026-10-28" }]);
  });

  it("skips terminal orders", async () => {
    const { monitor } = setup([order("1001", "2026-10-10", "done"), order("1002", "2026-10-10", "cancelled")]);
    const res = await monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.strictEqual(res.checked, 0);
  });

  it("leaves due-today alerts off unless enabled", async () => {
    const off = setup([order("1001", "2026-10-19")]);
    assert.deepStrictEqual((await off.monitor.sweep(new Date("2026-10-19T12:00:00.000Z"))).notified, []);

    const on = setup([order("1001", "2026-10-19")], { alertClasses: ["overdue", "dueToday", "dueTomorrow", "dueIn2Days"] });
    const res = await on.monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.deepStrictEqual(res.notified, [{ businessId: "1001", alertClass: "dueToday", day: "2026-10-19" }]);
  });

  it("skips an unreadable due date without stopping the sweep", async () => {
    const { monitor, sent } = setup([order("1001", "29/10/2026"), order("1002", "2026-10-18")]);
    const res = await monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.strictEqual(res.skipped, 1);
    assert.deepStrictEqual(res.notified, [{ businessId: "1002", alertClass: "overdue", day: "2026-10-19" }]);
    assert.strictEqual(sent.length, 1);
  });

  it("keeps delivering to others when one delivery fails, and does not retry it that day", async () => {
    const { monitor, sent } = setup([order("1001", "2026-10-18"), order("1002", "2026-10-18")], { failFor: "1001" });
    const res = await monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.strictEqual(res.failed, 1);
    assert.deepStrictEqual(res.notified.map((a) => a.businessId), ["1002"]);

    const again = await monitor.sweep(new Date("2026-10-19T13:00:00.000Z"));
    assert.deepStrictEqual(again.notified, []);
    assert.strictEqual(sent.length, 1);
  });

  it("uses the fallback channel for orders without one", async () => {
    const none = setup([order("1001", "2026-10-18", "open", null)]);
    const skipped = await none.monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.strictEqual(skipped.skipped, 1);

    const fallback = setup([order("1001", "2026-10-18", "open", null)], { fallbackChannel: "ops-room" });
    await fallback.monitor.sweep(new Date("2026-10-19T12:00:00.000Z"));
    assert.deepStrictEqual(fallback.sent.map((n) => n.channel), ["ops-room"]);
  });
});
