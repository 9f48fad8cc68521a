import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { FileStore } from "../store/file.js";
import { createRepository } from "../store/repository.js";
import { createReminderScheduler, reminderText } from "./reminders.js";
import { PersistenceError, SchedulingError, ValidationError } from "./errors.js";
import { defaultFields } from "../presets/work-order.v1.js";
import { Notification } from "../types/contracts.js";

const logger = pino({ level: "silent" });

describe("reminder scheduler", () => {
  let dir: string;
  let store: FileStore;
  let clock: Date;
  let sent: Notification[];
  let failing: boolean;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "wo-reminders-"));
    store = new FileStore(dir);
    await store.init();
    clock = new Date("2026-10-19T12:00:00.000Z");
    sent = [];
    failing = false;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const minutes = (n: number) => new Date(clock.getTime() + n * 60_000);
  const repository = () => createRepository({ store, logger, now: () => clock });
  const scheduler = () => createReminderScheduler({
    store,
    repository: repository(),
    notifier: {
      notify: async (n: Notification) => {
        if (failing) throw new Error("chat unreachable");
        sent.push(n);
      }
    },
    logger,
    now: () => clock
  });

  it("formats reminder messages with and without an order", () => {
    const base = { id: "r1", firesAt: "2026-10-19T13:00:00.000Z", message: "Call the site", channel: "chat-1", status: "pending" as const, createdAt: "2026-10-19T12:00:00.000Z" };
    assert.strictEqual(reminderText({ ...base, businessId: "1001" }), "Reminder for work order 1001: Call the site");
    assert.strictEqual(reminderText(base), "Reminder: Call the site");
  });

  it("accepts times within the grace window and rejects older ones", async () => {
    const s = scheduler();
    const late = await s.schedule({ firesAt: minutes(-1), message: "Call the site", channel: "chat-1" });
    assert.strictEqual(late.status, "pending");

    await assert.rejects(
      s.schedule({ firesAt: minutes(-10), message: "Call the site", channel: "chat-1" }),
      (err: unknown) => err instanceof SchedulingError && err.message === "The reminder time is in the past."
    );
    await assert.rejects(
      s.schedule({ firesAt: new Date("not a date"), message: "Call the site", channel: "chat-1" }),
      SchedulingError
    );
  });

  it("refuses an empty message", async () => {
    await assert.rejects(
      scheduler().schedule({ firesAt: minutes(60), message: "   ", channel: "chat-1" }),
      ValidationError
    );
  });

  it("fires a reminder exactly once", async () => {
    const s = scheduler();
    const r = await s.schedule({ firesAt: minutes(60), message: "Call the site", channel: "chat-1", businessId: "1001" });

    assert.deepStrictEqual(await s.tick(minutes(30)), []);

    const fired = await s.tick(minutes(60));
    assert.deepStrictEqual(fired.map((f) => f.id), [r.id]);
    assert.deepStrictEqual(sent, [{
      kind: "reminder",
      channel: "chat-1",
      text: "Reminder for work order 1001: Call the site",
      reminderId: r.id,
      businessId: "1001"
    }]);

    assert.deepStrictEqual(await s.tick(minutes(90)), []);
    assert.strictEqual(sent.length, 1);
    assert.strictEqual((await store.getReminder(r.id))?.status, "fired");
  });

  it("does not retry a reminder whose delivery failed", async () => {
    const s = scheduler();
    const r = await s.schedule({ firesAt: minutes(5), message: "Call the site", channel: "chat-1" });

    failing = true;
    assert.deepStrictEqual(await s.tick(minutes(5)), []);
    failing = false;
    assert.deepStrictEqual(await s.tick(minutes(10)), []);
    assert.strictEqual(sent.length, 0);
    assert.strictEqual((await store.getReminder(r.id))?.status, "fired");
  });

  it("cancels idempotently and never fires a cancelled reminder", async () => {
    const s = scheduler();
    const r = await s.schedule({ firesAt: minutes(5), message: "Call the site", channel: "chat-1" });

    assert.strictEqual(await s.cancel(r.id), true);
    assert.strictEqual(await s.cancel(r.id), false);
    assert.strictEqual(await s.cancel("missing"), false);
    assert.deepStrictEqual(await s.tick(minutes(10)), []);
    assert.strictEqual(sent.length, 0);
  });

  it("cancels every pending reminder of an order and audits it", async () => {
    const order = await repository().create({
      businessId: "1001",
      fields: {
        ...defaultFields(),
        description: { kind: "text", value: "Pump failure" },
        category: { kind: "choice", value: "Corrective" },
        dueDate: { kind: "date", value: "2026-10-29" }
      },
      channel: "chat-1"
    }, "chat-1");

    const s = scheduler();
    await s.schedule({ firesAt: minutes(5), message: "First", channel: "chat-1", businessId: "1001" });
    await s.schedule({ firesAt: minutes(10), message: "Second", channel: "chat-1", businessId: "1001" });
    await s.schedule({ firesAt: minutes(10), message: "Other", channel: "chat-1", businessId: "1002" });

    assert.strictEqual(await s.cancelAllFor("1001", "chat-1"), 2);
    assert.deepStrictEqual((await s.list()).map((r) => r.message), ["Other"]);

    const types = (await repository().events(order.id)).map((e) => e.type);
    assert.deepStrictEqual(types, ["created", "reminder_scheduled", "reminder_scheduled", "reminder_cancelled", "reminder_cancelled"]);
  });

  it("moves pending reminders to a renamed order", async () => {
    const s = scheduler();
    await s.schedule({ firesAt: minutes(5), message: "Call the site", channel: "chat-1", businessId: "1001" });

    assert.strictEqual(await s.retag("1001", "2002"), 1);
    assert.deepStrictEqual(await s.list({ businessId: "1001" }), []);
    assert.strictEqual((await s.list({ businessId: "2002" })).length, 1);
  });

  it("finishes scheduling and cancelling when the audit trail cannot be written", async () => {
    const order = await repository().create({
      businessId: "1001",
      fields: { ...defaultFields(), description: { kind: "text", value: "Pump failure" } },
      channel: "chat-1"
    }, "chat-1");
    const s = createReminderScheduler({
      store,
      repository: {
        findByBusinessId: async () => order,
        recordEvent: async () => { throw new PersistenceError("appendAudit", new Error("audit log is read-only")); }
      },
      notifier: { notify: async (n: Notification) => { sent.push(n); } },
      logger,
      now: () => clock
    });

    await s.schedule({ firesAt: minutes(5), message: "First", channel: "chat-1", businessId: "1001" });
    await s.schedule({ firesAt: minutes(10), message: "Second", channel: "chat-1", businessId: "1001" });
    assert.strictEqual((await s.list({ businessId: "1001" })).length, 2);

    assert.strictEqual(await s.cancelAllFor("1001"), 2);
    assert.deepStrictEqual(await s.list(), []);
  });
});
