import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { FileStore } from "./file.js";
import { createRepository } from "./repository.js";
import { DuplicateError, NotFoundError, PersistenceError } from "../core/errors.js";
import { defaultFields } from "../presets/work-order.v1.js";
import { AuditEvent, Draft, WorkOrder } from "../types/contracts.js";

const logger = pino({ level: "silent" });

function draft(businessId: string, dueDate: string = "2026-10-29"): Draft {
  return {
    businessId,
    fields: {
      ...defaultFields(),
      description: { kind: "text", value: "Pump failure" },
      category: { kind: "choice", value: "Corrective" },
      dueDate: { kind: "date", value: dueDate }
    },
    channel: "chat-1"
  };
}

class BrokenStore extends FileStore {
  async insertWorkOrder(_order: WorkOrder): Promise<void> {
    throw new Error("disk full");
  }
}

class AuditLessStore extends FileStore {
  async appendAudit(_ev: AuditEvent): Promise<void> {
    throw new Error("audit log is read-only");
  }
}

describe("repository", () => {
  let dir: string;
  let store: FileStore;
  let clock: Date;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "wo-repo-"));
    store = new FileStore(dir);
    await store.init();
    clock = new Date("2026-10-19T12:00:00.000Z");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const repo = () => createRepository({ store, logger, now: () => clock });

  it("creates an order with timestamps, channel and an audit event", async () => {
    const order = await repo().create(draft(" 1001 "), "chat-1");
    assert.strictEqual(order.businessId, "1001");
    assert.strictEqual(order.channel, "chat-1");
    assert.strictEqual(order.createdAt, "2026-10-19T12:00:00.000Z");
    assert.strictEqual(order.updatedAt, "2026-10-19T12:00:00.000Z");
    assert.deepStrictEqual(order.fields.status, { kind: "choice", value: "open" });

    const events = await repo().events(order.id);
    assert.deepStrictEqual(events.map((e) => [e.type, e.actor]), [["created", "chat-1"]]);
  });

  it("refuses a second order with the same business id", async () => {
    const first = await repo().create(draft("1001"));
    await assert.rejects(repo().create(draft("1001")), (err: unknown) => {
      assert.ok(err instanceof DuplicateError);
      assert.strictEqual(err.businessId, "1001");
      assert.strictEqual(err.existing?.id, first.id);
      return true;
    });
    assert.strictEqual((await repo().query()).length, 1);
  });

  it("merges only the supplied fields on update", async () => {
    const order = await repo().create(draft("1001"));
    clock = new Date("2026-10-19T13:00:00.000Z");

    const updated = await repo().update(order.id, { fields: { category: { kind: "choice", value: "Preventive" } } }, "chat-2");
    assert.deepStrictEqual(updated.fields.category, { kind: "choice", value: "Preventive" });
    assert.deepStrictEqual(updated.fields.description, { kind: "text", value: "Pump failure" });
    assert.deepStrictEqual(updated.fields.dueDate, { kind: "date", value: "2026-10-29" });
    assert.strictEqual(updated.createdAt, "2026-10-19T12:00:00.000Z");
    assert.strictEqual(updated.updatedAt, "2026-10-19T13:00:00.000Z");

    const stored = await repo().findByBusinessId("1001");
    assert.deepStrictEqual(stored, updated);

    const last = (await repo().events(order.id)).at(-1);
    assert.strictEqual(last?.type, "field_updated");
    assert.deepStrictEqual(last?.payload, { fields: ["category"] });
  });

  it("renames an order only to a free business id and keeps its identity", async () => {
    const a = await repo().create(draft("1001"));
    await repo().create(draft("1002"));

    await assert.rejects(repo().update(a.id, { businessId: "1002" }), DuplicateError);

    const renamed = await repo().update(a.id, { businessId: "2001" });
    assert.strictEqual(renamed.id, a.id);
    assert.strictEqual(await repo().findByBusinessId("1001"), null);
    assert.strictEqual((await repo().findByBusinessId("2001"))?.id, a.id);
  });

  it("reports a missing order on update", async () => {
    await assert.rejects(repo().update("nope", { fields: {} }), NotFoundError);
  });

  it("deletes once", async () => {
    const order = await repo().create(draft("1001"));
    assert.strictEqual(await repo().delete(order.id), true);
    assert.strictEqual(await repo().delete(order.id), false);
    assert.strictEqual(await repo().findByBusinessId("1001"), null);
  });

  it("sorts query results by due date, undated last", async () => {
    await repo().create(draft("3", "2026-11-05"));
    await repo().create(draft("1", "2026-10-21"));
    const undated = draft("2");
    delete undated.fields.dueDate;
    await repo().create(undated);

    assert.deepStrictEqual((await repo().query()).map((o) => o.businessId), ["1", "3", "2"]);
  });

  it("wraps store failures in PersistenceError", async () => {
    const broken = new BrokenStore(dir);
    await broken.init();
    const r = createRepository({ store: broken, logger });
    await assert.rejects(r.create(draft("1001")), (err: unknown) => {
      assert.ok(err instanceof PersistenceError);
      assert.strictEqual(err.code, "persistence_failed");
      assert.strictEqual(err.message, "Store operation create failed: disk full");
      return true;
    });
  });

  it("keeps committed writes when the audit append fails", async () => {
    const auditLess = new AuditLessStore(dir);
    await auditLess.init();
    const r = createRepository({ store: auditLess, logger, now: () => clock });

    const created = await r.create(draft("2002"), "chat-1");
    assert.strictEqual((await r.findByBusinessId("2002"))?.id, created.id);

    const updated = await r.update(created.id, { fields: { category: { kind: "choice", value: "Preventive" } } }, "chat-1");
    assert.deepStrictEqual(updated.fields.category, { kind: "choice", value: "Preventive" });

    assert.strictEqual(await r.delete(created.id, "chat-1"), true);
    assert.strictEqual(await r.findByBusinessId("2002"), null);
  });
});
