import sqlite3 from "sqlite3";
import pino, { Logger } from "pino";
import { z } from "zod";
import { Store } from "./store.js";
import { AuditEventSchema, OrderFieldsSchema, ReminderSchema } from "./rows.js";
import { categoryOf, statusOf } from "../core/fields.js";
import { isTerminal, TERMINAL_STATUSES } from "../presets/work-order.v1.js";
import { safeJsonParse } from "../lib/_util.js";
import { AuditEvent, ManualReminder, ReminderStatus, WorkOrder, WorkOrderQuery } from "../types/contracts.js";

type SqlParam = string | number | null;

function run(db: sqlite3.Database, sql: string, params: SqlParam[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}
function get(db: sqlite3.Database, sql: string, params: SqlParam[] = []) {
  return new Promise<unknown>((resolve, reject) => {
    db.get(sql, params, (err, row: unknown) => (err ? reject(err) : resolve(row)));
  });
}
function all(db: sqlite3.Database, sql: string, params: SqlParam[] = []) {
  return new Promise<unknown[]>((resolve, reject) => {
    db.all(sql, params, (err, rows: unknown[]) => (err ? reject(err) : resolve(rows)));
  });
}

const WorkOrderRow = z.object({
  id: z.string(),
  businessId: z.string(),
  fieldsJson: z.string(),
  channel: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

const ReminderRow = z.object({
  id: z.string(),
  businessId: z.string().nullable(),
  firesAt: z.string(),
  message: z.string(),
  channel: z.string(),
  status: z.string(),
  createdAt: z.string(),
  firedAt: z.string().nullable()
});

const AuditRow = z.object({
  id: z.string(),
  workOrderId: z.string(),
  businessId: z.string(),
  type: z.string(),
  actor: z.string(),
  payloadJson: z.string(),
  at: z.string()
});

export class SqliteStore implements Store {
  protected db: sqlite3.Database;
  private log: Logger;
  /** Rows left out of listings because they no longer parse, per table. */
  readonly skippedRows: Record<string, number> = {};

  constructor(private dbPath: string, logger?: Logger) {
    this.db = new sqlite3.Database(dbPath);
    this.log = (logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "sqlite-store" });
  }

  async init(): Promise<void> {
    await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `
      create table if not exists workorders (
        id text primary key,
        businessId text not null unique,
        category text,
        status text not null,
        fieldsJson text not null,
        channel text,
        createdAt text not null,
        updatedAt text not null
      );
    `);
    await run(this.db, `create index if not exists idx_workorders_status on workorders(status, category);`);

    await run(this.db, `
      create table if not exists reminders (
        id text primary key,
        businessId text,
        firesAt text not null,
        message text not null,
        channel text not null,
        status text not null,
        createdAt text not null,
        firedAt text
      );
    `);
    await run(this.db, `create index if not exists idx_reminders_status_fires on reminders(status, firesAt);`);

    await run(this.db, `
      create table if not exists alert_marks (
        key text primary key,
        at text not null
      );
    `);

    await run(this.db, `
      create table if not exists audit_events (
        id text primary key,
        workOrderId text not null,
        businessId text not null,
        type text not null,
        actor text not null,
        payloadJson text not null,
        at text not null
      );
    `);
    await run(this.db, `create index if not exists idx_audit_workorder on audit_events(workOrderId, at);`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  async insertWorkOrder(order: WorkOrder): Promise<void> {
    await run(this.db, `
      insert into workorders (id, businessId, category, status, fieldsJson, channel, createdAt, updatedAt)
      values (?,?,?,?,?,?,?,?)
    `, [
      order.id, order.businessId, categoryOf(order) ?? null, statusOf(order),
      JSON.stringify(order.fields), order.channel ?? null, order.createdAt, order.updatedAt
    ]);
  }

  async getWorkOrder(id: string): Promise<WorkOrder | null> {
    const row = await get(this.db, `select * from workorders where id=?`, [id]);
    return row ? this.rowToWorkOrder(row) : null;
  }

  async findWorkOrderByBusinessId(businessId: string): Promise<WorkOrder | null> {
    const row = await get(this.db, `select * from workorders where businessId=?`, [businessId]);
    return row ? this.rowToWorkOrder(row) : null;
  }

  async replaceWorkOrder(order: WorkOrder): Promise<boolean> {
    const changes = await run(this.db, `
      update workorders
      set businessId=?, category=?, status=?, fieldsJson=?, channel=?, updatedAt=?
      where id=?
    `, [
      order.businessId, categoryOf(order) ?? null, statusOf(order),
      JSON.stringify(order.fields), order.channel ?? null, order.updatedAt, order.id
    ]);
    return changes === 1;
  }

  async deleteWorkOrder(id: string): Promise<boolean> {
    return (await run(this.db, `delete from workorders where id=?`, [id])) === 1;
  }

  async listWorkOrders(q: WorkOrderQuery): Promise<WorkOrder[]> {
    const where: string[] = [];
    const params: SqlParam[] = [];

    if (q.category) { where.push(`category = ?`); params.push(q.category); }
    if (q.status) { where.push(`status = ?`); params.push(q.status); }
    if (q.openOnly) {
      where.push(`status not in (${TERMINAL_STATUSES.map(() => "?").join(",")})`);
      params.push(...TERMINAL_STATUSES);
    }

    const sql = `
      select * from workorders
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by updatedAt desc
    `;
    const rows = await all(this.db, sql, params);
    return this.readRows("workorders", rows, (r) => this.rowToWorkOrder(r))
      .filter((o) => !q.openOnly || !isTerminal(statusOf(o)));
  }

  async insertReminder(r: ManualReminder): Promise<void> {
    await run(this.db, `
      insert into reminders (id, businessId, firesAt, message, channel, status, createdAt, firedAt)
      values (?,?,?,?,?,?,?,?)
    `, [r.id, r.businessId ?? null, r.firesAt, r.message, r.channel, r.status, r.createdAt, r.firedAt ?? null]);
  }

  async getReminder(id: string): Promise<ManualReminder | null> {
    const row = await get(this.db, `select * from reminders where id=?`, [id]);
    return row ? this.rowToReminder(row) : null;
  }

  async listReminders(q: { status?: ReminderStatus; businessId?: string; dueBefore?: string }): Promise<ManualReminder[]> {
    const where: string[] = [];
    const params: SqlParam[] = [];

    if (q.status) { where.push(`status = ?`); params.push(q.status); }
    if (q.businessId !== undefined) { where.push(`businessId = ?`); params.push(q.businessId); }
    // firesAt is always written by toISOString, so text order is time order
    if (q.dueBefore) { where.push(`firesAt <= ?`); params.push(q.dueBefore); }

    const rows = await all(this.db, `
      select * from reminders
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by firesAt asc
    `, params);
    return this.readRows("reminders", rows, (r) => this.rowToReminder(r));
  }

  async transitionReminder(id: string, from: ReminderStatus, to: ReminderStatus, at: string): Promise<boolean> {
    const changes = await run(this.db, `
      update reminders
      set status=?, firedAt=case when ?='fired' then ? else firedAt end
      where id=? and status=?
    `, [to, to, at, id, from]);
    return changes === 1;
  }

  async retagReminders(fromBusinessId: string, toBusinessId: string): Promise<number> {
    return run(this.db, `update reminders set businessId=? where businessId=? and status='pending'`, [toBusinessId, fromBusinessId]);
  }

  async claimAlert(key: string, at: string): Promise<boolean> {
    const changes = await run(this.db, `insert or ignore into alert_marks (key, at) values (?,?)`, [key, at]);
    return changes === 1;
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    await run(this.db, `
      insert into audit_events (id, workOrderId, businessId, type, actor, payloadJson, at)
      values (?,?,?,?,?,?,?)
    `, [ev.id, ev.workOrderId, ev.businessId, ev.type, ev.actor, JSON.stringify(ev.payload ?? {}), ev.at]);
  }

  async listAudit(workOrderId: string, limit: number = 200): Promise<AuditEvent[]> {
    const rows = await all(this.db, `
      select * from audit_events
      where workOrderId=?
      order by at asc
      limit ?
    `, [workOrderId, Math.min(limit, 1000)]);
    return rows.map((raw) => {
      const r = AuditRow.parse(raw);
      return AuditEventSchema.parse({
        id: r.id,
        workOrderId: r.workOrderId,
        businessId: r.businessId,
        type: r.type,
        actor: r.actor,
        payload: safeJsonParse(r.payloadJson) ?? {},
        at: r.at
      });
    });
  }

  // one unreadable row must not hide the others from sweeps and listings
  private readRows<T>(table: string, rows: unknown[], read: (raw: unknown) => T): T[] {
    const out: T[] = [];
    for (const raw of rows) {
      try {
        out.push(read(raw));
      } catch (err) {
        this.skippedRows[table] = (this.skippedRows[table] ?? 0) + 1;
        this.log.warn({ err, table }, "sqlite: unreadable row skipped");
      }
    }
    return out;
  }

  private rowToWorkOrder(raw: unknown): WorkOrder {
    const r = WorkOrderRow.parse(raw);
    return {
      id: r.id,
      businessId: r.businessId,
      fields: OrderFieldsSchema.parse(safeJsonParse(r.fieldsJson)),
      ...(r.channel !== null ? { channel: r.channel } : {}),
      createdAt: r.createdAt,
      updatedAt: r.updatedAt
    };
  }

  private rowToReminder(raw: unknown): ManualReminder {
    const r = ReminderRow.parse(raw);
    return ReminderSchema.parse({
      id: r.id,
      businessId: r.businessId ?? undefined,
      firesAt: r.firesAt,
      message: r.message,
      channel: r.channel,
      status: r.status,
      createdAt: r.createdAt,
      firedAt: r.firedAt ?? undefined
    });
  }
}
