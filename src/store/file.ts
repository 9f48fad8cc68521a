import fs from "fs";
import path from "path";
import { z } from "zod";
import { Store } from "./store.js";
import { AuditEventSchema, ReminderSchema, WorkOrderSchema } from "./rows.js";
import { matchesQuery } from "../core/fields.js";
import { appendJsonl, readJsonl } from "../lib/_util.js";
import { AuditEvent, ManualReminder, ReminderStatus, WorkOrder, WorkOrderQuery } from "../types/contracts.js";

// workorders.jsonl holds put/delete records; the last record per id wins.
const WorkOrderLine = z.discriminatedUnion("op", [
  z.object({ op: z.literal("put"), order: WorkOrderSchema }),
  z.object({ op: z.literal("delete"), id: z.string() })
]);

const AlertLine = z.object({ key: z.string(), at: z.string() });

type Index = {
  orders: Map<string, WorkOrder>;
  idByBusinessId: Map<string, string>;
  reminders: Map<string, ManualReminder>;
  alerts: Set<string>;
  auditByWorkId: Map<string, AuditEvent[]>;
};

function parseWith<S extends z.ZodTypeAny>(schema: S) {
  return (v: unknown): z.infer<S> | null => {
    const r = schema.safeParse(v);
    return r.success ? r.data : null;
  };
}

export class FileStore implements Store {
  private dir: string;
  private workPath: string;
  private reminderPath: string;
  private alertPath: string;
  private auditPath: string;

  /** Lines that could not be parsed on the last load, per file name. */
  readonly skippedLines: Record<string, number> = {};

  private idx: Index = {
    orders: new Map(),
    idByBusinessId: new Map(),
    reminders: new Map(),
    alerts: new Set(),
    auditByWorkId: new Map()
  };

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.workPath = path.join(this.dir, "workorders.jsonl");
    this.reminderPath = path.join(this.dir, "reminders.jsonl");
    this.alertPath = path.join(this.dir, "alerts.jsonl");
    this.auditPath = path.join(this.dir, "audit.jsonl");
  }

  async init(): Promise<void> {
    fs.mkdirSync(this.dir, { recursive: true });
    for (const p of [this.workPath, this.reminderPath, this.alertPath, this.auditPath]) {
      if (!fs.existsSync(p)) fs.writeFileSync(p, "", "utf8");
    }
    this.loadWorkOrders();
    this.loadReminders();
    this.loadAlerts();
    this.loadAudit();
  }

  async close(): Promise<void> {
    // appends are synchronous; nothing to flush
  }

  private loadWorkOrders() {
    const { rows, skipped } = readJsonl(this.workPath, parseWith(WorkOrderLine));
    this.skippedLines["workorders.jsonl"] = skipped;
    for (const line of rows) {
      if (line.op === "put") this.indexOrder(line.order);
      else this.unindexOrder(line.id);
    }
  }

  private loadReminders() {
    const { rows, skipped } = readJsonl(this.reminderPath, parseWith(ReminderSchema));
    this.skippedLines["reminders.jsonl"] = skipped;
    for (const r of rows) this.idx.reminders.set(r.id, r);
  }

  private loadAlerts() {
    const { rows, skipped } = readJsonl(this.alertPath, parseWith(AlertLine));
    this.skippedLines["alerts.jsonl"] = skipped;
    for (const a of rows) this.idx.alerts.add(a.key);
  }

  private loadAudit() {
    const { rows, skipped } = readJsonl(this.auditPath, parseWith(AuditEventSchema));
    this.skippedLines["audit.jsonl"] = skipped;
    for (const ev of rows) {
      const arr = this.idx.auditByWorkId.get(ev.workOrderId) ?? [];
      arr.push(ev);
      this.idx.auditByWorkId.set(ev.workOrderId, arr);
    }
  }

  private indexOrder(order: WorkOrder) {
    const prev = this.idx.orders.get(order.id);
    if (prev && prev.businessId !== order.businessId) this.idx.idByBusinessId.delete(prev.businessId);
    this.idx.orders.set(order.id, order);
    this.idx.idByBusinessId.set(order.businessId, order.id);
  }

  private unindexOrder(id: string) {
    const prev = this.idx.orders.get(id);
    if (!prev) return;
    this.idx.orders.delete(id);
    if (this.idx.idByBusinessId.get(prev.businessId) === id) this.idx.idByBusinessId.delete(prev.businessId);
  }

  async insertWorkOrder(order: WorkOrder): Promise<void> {
    if (this.idx.orders.has(order.id)) throw new Error(`duplicate store id: ${order.id}`);
    appendJsonl(this.workPath, { op: "put", order });
    this.indexOrder(order);
  }

  async getWorkOrder(id: string): Promise<WorkOrder | null> {
    return this.idx.orders.get(id) ?? null;
  }

  async findWorkOrderByBusinessId(businessId: string): Promise<WorkOrder | null> {
    const id = this.idx.idByBusinessId.get(businessId);
    return id ? this.idx.orders.get(id) ?? null : null;
  }

  async replaceWorkOrder(order: WorkOrder): Promise<boolean> {
    if (!this.idx.orders.has(order.id)) return false;
    appendJsonl(this.workPath, { op: "put", order });
    this.indexOrder(order);
    return true;
  }

  async deleteWorkOrder(id: string): Promise<boolean> {
    if (!this.idx.orders.has(id)) return false;
    appendJsonl(this.workPath, { op: "delete", id });
    this.unindexOrder(id);
    return true;
  }

  async listWorkOrders(q: WorkOrderQuery): Promise<WorkOrder[]> {
    return [...this.idx.orders.values()]
      .filter((o) => matchesQuery(o, q))
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async insertReminder(reminder: ManualReminder): Promise<void> {
    if (this.idx.reminders.has(reminder.id)) throw new Error(`duplicate reminder id: ${reminder.id}`);
    appendJsonl(this.reminderPath, reminder);
    this.idx.reminders.set(reminder.id, reminder);
  }

  async getReminder(id: string): Promise<ManualReminder | null> {
    return this.idx.reminders.get(id) ?? null;
  }

  async listReminders(q: { status?: ReminderStatus; businessId?: string; dueBefore?: string }): Promise<ManualReminder[]> {
    const dueBeforeMs = q.dueBefore ? Date.parse(q.dueBefore) : undefined;
    return [...this.idx.reminders.values()]
      .filter((r) => {
        if (q.status && r.status !== q.status) return false;
        if (q.businessId !== undefined && r.businessId !== q.businessId) return false;
        if (dueBeforeMs !== undefined && Date.parse(r.firesAt) > dueBeforeMs) return false;
        return true;
      })
      .sort((a, b) => Date.parse(a.firesAt) - Date.parse(b.firesAt));
  }

  async transitionReminder(id: string, from: ReminderStatus, to: ReminderStatus, at: string): Promise<boolean> {
    const cur = this.idx.reminders.get(id);
    if (!cur || cur.status !== from) return false;
    const updated: ManualReminder = { ...cur, status: to, ...(to === "fired" ? { firedAt: at } : {}) };
    appendJsonl(this.reminderPath, updated);
    this.idx.reminders.set(id, updated);
    return true;
  }

  async retagReminders(fromBusinessId: string, toBusinessId: string): Promise<number> {
    let n = 0;
    for (const r of this.idx.reminders.values()) {
      if (r.status !== "pending" || r.businessId !== fromBusinessId) continue;
      const updated: ManualReminder = { ...r, businessId: toBusinessId };
      appendJsonl(this.reminderPath, updated);
      this.idx.reminders.set(r.id, updated);
      n++;
    }
    return n;
  }

  async claimAlert(key: string, at: string): Promise<boolean> {
    if (this.idx.alerts.has(key)) return false;
    appendJsonl(this.alertPath, { key, at });
    this.idx.alerts.add(key);
    return true;
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    appendJsonl(this.auditPath, ev);
    const arr = this.idx.auditByWorkId.get(ev.workOrderId) ?? [];
    arr.push(ev);
    this.idx.auditByWorkId.set(ev.workOrderId, arr);
  }

  async listAudit(workOrderId: string, limit: number = 200): Promise<AuditEvent[]> {
    const arr = this.idx.auditByWorkId.get(workOrderId) ?? [];
    return arr.slice(Math.max(0, arr.length - Math.min(limit, 1000)));
  }
}
