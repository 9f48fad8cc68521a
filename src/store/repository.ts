import pino, { Logger } from "pino";
import { nanoid } from "nanoid";
import { Store } from "./store.js";
import { makeAudit } from "../audit/audit.js";
import { withStore } from "./guard.js";
import { DuplicateError, NotFoundError, PersistenceError } from "../core/errors.js";
import { dueDateOf } from "../core/fields.js";
import { normalizeIdentifier } from "../core/normalize.js";
import { isFieldKey } from "../presets/work-order.v1.js";
import { AuditEvent, Draft, FieldKey, WorkOrder, WorkOrderPatch, WorkOrderQuery } from "../types/contracts.js";

export type Repository = ReturnType<typeof createRepository>;

/**
 * Work-order persistence on top of a Store: identity, timestamps, the
 * last-line uniqueness check and the audit trail. Store failures surface as
 * PersistenceError; domain errors pass through untouched.
 */
export function createRepository(args: {
  store: Store;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "repository" });
  const now = args.now ?? (() => new Date());
  const store = args.store;

  const guard = <T>(operation: string, fn: () => Promise<T>) => withStore(log, operation, fn);

  // Runs after the data write has committed: a failed append is logged, never raised.
  async function audit(ev: AuditEvent): Promise<void> {
    try {
      await store.appendAudit(ev);
    } catch (err) {
      log.error({ err, workOrderId: ev.workOrderId, businessId: ev.businessId, type: ev.type }, "audit: append failed");
    }
  }

  async function create(draft: Draft, actor: string = "system"): Promise<WorkOrder> {
    const businessId = normalizeIdentifier(draft.businessId);
    const existing = await guard("findByBusinessId", () => store.findWorkOrderByBusinessId(businessId));
    if (existing) throw new DuplicateError(businessId, existing);

    const at = now().toISOString();
    const order: WorkOrder = {
      id: nanoid(),
      businessId,
      fields: { ...draft.fields },
      ...(draft.channel ? { channel: draft.channel } : {}),
      createdAt: at,
      updatedAt: at
    };

    try {
      await store.insertWorkOrder(order);
    } catch (e) {
      // a unique-key violation means another session created it first
      const winner = await guard("findByBusinessId", () => store.findWorkOrderByBusinessId(businessId));
      if (winner) throw new DuplicateError(businessId, winner);
      log.error({ err: e, operation: "create" }, "store: operation failed");
      throw new PersistenceError("create", e);
    }

    await audit(makeAudit({
      workOrderId: order.id,
      businessId,
      type: "created",
      actor,
      payload: { fields: Object.keys(order.fields) },
      at: now()
    }));

    log.info({ workOrderId: order.id, businessId }, "workorder: created");
    return order;
  }

  async function findByBusinessId(businessId: string): Promise<WorkOrder | null> {
    const key = normalizeIdentifier(businessId);
    if (!key) return null;
    return guard("findByBusinessId", () => store.findWorkOrderByBusinessId(key));
  }

  async function findById(id: string): Promise<WorkOrder | null> {
    return guard("findById", () => store.getWorkOrder(id));
  }

  /** Partial merge: only the supplied keys change. A new businessId must be free. */
  async function update(id: string, patch: WorkOrderPatch, actor: string = "system"): Promise<WorkOrder> {
    const current = await findById(id);
    if (!current) throw new NotFoundError(patch.businessId ?? id);

    let businessId = current.businessId;
    if (patch.businessId !== undefined) {
      const next = normalizeIdentifier(patch.businessId);
      if (next !== current.businessId) {
        const holder = await findByBusinessId(next);
        if (holder && holder.id !== id) throw new DuplicateError(next, holder);
        businessId = next;
      }
    }

    const updated: WorkOrder = {
      ...current,
      businessId,
      fields: { ...current.fields, ...(patch.fields ?? {}) },
      updatedAt: now().toISOString()
    };

    const replaced = await guard("update", () => store.replaceWorkOrder(updated));
    if (!replaced) throw new NotFoundError(current.businessId);

    const changed: FieldKey[] = [];
    for (const [k, v] of Object.entries(patch.fields ?? {})) {
      if (v !== undefined && isFieldKey(k)) changed.push(k);
    }

    await audit(makeAudit({
      workOrderId: id,
      businessId,
      type: "field_updated",
      actor,
      payload: {
        fields: changed,
        ...(businessId !== current.businessId ? { businessId: { from: current.businessId, to: businessId } } : {})
      },
      at: now()
    }));

    log.info({ workOrderId: id, businessId, fields: changed }, "workorder: updated");
    return updated;
  }

  async function remove(id: string, actor: string = "system"): Promise<boolean> {
    const current = await findById(id);
    if (!current) return false;

    const deleted = await guard("delete", () => store.deleteWorkOrder(id));
    if (!deleted) return false;

    await audit(makeAudit({
      workOrderId: id,
      businessId: current.businessId,
      type: "deleted",
      actor,
      at: now()
    }));

    log.info({ workOrderId: id, businessId: current.businessId }, "workorder: deleted");
    return true;
  }

  /** Matching orders sorted by due date (orders without one last), then business id. */
  async function query(q: WorkOrderQuery = {}): Promise<WorkOrder[]> {
    const rows = await guard("query", () => store.listWorkOrders(q));
    return [...rows].sort(byDueDate);
  }

  async function events(workOrderId: string, limit?: number): Promise<AuditEvent[]> {
    return guard("listAudit", () => store.listAudit(workOrderId, limit));
  }

  async function recordEvent(order: WorkOrder, type: string, actor: string, payload: Record<string, unknown>): Promise<void> {
    await audit(makeAudit({
      workOrderId: order.id,
      businessId: order.businessId,
      type,
      actor,
      payload,
      at: now()
    }));
  }

  return { create, findByBusinessId, findById, update, delete: remove, query, events, recordEvent };
}

function byDueDate(a: WorkOrder, b: WorkOrder): number {
  const da = dueDateOf(a);
  const db = dueDateOf(b);
  if (da !== db) {
    if (da === undefined) return 1;
    if (db === undefined) return -1;
    return da < db ? -1 : 1;
  }
  return a.businessId.localeCompare(b.businessId, undefined, { numeric: true });
}
