import { Category, OrderFields, OrderStatus, WorkOrder, WorkOrderQuery } from "../types/contracts.js";
import { isCategory, isOrderStatus, isTerminal } from "../presets/work-order.v1.js";

type HasFields = { fields: OrderFields };

export function statusOf(o: HasFields): OrderStatus {
  const v = o.fields.status;
  return v?.kind === "choice" && isOrderStatus(v.value) ? v.value : "open";
}

export function categoryOf(o: HasFields): Category | undefined {
  const v = o.fields.category;
  return v?.kind === "choice" && isCategory(v.value) ? v.value : undefined;
}

/** Raw stored due date; callers validate it before doing arithmetic. */
export function dueDateOf(o: HasFields): string | undefined {
  const v = o.fields.dueDate;
  if (!v || v.kind === "unset") return undefined;
  return v.value;
}

export function matchesQuery(order: WorkOrder, q: WorkOrderQuery): boolean {
  if (q.category && categoryOf(order) !== q.category) return false;
  const status = statusOf(order);
  if (q.status && status !== q.status) return false;
  if (q.openOnly && isTerminal(status)) return false;
  return true;
}
