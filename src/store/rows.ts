import { z } from "zod";
import { STATUSES, CATEGORIES } from "../presets/work-order.v1.js";

export const FieldValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), value: z.string() }),
  z.object({ kind: z.literal("choice"), value: z.string() }),
  z.object({ kind: z.literal("date"), value: z.string() }),
  z.object({ kind: z.literal("unset") })
]);

export const OrderFieldsSchema = z.object({
  description: FieldValueSchema.optional(),
  category: FieldValueSchema.optional(),
  dueDate: FieldValueSchema.optional(),
  assignee: FieldValueSchema.optional(),
  scheduledDate: FieldValueSchema.optional(),
  status: FieldValueSchema.optional(),
  site: FieldValueSchema.optional(),
  ticketRef: FieldValueSchema.optional(),
  distanceKm: FieldValueSchema.optional(),
  criticality: FieldValueSchema.optional()
});

export const WorkOrderSchema = z.object({
  id: z.string().min(1),
  businessId: z.string().min(1),
  fields: OrderFieldsSchema,
  channel: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const ReminderSchema = z.object({
  id: z.string().min(1),
  businessId: z.string().optional(),
  firesAt: z.string(),
  message: z.string(),
  channel: z.string(),
  status: z.enum(["pending", "fired", "cancelled"]),
  createdAt: z.string(),
  firedAt: z.string().optional()
});

export const AuditEventSchema = z.object({
  id: z.string(),
  workOrderId: z.string(),
  businessId: z.string(),
  type: z.string(),
  actor: z.string(),
  payload: z.record(z.unknown()),
  at: z.string()
});

export const OrderStatusSchema = z.enum(STATUSES);
export const CategorySchema = z.enum(CATEGORIES);
