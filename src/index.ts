export { createWorkflow } from "./core/workflow.js";
export { createRepository } from "./store/repository.js";
export { createReminderScheduler } from "./core/reminders.js";
export { createDeadlineMonitor, classify } from "./core/deadlines.js";
export { makeRoutes } from "./api/routes.js";
export { makeTelegramRoutes } from "./api/telegram.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export { LabeledTextExtractor } from "./lib/extract.js";
export { TelegramTransport } from "./lib/telegram.js";
export { DeskError, ValidationError, NotFoundError, DuplicateError, PersistenceError, SchedulingError } from "./core/errors.js";
export type { Store } from "./store/store.js";
export type { DocumentExtractor } from "./lib/extract.js";
export type {
  WorkOrder, Draft, FieldValue, ManualReminder, DeadlineAlert, AuditEvent, TurnInput, Prompt, ChatTransport, Notifier
} from "./types/contracts.js";
