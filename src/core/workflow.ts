import pino, { Logger } from "pino";
import { Repository } from "../store/repository.js";
import { ReminderScheduler } from "./reminders.js";
import { DocumentExtractor } from "../lib/extract.js";
import { DuplicateError, NotFoundError, PersistenceError, SchedulingError, ValidationError } from "./errors.js";
import { Action, EditTarget, Session, SessionState, newSession } from "./session.js";
import { canTransition } from "./transitions.js";
import { decodeAction, encodeAction } from "./actions.js";
import { Checked, validateChoice, validateField, validateIdentifier } from "./validate.js";
import { parseLocalDateTime, formatDateTime } from "./dates.js";
import { normalizeText } from "./normalize.js";
import {
  currentValue, helpText, menuPrompt, renderListItem, renderSummary, splitMessages
} from "./render.js";
import {
  CATEGORIES, FIELDS, NOT_APPLICABLE, STATUSES, createSequence, defaultFields, fieldSpec,
  isCategory, isFieldKey, isOrderStatus, statusLabel
} from "../presets/work-order.v1.js";
import {
  Category, ChatTransport, Choice, Draft, EditableKey, FieldKey, FieldValue, OrderFields, OrderStatus, Prompt, TurnInput, WorkOrder
} from "../types/contracts.js";

function withField(fields: OrderFields, key: FieldKey, value: FieldValue): OrderFields {
  const next: OrderFields = { ...fields };
  next[key] = value;
  return next;
}

const CANCEL: Choice = { label: "Cancel", token: encodeAction({ type: "cancel" }) };
const ALL = "all";
const NO_ORDER = "none";

export type Workflow = ReturnType<typeof createWorkflow>;

/**
 * Guided chat dialogue over work orders. One Session per chat; inputs of a
 * session are handled one at a time in arrival order.
 */
export function createWorkflow(args: {
  repository: Repository;
  scheduler: Pick<ReminderScheduler, "schedule" | "cancelAllFor" | "retag">;
  transport: ChatTransport;
  extractor: DocumentExtractor;
  timezone: string;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "workflow" });
  const clock = args.now ?? (() => new Date());
  const repo = args.repository;
  const sessions = new Map<string, Session>();
  const queues = new Map<string, Promise<void>>();

  // --- session plumbing ---

  function sessionFor(sessionId: string, channel: string): Session {
    let s = sessions.get(sessionId);
    if (!s) {
      s = newSession(sessionId, channel, clock());
      sessions.set(sessionId, s);
    }
    s.channel = channel;
    return s;
  }

  function go(s: Session, next: SessionState) {
    if (!canTransition(s.state.tag, next.tag)) {
      throw new Error(`Illegal transition ${s.state.tag} -> ${next.tag}`);
    }
    s.state = next;
    s.updatedAt = clock().toISOString();
  }

  async function send(s: Session, prompt: Prompt) {
    await args.transport.sendPrompt(s.id, prompt);
  }

  async function say(s: Session, text: string) {
    await send(s, { text });
  }

  /** Moves to `next` and sends its prompt, optionally preceded by `note`. */
  async function enter(s: Session, next: SessionState, note?: string) {
    go(s, next);
    await send(s, withNote(promptFor(next), note));
  }

  /** Stays in the current state and asks again. */
  async function reprompt(s: Session, error: string) {
    await send(s, withNote(promptFor(s.state), error));
  }

  async function toMenu(s: Session, note?: string) {
    await enter(s, { tag: "menu" }, note);
  }

  function withNote(p: Prompt, note?: string): Prompt {
    return note ? { ...p, text: `${note}\n\n${p.text}` } : p;
  }

  // --- prompts ---

  function fieldPrompt(key: EditableKey, current?: string): Prompt {
    const spec = fieldSpec(key);
    const suffix = current !== undefined ? ` (current: ${current})` : "";
    switch (spec.domain.type) {
      case "identifier":
        return { text: `Enter the ${spec.label.toLowerCase()}${suffix}:`, choices: [CANCEL] };
      case "text":
        return { text: `Enter ${spec.label}${suffix}:`, choices: [CANCEL] };
      case "choice":
        return {
          text: `Choose ${spec.label}${suffix}:`,
          choices: [...spec.domain.options.map((o) => ({ label: o.label, token: encodeAction({ type: "pick", value: o.value }) })), CANCEL]
        };
      case "date": {
        const unset = spec.domain.allowUnset ? `, or ${NOT_APPLICABLE}` : "";
        return { text: `Enter ${spec.label} (DD/MM/YYYY${unset})${suffix}:`, choices: [CANCEL] };
      }
    }
  }

  function editMenuPrompt(target: EditTarget): Prompt {
    const subject = target.kind === "draft" ? target.draft : target.order;
    const choices: Choice[] = FIELDS.map((f) => ({
      label: `${f.label}: ${currentValue(subject, f.key)}`,
      token: encodeAction({ type: "field", key: f.key })
    }));
    choices.push({ label: target.kind === "draft" ? "Back to summary" : "Finish", token: encodeAction({ type: "finish" }) });
    choices.push(CANCEL);
    return { text: `Work order ${subject.businessId}: choose a field to edit.`, choices };
  }

  function promptFor(state: SessionState): Prompt {
    switch (state.tag) {
      case "menu":
        return menuPrompt();
      case "collect_identifier":
        return fieldPrompt("businessId");
      case "duplicate_choice":
        return {
          text: `Work order ${state.existing.businessId} already exists:\n\n${renderSummary(state.existing)}\n\nEdit the existing order instead?`,
          choices: [{ label: "Edit existing", token: encodeAction({ type: "edit" }) }, CANCEL]
        };
      case "collect_field": {
        const key = createSequence()[state.index];
        return fieldPrompt(key);
      }
      case "confirm_summary":
        return {
          text: `Please review the work order:\n\n${renderSummary(state.draft)}`,
          choices: [
            { label: "Confirm", token: encodeAction({ type: "confirm" }) },
            { label: "Edit", token: encodeAction({ type: "edit" }) },
            CANCEL
          ]
        };
      case "field_edit_menu":
        return editMenuPrompt(state.target);
      case "await_field_value": {
        const subject = state.target.kind === "draft" ? state.target.draft : state.target.order;
        return fieldPrompt(state.fieldKey, currentValue(subject, state.fieldKey));
      }
      case "lookup_for_update":
        return { text: "Enter the number of the work order to update:", choices: [CANCEL] };
      case "lookup_for_delete":
        return { text: "Enter the number of the work order to delete:", choices: [CANCEL] };
      case "confirm_delete":
        return {
          text: `Delete this work order?\n\n${renderSummary(state.order)}`,
          choices: [{ label: "Delete", token: encodeAction({ type: "confirm" }) }, CANCEL]
        };
      case "filter_category":
        return {
          text: "Filter by category:",
          choices: [
            ...CATEGORIES.map((c) => ({ label: c, token: encodeAction({ type: "filter", value: c }) })),
            { label: "All", token: encodeAction({ type: "filter", value: ALL }) },
            CANCEL
          ]
        };
      case "filter_status":
        return {
          text: "Filter by status:",
          choices: [
            ...STATUSES.map((st) => ({ label: statusLabel(st), token: encodeAction({ type: "filter", value: st }) })),
            { label: "All", token: encodeAction({ type: "filter", value: ALL }) },
            CANCEL
          ]
        };
      case "reminder_lookup":
        return { text: `Enter the work order number for the reminder, or '${NO_ORDER}' for a reminder without an order:`, choices: [CANCEL] };
      case "reminder_time":
        return { text: "Enter the date and time of the reminder (DD/MM/YYYY HH:MM):", choices: [CANCEL] };
      case "reminder_message":
        return { text: "Enter the reminder message:", choices: [CANCEL] };
      case "await_document":
        return { text: "Send the document: a text file with one 'Label: value' line per field.", choices: [CANCEL] };
    }
  }

  // --- input helpers ---

  function actionOf(input: TurnInput): Action | null {
    return input.kind === "choice" ? decodeAction(input.token) : null;
  }

  function textOf(input: TurnInput): string | null {
    return input.kind === "text" ? input.text : null;
  }

  /** A value for a plain field: picked from the offered set for choices, typed otherwise. */
  function readValue(key: FieldKey, input: TurnInput): Checked<FieldValue> {
    const spec = fieldSpec(key);
    if (spec.domain.type === "choice") {
      const action = actionOf(input);
      if (action?.type !== "pick") return { ok: false, error: "Please choose one of the options below." };
      return validateChoice(key, action.value);
    }
    const text = textOf(input);
    if (text === null) return { ok: false, error: `Please type the ${spec.label.toLowerCase()}.` };
    return validateField(key, text);
  }

  function nextMissing(draft: Draft): number {
    return createSequence().findIndex((k) => draft.fields[k] === undefined);
  }

  /** Asks for the next missing required field, or shows the summary when none is left. */
  async function continueDraft(s: Session, draft: Draft, note?: string) {
    const index = nextMissing(draft);
    if (index === -1) await enter(s, { tag: "confirm_summary", draft }, note);
    else await enter(s, { tag: "collect_field", draft, index }, note);
  }

  async function lookup(s: Session, input: TurnInput): Promise<WorkOrder | null> {
    const text = textOf(input);
    if (text === null) {
      await reprompt(s, "Please type the work order number.");
      return null;
    }
    const id = validateIdentifier(text);
    if (!id.ok) {
      await reprompt(s, id.error);
      return null;
    }
    const order = await repo.findByBusinessId(id.value);
    if (!order) {
      await reprompt(s, `${new NotFoundError(id.value).message}.`);
      return null;
    }
    return order;
  }

  // --- states ---

  async function onMenu(s: Session, action: Action | null) {
    if (action?.type !== "menu") return reprompt(s, "Please choose an option.");
    switch (action.item) {
      case "create": return enter(s, { tag: "collect_identifier" });
      case "update": return enter(s, { tag: "lookup_for_update" });
      case "delete": return enter(s, { tag: "lookup_for_delete" });
      case "list": return enter(s, { tag: "filter_category" });
      case "upload": return enter(s, { tag: "await_document" });
      case "reminder": return enter(s, { tag: "reminder_lookup" });
      case "help":
        await say(s, helpText());
        return toMenu(s);
    }
  }

  async function onCollectIdentifier(s: Session, input: TurnInput) {
    const text = textOf(input);
    if (text === null) return reprompt(s, "Please type the order number.");
    const id = validateIdentifier(text);
    if (!id.ok) return reprompt(s, id.error);

    const existing = await repo.findByBusinessId(id.value);
    if (existing) return enter(s, { tag: "duplicate_choice", existing });

    return continueDraft(s, { businessId: id.value, fields: defaultFields(), channel: s.channel });
  }

  async function onDuplicateChoice(s: Session, existing: WorkOrder, action: Action | null) {
    if (action?.type !== "edit") return reprompt(s, "Please choose one of the options below.");
    const fresh = await repo.findById(existing.id);
    if (!fresh) return toMenu(s, `Work order ${existing.businessId} no longer exists.`);
    return enter(s, { tag: "field_edit_menu", target: { kind: "persisted", order: fresh } });
  }

  async function onCollectField(s: Session, draft: Draft, index: number, input: TurnInput) {
    const key = createSequence()[index];
    const value = readValue(key, input);
    if (!value.ok) return reprompt(s, value.error);
    return continueDraft(s, { ...draft, fields: withField(draft.fields, key, value.value) });
  }

  async function onConfirmSummary(s: Session, draft: Draft, action: Action | null) {
    if (action?.type === "edit") return enter(s, { tag: "field_edit_menu", target: { kind: "draft", draft } });
    if (action?.type !== "confirm") return reprompt(s, "Please confirm, edit or cancel.");

    try {
      const order = await repo.create(draft, s.id);
      return toMenu(s, `Work order ${order.businessId} created.`);
    } catch (e) {
      if (!(e instanceof DuplicateError)) throw e;
      const existing = e.existing ?? await repo.findByBusinessId(e.businessId);
      if (!existing) throw e;
      return enter(s, { tag: "duplicate_choice", existing });
    }
  }

  async function onFieldEditMenu(s: Session, target: EditTarget, action: Action | null) {
    if (action?.type === "field") return enter(s, { tag: "await_field_value", target, fieldKey: action.key });
    if (action?.type !== "finish") return reprompt(s, "Please choose a field to edit.");

    if (target.kind === "draft") return enter(s, { tag: "confirm_summary", draft: target.draft });
    // each edit was saved when it was made
    return toMenu(s, `Work order ${target.order.businessId} saved.`);
  }

  async function onAwaitIdentifier(s: Session, target: EditTarget, input: TurnInput) {
    const text = textOf(input);
    if (text === null) return reprompt(s, "Please type the order number.");
    const id = validateIdentifier(text);
    if (!id.ok) return reprompt(s, id.error);

    const current = target.kind === "draft" ? target.draft.businessId : target.order.businessId;
    if (id.value === current) return enter(s, { tag: "field_edit_menu", target }, "The order number is unchanged.");

    const taken = `Work order ${id.value} already exists. Please type a different number.`;
    const holder = await repo.findByBusinessId(id.value);
    if (holder) return reprompt(s, taken);

    if (target.kind === "draft") {
      const draft = { ...target.draft, businessId: id.value };
      return enter(s, { tag: "field_edit_menu", target: { kind: "draft", draft } }, `${fieldSpec("businessId").label} updated.`);
    }

    let order: WorkOrder;
    try {
      order = await repo.update(target.order.id, { businessId: id.value }, s.id);
    } catch (e) {
      if (e instanceof DuplicateError) return reprompt(s, taken);
      throw e;
    }
    await args.scheduler.retag(current, order.businessId);
    return enter(s, { tag: "field_edit_menu", target: { kind: "persisted", order } }, `${fieldSpec("businessId").label} updated.`);
  }

  async function onAwaitFieldValue(s: Session, target: EditTarget, fieldKey: EditableKey, input: TurnInput) {
    if (!isFieldKey(fieldKey)) return onAwaitIdentifier(s, target, input);

    const value = readValue(fieldKey, input);
    // invalid input leaves both the state and the stored value as they were
    if (!value.ok) return reprompt(s, value.error);

    const note = `${fieldSpec(fieldKey).label} updated.`;
    if (target.kind === "draft") {
      const draft = { ...target.draft, fields: withField(target.draft.fields, fieldKey, value.value) };
      return enter(s, { tag: "field_edit_menu", target: { kind: "draft", draft } }, note);
    }

    const order = await repo.update(target.order.id, { fields: withField({}, fieldKey, value.value) }, s.id);
    return enter(s, { tag: "field_edit_menu", target: { kind: "persisted", order } }, note);
  }

  async function onConfirmDelete(s: Session, order: WorkOrder, action: Action | null) {
    if (action?.type !== "confirm") return reprompt(s, "Please confirm or cancel.");

    const deleted = await repo.delete(order.id, s.id);
    const head = deleted ? `Work order ${order.businessId} deleted.` : `Work order ${order.businessId} was already deleted.`;

    let cancelled: number;
    try {
      cancelled = await args.scheduler.cancelAllFor(order.businessId, s.id);
    } catch (e) {
      if (!(e instanceof PersistenceError)) throw e;
      log.error({ err: e, businessId: order.businessId }, "workflow: reminder cascade failed");
      return toMenu(s, `${head} Its pending reminders could not be cancelled.`);
    }
    const tail = cancelled > 0 ? ` ${cancelled} reminder${cancelled === 1 ? "" : "s"} cancelled.` : "";
    return toMenu(s, head + tail);
  }

  async function onFilterCategory(s: Session, action: Action | null) {
    if (action?.type !== "filter") return reprompt(s, "Please choose a category.");
    if (action.value === ALL) return enter(s, { tag: "filter_status" });
    if (!isCategory(action.value)) return reprompt(s, "Please choose a category.");
    return enter(s, { tag: "filter_status", category: action.value });
  }

  async function onFilterStatus(s: Session, category: Category | undefined, action: Action | null) {
    if (action?.type !== "filter") return reprompt(s, "Please choose a status.");
    let status: OrderStatus | undefined;
    if (action.value !== ALL) {
      if (!isOrderStatus(action.value)) return reprompt(s, "Please choose a status.");
      status = action.value;
    }

    const orders = await repo.query({ category, status });
    if (orders.length === 0) return toMenu(s, "No work orders found.");

    const header = `Work orders (${orders.length}):`;
    for (const text of splitMessages([header, ...orders.map(renderListItem)])) {
      await say(s, text);
    }
    return toMenu(s);
  }

  async function onReminderLookup(s: Session, input: TurnInput) {
    const text = textOf(input);
    if (text !== null && normalizeText(text) === NO_ORDER) return enter(s, { tag: "reminder_time" });
    const order = await lookup(s, input);
    if (!order) return;
    return enter(s, { tag: "reminder_time", businessId: order.businessId }, `Work order ${order.businessId} found.`);
  }

  async function onReminderTime(s: Session, businessId: string | undefined, input: TurnInput) {
    const text = textOf(input);
    if (text === null) return reprompt(s, "Please type the date and time.");
    const at = parseLocalDateTime(text, args.timezone);
    if (!at) return reprompt(s, "Invalid date and time. Please use DD/MM/YYYY HH:MM (e.g. 25/10/2026 14:30).");
    if (at.getTime() <= clock().getTime()) {
      return reprompt(s, new SchedulingError("The reminder time must be in the future.").message);
    }
    return enter(s, { tag: "reminder_message", firesAt: at.toISOString(), ...(businessId ? { businessId } : {}) });
  }

  async function onReminderMessage(s: Session, businessId: string | undefined, firesAt: string, input: TurnInput) {
    const text = textOf(input);
    if (text === null) return reprompt(s, "Please type the reminder message.");
    try {
      const r = await args.scheduler.schedule({ firesAt: new Date(firesAt), message: text, channel: s.channel, businessId }, s.id);
      return toMenu(s, `Reminder scheduled for ${formatDateTime(r.firesAt, args.timezone)}.`);
    } catch (e) {
      if (e instanceof ValidationError) return reprompt(s, e.message);
      if (e instanceof SchedulingError) {
        return enter(s, { tag: "reminder_time", ...(businessId ? { businessId } : {}) }, `${e.message} Please enter a new time.`);
      }
      throw e;
    }
  }

  async function onDocument(s: Session, input: TurnInput) {
    if (input.kind !== "document") return reprompt(s, "Please send a document.");
    const res = await args.extractor.extract(input.bytes, { fileName: input.fileName, mimeType: input.mimeType });
    if (!res.ok) return reprompt(s, res.error);

    const raw = res.fields.businessId;
    const id = raw === undefined ? null : validateIdentifier(raw);
    if (!id || !id.ok) return reprompt(s, "The document has no valid order number.");

    const existing = await repo.findByBusinessId(id.value);
    if (existing) return enter(s, { tag: "duplicate_choice", existing });

    const draft: Draft = { businessId: id.value, fields: defaultFields(), channel: s.channel };
    const dropped: string[] = [];
    for (const [key, value] of Object.entries(res.fields)) {
      if (value === undefined || !isFieldKey(key)) continue;
      const checked = validateField(key, value);
      if (checked.ok) draft.fields[key] = checked.value;
      else dropped.push(`${fieldSpec(key).label}: ${checked.error}`);
    }

    const note = dropped.length
      ? `Some values in the document were ignored:\n${dropped.join("\n")}`
      : "Document read.";
    return continueDraft(s, draft, note);
  }

  // --- dispatch ---

  async function step(s: Session, input: TurnInput) {
    if (input.kind === "command") {
      if (input.command === "cancel") return toMenu(s, "Cancelled.");
      return toMenu(s, input.command === "start" ? "Welcome to the work-order desk." : undefined);
    }

    const action = actionOf(input);
    if (input.kind === "choice" && !action) return reprompt(s, "That option is not available.");
    if (action?.type === "cancel") return toMenu(s, "Cancelled.");

    const st = s.state;
    switch (st.tag) {
      case "menu": return onMenu(s, action);
      case "collect_identifier": return onCollectIdentifier(s, input);
      case "duplicate_choice": return onDuplicateChoice(s, st.existing, action);
      case "collect_field": return onCollectField(s, st.draft, st.index, input);
      case "confirm_summary": return onConfirmSummary(s, st.draft, action);
      case "field_edit_menu": return onFieldEditMenu(s, st.target, action);
      case "await_field_value": return onAwaitFieldValue(s, st.target, st.fieldKey, input);
      case "lookup_for_update": {
        const order = await lookup(s, input);
        if (order) await enter(s, { tag: "field_edit_menu", target: { kind: "persisted", order } });
        return;
      }
      case "lookup_for_delete": {
        const order = await lookup(s, input);
        if (order) await enter(s, { tag: "confirm_delete", order });
        return;
      }
      case "confirm_delete": return onConfirmDelete(s, st.order, action);
      case "filter_category": return onFilterCategory(s, action);
      case "filter_status": return onFilterStatus(s, st.category, action);
      case "reminder_lookup": return onReminderLookup(s, input);
      case "reminder_time": return onReminderTime(s, st.businessId, input);
      case "reminder_message": return onReminderMessage(s, st.businessId, st.firesAt, input);
      case "await_document": return onDocument(s, input);
    }
  }

  async function processTurn(sessionId: string, channel: string, input: TurnInput) {
    const s = sessionFor(sessionId, channel);
    const from = s.state.tag;
    try {
      await step(s, input);
    } catch (e) {
      // store failures and anything unexpected end the current operation only
      if (e instanceof NotFoundError) {
        log.warn({ sessionId, state: from, businessId: e.businessId }, "workflow: order vanished");
        return forceMenu(s, `${e.message}.`);
      }
      log.error({ err: e, sessionId, state: from }, "workflow: operation failed");
      const text = e instanceof PersistenceError
        ? "The work-order store is unavailable, so the operation was not completed. Please try again later."
        : "Something went wrong, so the operation was not completed.";
      return forceMenu(s, text);
    }
    if (s.state.tag !== from) log.debug({ sessionId, from, to: s.state.tag }, "workflow: transition");
  }

  async function forceMenu(s: Session, text: string) {
    go(s, { tag: "menu" });
    await send(s, withNote(menuPrompt(), text));
  }

  /**
   * Queues one input for a session. The returned promise settles when this
   * input has been handled; a transport failure rejects it.
   */
  function handleTurn(sessionId: string, channel: string, input: TurnInput): Promise<void> {
    const prev = queues.get(sessionId) ?? Promise.resolve();
    const run = prev.then(() => processTurn(sessionId, channel, input));
    const tail = run.then(
      () => undefined,
      (err) => log.error({ err, sessionId }, "workflow: could not reply")
    );
    queues.set(sessionId, tail);
    void tail.then(() => {
      if (queues.get(sessionId) === tail) queues.delete(sessionId);
    });
    return run;
  }

  function stateOf(sessionId: string): SessionState {
    return sessions.get(sessionId)?.state ?? { tag: "menu" };
  }

  return { handleTurn, stateOf };
}
