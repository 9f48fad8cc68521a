import { describe, it } from "node:test";
import assert from "node:assert";
import * as wo from "./work-order.v1.js";

describe("work order preset", () => {
  it("asks description, category and due date during creation, in display order", () => {
    assert.deepStrictEqual(wo.createSequence(), ["description", "category", "dueDate"]);
  });

  it("starts new orders open, unassigned and unscheduled", () => {
    assert.deepStrictEqual(wo.defaultFields(), {
      status: { kind: "choice", value: "open" },
      assignee: { kind: "text", value: "Unassigned" },
      scheduledDate: { kind: "unset" }
    });
  });

  it("lists the order number first and every field once", () => {
    const keys = wo.FIELDS.map((f) => f.key);
    assert.strictEqual(keys[0], "businessId");
    assert.strictEqual(new Set(keys).size, keys.length);
  });

  it("offers categories and statuses as closed choice sets", () => {
    const category = wo.fieldSpec("category").domain;
    assert.strictEqual(category.type, "choice");
    if (category.type === "choice") {
      assert.deepStrictEqual(category.options.map((o) => o.value), ["Corrective", "Preventive"]);
    }
    const status = wo.fieldSpec("status").domain;
    assert.strictEqual(status.type, "choice");
    if (status.type === "choice") {
      assert.deepStrictEqual(status.options.find((o) => o.value === "in-progress"), { value: "in-progress", label: "In progress" });
    }
  });

  it("only lets optional dates be unset", () => {
    assert.deepStrictEqual(wo.fieldSpec("dueDate").domain, { type: "date", allowUnset: false });
    assert.deepStrictEqual(wo.fieldSpec("scheduledDate").domain, { type: "date", allowUnset: true });
  });

  it("treats done and cancelled as terminal", () => {
    assert.deepStrictEqual(wo.STATUSES.filter(wo.isTerminal), ["done", "cancelled"]);
  });

  it("recognizes keys and values", () => {
    assert.strictEqual(wo.isEditableKey("businessId"), true);
    assert.strictEqual(wo.isFieldKey("businessId"), false);
    assert.strictEqual(wo.isFieldKey("site"), true);
    assert.strictEqual(wo.isEditableKey("colour"), false);
    assert.strictEqual(wo.isOrderStatus("in-progress"), true);
    assert.strictEqual(wo.isOrderStatus("In progress"), false);
    assert.strictEqual(wo.isCategory("Corrective"), true);
    assert.strictEqual(wo.isCategory("corrective"), false);
  });

  it("accepts identifiers of digits only", () => {
    assert.strictEqual(wo.IDENTIFIER_PATTERN.test("1001"), true);
    assert.strictEqual(wo.IDENTIFIER_PATTERN.test("OS-1001"), false);
  });
});
