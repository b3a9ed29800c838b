import { describe, expect, it } from "vitest";
import { createMilestone, createPerson, createTask, isTaskPriority, isTaskStatus, sameEntity } from "./entities.js";
import { ValidationError } from "./errors.js";

const baseTask = {
  id: 1,
  title: "Write plan",
  startDate: "2025-01-01",
  dueDate: "2025-01-10",
};

describe("createTask", () => {
  it("applies defaults for optional fields", () => {
    const result = createTask(baseTask);
    expect(result).toEqual({
      ok: true,
      value: {
        id: 1,
        title: "Write plan",
        description: "",
        status: "Not Started",
        priority: "Medium",
        startDate: "2025-01-01",
        dueDate: "2025-01-10",
        assigneeId: null,
        milestoneId: null,
      },
    });
  });

  it("returns a frozen snapshot", () => {
    const result = createTask(baseTask);
    expect(result.ok).toBe(true);
    if (result.ok) expect(Object.isFrozen(result.value)).toBe(true);
  });

  it("keeps the title exactly as submitted", () => {
    const result = createTask({ ...baseTask, title: " Write plan " });
    expect(result.ok && result.value.title).toBe(" Write plan ");
  });

  it("accepts start equal to due", () => {
    expect(createTask({ ...baseTask, dueDate: "2025-01-01" }).ok).toBe(true);
  });

  it("rejects start after due, naming dueDate", () => {
    const result = createTask({ ...baseTask, startDate: "2025-01-11" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.field).toBe("dueDate");
    }
  });

  it("rejects blank title", () => {
    const result = createTask({ ...baseTask, title: "   " });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.field).toBe("title");
  });

  it("rejects unknown status and priority", () => {
    const status = createTask({ ...baseTask, status: "Done" });
    const priority = createTask({ ...baseTask, priority: "Urgent" });
    expect(!status.ok && status.error.field).toBe("status");
    expect(!priority.ok && priority.error.field).toBe("priority");
  });

  it("rejects impossible calendar dates", () => {
    const result = createTask({ ...baseTask, startDate: "2025-02-30" });
    expect(!result.ok && result.error.field).toBe("startDate");
  });

  it("rejects non-integer references", () => {
    const result = createTask({ ...baseTask, assigneeId: 1.5 });
    expect(!result.ok && result.error.field).toBe("assigneeId");
  });
});

describe("createPerson", () => {
  it("keeps fields exactly as submitted and defaults role to empty", () => {
    expect(createPerson({ id: 3, name: "  Ada  ", email: " ada@example.test", role: " Dev " })).toEqual({
      ok: true,
      value: { id: 3, name: "  Ada  ", email: " ada@example.test", role: " Dev " },
    });
    expect(createPerson({ id: 4, name: "Bob", email: "bob@example.test" })).toEqual({
      ok: true,
      value: { id: 4, name: "Bob", email: "bob@example.test", role: "" },
    });
  });

  it("rejects a whitespace-only name", () => {
    const result = createPerson({ id: 1, name: "   ", email: "ada@example.test" });
    expect(!result.ok && result.error.field).toBe("name");
  });

  it.each(["ada", "@example.test", "ada@", "a@b@c"])("rejects email %s", (email) => {
    const result = createPerson({ id: 1, name: "Ada", email });
    expect(!result.ok && result.error.field).toBe("email");
  });
});

describe("createMilestone", () => {
  it("target date is optional", () => {
    expect(createMilestone({ id: 1, name: "Beta" })).toEqual({
      ok: true,
      value: { id: 1, name: "Beta", targetDate: null },
    });
  });

  it("rejects malformed target date", () => {
    const result = createMilestone({ id: 1, name: "Beta", targetDate: "2025/03/01" });
    expect(!result.ok && result.error.field).toBe("targetDate");
  });
});

describe("enum guards", () => {
  it("recognise only listed values", () => {
    expect(isTaskStatus("Blocked")).toBe(true);
    expect(isTaskStatus("blocked")).toBe(false);
    expect(isTaskPriority("High")).toBe(true);
    expect(isTaskPriority("Critical")).toBe(false);
  });
});

describe("sameEntity", () => {
  it("compares identifiers only", () => {
    const a = createPerson({ id: 1, name: "Ada", email: "ada@example.test" });
    const b = createPerson({ id: 1, name: "Ada L.", email: "ada.l@example.test" });
    const c = createPerson({ id: 2, name: "Ada", email: "ada@example.test" });
    if (!a.ok || !b.ok || !c.ok) throw new Error("fixture invalid");
    expect(sameEntity(a.value, b.value)).toBe(true);
    expect(sameEntity(a.value, c.value)).toBe(false);
  });
});
