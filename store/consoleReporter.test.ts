import { describe, expect, it } from "vitest";
import { createConsoleReporter, formatEvent } from "./consoleReporter.js";

function captureLogger() {
  const lines: Array<[string, string]> = [];
  return {
    lines,
    logger: {
      info: (message: string) => lines.push(["info", message]),
      warn: (message: string) => lines.push(["warn", message]),
      error: (message: string) => lines.push(["error", message]),
    },
  };
}

describe("createConsoleReporter", () => {
  it("routes events to a level by kind", () => {
    const { lines, logger } = captureLogger();
    const reporter = createConsoleReporter(logger);

    reporter.report({ type: "EntityCreated", entity: "task", id: 3 });
    reporter.report({
      type: "ValidationRejected",
      entity: "task",
      operation: "create",
      field: "title",
      message: "title must not be empty",
    });
    reporter.report({ type: "StorageFault", entity: "person", operation: "list", message: "Invalid JSON in store file" });

    expect(lines.map(([level]) => level)).toEqual(["info", "warn", "error"]);
    expect(lines[0]?.[1]).toBe('Created task 3 {"type":"EntityCreated","entity":"task","id":3}');
  });
});

describe("formatEvent", () => {
  it("names the missing reference", () => {
    expect(
      formatEvent({ type: "ReferenceRejected", entity: "task", operation: "update", field: "assigneeId", referencedId: 7 })
    ).toBe(
      'Rejected task update: assigneeId 7 does not exist {"type":"ReferenceRejected","entity":"task","operation":"update","field":"assigneeId","referencedId":7}'
    );
  });

  it("includes cleared task ids on delete", () => {
    expect(formatEvent({ type: "EntityDeleted", entity: "person", id: 2, clearedTaskIds: [4, 5] })).toBe(
      'Deleted person 2 {"type":"EntityDeleted","entity":"person","id":2,"clearedTaskIds":[4,5]}'
    );
  });
});
