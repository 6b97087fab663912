import { describe, expect, it } from "vitest";
import { renderAnnotation, renderStatusLine } from "../src/domain/rendering";
import { makeSystem } from "./helpers/taskSystems";

describe("renderStatusLine", () => {
  it("renders status and title", () => {
    expect(renderStatusLine("generic-1", { title: "First issue", status: "New" })).toBe(
      "generic-1 (New): First issue",
    );
  });

  it("renders missing fields as empty strings", () => {
    expect(renderStatusLine("generic-1", {})).toBe("generic-1 (): ");
    expect(renderStatusLine("generic-1", { title: "First issue" })).toBe(
      "generic-1 (): First issue",
    );
  });
});

describe("renderAnnotation", () => {
  const generic = makeSystem({ messageFormat: "generic" });

  it("uses the generic format when the task has a title", () => {
    const task = { id: "1", title: "First issue", system: generic };
    expect(renderAnnotation("generic-1", task, generic)).toBe("generic #1 First issue");
  });

  it("falls back to the identifier under the generic format without a title", () => {
    expect(renderAnnotation("generic-1", { id: "1", status: "New" }, generic)).toBe("generic-1");
  });

  it("uses the status line shape without a message format", () => {
    const system = makeSystem();
    const task = { id: "1", title: "First issue", status: "New" };
    expect(renderAnnotation("generic-1", task, system)).toBe("generic-1 (New): First issue");
    expect(renderAnnotation("generic-1", { id: "1" })).toBe("generic-1 (): ");
  });
});
