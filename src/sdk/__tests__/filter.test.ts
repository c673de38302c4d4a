import { describe, it, expect } from "vitest";
import { compileFilter, filterEvents, toFieldTree } from "../filter.ts";
import { SdkError } from "../errors.ts";
import type { AsanaEvent } from "../types.ts";

function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof SdkError ? err.code : "not an SdkError";
  }
  return undefined;
}

const bare: AsanaEvent = { action: "changed" };
const renamed: AsanaEvent = { action: "changed", change: { field: "name", action: "changed" } };
const assigned: AsanaEvent = {
  action: "changed",
  user: { gid: "7", name: "Robin" },
  resource: { gid: "11", resource_type: "task", resource_subtype: "default_task" },
  change: {
    field: "assignee",
    action: "changed",
    new_value: { gid: "1210930954402852", resource_type: "user" },
  },
};

describe("compileFilter", () => {
  it("excludes events whose path is absent without raising", () => {
    const f = compileFilter('event.change.field == "name"');
    expect(filterEvents([bare, renamed], f)).toEqual([renamed]);
  });

  it("fails upfront on an incomplete expression", () => {
    expect(() => compileFilter("event.action ==")).toThrow(
      "Invalid filter at position 15: unexpected end of expression",
    );
  });

  it.each([
    ["empty", "   "],
    ["unknown root", 'task.action == "changed"'],
    ["unclosed paren", '(event.action == "changed"'],
    ["dangling dot", "event.change."],
    ["stray character", "event.action = 1"],
    ["unterminated string", 'event.action == "changed'],
    ["trailing token", 'event.action == "a" "b"'],
  ])("rejects %s with INVALID_FILTER", (_label, expr) => {
    expect(thrownCode(() => compileFilter(expr))).toBe("INVALID_FILTER");
  });

  it("reaches nested values inside change slots", () => {
    const f = compileFilter('event.change.new_value.gid == "1210930954402852"');
    expect(f.matches(assigned)).toBe(true);
    expect(f.matches(renamed)).toBe(false);
  });

  it("combines conditions with && and ||", () => {
    const f = compileFilter(
      'event.action == "changed" && (event.change.field == "name" || event.user.name == "Robin")',
    );
    expect(filterEvents([bare, renamed, assigned], f)).toEqual([renamed, assigned]);
  });

  it("short-circuits before touching an absent branch", () => {
    const f = compileFilter('event.change != null && event.change.field == "name"');
    expect(filterEvents([bare, renamed], f)).toEqual([renamed]);
  });

  it("reads a missing last key as null", () => {
    const f = compileFilter("event.user == null");
    expect(f.matches(bare)).toBe(true);
    expect(f.matches(assigned)).toBe(false);
  });

  it("negates with !", () => {
    const f = compileFilter('!(event.change.field == "assignee")');
    expect(f.matches(renamed)).toBe(true);
    expect(f.matches(assigned)).toBe(false);
  });

  it("never matches a non-boolean result or operand", () => {
    expect(compileFilter("event.action").matches(renamed)).toBe(false);
    expect(compileFilter('event.action && event.action == "changed"').matches(renamed)).toBe(false);
    expect(compileFilter("!event.action").matches(renamed)).toBe(false);
  });

  it("compares numbers, booleans and escaped strings", () => {
    const e: AsanaEvent = {
      action: "changed",
      change: { field: "notes", new_value: { count: 3, done: true, text: 'say "hi"' } },
    };
    expect(compileFilter("event.change.new_value.count == 3").matches(e)).toBe(true);
    expect(compileFilter('event.change.new_value.count == "3"').matches(e)).toBe(false);
    expect(compileFilter("event.change.new_value.done == true").matches(e)).toBe(true);
    expect(compileFilter("event.change.new_value.text == 'say \"hi\"'").matches(e)).toBe(true);
  });

  it("compares objects structurally", () => {
    const f = compileFilter("event.change.old_value == event.change.new_value");
    const same: AsanaEvent = { change: { old_value: { gid: "1", tags: ["a"] }, new_value: { gid: "1", tags: ["a"] } } };
    const moved: AsanaEvent = { change: { old_value: { gid: "1", tags: ["a"] }, new_value: { gid: "1", tags: ["b"] } } };
    expect(filterEvents([same, moved], f)).toEqual([same]);
  });

  it("treats inherited members as absent", () => {
    expect(compileFilter("event.constructor == null").matches(bare)).toBe(true);
    expect(compileFilter("event.hasOwnProperty != null").matches(bare)).toBe(false);
    expect(compileFilter("event.__proto__.x == null").matches(bare)).toBe(false);
    expect(compileFilter("event.change.toString == null").matches(renamed)).toBe(true);
  });

  it("reads a __proto__ key carried by the event itself", () => {
    const e: AsanaEvent = { action: "changed" };
    Object.defineProperty(e, "__proto__", { value: { x: 1 }, enumerable: true });
    expect(compileFilter("event.__proto__.x == 1").matches(e)).toBe(true);
  });
});

describe("toFieldTree", () => {
  it("drops undefined members and keeps nulls", () => {
    expect(toFieldTree({ a: undefined, b: null, c: [1, undefined], d: { e: "x" } })).toEqual({
      b: null,
      c: [1, null],
      d: { e: "x" },
    });
  });

  it("keeps a __proto__ key as an own member", () => {
    const source = { a: 1 };
    Object.defineProperty(source, "__proto__", { value: { polluted: true }, enumerable: true });
    const tree = toFieldTree(source);

    expect(Object.getPrototypeOf(tree)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(tree, "__proto__")?.value).toEqual({ polluted: true });
  });
});
