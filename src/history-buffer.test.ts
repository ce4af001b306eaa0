import { describe, it, expect } from "vitest";
import { HistoryBuffer } from "./history-buffer.js";

describe("HistoryBuffer", () => {
  it("keeps the most recent items up to the limit, most recent last", () => {
    const history = new HistoryBuffer(3);
    for (const text of ["a", "b", "c", "d", "e"]) history.push(text);

    expect(history.snapshot()).toEqual(["c", "d", "e"]);
  });

  it("defaults to five items", () => {
    const history = new HistoryBuffer();
    for (let i = 1; i <= 7; i++) history.push(`s${i}`);
    expect(history.snapshot()).toEqual(["s3", "s4", "s5", "s6", "s7"]);
  });

  it("replaceLast swaps the newest item", () => {
    const history = new HistoryBuffer();
    history.push("first");
    history.push("I want to");
    history.replaceLast("I want to go home");
    expect(history.snapshot()).toEqual(["first", "I want to go home"]);
  });

  it("replaceLast on an empty buffer appends", () => {
    const history = new HistoryBuffer();
    history.replaceLast("only");
    expect(history.snapshot()).toEqual(["only"]);
  });

  it("hands out frozen copies", () => {
    const history = new HistoryBuffer();
    history.push("a");
    const snap = history.snapshot();
    history.push("b");

    expect(snap).toEqual(["a"]);
    expect(Object.isFrozen(snap)).toBe(true);
  });

  it("rejects a non-positive or fractional limit", () => {
    expect(() => new HistoryBuffer(0)).toThrow("History limit must be a positive integer, got 0");
    expect(() => new HistoryBuffer(2.5)).toThrow();
  });
});
