import { describe, expect, it } from "vitest";
import { describeError, errnoCode, fail, fromUnknown, ok } from "./app-error.js";

describe("Result helpers", () => {
  it("builds success and failure values", () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(fail("Invalid", "bad header")).toEqual({
      ok: false,
      error: { kind: "Invalid", message: "bad header" },
    });
  });

  it("formats an error with its kind", () => {
    expect(describeError({ kind: "NotPermitted", message: "outside root" })).toBe(
      "NotPermitted: outside root",
    );
  });
});

describe("fromUnknown", () => {
  it("maps errno errors to IO", () => {
    const err = Object.assign(new Error("no such file"), { code: "ENOENT" });
    const result = fromUnknown(err, "Reading a.txt");
    expect(result.error.kind).toBe("IO");
    expect(result.error.message).toBe("Reading a.txt: no such file");
    expect(result.error.cause).toBe(err);
  });

  it("maps plain errors and non-errors to Unknown", () => {
    expect(fromUnknown(new TypeError("oops"), "Routing").error.kind).toBe(
      "Unknown",
    );
    expect(fromUnknown("boom", "Routing").error).toEqual({
      kind: "Unknown",
      message: "Routing: boom",
      cause: "boom",
    });
  });

  it("reads string error codes only", () => {
    expect(errnoCode({ code: "EACCES" })).toBe("EACCES");
    expect(errnoCode({ code: 13 })).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});
