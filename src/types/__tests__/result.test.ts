import { describe, it, expect } from "vitest";
import { err, fromPromiseWith, isErr, isOk, ok, partition, type Result } from "../result.js";

describe("Result", () => {
  it("should narrow with the type guards", () => {
    const good: Result<number, string> = ok(1);
    const bad: Result<number, string> = err("nope");

    expect(isOk(good) && good.value).toBe(1);
    expect(isErr(bad) && bad.error).toBe("nope");
  });

  it("should map a rejection through the error mapper", async () => {
    const result = await fromPromiseWith(Promise.reject(new Error("boom")), (e) =>
      e instanceof Error ? e.message : "unknown"
    );

    expect(result).toEqual({ ok: false, error: "boom" });
    expect(await fromPromiseWith(Promise.resolve(3), () => "unused")).toEqual({ ok: true, value: 3 });
  });

  it("should partition values and errors in order", () => {
    const results: Result<number, string>[] = [ok(1), err("a"), ok(2), err("b")];

    expect(partition(results)).toEqual({ oks: [1, 2], errs: ["a", "b"] });
  });
});
