/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, mapError, flatMap, traverse } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.equal(42);
      }
    });

    it("should create error result", () => {
      const result = error<number, string>("Something went wrong");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.equal("Something went wrong");
      }
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("mapError", () => {
    it("should map the error", () => {
      const mapped = mapError(error<number, string>("bad"), (e) => e.length);
      expect(mapped).to.deep.equal({ ok: false, error: 3 });
    });

    it("should pass through ok", () => {
      const mapped = mapError(ok<number, string>(1), (e) => e.length);
      expect(mapped).to.deep.equal({ ok: true, value: 1 });
    });
  });

  describe("flatMap", () => {
    it("should chain ok results", () => {
      const chained = flatMap(ok<number, string>(5), (x) =>
        ok<string, string>(`#${x}`)
      );
      expect(chained).to.deep.equal({ ok: true, value: "#5" });
    });

    it("should short-circuit on the first error", () => {
      let called = false;
      const chained = flatMap(error<number, string>("first"), (x) => {
        called = true;
        return ok<number, string>(x);
      });
      expect(called).to.equal(false);
      expect(chained).to.deep.equal({ ok: false, error: "first" });
    });
  });

  describe("traverse", () => {
    it("should collect every value in order", () => {
      const result = traverse([1, 2, 3], (x, i) => ok<number, string>(x * 10 + i));
      expect(result).to.deep.equal({ ok: true, value: [10, 21, 32] });
    });

    it("should stop at the first failing item", () => {
      const seen: number[] = [];
      const result = traverse([1, 2, 3], (x) => {
        seen.push(x);
        return x === 2 ? error<number, string>("two") : ok<number, string>(x);
      });
      expect(result).to.deep.equal({ ok: false, error: "two" });
      expect(seen).to.deep.equal([1, 2]);
    });
  });
});
