/**
 * Behavioural tests for the generic template itself
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { SyncMap } from "../template/sync-map.js";

const entries = (m: SyncMap): [unknown, unknown][] => {
  const seen: [unknown, unknown][] = [];
  m.range((k, v) => {
    seen.push([k, v]);
    return true;
  });
  return seen;
};

describe("SyncMap template", () => {
  it("should report missing keys", () => {
    const m = new SyncMap();
    expect(m.load("a")).to.deep.equal([undefined, false]);
  });

  it("should load stored values", () => {
    const m = new SyncMap();
    m.store("a", 1);
    m.store("b", 2);
    expect(m.load("a")).to.deep.equal([1, true]);
    expect(m.load("b")).to.deep.equal([2, true]);
  });

  it("should overwrite existing values", () => {
    const m = new SyncMap();
    m.store("a", 1);
    m.store("a", 2);
    expect(m.load("a")).to.deep.equal([2, true]);
  });

  it("should keep values across promotion of the dirty map", () => {
    const m = new SyncMap();
    m.store("a", 1);
    // Misses on the snapshot promote the dirty map.
    m.load("a");
    m.load("a");
    m.store("a", 3);
    m.store("b", 4);
    expect(m.load("a")).to.deep.equal([3, true]);
    expect(m.load("b")).to.deep.equal([4, true]);
  });

  it("should delete values", () => {
    const m = new SyncMap();
    m.store("a", 1);
    m.delete("a");
    expect(m.load("a")).to.deep.equal([undefined, false]);
    m.delete("never-stored");
    expect(m.load("never-stored")).to.deep.equal([undefined, false]);
  });

  it("should restore deleted keys after the snapshot was promoted", () => {
    const m = new SyncMap();
    m.store("a", 1);
    m.load("a");
    m.delete("a");
    // Expunges "a" while copying the snapshot into a new dirty map.
    m.store("b", 2);
    m.store("a", 5);
    expect(m.load("a")).to.deep.equal([5, true]);
    // "a" re-entered the dirty map after "b".
    expect(entries(m)).to.deep.equal([
      ["b", 2],
      ["a", 5],
    ]);
  });

  describe("loadOrStore", () => {
    it("should store when absent", () => {
      const m = new SyncMap();
      expect(m.loadOrStore("a", 1)).to.deep.equal([1, false]);
      expect(m.load("a")).to.deep.equal([1, true]);
    });

    it("should load when present", () => {
      const m = new SyncMap();
      m.store("a", 1);
      expect(m.loadOrStore("a", 2)).to.deep.equal([1, true]);
      m.load("a");
      expect(m.loadOrStore("a", 3)).to.deep.equal([1, true]);
    });

    it("should store into a deleted entry", () => {
      const m = new SyncMap();
      m.store("a", 1);
      m.load("a");
      m.delete("a");
      expect(m.loadOrStore("a", 7)).to.deep.equal([7, false]);
      expect(m.load("a")).to.deep.equal([7, true]);
    });
  });

  describe("range", () => {
    it("should visit every live entry", () => {
      const m = new SyncMap();
      m.store("a", 1);
      m.store("b", 2);
      m.store("c", 3);
      m.delete("b");
      expect(entries(m)).to.deep.equal([
        ["a", 1],
        ["c", 3],
      ]);
    });

    it("should stop when the callback returns false", () => {
      const m = new SyncMap();
      m.store("a", 1);
      m.store("b", 2);
      const seen: unknown[] = [];
      m.range((k) => {
        seen.push(k);
        return false;
      });
      expect(seen).to.deep.equal(["a"]);
    });

    it("should tolerate stores during the walk", () => {
      const m = new SyncMap();
      m.store("a", 1);
      m.range((k, v) => {
        m.store(`${String(k)}2`, v);
        return true;
      });
      expect(m.load("a2")).to.deep.equal([1, true]);
    });
  });
});
