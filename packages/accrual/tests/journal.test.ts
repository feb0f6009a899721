/**
 * Tests for TransactionJournal and JournaledMap.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  TransactionJournal,
  JournaledMap,
  JournaledValue,
  compositeKey,
  splitKey,
} from "../src/journal.js";

describe("TransactionJournal", () => {
  let journal: TransactionJournal;
  let map: JournaledMap<string, number>;

  beforeEach(() => {
    journal = new TransactionJournal();
    map = new JournaledMap(journal);
  });

  it("keeps mutations made by a successful run", () => {
    journal.run(() => {
      map.set("a", 1);
      map.set("b", 2);
    });
    expect(map.get("a")).toBe(1);
    expect(map.get("b")).toBe(2);
  });

  it("returns the value of the run", () => {
    expect(journal.run(() => 7)).toBe(7);
  });

  it("reverts every mutation when the run throws", () => {
    map.set("a", 1);

    expect(() =>
      journal.run(() => {
        map.set("a", 10);
        map.set("b", 20);
        map.delete("a");
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(map.get("a")).toBe(1);
    expect(map.has("b")).toBe(false);
    expect(map.size).toBe(1);
  });

  it("restores the value from before the first of several writes", () => {
    map.set("a", 1);
    expect(() =>
      journal.run(() => {
        map.set("a", 2);
        map.set("a", 3);
        throw new Error("boom");
      }),
    ).toThrow();
    expect(map.get("a")).toBe(1);
  });

  it("joins nested runs into the outer transaction", () => {
    expect(() =>
      journal.run(() => {
        journal.run(() => {
          map.set("inner", 1);
        });
        throw new Error("outer fails");
      }),
    ).toThrow("outer fails");

    expect(map.has("inner")).toBe(false);
  });

  it("fires commit hooks after the outermost run", () => {
    const fired: string[] = [];
    journal.run(() => {
      journal.onCommit(() => fired.push("first"));
      journal.run(() => {
        journal.onCommit(() => fired.push("second"));
      });
      expect(fired).toEqual([]);
    });
    expect(fired).toEqual(["first", "second"]);
  });

  it("drops commit hooks on rollback", () => {
    const fired: string[] = [];
    expect(() =>
      journal.run(() => {
        journal.onCommit(() => fired.push("never"));
        throw new Error("boom");
      }),
    ).toThrow();
    expect(fired).toEqual([]);
  });

  it("runs a commit hook immediately outside a transaction", () => {
    let fired = false;
    journal.onCommit(() => {
      fired = true;
    });
    expect(fired).toBe(true);
  });

  it("runs every commit hook when one throws, then rethrows the first error", () => {
    const fired: string[] = [];

    expect(() =>
      journal.run(() => {
        map.set("a", 1);
        journal.onCommit(() => {
          fired.push("first");
          throw new Error("listener failed");
        });
        journal.onCommit(() => {
          fired.push("second");
          throw new Error("also failed");
        });
        journal.onCommit(() => {
          fired.push("third");
        });
      }),
    ).toThrow("listener failed");

    expect(fired).toEqual(["first", "second", "third"]);
    expect(map.get("a")).toBe(1);
    expect(journal.active).toBe(false);
  });

  it("reports whether a transaction is open", () => {
    expect(journal.active).toBe(false);
    journal.run(() => {
      expect(journal.active).toBe(true);
    });
    expect(journal.active).toBe(false);
  });

  it("is usable again after a rollback", () => {
    expect(() => journal.run(() => { throw new Error("boom"); })).toThrow();
    journal.run(() => map.set("a", 1));
    expect(map.get("a")).toBe(1);
  });
});

describe("compositeKey / splitKey", () => {
  it("round-trips identity pairs", () => {
    expect(splitKey(compositeKey("0xp", "0xh"))).toEqual(["0xp", "0xh"]);
  });
});

describe("JournaledValue", () => {
  it("reverts an assignment on rollback", () => {
    const journal = new TransactionJournal();
    const value = new JournaledValue(journal, "admin-1");

    expect(() =>
      journal.run(() => {
        value.set("admin-2");
        throw new Error("boom");
      }),
    ).toThrow();
    expect(value.get()).toBe("admin-1");

    journal.run(() => value.set("admin-3"));
    expect(value.get()).toBe("admin-3");
  });
});
