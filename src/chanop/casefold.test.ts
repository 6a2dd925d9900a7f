import { describe, expect, it } from "vitest";
import {
  CaseInsensitiveMap,
  CaseInsensitiveSet,
  equalsIgnoreCase,
  foldCase,
  normalizeKey,
} from "./casefold.js";

describe("case-insensitive keys", () => {
  it("folds ASCII letters only", () => {
    expect(foldCase("AlIcE[1]")).toBe("alice[1]");
    expect(foldCase("ÀB")).toBe("Àb");
    expect(equalsIgnoreCase("#Chan", "#CHAN")).toBe(true);
  });

  it("normalizes every part of a composite key", () => {
    expect(normalizeKey(["Libera", "#Chan"])).toBe(normalizeKey(["libera", "#chan"]));
    expect(normalizeKey(["a", "bc"])).not.toBe(normalizeKey(["ab", "c"]));
  });

  it("returns the same record for any casing", () => {
    const map = new CaseInsensitiveMap<string, { host: string }>();
    const record = { host: "alice!a@example.org" };
    map.set("Alice", record);

    expect(map.get("alice")).toBe(record);
    expect(map.get("ALICE")).toBe(record);
    expect(map.has("aLiCe")).toBe(true);
  });

  it("deletes through any casing", () => {
    const map = new CaseInsensitiveMap<string, number>([["Alice", 1]]);
    expect(map.delete("ALICE")).toBe(true);
    expect(map.has("alice")).toBe(false);
    expect(map.get("Alice")).toBeUndefined();
    expect(map.size).toBe(0);
  });

  it("keeps the first casing for display", () => {
    const map = new CaseInsensitiveMap<string, number>();
    map.set("Alice", 1);
    map.set("ALICE", 2);
    expect([...map.keys()]).toEqual(["Alice"]);
    expect(map.get("alice")).toBe(2);
  });

  it("can replace the stored casing in place", () => {
    const map = new CaseInsensitiveMap<string, number>([
      ["alice", 1],
      ["bob", 2],
    ]);
    map.setWithCasing("Alice", 3);
    expect([...map.entries()]).toEqual([
      ["Alice", 3],
      ["bob", 2],
    ]);
  });

  it("supports tuple keys", () => {
    const map = new CaseInsensitiveMap<readonly [string, string], string>();
    map.set(["Libera", "#Ops"], "users");
    expect(map.get(["libera", "#ops"])).toBe("users");
    expect([...map.entries()]).toEqual([[["Libera", "#Ops"], "users"]]);
  });

  it("dedupes set members regardless of case", () => {
    const set = new CaseInsensitiveSet<string>(["#ops", "#OPS", "#dev"]);
    expect(set.size).toBe(2);
    expect([...set]).toEqual(["#ops", "#dev"]);
    expect(set.has("#Dev")).toBe(true);
  });
});
