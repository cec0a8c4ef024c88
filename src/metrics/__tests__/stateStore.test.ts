import { describe, expect, it } from "vitest";
import { StateStore } from "../stateStore";

describe("StateStore", () => {
  it("starts empty", () => {
    const store = new StateStore<number>();
    expect(store.size).toBe(0);
    expect(store.snapshot()).toEqual([]);
  });

  it("replaces the value on set for an existing key", () => {
    const store = new StateStore<string>();
    store.set("shop/a", "first");
    store.set("shop/a", "second");

    expect(store.size).toBe(1);
    expect(store.snapshot()).toEqual(["second"]);
  });

  it("removes on delete and ignores unknown keys", () => {
    const store = new StateStore<string>();
    store.set("shop/a", "a");
    store.set("shop/b", "b");

    store.delete("shop/a");
    store.delete("shop/missing");

    expect(store.snapshot()).toEqual(["b"]);
  });

  it("keeps first-insertion order of keys across replacements", () => {
    const store = new StateStore<string>();
    store.set("shop/a", "a1");
    store.set("shop/b", "b1");
    store.set("shop/a", "a2");

    expect(store.snapshot()).toEqual(["a2", "b1"]);
  });

  it("returns a frozen snapshot unaffected by later writes", () => {
    const store = new StateStore<string>();
    store.set("shop/a", "a");

    const snap = store.snapshot();
    store.set("shop/b", "b");
    store.delete("shop/a");

    expect(snap).toEqual(["a"]);
    expect(Object.isFrozen(snap)).toBe(true);
  });
});
