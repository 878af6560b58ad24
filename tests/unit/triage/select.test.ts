import { describe, it, expect, jest } from "@jest/globals";
import { selectForScan, walkForScan } from "../../../src/triage/select";
import { isScoped } from "../../../src/types";
import { record } from "../../helpers";

const names = (packages: { name: string }[]) => packages.map((p) => p.name);

describe("selectForScan", () => {
  it("keeps unscoped packages above the cutoff and drops the rest", () => {
    const packages = [record("@scope/a", 100), record("b", 90), record("c", 50)];
    expect(names(selectForScan(packages, 60))).toEqual(["b"]);
  });

  it("returns every unscoped record in order when all are recent", () => {
    const packages = [
      record("alpha", 500),
      record("@org/beta", 400),
      record("gamma", 300),
      record("@org/delta", 200),
      record("epsilon", 100),
    ];
    expect(names(selectForScan(packages, 100))).toEqual(["alpha", "gamma", "epsilon"]);
  });

  it("treats a record exactly at the cutoff as eligible", () => {
    expect(names(selectForScan([record("edge", 60)], 60))).toEqual(["edge"]);
  });

  it("stops at the first record older than the cutoff even if newer ones follow", () => {
    const packages = [record("a", 100), record("old", 10), record("late", 200), record("d", 90)];
    expect(names(selectForScan(packages, 60))).toEqual(["a"]);
  });

  it("returns nothing when the first record is already too old", () => {
    expect(selectForScan([record("a", 10), record("b", 5)], 60)).toEqual([]);
  });

  it("returns nothing when every recent record is scoped", () => {
    expect(selectForScan([record("@x/a", 100), record("@y/b", 90)], 60)).toEqual([]);
  });

  it("returns the records unchanged", () => {
    const b = record("b", 90);
    expect(selectForScan([b], 0)[0]).toBe(b);
  });

  it("reports out-of-order records without changing the selection", () => {
    const onOutOfOrder = jest.fn();
    const packages = [record("a", 100), record("b", 80), record("c", 95), record("d", 70)];

    const selected = selectForScan(packages, 60, { onOutOfOrder });

    expect(names(selected)).toEqual(["a", "b", "c", "d"]);
    expect(onOutOfOrder).toHaveBeenCalledTimes(1);
    expect(onOutOfOrder).toHaveBeenCalledWith(packages[1], packages[2]);
  });

  it("reports each scoped record it skips", () => {
    const onScopedSkip = jest.fn();
    const packages = [record("@s/a", 100), record("b", 90), record("@s/c", 80), record("@s/d", 10)];

    selectForScan(packages, 60, { onScopedSkip });

    expect(onScopedSkip).toHaveBeenCalledTimes(2);
    expect(onScopedSkip).toHaveBeenNthCalledWith(1, packages[0]);
    expect(onScopedSkip).toHaveBeenNthCalledWith(2, packages[2]);
  });
});

describe("walkForScan", () => {
  it("yields lazily and does not look past what is consumed", () => {
    const onOutOfOrder = jest.fn();
    const walk = walkForScan([record("a", 100), record("b", 90), record("c", 200)], 0, { onOutOfOrder });

    expect(walk.next().value).toEqual(record("a", 100));
    expect(onOutOfOrder).not.toHaveBeenCalled();
  });
});

describe("isScoped", () => {
  it("recognises @-prefixed names", () => {
    expect(isScoped({ name: "@scope/pkg" })).toBe(true);
    expect(isScoped({ name: "pkg" })).toBe(false);
    expect(isScoped({ name: "pkg@scope" })).toBe(false);
  });
});
