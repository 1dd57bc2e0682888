import { describe, it, expect } from "vitest";
import * as ids from "../../src/utils/id.js";

describe("createIdSequence", () => {
  it("counts up from 1 by default", () => {
    const next = ids.createIdSequence();
    expect([next(), next(), next()]).toEqual([1, 2, 3]);
  });

  it("keeps separate sequences independent", () => {
    const a = ids.createIdSequence(10);
    const b = ids.createIdSequence(10);
    a();
    expect(b()).toBe(10);
    expect(a()).toBe(11);
  });

  it("is the module's only export", () => {
    expect(Object.keys(ids)).toEqual(["createIdSequence"]);
  });
});
