import { describe, expect, it } from "vitest";

import { Shared, shared } from "@is-same/core";

describe("shared", () => {
  it("treats clones of one handle as the same", () => {
    const first = Shared.of(4);
    const second = first.clone();

    expect(shared<number>().isSame(first, second)).toBe(true);
    expect(second.value).toBe(4);
  });

  it("treats separate allocations as different even with equal content", () => {
    const first = Shared.of(4);

    expect(shared<number>().isNotSame(first, Shared.of(3))).toBe(true);
    expect(shared<number>().isNotSame(first, Shared.of(4))).toBe(true);
  });

  it("never reads the pointee", () => {
    const content = { count: 1 };
    const handle = Shared.of(content);
    const clone = handle.clone();

    // Breaking the immutability contract is invisible to the comparison.
    content.count = 2;
    expect(shared<{ count: number }>().isSame(handle, clone)).toBe(true);
    expect(Shared.ptrEq(handle, Shared.of(content))).toBe(false);
  });
});
