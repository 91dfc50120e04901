// test/id_handle.test.ts

import { describe, it, expect } from "vitest";
import { IdHandle } from "../src";

describe("IdHandle", () => {
  it("should compare by id only", () => {
    const a = new IdHandle("words", 7);

    expect(a.equals(new IdHandle("renamed", 7))).toBe(true);
    expect(a.equals(new IdHandle("words", 8))).toBe(false);
    expect(a.equals({ name: "words", id: 7 })).toBe(false);
  });

  it("should hash to its id", () => {
    expect(new IdHandle("words", 7).hashCode()).toBe(7);
  });

  it("should render as name#id", () => {
    expect(String(new IdHandle("words", 7))).toBe("words#7");
  });
});
