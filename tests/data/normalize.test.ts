import { describe, it, expect } from "vitest";
import { indexableWords, normalize, words } from "../../src/data/normalize.js";

describe("normalize", () => {
  it("should lowercase and strip punctuation", () => {
    expect(normalize("Marks & Spencer P.L.C.")).toBe("marks spencer plc");
  });

  it("should collapse whitespace runs and trim", () => {
    expect(normalize("  Acme \t Widgets\n Ltd  ")).toBe("acme widgets ltd");
  });

  it("should keep digits, underscores and accented letters", () => {
    expect(normalize("Société_Générale 24/7")).toBe("société_générale 247");
  });

  it("should return an empty string for punctuation only", () => {
    expect(normalize("!!! ---")).toBe("");
    expect(normalize("")).toBe("");
  });

  it("should be idempotent", () => {
    const once = normalize("  O'Brien & Sons (UK) Ltd. ");
    expect(once).toBe("obrien sons uk ltd");
    expect(normalize(once)).toBe(once);
  });
});

describe("words", () => {
  it("should split a normalized string on spaces", () => {
    expect(words("acme widgets ltd")).toEqual(["acme", "widgets", "ltd"]);
  });

  it("should return no words for an empty string", () => {
    expect(words("")).toEqual([]);
  });
});

describe("indexableWords", () => {
  it("should drop words shorter than three characters", () => {
    expect(indexableWords("a b co ltd uk bank")).toEqual(["ltd", "bank"]);
  });
});
