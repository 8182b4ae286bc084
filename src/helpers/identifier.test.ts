import { describe, expect, it } from "vitest";
import {
  describeIdentifier,
  matchesIdentifier,
  parseIdentifier,
  selectEntries,
} from "./identifier";

describe("parseIdentifier", () => {
  it("selects everything when absent", () => {
    expect(parseIdentifier(undefined)).toEqual({ kind: "all" });
    expect(parseIdentifier(null)).toEqual({ kind: "all" });
  });

  it("takes integers as gateway ids", () => {
    expect(parseIdentifier("12")).toEqual({ kind: "id", id: 12 });
    expect(parseIdentifier(3)).toEqual({ kind: "id", id: 3 });
  });

  it("lowercases plain names", () => {
    expect(parseIdentifier("Office Window")).toEqual({
      kind: "name",
      name: "office window",
    });
  });

  it("compiles slashed text to a case-insensitive pattern", () => {
    const identifier = parseIdentifier("/office.*/");
    expect(identifier.kind).toBe("pattern");
    expect(describeIdentifier(identifier)).toBe("/^(?:office.*)/i");
  });
});

describe("matchesIdentifier", () => {
  const tests: [string, string, string, boolean][] = [
    ["1", "1", "Kitchen", true],
    ["01", "1", "Kitchen", true],
    ["2", "1", "Kitchen", false],
    ["kitchen", "1", "Kitchen", true],
    ["Kitchen ceiling", "1", "Kitchen", false],
    ["/kit/", "1", "Kitchen", true],
    // anchored at the start of the name only
    ["/chen/", "1", "Kitchen", false],
    ["/kit/", "1", "Kitchen ceiling", true],
    ["Office*", "4", "office ceiling 1", true],
    ["Office*", "4", "Living room", false],
    ["Lamp ?", "4", "Lamp 2", true],
    ["Lamp ?", "4", "Lamp 22", false],
  ];

  test.each(tests)("%s against %s/%s : %s", (input, id, name, ok) => {
    expect(matchesIdentifier(parseIdentifier(input), id, name)).toBe(ok);
  });
});

describe("selectEntries", () => {
  const catalog = {
    "1": { name: "Office ceiling 1" },
    "2": { name: "Office ceiling 2" },
    "3": { name: "Hallway" },
  };

  it("keeps the matching ids", () => {
    expect(Object.keys(selectEntries(catalog, parseIdentifier("/office/")))).toEqual([
      "1",
      "2",
    ]);
  });

  it("returns the whole catalog for no identifier", () => {
    expect(selectEntries(catalog, parseIdentifier(undefined))).toEqual(catalog);
  });

  it("returns nothing when nothing matches", () => {
    expect(selectEntries(catalog, parseIdentifier("Garage"))).toEqual({});
  });
});
