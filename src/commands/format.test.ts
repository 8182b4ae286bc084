import { describe, expect, it } from "vitest";
import { GROUPS, LIGHTS } from "../testing/gateway";
import { GroupSchema, GroupsSchema, LightsSchema } from "../types";
import { entriesToJson, groupState, groupSummary, lightLine, lightsSummary, sortEntries, toJson } from "./format";

const lights = LightsSchema.parse(LIGHTS);
const groups = GroupsSchema.parse(GROUPS);

describe("sortEntries", () => {
  const entries: Array<[string, { name: string }]> = [
    ["10", { name: "alpha" }],
    ["2", { name: "Zulu" }],
    ["1", { name: "beta" }],
  ];

  it("sorts numerically by id", () => {
    expect(sortEntries(entries, "id").map(([id]) => id)).toEqual(["1", "2", "10"]);
  });

  it("sorts by name, upper case first", () => {
    expect(sortEntries(entries, "name").map(([id]) => id)).toEqual(["2", "10", "1"]);
  });
});

describe("groupState", () => {
  it.each([
    [{ all_on: true, any_on: true }, "ON"],
    [{ all_on: false, any_on: true }, "PARTIALLY ON"],
    [{ all_on: false, any_on: false }, "OFF"],
    [undefined, "OFF"],
  ])("reports %j as %s", (state, expected) => {
    expect(groupState(GroupSchema.parse({ name: "Office", state }))).toBe(expected);
  });
});

describe("lightLine", () => {
  it("shows type, manufacturer and state", () => {
    expect(lightLine("3", lights["3"])).toBe("3: Office plug (On/Off plug-in unit, IKEA of Sweden) [ON]");
  });

  it("copes with a missing manufacturer", () => {
    const light = LightsSchema.parse({ "4": { name: "Lamp", type: "Dimmable light", state: {} } })["4"];
    expect(lightLine("4", light)).toBe("4: Lamp (Dimmable light, unknown) [OFF]");
  });
});

describe("lightsSummary", () => {
  it("lists lights by name", () => {
    expect(lightsSummary(lights, "name")).toEqual([
      "10: Hallway (Color light, IKEA of Sweden) [OFF]",
      "1: Office ceiling 1 (Color temperature light, IKEA of Sweden) [ON]",
      "2: Office ceiling 2 (Extended color light, Philips) [OFF]",
      "3: Office plug (On/Off plug-in unit, IKEA of Sweden) [ON]",
    ]);
  });
});

describe("groupSummary", () => {
  it("lists scenes and member lights under the group", () => {
    expect(groupSummary("1", groups["1"], lights, "name")).toEqual([
      "1: Office (2 scenes, 3 lights) [PARTIALLY ON]",
      "  Scenes:",
      "    2: Relax",
      "    1: Work",
      "  Lights:",
      "    1: Office ceiling 1 (Color temperature light, IKEA of Sweden) [ON]",
      "    2: Office ceiling 2 (Extended color light, Philips) [OFF]",
      "    3: Office plug (On/Off plug-in unit, IKEA of Sweden) [ON]",
    ]);
  });

  it("keeps headers for empty groups", () => {
    const empty = GroupSchema.parse({ name: "Attic" });
    expect(groupSummary("7", empty, lights, "id")).toEqual([
      "7: Attic (0 scenes, 0 lights) [OFF]",
      "  Scenes:",
      "  Lights:",
    ]);
  });
});

describe("entriesToJson", () => {
  it("keeps integer keys in the given order", () => {
    expect(entriesToJson([["2", { name: "Relax" }], ["1", { name: "Work" }]])).toBe(
      ['{', '    "2": {', '        "name": "Relax"', "    },", '    "1": {', '        "name": "Work"', "    }", "}"].join("\n")
    );
  });

  it("prints what toJson prints for the same order", () => {
    const value = { "1": { name: "Work", lights: ["1", "2"] }, "3": { name: "Night", lights: [] } };

    expect(entriesToJson(Object.entries(value))).toBe(toJson(value));
    expect(entriesToJson([])).toBe(toJson({}));
  });
});
