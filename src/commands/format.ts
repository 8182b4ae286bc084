import { Group, Light, Lights } from "../types";

export type SortOrder = "id" | "name";

// Code point order, so the listing does not depend on the locale.
function byName(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * `[id, resource]` pairs in display order.
 */
export function sortEntries<T extends { name: string }>(
  entries: Array<[string, T]>,
  order: SortOrder
): Array<[string, T]> {
  return [...entries].sort(([idA, a], [idB, b]) =>
    order === "name" ? byName(a.name, b.name) : Number(idA) - Number(idB)
  );
}

export function groupState(group: Group): "ON" | "PARTIALLY ON" | "OFF" {
  if (group.state?.all_on) {
    return "ON";
  }
  return group.state?.any_on ? "PARTIALLY ON" : "OFF";
}

export function lightLine(id: string, light: Light): string {
  const state = light.state.on ? "ON" : "OFF";
  return `${id}: ${light.name} (${light.type}, ${light.manufacturername ?? "unknown"}) [${state}]`;
}

export function lightsSummary(lights: Lights, order: SortOrder): string[] {
  return sortEntries(Object.entries(lights), order).map(([id, light]) => lightLine(id, light));
}

/**
 * A group line followed by its scenes and member lights, indented.
 */
export function groupSummary(id: string, group: Group, lights: Lights, order: SortOrder): string[] {
  const members = Object.entries(lights).filter(([lightId]) => group.lights.includes(lightId));
  const scenes = group.scenes.map((scene): [string, { name: string }] => [scene.id, scene]);

  return [
    `${id}: ${group.name} (${group.scenes.length} scenes, ${group.lights.length} lights) [${groupState(group)}]`,
    "  Scenes:",
    ...sortEntries(scenes, order).map(([sceneId, scene]) => `    ${sceneId}: ${scene.name}`),
    "  Lights:",
    ...sortEntries(members, order).map(([lightId, light]) => `    ${lightLine(lightId, light)}`),
  ];
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 4);
}

/**
 * Like `toJson` on an object, but keeps the order of the entries even for
 * integer keys.
 */
export function entriesToJson(entries: Array<[string, unknown]>): string {
  if (!entries.length) {
    return "{}";
  }
  const members = entries.map(([key, value]) => `    ${JSON.stringify(key)}: ${toJson(value).split("\n").join("\n    ")}`);
  return `{\n${members.join(",\n")}\n}`;
}
