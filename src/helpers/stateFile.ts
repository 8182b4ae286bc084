import { readFileSync } from "fs";
import { parse } from "yaml";
import { UsageError } from "../errors";
import { IdentifierInput } from "./identifier";

/**
 * Ordered light identifier -> state keywords pairs. Order matters: a
 * catch-all pattern usually comes first, specific lights after it.
 */
export type LightStates = Array<[IdentifierInput, string]>;

export type SceneDefinition = {
  group: IdentifierInput;
  scene: IdentifierInput;
  states: LightStates;
};

// Maps keep the document order, plain objects would move numeric keys first.
function parseOrderedMapping(text: string, source: string): Array<[unknown, unknown]> {
  const document: unknown = parse(text, { mapAsMap: true });
  if (!(document instanceof Map)) {
    throw new UsageError(`${source} must contain a YAML mapping`);
  }
  const entries: Array<[unknown, unknown]> = [...document.entries()];
  return entries;
}

function toKey(key: unknown, source: string): IdentifierInput {
  if (typeof key === "string" || typeof key === "number") {
    return key;
  }
  throw new UsageError(`${source}: keys must be names, ids or /patterns/, got ${String(key)}`);
}

function toKeywords(value: unknown, source: string): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "on" : "off";
  }
  throw new UsageError(`${source}: light states must be text such as "on 60% natural"`);
}

function toLightStates(entries: Array<[unknown, unknown]>, source: string): LightStates {
  return entries.map(([key, value]) => [toKey(key, source), toKeywords(value, source)]);
}

export function parseLightStates(text: string, source = "state file"): LightStates {
  return toLightStates(parseOrderedMapping(text, source), source);
}

/**
 * Reads `group -> scene -> light -> keywords` documents.
 */
export function parseSceneBook(text: string, source = "scene file"): SceneDefinition[] {
  const definitions: SceneDefinition[] = [];

  for (const [group, scenes] of parseOrderedMapping(text, source)) {
    if (!(scenes instanceof Map)) {
      throw new UsageError(`${source}: group ${String(group)} must map scene names to light states`);
    }
    const sceneEntries: Array<[unknown, unknown]> = [...scenes.entries()];

    for (const [scene, lights] of sceneEntries) {
      if (!(lights instanceof Map)) {
        throw new UsageError(`${source}: scene ${String(scene)} must map lights to states`);
      }
      const lightEntries: Array<[unknown, unknown]> = [...lights.entries()];
      definitions.push({
        group: toKey(group, source),
        scene: toKey(scene, source),
        states: toLightStates(lightEntries, source),
      });
    }
  }

  return definitions;
}

export function readStateFile(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err: unknown) {
    throw new UsageError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
