import { StateError } from "../errors";
import createLogger from "./logger";

const log = createLogger("lighter.light-state");

/**
 * Body accepted by the gateway on `/lights/<id>/state` and
 * `/groups/<id>/action`.
 */
export type LightStateUpdate = {
  on: boolean;
  alert?: "none" | "lselect";
  transitiontime?: number;
  bri?: number;
  ct?: number;
};

/** Minimum and maximum colour temperature a light accepts, in mireds. */
export type CtBounds = readonly [number, number];

export const DEFAULT_CT_BOUNDS: CtBounds = [153, 500];

// The most restrictive bulbs decide for the whole group.
export const GROUP_CT_BOUNDS: CtBounds = [250, 454];

export const GROUP_TYPE = "Group";

export const NAMED_WHITES: Readonly<Record<string, number>> = {
  candle: 2000,
  warm: 2700,
  "warm+": 3000,
  soft: 3500,
  natural: 3700,
  cool: 4000,
  "day-": 5000,
  day: 6500,
};

const MIN_KELVIN = 2000;
const MAX_KELVIN = 6500;
const MIN_MIRED = 153;
const MAX_MIRED = 500;

export function brightness(percent: number): number {
  return Math.round((255 * percent) / 100);
}

export function colorTemperature(kelvin: number, bounds: CtBounds): number {
  const bounded = Math.min(Math.max(kelvin, MIN_KELVIN), MAX_KELVIN);
  const scaled =
    ((bounded - MIN_KELVIN) / (MAX_KELVIN - MIN_KELVIN)) * (MAX_MIRED - MIN_MIRED) +
    MIN_MIRED;
  // higher kelvin is a lower mired value
  const value = MIN_MIRED + MAX_MIRED - Math.round(scaled);

  if (value < bounds[0]) {
    log.warn("Cannot set light color temperature to %d (minimum is %d)", value, bounds[0]);
    return bounds[0];
  }
  if (value > bounds[1]) {
    log.warn("Cannot set light color temperature to %d (maximum is %d)", value, bounds[1]);
    return bounds[1];
  }
  return value;
}

/**
 * Turns human keywords such as `on 60% natural` into a gateway state body.
 *
 * Keywords are consumed in order, so later ones override earlier ones.
 * On/Off plug-in units only ever receive `on`.
 */
export function translateLightState(
  lightType: string,
  bounds: CtBounds,
  keywords: readonly string[],
  transitionTime: number
): LightStateUpdate {
  const state: LightStateUpdate = {
    on: true,
    alert: "none",
    transitiontime: transitionTime,
  };

  for (const raw of keywords) {
    const keyword = raw.trim().toLowerCase();

    if (keyword === "off" || keyword === "0" || keyword === "0%") {
      state.on = false;
    } else if (keyword === "on") {
      state.on = true;
    } else if (keyword === "alert") {
      state.alert = "lselect";
    } else if (keyword in NAMED_WHITES) {
      state.ct = colorTemperature(NAMED_WHITES[keyword], bounds);
    } else if (/^\d+%$/.test(keyword)) {
      state.bri = brightness(Number(keyword.slice(0, -1)));
    } else if (/^\d+k$/.test(keyword)) {
      state.ct = colorTemperature(Number(keyword.slice(0, -1)), bounds);
    } else {
      throw new StateError(`keyword "${raw}" is not recognized when setting the light state`);
    }
  }

  if (lightType.startsWith("On/Off")) {
    return { on: state.on };
  }

  return state;
}

/**
 * Splits a state value from the command line or a YAML file into keywords.
 */
export function splitKeywords(value: string): string[] {
  return value.split(/\s+/).filter((v) => v.length > 0);
}
