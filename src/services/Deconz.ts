import ms from "ms";
import { concat, defer, from, Observable, of, throwError, timer } from "rxjs";
import {
  catchError,
  concatMap,
  ignoreElements,
  map,
  retry,
  shareReplay,
  switchMap,
  tap,
  toArray,
} from "rxjs/operators";
import { GatewayError, LighterError, SceneError } from "../errors";
import {
  describeIdentifier,
  IdentifierInput,
  matchesIdentifier,
  parseIdentifier,
  selectEntries,
} from "../helpers/identifier";
import {
  CtBounds,
  DEFAULT_CT_BOUNDS,
  GROUP_CT_BOUNDS,
  GROUP_TYPE,
  splitKeywords,
  translateLightState,
} from "../helpers/lightState";
import createLogger from "../helpers/logger";
import { LightStates } from "../helpers/stateFile";
import {
  ApiKeySchema,
  CreatedSchema,
  GatewayState,
  GatewayStateSchema,
  Group,
  Groups,
  GroupsSchema,
  Light,
  Lights,
  LightsSchema,
  ResultEntry,
  ResultSchema,
  Scene,
  SceneSchema,
} from "../types";
import Config from "./Config";
import Rest, { PathType } from "./Rest";

const log = createLogger("lighter.deconz");

export const DEVICE_TYPE = "lighter";

export const LINK_ATTEMPTS = 60;

export const LINK_INTERVAL = ms("1s");

// Read-only or transient attributes the gateway refuses on a state write.
const NOT_RESTORED = ["alert", "reachable", "colormode"];

export type GroupAttributes = {
  name?: string;
  lights?: IdentifierInput[];
  hidden?: boolean;
};

export type ApiKeyOptions = {
  attempts?: number;
  interval?: number;
};

function uniq(values: string[]): string[] {
  return [...new Set(values)];
}

function sequentially(ids: string[], work: (id: string) => Observable<unknown>): Observable<string[]> {
  return from(ids).pipe(
    concatMap(work),
    toArray(),
    map(() => ids)
  );
}

function boundsOf(light: Light): CtBounds {
  return [light.ctmin ?? DEFAULT_CT_BOUNDS[0], light.ctmax ?? DEFAULT_CT_BOUNDS[1]];
}

function membersOf(groups: Group[], lights: Lights): Lights {
  const members = new Set(groups.flatMap((group) => group.lights));
  return Object.fromEntries(Object.entries(lights).filter(([id]) => members.has(id)));
}

function reportResults(what: string, entries: ResultEntry[]): void {
  for (const entry of entries) {
    if ("success" in entry) {
      for (const [address, value] of Object.entries(entry.success)) {
        log.debug("%s: '%s' set to %j", what, address, value);
      }
    } else {
      log.error("%s: %s (%s)", what, entry.error.description, entry.error.address);
    }
  }
}

/**
 * A session with a deCONZ gateway through its v1 REST API.
 *
 * Lights and groups are fetched once per session and filtered locally;
 * `refreshCache()` drops both catalogs.
 */
export default class Deconz {
  rest: Rest;
  config: Config;

  private cache: { lights?: Observable<Lights>; groups?: Observable<Groups> } = {};

  constructor({ rest, config }: { rest: Rest; config: Config }) {
    this.rest = rest;
    this.config = config;
  }

  refreshCache(): void {
    this.cache = {};
  }

  private allLights$(): Observable<Lights> {
    if (!this.cache.lights) {
      this.cache.lights = this.rest.get$(["lights"], LightsSchema).pipe(shareReplay(1));
    }
    return this.cache.lights;
  }

  private allGroups$(): Observable<Groups> {
    if (!this.cache.groups) {
      this.cache.groups = this.rest.get$(["groups"], GroupsSchema).pipe(shareReplay(1));
    }
    return this.cache.groups;
  }

  private transitionTime$(): Observable<number> {
    return this.config.root$().pipe(map((config) => config.transitionTime));
  }

  private write$(path: PathType, body: unknown, what: string): Observable<ResultEntry[]> {
    return this.rest.put$(path, body, ResultSchema).pipe(
      catchError((err: unknown) => {
        if (err instanceof GatewayError) {
          const parsed = ResultSchema.safeParse(err.body);
          if (parsed.success) {
            log.error("Unable to set %s (status %d)", what, err.status);
            return of(parsed.data);
          }
        }
        return throwError(() => err);
      }),
      tap((entries) => reportResults(what, entries))
    );
  }

  /**
   * Asks the gateway for a new API key.
   *
   * The gateway only hands out keys for a short while after "Authenticate
   * app" was pressed in its web interface; until then it answers 403.
   */
  apiKey$({ attempts = LINK_ATTEMPTS, interval = LINK_INTERVAL }: ApiKeyOptions = {}): Observable<string> {
    return this.rest
      .fetch$([], {
        method: "POST",
        body: { devicetype: DEVICE_TYPE },
        schema: ApiKeySchema,
        anonymous: true,
      })
      .pipe(
        retry({
          count: Math.max(attempts - 1, 0),
          delay: (error: unknown, retryCount: number) => {
            if (error instanceof GatewayError && error.status === 403) {
              log.warn(
                "Gateway responded with a 403 (Forbidden) error - link button not pressed. Please click on 'Authenticate app' at the gateway web interface"
              );
              log.info("Sleeping for %s (attempt %d of %d)...", ms(interval), retryCount, attempts);
              return timer(interval);
            }
            return throwError(() => error);
          },
        }),
        catchError((err: unknown) => {
          if (err instanceof GatewayError && err.status === 403) {
            return throwError(
              () => new LighterError(`Gateway stayed locked after ${attempts} attempts - unlock it and try again`)
            );
          }
          return throwError(() => err);
        }),
        map((entries) => entries[0].success.username)
      );
  }

  /**
   * The complete gateway state: configuration, lights, groups, scenes...
   */
  pull$(): Observable<GatewayState> {
    return this.rest.get$([], GatewayStateSchema);
  }

  push$(document: Record<string, unknown>): Observable<ResultEntry[]> {
    return this.write$(["config"], document, "configuration");
  }

  lights$(id?: IdentifierInput): Observable<Lights> {
    const identifier = parseIdentifier(id);

    return this.allLights$().pipe(
      map((all) => {
        if (identifier.kind === "all") {
          return all;
        }
        const selected = selectEntries(all, identifier);
        log.debug(
          "Returning %d out of %d total lights/switches",
          Object.keys(selected).length,
          Object.keys(all).length
        );
        return selected;
      })
    );
  }

  setLightName$(id: IdentifierInput, name: string): Observable<string[]> {
    return this.lights$(id).pipe(
      switchMap((affected) => {
        const ids = Object.keys(affected);
        if (!ids.length) {
          log.warn("No lights affected by name change");
          return of([]);
        }
        return sequentially(ids, (k) => this.write$(["lights", k], { name }, `light ${k}`));
      })
    );
  }

  private setLightsState$(lights: Lights, keywords: string[]): Observable<string[]> {
    return this.transitionTime$().pipe(
      switchMap((transitionTime) =>
        sequentially(Object.keys(lights), (k) => {
          const light = lights[k];
          const body = translateLightState(light.type, boundsOf(light), keywords, transitionTime);
          return this.write$(["lights", k, "state"], body, `light ${k}`);
        })
      )
    );
  }

  setLightState$(id: IdentifierInput, keywords: string[]): Observable<string[]> {
    return this.lights$(id).pipe(
      switchMap((affected) => {
        if (!Object.keys(affected).length) {
          log.warn("No lights affected by state change");
          return of([]);
        }
        return this.setLightsState$(affected, keywords);
      })
    );
  }

  groups$(id?: IdentifierInput): Observable<Groups> {
    const identifier = parseIdentifier(id);

    return this.allGroups$().pipe(
      map((all) => {
        if (identifier.kind === "all") {
          return all;
        }
        const selected = selectEntries(all, identifier);
        log.debug(
          "Returning %d out of %d total groups",
          Object.keys(selected).length,
          Object.keys(all).length
        );
        return selected;
      })
    );
  }

  /**
   * Light ids matching any of `ids`, built additively and in order, without
   * duplicates.
   */
  resolveLightIds$(ids: IdentifierInput[]): Observable<string[]> {
    return this.allLights$().pipe(
      map((all) => uniq(ids.flatMap((id) => Object.keys(selectEntries(all, parseIdentifier(id))))))
    );
  }

  /**
   * Only attributes that are set are changed. An empty `lights` list
   * removes every light from the group.
   */
  setGroupAttrs$(id: IdentifierInput, attributes: GroupAttributes): Observable<string[]> {
    return this.groups$(id).pipe(
      switchMap((affected) => {
        const ids = Object.keys(affected);
        if (!ids.length) {
          log.warn("No groups affected by attribute change");
          return of([]);
        }

        const lights$: Observable<string[] | undefined> =
          attributes.lights === undefined
            ? of(undefined)
            : this.resolveLightIds$(attributes.lights).pipe(
                tap((lights) => log.debug("%d lights will be assigned to the group", lights.length))
              );

        return lights$.pipe(
          switchMap((lights) => {
            const body: Record<string, unknown> = {};
            if (attributes.name !== undefined) {
              body.name = attributes.name;
            }
            if (lights !== undefined) {
              body.lights = lights;
            }
            if (attributes.hidden !== undefined) {
              body.hidden = attributes.hidden;
            }
            return sequentially(ids, (k) => this.write$(["groups", k], body, `group ${k}`));
          })
        );
      })
    );
  }

  setGroupState$(id: IdentifierInput, keywords: string[]): Observable<string[]> {
    return this.groups$(id).pipe(
      switchMap((affected) => {
        const ids = Object.keys(affected);
        if (!ids.length) {
          log.warn("No groups affected by state change");
          return of([]);
        }
        return this.transitionTime$().pipe(
          switchMap((transitionTime) => {
            const body = translateLightState(GROUP_TYPE, GROUP_CT_BOUNDS, keywords, transitionTime);
            return sequentially(ids, (k) => this.write$(["groups", k, "action"], body, `group ${k}`));
          })
        );
      })
    );
  }

  groupLights$(id: IdentifierInput): Observable<Lights> {
    return this.groups$(id).pipe(
      switchMap((groups) =>
        this.allLights$().pipe(map((all) => membersOf(Object.values(groups), all)))
      )
    );
  }

  /**
   * Applies ordered light states inside the matched groups. Light
   * identifiers only select among the lights of each group: a catch-all
   * pattern means every light of the group, not every light of the gateway.
   */
  setGroupLights$(id: IdentifierInput, states: LightStates): Observable<string[]> {
    return this.groups$(id).pipe(
      switchMap((groups) => {
        if (!Object.keys(groups).length) {
          log.warn("No groups affected by state change");
          return of([]);
        }

        return this.allLights$().pipe(
          switchMap((all) => {
            const work = states.flatMap(([lightId, value]) => {
              const identifier = parseIdentifier(lightId);
              return Object.values(groups).map(
                (group): [Lights, string[]] => [
                  selectEntries(membersOf([group], all), identifier),
                  splitKeywords(value),
                ]
              );
            });

            return from(work).pipe(
              concatMap(([lights, keywords]) => this.setLightsState$(lights, keywords)),
              toArray(),
              map((affected) => uniq(affected.flat()))
            );
          })
        );
      })
    );
  }

  /**
   * Scene details keyed by group id, then scene id.
   */
  scenes$(group: IdentifierInput, scene?: IdentifierInput): Observable<Record<string, Record<string, Scene>>> {
    const identifier = parseIdentifier(scene);

    return this.groups$(group).pipe(
      switchMap((groups) => {
        const work = Object.entries(groups).flatMap(([groupId, value]) =>
          value.scenes
            .filter((s) => matchesIdentifier(identifier, s.id, s.name))
            .map((s): [string, string] => [groupId, s.id])
        );

        const result: Record<string, Record<string, Scene>> = Object.fromEntries(
          Object.keys(groups).map((groupId) => [groupId, {}])
        );

        return from(work).pipe(
          concatMap(([groupId, sceneId]) =>
            this.rest
              .get$(["groups", groupId, "scenes", sceneId], SceneSchema)
              .pipe(tap((details) => (result[groupId][sceneId] = details)))
          ),
          toArray(),
          map(() => result)
        );
      })
    );
  }

  recallScene$(group: IdentifierInput, scene: IdentifierInput): Observable<string[]> {
    const identifier = parseIdentifier(scene);

    return this.groups$(group).pipe(
      switchMap((groups) => {
        const targets = Object.entries(groups).flatMap(([groupId, value]) =>
          value.scenes
            .filter((s) => matchesIdentifier(identifier, s.id, s.name))
            .map((s) => `${groupId}/${s.id}`)
        );
        if (!targets.length) {
          log.warn("No scenes affected by recall of %s", describeIdentifier(identifier));
          return of([]);
        }
        return sequentially(targets, (target) => {
          const [groupId, sceneId] = target.split("/");
          return this.write$(["groups", groupId, "scenes", sceneId, "recall"], {}, `scene ${target}`);
        });
      })
    );
  }

  private singleGroup$(group: IdentifierInput): Observable<[string, Group] | undefined> {
    return this.groups$(group).pipe(
      map((groups) => {
        const entries = Object.entries(groups);
        if (entries.length > 1) {
          throw new SceneError(
            `Scene storage can only affect one group at a time. You selected ${entries.length} groups instead`
          );
        }
        if (!entries.length) {
          log.error("No group being affected by scene storage");
          return undefined;
        }
        return entries[0];
      })
    );
  }

  private sceneId$(groupId: string, group: Group, scene: IdentifierInput, create: boolean): Observable<string | undefined> {
    const identifier = parseIdentifier(scene);
    const candidates = group.scenes.filter((s) => matchesIdentifier(identifier, s.id, s.name));

    if (candidates.length > 1) {
      return throwError(
        () =>
          new SceneError(
            `Scene storage can only affect one scene at a time. You selected ${candidates.length} scenes instead`
          )
      );
    }
    if (candidates.length === 1) {
      return of(candidates[0].id);
    }
    if (create && identifier.kind === "name") {
      return this.createScene$(groupId, String(scene).trim());
    }
    log.error("No scene being affected by scene storage");
    return of(undefined);
  }

  createScene$(groupId: string, name: string): Observable<string> {
    return this.rest.post$(["groups", groupId, "scenes"], { name }, CreatedSchema).pipe(
      map((entries) => String(entries[0].success.id)),
      tap((sceneId) => log.info("Created scene %s (%s) in group %s", sceneId, name, groupId))
    );
  }

  /**
   * Stores the current state of the group lights into an existing scene.
   */
  storeScene$(group: IdentifierInput, scene: IdentifierInput): Observable<string | undefined> {
    return this.singleGroup$(group).pipe(
      switchMap((selected) => {
        if (!selected) {
          return of(undefined);
        }
        const [groupId, value] = selected;
        return this.sceneId$(groupId, value, scene, false).pipe(
          switchMap((sceneId) =>
            sceneId === undefined
              ? of(undefined)
              : this.write$(["groups", groupId, "scenes", sceneId, "store"], {}, `scene ${sceneId} of group ${groupId}`).pipe(
                  map(() => sceneId)
                )
          )
        );
      })
    );
  }

  /**
   * Sets a scene from light states, leaving the lights as they were found.
   *
   * The group lights are put in `states`, the scene stored (created first
   * when a name does not exist yet) and the previous light states restored.
   */
  defineScene$(group: IdentifierInput, scene: IdentifierInput, states: LightStates): Observable<string | undefined> {
    this.refreshCache();

    return this.singleGroup$(group).pipe(
      switchMap((selected) => {
        if (!selected) {
          return of(undefined);
        }
        const [groupId, value] = selected;

        return this.groupLights$(Number(groupId)).pipe(
          switchMap((snapshot) =>
            this.sceneId$(groupId, value, scene, true).pipe(
              switchMap((sceneId) => {
                if (sceneId === undefined) {
                  return of(undefined);
                }
                return concat(
                  this.setGroupLights$(Number(groupId), states).pipe(ignoreElements()),
                  this.transitionTime$().pipe(
                    switchMap((transitionTime) => timer(transitionTime * 100)),
                    ignoreElements()
                  ),
                  this.write$(
                    ["groups", groupId, "scenes", sceneId, "store"],
                    {},
                    `scene ${sceneId} of group ${groupId}`
                  ).pipe(ignoreElements()),
                  this.restoreLightState$(snapshot).pipe(ignoreElements()),
                  defer(() => {
                    this.refreshCache();
                    return of(sceneId);
                  })
                );
              })
            )
          )
        );
      })
    );
  }

  /**
   * Puts lights back into a state previously read from the gateway.
   */
  restoreLightState$(lights: Lights): Observable<string[]> {
    return this.transitionTime$().pipe(
      switchMap((transitionTime) =>
        sequentially(Object.keys(lights), (k) => {
          const state: Record<string, unknown> = Object.fromEntries(
            Object.entries(lights[k].state).filter(([key]) => !NOT_RESTORED.includes(key))
          );
          state.transitiontime = transitionTime;
          return this.write$(["lights", k, "state"], state, `light ${k}`);
        })
      )
    );
  }
}
