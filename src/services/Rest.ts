import { differenceInMilliseconds } from "date-fns";
import { from, Observable, switchMap, throwError } from "rxjs";
import { z } from "zod";
import { ConfigError, GatewayError } from "../errors";
import createLogger from "../helpers/logger";
import Config, { IRootConfig } from "./Config";

const log = createLogger("lighter.rest");

export type Method = "GET" | "POST" | "PUT" | "DELETE";

export type PathType = string | (string | number | undefined | null)[];

export type RestOptions<T> = {
  method: Method;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  body?: unknown;
  /** Skip the API key, only the key request itself goes without one. */
  anonymous?: boolean;
};

export default class Rest {
  config: Config;

  constructor({ config }: { config: Config }) {
    this.config = config;
  }

  fetch$<T>(path: PathType, options: RestOptions<T>): Observable<T> {
    return this.config.root$().pipe(
      switchMap((config) => {
        if (!options.anonymous && !config.apiKey) {
          return throwError(
            () =>
              new ConfigError(
                "No API key configured - run `lighter config apikey` and add it to your configuration"
              )
          );
        }

        const doPromise = async () => {
          const url = createUrl(config, options.anonymous ? path : prefix(config.apiKey, path));

          log.debug("fetching URL %s %s", options.method, url);
          const start = new Date().getTime();
          try {
            const result = await fetch(url, {
              method: options.method,
              headers: { "content-type": "application/json" },
              body: options.body === undefined ? undefined : JSON.stringify(options.body),
            });
            log.debug(
              "done fetching %s %s (%d) %s",
              options.method,
              url,
              result.status,
              `${differenceInMilliseconds(new Date(), start)}ms`
            );

            const body = parseBody(await result.text());

            if (result.status >= 400) {
              throw new GatewayError(options.method, url, result.status, body);
            }

            return options.schema.parse(body);
          } catch (err: unknown) {
            log.debug(
              "failed fetching %s %s %s %s",
              options.method,
              url,
              err instanceof Error ? err.message : "",
              `${differenceInMilliseconds(new Date(), start)}ms`
            );
            throw err;
          }
        };

        return from(doPromise());
      })
    );
  }

  get$<T>(path: PathType, schema: RestOptions<T>["schema"]): Observable<T> {
    return this.fetch$(path, { method: "GET", schema });
  }

  put$<T>(path: PathType, body: unknown, schema: RestOptions<T>["schema"]): Observable<T> {
    return this.fetch$(path, { method: "PUT", body, schema });
  }

  post$<T>(path: PathType, body: unknown, schema: RestOptions<T>["schema"]): Observable<T> {
    return this.fetch$(path, { method: "POST", body, schema });
  }
}

function prefix(apiKey: string | undefined, path: PathType): PathType {
  return [apiKey, ...(typeof path === "string" ? [path] : path)];
}

function parseBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function createBasePath(path: PathType): string {
  return (typeof path === "string" ? [path] : path).reduce((acc: string, v) => {
    if (typeof v === "undefined" || v === null) {
      return acc;
    }

    const append = String(v);
    return acc + (append.startsWith("/") ? append : `/${encodeURIComponent(append)}`);
  }, "");
}

export function createUrl(config: Pick<IRootConfig, "host" | "port">, path: PathType): string {
  return `http://${config.host}:${config.port}/api${createBasePath(path)}`;
}
