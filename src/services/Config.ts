import { existsSync } from "fs";
import { homedir } from "os";
import { resolve } from "path";
import { defer, Observable, of } from "rxjs";
import { shareReplay } from "rxjs/operators";

import ms from "ms";

import { ConfigError } from "../errors";
import convict from "../helpers/convict";
import createLogger from "../helpers/logger";

const log = createLogger("lighter.config");

function durationToMs(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value >= 0 ? value : undefined;
  }
  if (typeof value === "string") {
    const parsed = ms(value);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
  }
  return undefined;
}

convict.addFormat({
  name: "transition",
  validate(value: unknown) {
    if (value !== null && durationToMs(value) === undefined) {
      throw new Error("must be a duration such as '400ms' or '2s', or milliseconds");
    }
  },
});

convict.addFormat({
  name: "tenths",
  validate(value: unknown) {
    if (value !== null && !(typeof value === "number" && Number.isInteger(value) && value >= 0)) {
      throw new Error("must be a whole number of tenths of a second");
    }
  },
});

interface ConfigSchema {
  host: string;
  port: number;
  apiKey: string;
  api_key: string;
  transition: string | number | null;
  transitiontime: number | null;
}

const CONVICT_SCHEMA: convict.Schema<ConfigSchema> = {
  host: {
    default: "",
    doc: "IP address or name of the deCONZ gateway.",
    env: "DECONZ_HOST",
    format: String,
  },
  port: {
    default: 80,
    doc: "Port of the deCONZ REST API.",
    env: "DECONZ_PORT",
    format: "port",
  },
  apiKey: {
    default: "",
    doc: "A previously obtained API key. Get one with `lighter config apikey` after unlocking the gateway.",
    env: "DECONZ_API_KEY",
    format: String,
    sensitive: true,
  },
  api_key: {
    default: "",
    doc: "Older name of apiKey.",
    format: String,
    sensitive: true,
  },
  transition: {
    default: null,
    nullable: true,
    doc: "Transition between two light states, e.g. '400ms' or '1s'. Plain numbers are milliseconds.",
    env: "LIGHTER_TRANSITION",
    format: "transition",
  },
  transitiontime: {
    default: null,
    nullable: true,
    doc: "Transition in tenths of a second, as the gateway takes it. Older alternative to transition.",
    format: "tenths",
  },
};

export interface IRootConfig {
  host: string;
  port: number;
  apiKey?: string;
  /** In tenths of a second, the unit the gateway expects. */
  transitionTime: number;
  source?: string;
}

export type ConfigOptions = {
  candidates?: string[];
  env?: NodeJS.ProcessEnv;
  root?: IRootConfig;
};

/**
 * Files looked at, in order of preference.
 */
export function defaultCandidates(env: NodeJS.ProcessEnv = process.env): string[] {
  const home = homedir();
  return [
    ...(env.LIGHTER_CONFIG ? [resolve(env.LIGHTER_CONFIG)] : []),
    resolve(".lighter.json"),
    resolve(".lighter.yaml"),
    resolve(home, ".lighter.json"),
    resolve(home, ".lighter.yaml"),
  ];
}

export default class Config {
  private candidates: string[];
  private env: NodeJS.ProcessEnv;
  private preset?: IRootConfig;
  private cached$?: Observable<IRootConfig>;

  constructor(options: ConfigOptions = {}) {
    this.env = options.env || process.env;
    this.candidates = options.candidates || defaultCandidates(this.env);
    this.preset = options.root;
  }

  load(): IRootConfig {
    if (this.preset) {
      return this.preset;
    }

    const source = this.candidates.find((candidate) => existsSync(candidate));
    const config = convict<ConfigSchema>(CONVICT_SCHEMA, { env: this.env, args: [] });

    if (source) {
      log.debug("loading configuration from %s", source);
      config.loadFile(source);
    }

    const where = source ? ` in ${source}` : "";
    try {
      config.validate({ allowed: "strict" });
    } catch (err: unknown) {
      throw new ConfigError(`invalid configuration${where}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const apiKey = config.get("apiKey");
    const legacyKey = config.get("api_key");
    if (apiKey && legacyKey) {
      throw new ConfigError(`invalid configuration${where}: set apiKey or api_key, not both`);
    }
    const transition = config.get("transition");
    const tenths = config.get("transitiontime");
    if (transition !== null && tenths !== null) {
      throw new ConfigError(`invalid configuration${where}: set transition or transitiontime, not both`);
    }

    const host = config.get("host");
    if (!host) {
      throw new ConfigError(
        source
          ? `No gateway host configured in ${source} - cannot proceed`
          : "No configuration file loaded - cannot proceed"
      );
    }

    const root: IRootConfig = {
      host,
      port: config.get("port"),
      apiKey: apiKey || legacyKey || undefined,
      transitionTime: tenths ?? Math.round((durationToMs(transition) ?? 0) / 100),
      source,
    };
    log.debug("root: %s", config.toString());

    return root;
  }

  root$(): Observable<IRootConfig> {
    if (!this.cached$) {
      this.cached$ = this.preset
        ? of(this.preset)
        : defer(() => of(this.load())).pipe(shareReplay(1));
    }
    return this.cached$;
  }
}
