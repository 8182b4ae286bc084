import { existsSync } from "fs";
import { dirname, resolve } from "path";
import { ConfigError } from "../errors";
import convict from "../helpers/convict";
import createLogger from "../helpers/logger";

const log = createLogger("lighter.build.plan");

export const DEFAULT_PLAN = "build.yaml";

convict.addFormat({
  name: "string-list",
  validate(value: unknown) {
    if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string" && entry.length > 0)) {
      throw new Error("must be a list of non-empty strings");
    }
  },
});

interface BuildPlanSchema {
  buildCommand: string;
  containerCommand: string;
  mountPoint: string;
  versionOption: string;
  simplePackages: string[];
  interpreterVersions: string[];
  interpretedPackages: string[];
}

const CONVICT_SCHEMA: convict.Schema<BuildPlanSchema> = {
  buildCommand: {
    default: "conda build",
    doc: "Command line of the package-build tool, the package directory is appended.",
    env: "LIGHTER_BUILD_COMMAND",
    format: String,
  },
  containerCommand: {
    default: "scripts/conda-build-docker.sh",
    doc: "Command line of the containerized build, run from the plan's directory.",
    env: "LIGHTER_CONTAINER_COMMAND",
    format: String,
  },
  mountPoint: {
    default: "/work",
    doc: "Where the plan's directory is mounted inside the container.",
    format: String,
  },
  versionOption: {
    default: "--python",
    doc: "Option selecting the interpreter version, given as `<option>=<version>`.",
    format: String,
  },
  simplePackages: {
    default: [],
    doc: "Package directories built once.",
    format: "string-list",
  },
  interpreterVersions: {
    default: [],
    doc: "Interpreter versions each interpreted package is built for.",
    format: "string-list",
  },
  interpretedPackages: {
    default: [],
    doc: "Package directories built once per interpreter version.",
    format: "string-list",
  },
};

export type BuildPlan = BuildPlanSchema & {
  /** Directory of the plan file; package paths are relative to it. */
  root: string;
  source: string;
};

export type PlanOptions = {
  env?: NodeJS.ProcessEnv;
};

export function loadPlan(path: string = DEFAULT_PLAN, options: PlanOptions = {}): BuildPlan {
  const source = resolve(path);
  if (!existsSync(source)) {
    throw new ConfigError(`Build plan ${source} not found - cannot proceed`);
  }

  const config = convict<BuildPlanSchema>(CONVICT_SCHEMA, { env: options.env || process.env, args: [] });
  log.debug("loading build plan from %s", source);

  try {
    config.loadFile(source);
    config.validate({ allowed: "strict" });
  } catch (err: unknown) {
    throw new ConfigError(`invalid build plan ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return {
    ...config.getProperties(),
    root: dirname(source),
    source,
  };
}
