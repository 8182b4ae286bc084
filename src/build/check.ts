import { existsSync, readFileSync } from "fs";
import { dirname, join, posix, resolve } from "path";
import { z } from "zod";
import { formatError, RecipeError } from "../errors";
import createLogger from "../helpers/logger";
import { BuildPlan } from "./plan";
import { readRecipe, Recipe } from "./recipe";

const log = createLogger("lighter.build.check");

const DOTTED_VERSION = /^\d+(\.\d+)*$/;
const RUNS_BUILD = /\bnpm\s+run(-script)?\s+build\b/;

const ProjectSchema = z.object({
  name: z.string().optional(),
  bin: z.union([z.string(), z.record(z.string(), z.string())]).optional(),
  scripts: z.record(z.string(), z.string()).optional(),
});

export type Project = z.infer<typeof ProjectSchema>;

function samePath(a: string, b: string): boolean {
  return posix.normalize(a) === posix.normalize(b);
}

/**
 * Commands a package.json installs, with the file each one runs. A plain
 * string `bin` installs the package name (without its scope).
 */
export function installedCommands(project: Project): Map<string, string> {
  if (typeof project.bin === "string") {
    const commands = new Map<string, string>();
    if (project.name) {
      commands.set(project.name.replace(/^@[^/]+\//, ""), project.bin);
    }
    return commands;
  }
  return new Map(Object.entries(project.bin || {}));
}

function readProject(directory: string): Project | undefined {
  const file = join(directory, "package.json");
  if (!existsSync(file)) {
    return undefined;
  }
  const parsed = ProjectSchema.safeParse(JSON.parse(readFileSync(file, "utf8")));
  if (!parsed.success) {
    throw new RecipeError(file, "bin must be a path or map command names to paths");
  }
  return parsed.data;
}

function checkEntryPoints(name: string, recipe: Recipe, project: Project): string[] {
  const installed = installedCommands(project);
  return recipe.descriptor.extra.entry_points.flatMap((entry) => {
    const file = installed.get(entry.command);
    if (file === undefined) {
      return [`${name}: entry point "${entry.command}" is not installed by package.json`];
    }
    if (!samePath(file, entry.target)) {
      return [`${name}: entry point "${entry.command}" runs ${entry.target} but package.json installs ${file}`];
    }
    return [];
  });
}

function checkBuildScript(name: string, recipe: Recipe, project: Project): string[] {
  if (!project.scripts?.build || recipe.descriptor.build.script.some((line) => RUNS_BUILD.test(line))) {
    return [];
  }
  return [`${name}: the build script never runs "npm run build", so the package would miss its compiled files`];
}

function checkStableVersion(name: string, recipe: Recipe): string[] {
  const again = readRecipe(recipe.path).descriptor.package.version;
  const first = recipe.descriptor.package.version;
  return again === first ? [] : [`${name}: version changed between renders (${first}, then ${again})`];
}

function checkPackage(plan: BuildPlan, name: string): string[] {
  const directory = resolve(plan.root, name);
  if (!existsSync(directory)) {
    return [`${name}: package directory does not exist`];
  }

  try {
    const recipe = readRecipe(directory);
    const project = readProject(dirname(recipe.path));
    return [
      ...(project ? [...checkEntryPoints(name, recipe, project), ...checkBuildScript(name, recipe, project)] : []),
      ...checkStableVersion(name, recipe),
    ];
  } catch (err: unknown) {
    if (err instanceof RecipeError) {
      return [`${name}: ${err.reason}`];
    }
    if (err instanceof SyntaxError) {
      return [`${name}: ${formatError(err)}`];
    }
    throw err;
  }
}

/**
 * Everything that would make a build of the plan fail before the build
 * tool even starts. An empty list means the plan is consistent.
 */
export function checkPlan(plan: BuildPlan): string[] {
  const packages = [...new Set([...plan.simplePackages, ...plan.interpretedPackages])];

  const problems = [
    ...packages.flatMap((name) => checkPackage(plan, name)),
    ...plan.interpreterVersions
      .filter((version) => !DOTTED_VERSION.test(version))
      .map((version) => `interpreter version "${version}" is not a dotted numeric version`),
  ];

  log.debug("checked %d packages and %d versions", packages.length, plan.interpreterVersions.length);
  return problems;
}
