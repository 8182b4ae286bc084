import { existsSync, readFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { parseDocument } from "yaml";
import { z } from "zod";
import { RecipeError } from "../errors";
import createLogger from "../helpers/logger";

const log = createLogger("lighter.build.recipe");

export const RECIPE_FILE = "meta.yaml";

const SET_LITERAL = /^\{%-?\s*set\s+(\w+)\s*=\s*(['"])(.*)\2\s*-?%\}$/;
const SET_FILE_DATA = /^\{%-?\s*set\s+(\w+)\s*=\s*load_file_data\(\s*(['"])(.+?)\2\s*\)\[\s*(['"])(.+?)\4\s*\]\s*-?%\}$/;
const STATEMENT = /\{%.*?%\}/;
const EXPRESSION = /\{\{\s*(\w+)\s*\}\}/g;

export type Requirement = {
  name: string;
  constraint?: string;
};

export type EntryPoint = {
  command: string;
  target: string;
};

const RequirementSchema = z
  .string()
  .trim()
  .regex(/^\S+(\s+\S.*)?$/, "requirements look like `name [constraint]`")
  .transform((value): Requirement => {
    const [name, ...constraint] = value.split(/\s+/);
    return constraint.length ? { name, constraint: constraint.join(" ") } : { name };
  });

const RequirementListSchema = z.array(RequirementSchema).nullish().transform((list) => list ?? []);

const ENTRY_POINT = /^\s*([^\s=]+)\s*=\s*(\S.*?)\s*$/;
const MODULE_FUNCTION = /^[A-Za-z_][\w.]*:[A-Za-z_][\w.]*$/;

function entryPointSchema(accepts: (target: string) => boolean, expected: string) {
  return z.string().transform((value, ctx): EntryPoint => {
    const match = ENTRY_POINT.exec(value);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "entry points look like `command = target`" });
      return z.NEVER;
    }
    const entry = { command: match[1], target: match[2] };
    if (!accepts(entry.target)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${expected}, not "${entry.target}"` });
      return z.NEVER;
    }
    return entry;
  });
}

/**
 * conda-build writes a wrapper for these itself, so the target must be
 * `module:function`.
 */
const ModuleEntryPointSchema = entryPointSchema(
  (target) => MODULE_FUNCTION.test(target),
  "conda-build only runs `module:function` entry points"
);

/** Files of the package that its build script installs as commands. */
const FileEntryPointSchema = entryPointSchema(
  (target) => !MODULE_FUNCTION.test(target),
  "extra entry points name a file of the package"
);

export const PackageDescriptorSchema = z.object({
  package: z.object({
    name: z.string().min(1),
    version: z.union([z.string().min(1), z.number()]).transform(String),
  }),
  source: z.object({ path: z.string() }).partial().optional(),
  build: z.object({
    number: z.number().int().nonnegative().default(0),
    noarch: z.string().optional(),
    /** A single command or a list of them, run in order. */
    script: z.preprocess(
      (value) => (typeof value === "string" ? [value] : value),
      z.array(z.string().min(1)).min(1)
    ),
    entry_points: z.array(ModuleEntryPointSchema).nullish().transform((list) => list ?? []),
  }),
  requirements: z
    .object({
      build: RequirementListSchema,
      run: RequirementListSchema,
    })
    .default({}),
  test: z
    .object({
      requires: RequirementListSchema,
      commands: z.array(z.string()).nullish().transform((list) => list ?? []),
    })
    .default({}),
  about: z
    .object({
      home: z.string(),
      license: z.string(),
      license_family: z.string(),
      summary: z.string(),
    })
    .partial()
    .optional(),
  extra: z
    .object({
      entry_points: z.array(FileEntryPointSchema).nullish().transform((list) => list ?? []),
    })
    .default({}),
});

export type PackageDescriptor = z.output<typeof PackageDescriptorSchema>;

export type Recipe = {
  /** The recipe directory. */
  path: string;
  descriptor: PackageDescriptor;
};

export type RenderOptions = {
  /** Where `load_file_data` looks; the recipe directory's parent by default. */
  root?: string;
};

function loadFileData(recipe: string, root: string, file: string, key: string): string {
  const path = resolve(root, file);
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    throw new RecipeError(recipe, `cannot load data from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = z.record(z.string(), z.unknown()).safeParse(data);
  const value = parsed.success ? parsed.data[key] : undefined;
  if (typeof value !== "string" && typeof value !== "number") {
    throw new RecipeError(recipe, `${path} has no "${key}" to load`);
  }
  return String(value);
}

/**
 * Expands the template statements a descriptor may use: `set` from a
 * literal or from `load_file_data(file)[key]`, and `{{ variable }}`.
 */
export function renderRecipe(text: string, recipe: string, root: string): string {
  const variables = new Map<string, string>();
  const lines: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();

    const literal = SET_LITERAL.exec(trimmed);
    if (literal) {
      variables.set(literal[1], literal[3]);
      continue;
    }

    const fileData = SET_FILE_DATA.exec(trimmed);
    if (fileData) {
      variables.set(fileData[1], loadFileData(recipe, root, fileData[3], fileData[5]));
      continue;
    }

    if (STATEMENT.test(line)) {
      throw new RecipeError(recipe, `unsupported template statement: ${trimmed}`);
    }

    lines.push(
      line.replace(EXPRESSION, (_match, name: string) => {
        const value = variables.get(name);
        if (value === undefined) {
          throw new RecipeError(recipe, `undefined template variable "${name}"`);
        }
        return value;
      })
    );
  }

  return lines.join("\n");
}

export function parseRecipe(rendered: string, recipe: string): PackageDescriptor {
  const document = parseDocument(rendered);
  if (document.errors.length) {
    throw new RecipeError(recipe, document.errors[0].message);
  }

  const parsed = PackageDescriptorSchema.safeParse(document.toJS());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RecipeError(recipe, `${issue.path.join(".") || "descriptor"}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Reads, renders and validates the descriptor of a package directory.
 */
export function readRecipe(directory: string, options: RenderOptions = {}): Recipe {
  const path = resolve(directory);
  const file = join(path, RECIPE_FILE);
  if (!existsSync(file)) {
    throw new RecipeError(directory, `no ${RECIPE_FILE} found`);
  }

  log.debug("reading package descriptor %s", file);
  const rendered = renderRecipe(readFileSync(file, "utf8"), directory, options.root || dirname(path));
  return { path, descriptor: parseRecipe(rendered, directory) };
}
