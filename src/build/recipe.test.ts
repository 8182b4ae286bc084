import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { RecipeError } from "../errors";
import { parseRecipe, readRecipe, renderRecipe } from "./recipe";

const tempDirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "lighter-recipe-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  }
});

const MINIMAL = ["package:", "  name: demo", "  version: 1.0.0", "build:", "  script: make install"].join("\n");

describe("renderRecipe", () => {
  it("substitutes literal variables and drops the statements", () => {
    const text = ["{% set name = 'demo' %}", '{%- set home = "https://example.test" -%}', "name: {{ name }}", "home: {{home}}"].join("\n");

    expect(renderRecipe(text, "demo", "/nowhere")).toBe("name: demo\nhome: https://example.test");
  });

  it("loads values from a JSON file under the root", async () => {
    const root = await tempDir();
    await fs.writeFile(path.join(root, "package.json"), JSON.stringify({ version: "3.1.4", build: 7 }));
    const text = [
      "{% set version = load_file_data('package.json')['version'] %}",
      '{% set number = load_file_data("package.json")["build"] %}',
      "version: {{ version }}-{{ number }}",
    ].join("\n");

    expect(renderRecipe(text, "demo", root)).toBe("version: 3.1.4-7");
  });

  it("fails on a missing key", async () => {
    const root = await tempDir();
    await fs.writeFile(path.join(root, "package.json"), "{}");
    const text = "{% set version = load_file_data('package.json')['version'] %}";

    expect(() => renderRecipe(text, "demo", root)).toThrow(
      new RecipeError("demo", `${path.join(root, "package.json")} has no "version" to load`)
    );
  });

  it("fails on undefined variables", () => {
    expect(() => renderRecipe("name: {{ name }}", "demo", "/nowhere")).toThrow(
      'demo: undefined template variable "name"'
    );
  });

  it("fails on statements it does not know", () => {
    expect(() => renderRecipe("{% if win %}\nskip: true\n{% endif %}", "demo", "/nowhere")).toThrow(
      "demo: unsupported template statement: {% if win %}"
    );
  });
});

describe("parseRecipe", () => {
  it("splits requirements into names and constraints", () => {
    const descriptor = parseRecipe(
      [
        MINIMAL,
        "requirements:",
        "  build:",
        "    - nodejs >=20",
        "  run:",
        "    - nodejs >=20,<23",
        "    - git",
        "test:",
        "  requires:",
        "    - bats-core 1.*",
      ].join("\n"),
      "demo"
    );

    expect(descriptor.requirements).toEqual({
      build: [{ name: "nodejs", constraint: ">=20" }],
      run: [{ name: "nodejs", constraint: ">=20,<23" }, { name: "git" }],
    });
    expect(descriptor.test).toEqual({ requires: [{ name: "bats-core", constraint: "1.*" }], commands: [] });
  });

  it("fills in what may be left out", () => {
    const descriptor = parseRecipe(MINIMAL, "demo");

    expect(descriptor.build).toEqual({ number: 0, script: ["make install"], entry_points: [] });
    expect(descriptor.requirements).toEqual({ build: [], run: [] });
    expect(descriptor.extra).toEqual({ entry_points: [] });
  });

  it("takes the build script as a list of commands", () => {
    const descriptor = parseRecipe(
      MINIMAL.replace("  script: make install", "  script:\n    - make\n    - make install"),
      "demo"
    );

    expect(descriptor.build.script).toEqual(["make", "make install"]);
  });

  it("keeps numeric versions as text", () => {
    expect(parseRecipe(MINIMAL.replace("1.0.0", "2"), "demo").package.version).toBe("2");
  });

  it("rejects duplicate keys", () => {
    expect(() => parseRecipe(`${MINIMAL}\npackage:\n  name: other`, "demo")).toThrow(/^demo: Map keys must be unique/);
  });

  it("names the first invalid field", () => {
    expect(() => parseRecipe("package:\n  name: demo\n  version: 1.0.0\nbuild:\n  number: 0", "demo")).toThrow(
      new RecipeError("demo", "build.script: Required")
    );
  });

  it("keeps module entry points for conda-build", () => {
    const descriptor = parseRecipe(`${MINIMAL}\n  entry_points:\n    - demo = demo.cli:main`, "demo");

    expect(descriptor.build.entry_points).toEqual([{ command: "demo", target: "demo.cli:main" }]);
  });

  it("refuses file entry points where conda-build would read them", () => {
    expect(() => parseRecipe(`${MINIMAL}\n  entry_points:\n    - demo = dist/cli.js`, "demo")).toThrow(
      new RecipeError("demo", 'build.entry_points.0: conda-build only runs `module:function` entry points, not "dist/cli.js"')
    );
  });

  it("reads file entry points from extra", () => {
    const descriptor = parseRecipe(`${MINIMAL}\nextra:\n  entry_points:\n    - demo = ./dist/cli.js`, "demo");

    expect(descriptor.extra.entry_points).toEqual([{ command: "demo", target: "./dist/cli.js" }]);
  });

  it("refuses module entry points in extra", () => {
    expect(() => parseRecipe(`${MINIMAL}\nextra:\n  entry_points:\n    - demo = demo.cli:main`, "demo")).toThrow(
      new RecipeError("demo", 'extra.entry_points.0: extra entry points name a file of the package, not "demo.cli:main"')
    );
  });

  it("rejects entry points without a target", () => {
    expect(() => parseRecipe(`${MINIMAL}\n  entry_points:\n    - demo`, "demo")).toThrow(
      "demo: build.entry_points.0: entry points look like `command = target`"
    );
  });
});

describe("readRecipe", () => {
  it("reads the descriptor of this repository", async () => {
    const project = z
      .object({ version: z.string() })
      .parse(JSON.parse(await fs.readFile(path.resolve(__dirname, "../../package.json"), "utf8")));

    const { descriptor } = readRecipe(path.resolve(__dirname, "../../conda"));

    expect(descriptor.package).toEqual({ name: "lighter", version: project.version });
    expect(descriptor.build.entry_points).toEqual([]);
    expect(descriptor.extra.entry_points).toEqual([
      { command: "lighter", target: "dist/cli.js" },
      { command: "lighter-build", target: "dist/build/cli.js" },
    ]);
    expect(descriptor.build.script).toContain("npm run build");
    expect(descriptor.build.script.at(-1)).toBe(
      `npm install --global --omit=dev --prefix "\${PREFIX}" "./lighter-${project.version}.tgz"`
    );
    expect(descriptor.requirements.run).toEqual([{ name: "nodejs", constraint: ">=20" }]);
  });

  it("fails without a descriptor", async () => {
    const dir = await tempDir();

    expect(() => readRecipe(dir)).toThrow(new RecipeError(dir, "no meta.yaml found"));
  });
});
