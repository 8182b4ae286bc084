import { writeFileSync } from "fs";
import { lastValueFrom } from "rxjs";
import { UsageError } from "../errors";
import { readStateFile } from "../helpers/stateFile";
import { GatewayStateSchema } from "../types";
import { toJson } from "./format";
import { CommandGroup, print } from "./types";

function parseDocument(path: string): Record<string, unknown> {
  let document: unknown;
  try {
    document = JSON.parse(readStateFile(path));
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      throw err;
    }
    throw new UsageError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = GatewayStateSchema.safeParse(document);
  if (!parsed.success) {
    throw new UsageError(`${path} must contain a JSON object`);
  }
  return parsed.data;
}

const config: CommandGroup = {
  name: "config",
  description: "Reads and writes the gateway configuration",
  commands: [
    {
      name: "get",
      usage: "[PATH]",
      description: "Gets the whole gateway state in JSON format, to PATH or the screen",
      minArgs: 0,
      maxArgs: 1,
      async run({ services, io, args }) {
        const data = toJson(await lastValueFrom(services.deconz.pull$()));
        const [path] = args;
        if (path) {
          writeFileSync(path, `${data}\n`);
        } else {
          print(io, data);
        }
      },
    },
    {
      name: "push",
      usage: "PATH",
      description: "Pushes a JSON configuration document to the gateway",
      minArgs: 1,
      maxArgs: 1,
      async run({ services, args }) {
        await lastValueFrom(services.deconz.push$(parseDocument(args[0])));
      },
    },
    {
      name: "apikey",
      usage: "",
      description: "Gets a new API key from the gateway, after it was unlocked",
      minArgs: 0,
      maxArgs: 0,
      async run({ services, io }) {
        const key = await lastValueFrom(services.deconz.apiKey$());
        print(io, `API key: ${key}`);
      },
    },
  ],
};

export default config;
