import { lastValueFrom } from "rxjs";
import { UsageError } from "../errors";
import { splitKeywords } from "../helpers/lightState";
import { parseLightStates, readStateFile } from "../helpers/stateFile";
import { groupSummary, sortEntries, toJson } from "./format";
import { CommandGroup, print } from "./types";

const HIDDEN = new Map([
  ["yes", true],
  ["no", false],
]);

const groups: CommandGroup = {
  name: "groups",
  description: "Lists and controls groups of lights",
  commands: [
    {
      name: "get",
      usage: "[ID]",
      description: "Gets information on some or all groups",
      minArgs: 0,
      maxArgs: 1,
      flags: ["summary", "sortName"],
      async run({ services, io, args, flags }) {
        const data = await lastValueFrom(services.deconz.groups$(args[0]));
        if (!flags.summary) {
          print(io, toJson(data));
          return;
        }

        const order = flags.sortName ? "name" : "id";
        const lights = await lastValueFrom(services.deconz.lights$());
        for (const [id, group] of sortEntries(Object.entries(data), order)) {
          print(io, groupSummary(id, group, lights, order));
        }
      },
    },
    {
      name: "name",
      usage: "ID NAME",
      description: "Renames groups",
      minArgs: 2,
      maxArgs: 2,
      async run({ services, args }) {
        await lastValueFrom(services.deconz.setGroupAttrs$(args[0], { name: args[1] }));
      },
    },
    {
      name: "member",
      usage: "ID [LIGHT...]",
      description: "Sets the lights of groups; no LIGHT empties them",
      minArgs: 1,
      maxArgs: Infinity,
      async run({ services, args: [id, ...lights] }) {
        await lastValueFrom(services.deconz.setGroupAttrs$(id, { lights }));
      },
    },
    {
      name: "hidden",
      usage: "ID yes|no",
      description: "Hides groups from, or shows them to, the gateway apps",
      minArgs: 2,
      maxArgs: 2,
      async run({ services, args: [id, value] }) {
        const hidden = HIDDEN.get(value.toLowerCase());
        if (hidden === undefined) {
          throw new UsageError(`hidden takes "yes" or "no", not "${value}"`);
        }
        await lastValueFrom(services.deconz.setGroupAttrs$(id, { hidden }));
      },
    },
    {
      name: "state",
      usage: "ID KEYWORD...",
      description: "Sets the state of every light in groups at once",
      minArgs: 2,
      maxArgs: Infinity,
      async run({ services, args: [id, ...values] }) {
        await lastValueFrom(services.deconz.setGroupState$(id, values.flatMap(splitKeywords)));
      },
    },
    {
      name: "scene",
      usage: "ID FILE",
      description: "Sets lights of groups from a YAML file mapping lights to states",
      minArgs: 2,
      maxArgs: 2,
      async run({ services, args: [id, file] }) {
        const states = parseLightStates(readStateFile(file), file);
        await lastValueFrom(services.deconz.setGroupLights$(id, states));
      },
    },
  ],
};

export default groups;
