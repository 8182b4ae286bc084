import { lastValueFrom } from "rxjs";
import { splitKeywords } from "../helpers/lightState";
import { lightsSummary, toJson } from "./format";
import { CommandGroup, print } from "./types";

const lights: CommandGroup = {
  name: "lights",
  description: "Lists and controls lights and switches",
  commands: [
    {
      name: "get",
      usage: "[ID]",
      description: "Gets information on some or all lights",
      minArgs: 0,
      maxArgs: 1,
      flags: ["summary", "sortName"],
      async run({ services, io, args, flags }) {
        const data = await lastValueFrom(services.deconz.lights$(args[0]));
        if (!flags.summary) {
          print(io, toJson(data));
          return;
        }
        print(io, lightsSummary(data, flags.sortName ? "name" : "id"));
      },
    },
    {
      name: "name",
      usage: "ID NAME",
      description: "Renames lights",
      minArgs: 2,
      maxArgs: 2,
      async run({ services, args }) {
        await lastValueFrom(services.deconz.setLightName$(args[0], args[1]));
      },
    },
    {
      name: "state",
      usage: "ID KEYWORD...",
      description: "Sets the state of lights, e.g. `on 60% natural`",
      minArgs: 2,
      maxArgs: Infinity,
      async run({ services, args: [id, ...values] }) {
        await lastValueFrom(services.deconz.setLightState$(id, values.flatMap(splitKeywords)));
      },
    },
  ],
};

export default lights;
