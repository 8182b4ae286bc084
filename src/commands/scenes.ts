import { from, lastValueFrom } from "rxjs";
import { concatMap, toArray } from "rxjs/operators";
import createLogger from "../helpers/logger";
import { parseLightStates, parseSceneBook, readStateFile } from "../helpers/stateFile";
import { entriesToJson, sortEntries } from "./format";
import { CommandGroup, print } from "./types";

const log = createLogger("lighter.scenes");

const scenes: CommandGroup = {
  name: "scenes",
  description: "Lists, defines and recalls the scenes of groups",
  commands: [
    {
      name: "get",
      usage: "ID [SCENE]",
      description: "Gets information on some or all scenes of groups",
      minArgs: 1,
      maxArgs: 2,
      flags: ["sortName"],
      async run({ services, io, args: [id, scene], flags }) {
        const data = await lastValueFrom(services.deconz.scenes$(id, scene));
        const order = flags.sortName ? "name" : "id";
        for (const [groupId, details] of Object.entries(data)) {
          print(io, [`Group: ${groupId}`, entriesToJson(sortEntries(Object.entries(details), order))]);
        }
      },
    },
    {
      name: "set",
      usage: "ID SCENE FILE",
      description: "Stores a scene from a YAML file mapping lights to states, then restores the lights",
      minArgs: 3,
      maxArgs: 3,
      async run({ services, args: [id, scene, file] }) {
        const states = parseLightStates(readStateFile(file), file);
        const sceneId = await lastValueFrom(services.deconz.defineScene$(id, scene, states));
        if (sceneId !== undefined) {
          log.info("Stored scene %s", sceneId);
        }
      },
    },
    {
      name: "setmany",
      usage: "FILE",
      description: "Stores every scene of a YAML file mapping groups to scenes to light states",
      minArgs: 1,
      maxArgs: 1,
      async run({ services, args: [file] }) {
        const definitions = parseSceneBook(readStateFile(file), file);
        await lastValueFrom(
          from(definitions).pipe(
            concatMap(({ group, scene, states }) => services.deconz.defineScene$(group, scene, states)),
            toArray()
          )
        );
      },
    },
    {
      name: "recall",
      usage: "ID SCENE",
      description: "Recalls scenes of groups",
      minArgs: 2,
      maxArgs: 2,
      async run({ services, args: [id, scene] }) {
        await lastValueFrom(services.deconz.recallScene$(id, scene));
      },
    },
    {
      name: "store",
      usage: "ID SCENE",
      description: "Stores the current state of the group lights into a scene",
      minArgs: 2,
      maxArgs: 2,
      async run({ services, args: [id, scene] }) {
        await lastValueFrom(services.deconz.storeScene$(id, scene));
      },
    },
  ],
};

export default scenes;
