import { z } from "zod";

// Gateway payloads. Unknown keys are kept so JSON output shows everything
// the gateway sent.

export const LightSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    manufacturername: z.string().optional(),
    modelid: z.string().optional(),
    ctmin: z.number().optional(),
    ctmax: z.number().optional(),
    state: z
      .object({
        on: z.boolean().optional(),
        reachable: z.boolean().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type Light = z.infer<typeof LightSchema>;

export const LightsSchema = z.record(z.string(), LightSchema);

export type Lights = z.infer<typeof LightsSchema>;

export const GroupSceneSchema = z
  .object({
    id: z.string(),
    name: z.string(),
  })
  .passthrough();

export type GroupScene = z.infer<typeof GroupSceneSchema>;

export const GroupSchema = z
  .object({
    name: z.string(),
    lights: z.array(z.string()).default([]),
    scenes: z.array(GroupSceneSchema).default([]),
    hidden: z.boolean().optional(),
    state: z
      .object({
        all_on: z.boolean().optional(),
        any_on: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Group = z.infer<typeof GroupSchema>;

export const GroupsSchema = z.record(z.string(), GroupSchema);

export type Groups = z.infer<typeof GroupsSchema>;

export const SceneSchema = z
  .object({
    name: z.string(),
  })
  .passthrough();

export type Scene = z.infer<typeof SceneSchema>;

export const GatewayStateSchema = z.record(z.string(), z.unknown());

export type GatewayState = z.infer<typeof GatewayStateSchema>;

export const ResultEntrySchema = z.union([
  z.object({ success: z.record(z.string(), z.unknown()) }),
  z.object({
    error: z.object({
      type: z.number(),
      address: z.string(),
      description: z.string(),
    }),
  }),
]);

export type ResultEntry = z.infer<typeof ResultEntrySchema>;

/**
 * Every write answers with one entry per attribute touched, successes and
 * failures mixed.
 */
export const ResultSchema = z.array(ResultEntrySchema);

export const ApiKeySchema = z
  .array(z.object({ success: z.object({ username: z.string() }) }))
  .nonempty();

export const CreatedSchema = z
  .array(z.object({ success: z.object({ id: z.union([z.string(), z.number()]) }) }))
  .nonempty();
