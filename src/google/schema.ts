// Schema for incoming Google Smart Home requests and command parameters

import { z } from "zod";

// ===========================================================================
// Google Commands Enum
// ===========================================================================

export const GOOGLE_COMMANDS = {
  ON_OFF: "action.devices.commands.OnOff",
  BRIGHTNESS_ABSOLUTE: "action.devices.commands.BrightnessAbsolute",
} as const;

export const GOOGLE_INTENTS = {
  SYNC: "action.devices.SYNC",
  QUERY: "action.devices.QUERY",
  EXECUTE: "action.devices.EXECUTE",
} as const;

// Unknown commands and extra parameters are accepted, the command resolver
// falls back to turning the device off for anything it does not recognize
export const CommandParametersSchema = z
  .object({
    on: z.boolean().optional(),
    brightness: z.number().optional(),
  })
  .passthrough();

const GoogleCommandSchema = z.object({
  command: z.string(),
  params: CommandParametersSchema.optional(),
});

// ===========================================================================
// Request Schemas
// ===========================================================================

const DeviceRefSchema = z.object({ id: z.string() });

export const QueryRequestPayloadSchema = z.object({
  devices: z.array(DeviceRefSchema),
});

export const ExecuteRequestPayloadSchema = z.object({
  commands: z.array(
    z.object({
      devices: z.array(DeviceRefSchema),
      execution: z.array(GoogleCommandSchema).min(1),
    })
  ),
});

export const SmartHomeRequestSchema = z.object({
  requestId: z.string(),
  inputs: z.tuple([
    z.discriminatedUnion("intent", [
      z.object({ intent: z.literal(GOOGLE_INTENTS.SYNC) }),
      z.object({
        intent: z.literal(GOOGLE_INTENTS.QUERY),
        payload: QueryRequestPayloadSchema,
      }),
      z.object({
        intent: z.literal(GOOGLE_INTENTS.EXECUTE),
        payload: ExecuteRequestPayloadSchema,
      }),
    ]),
  ]),
});

// Entity aliases are passed on as nicknames when they form a list
export const AliasesSchema = z.array(z.unknown());

// ===========================================================================
// Type Exports
// ===========================================================================

export type CommandParameters = z.infer<typeof CommandParametersSchema>;
export type GoogleCommand = z.infer<typeof GoogleCommandSchema>;
export type QueryRequestPayload = z.infer<typeof QueryRequestPayloadSchema>;
export type ExecuteRequestPayload = z.infer<typeof ExecuteRequestPayloadSchema>;
export type SmartHomeRequest = z.infer<typeof SmartHomeRequestSchema>;
