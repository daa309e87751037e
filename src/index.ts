export { FulfillmentController, RequestError } from "./google/fulfillment.ts";
export {
  determineService,
  entityToDevice,
  makeActionsResponse,
  mapQueryResponse,
  mapSyncResponse,
  queryDevice,
} from "./google/mapper.ts";
export {
  GOOGLE_COMMANDS,
  GOOGLE_INTENTS,
  SmartHomeRequestSchema,
  type CommandParameters,
  type SmartHomeRequest,
} from "./google/schema.ts";
export {
  CAPABILITY_MAP,
  GOOGLE_DEVICE_TYPES,
  GOOGLE_TRAITS,
  getCapability,
  type CapabilityEntry,
} from "./google/traits.ts";
export type * from "./google/types.ts";
export { createLogger, Logger } from "./logger.ts";
export * from "./registry/types.ts";
