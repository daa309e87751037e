/**
 * Entity registry model
 * Snapshots, service calls and constants shared with the host registry
 */

export const DOMAINS = {
  GROUP: "group",
  SWITCH: "switch",
  FAN: "fan",
  LIGHT: "light",
  COVER: "cover",
  MEDIA_PLAYER: "media_player",
} as const;

export const SERVICES = {
  TURN_ON: "turn_on",
  TURN_OFF: "turn_off",
  VOLUME_SET: "volume_set",
  SET_COVER_POSITION: "set_cover_position",
  OPEN_COVER: "open_cover",
  CLOSE_COVER: "close_cover",
} as const;

export type ServiceName = (typeof SERVICES)[keyof typeof SERVICES];

export const ATTRIBUTES = {
  FRIENDLY_NAME: "friendly_name",
  ASSISTANT_NAME: "google_assistant_name",
  ALIASES: "aliases",
  SUPPORTED_FEATURES: "supported_features",
  BRIGHTNESS: "brightness", // 0-255
  VOLUME_LEVEL: "volume_level", // 0.0-1.0
} as const;

/**
 * Feature bits reported in the supported_features attribute.
 * Values are per domain, so equal bits in different domains are unrelated.
 */
export const FEATURES = {
  LIGHT_BRIGHTNESS: 1,
  LIGHT_COLOR_TEMP: 2,
  LIGHT_RGB_COLOR: 16,
  COVER_SET_POSITION: 4,
  MEDIA_VOLUME_SET: 4,
} as const;

export const STATE_OFF = "off";

export type EntityAttributes = Record<string, unknown>;

/**
 * Point-in-time view of a registry entity, e.g. light.kitchen
 */
export interface EntitySnapshot {
  entityId: string;
  domain: string;
  state: string;
  attributes: EntityAttributes;
}

export interface ServiceArgs {
  entityId: string;
  brightness?: number; // 0-255
  volume?: number; // 0.0-1.0
  position?: number;
}

/**
 * Service call to dispatch against the registry
 */
export interface ServiceInvocation {
  service: ServiceName;
  args: ServiceArgs;
}

/**
 * Port to the host registry. Lookups are synchronous reads of current state,
 * service calls resolve to whether the registry accepted the call.
 */
export interface EntityRegistry {
  getEntities(): EntitySnapshot[];
  getEntity(entityId: string): EntitySnapshot | undefined;
  callService(domain: string, invocation: ServiceInvocation): Promise<boolean>;
}

/**
 * Domain part of an entity id: everything before the first "."
 */
export const domainOf = (entityId: string): string => entityId.split(".")[0];

export const toEntitySnapshot = (
  entityId: string,
  state: string,
  attributes: EntityAttributes = {}
): EntitySnapshot => ({
  entityId,
  domain: domainOf(entityId),
  state,
  attributes,
});
