/**
 * Capability Mapper
 * Converts between registry entities and Google Smart Home format
 */

import { createLogger } from "../logger.ts";
import {
  ATTRIBUTES,
  DOMAINS,
  SERVICES,
  STATE_OFF,
  domainOf,
  type EntityAttributes,
  type EntitySnapshot,
  type ServiceInvocation,
} from "../registry/types.ts";
import {
  AliasesSchema,
  GOOGLE_COMMANDS,
  type CommandParameters,
} from "./schema.ts";
import { getCapability, toGoogleTrait, toGoogleType } from "./traits.ts";
import type {
  DeviceDescriptor,
  GoogleDeviceName,
  QueryDeviceState,
  QueryResponsePayload,
  QueryResult,
  SmartHomeResponseBase,
  SyncResponsePayload,
} from "./types.ts";

const log = createLogger("google:mapper");

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value !== "";

/**
 * Read a numeric attribute. Absent attributes resolve to the fallback,
 * attributes present with a non-numeric value (e.g. null) to undefined.
 */
const numericAttribute = (
  attributes: EntityAttributes,
  key: string,
  fallback: number
): number | undefined => {
  const value = attributes[key];
  if (value === undefined) {
    return fallback;
  }
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
};

/** Round to the nearest integer, ties going to the even neighbour */
const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
};

// Bitmasks outside the unsigned 32-bit range would be truncated by `&`
const featureMask = (supported: unknown): number =>
  typeof supported === "number" &&
  Number.isInteger(supported) &&
  supported >= 0 &&
  supported <= 0xffffffff
    ? supported
    : 0;

const buildDeviceName = ({
  entityId,
  attributes,
}: EntitySnapshot): GoogleDeviceName => {
  const name = [
    attributes[ATTRIBUTES.ASSISTANT_NAME],
    attributes[ATTRIBUTES.FRIENDLY_NAME],
  ].find(isNonEmptyString);

  const aliases = attributes[ATTRIBUTES.ALIASES];
  let nicknames: unknown[] | undefined;
  if (aliases !== undefined) {
    const parsed = AliasesSchema.safeParse(aliases);
    if (parsed.success) {
      nicknames = parsed.data;
    } else {
      log.warn("mapper.invalid_aliases", {
        entityId,
        reason: `${ATTRIBUTES.ALIASES} must be a list`,
      });
    }
  }

  return {
    ...(name !== undefined ? { name } : {}),
    ...(nicknames !== undefined ? { nicknames } : {}),
  };
};

/**
 * Convert a registry entity to a Google device for the SYNC intent
 *
 * @returns undefined when the entity's domain has no Google counterpart
 */
export const entityToDevice = (
  entity: EntitySnapshot
): DeviceDescriptor | undefined => {
  const capability = getCapability(entity.domain);
  if (!capability) {
    return undefined;
  }

  const features = featureMask(
    entity.attributes[ATTRIBUTES.SUPPORTED_FEATURES]
  );

  return {
    id: entity.entityId,
    type: toGoogleType(capability.deviceType),
    traits: [
      toGoogleTrait(capability.baseTrait),
      ...capability.featureTraits
        .filter(([flag]) => (flag & features) !== 0)
        .map(([, trait]) => toGoogleTrait(trait)),
    ],
    name: buildDeviceName(entity),
    willReportState: false,
  };
};

/**
 * Convert entity state to Google state for the QUERY intent.
 * Media player volume is reported as brightness.
 */
export const queryDevice = (entity: EntitySnapshot): QueryResult => {
  // Anything other than "off" (including unknown/unavailable) counts as on
  const on = entity.state !== STATE_OFF;
  const fallback = on ? 255 : 0;

  let level255 = numericAttribute(
    entity.attributes,
    ATTRIBUTES.BRIGHTNESS,
    fallback
  );

  if (entity.domain === DOMAINS.MEDIA_PLAYER) {
    const volume = numericAttribute(
      entity.attributes,
      ATTRIBUTES.VOLUME_LEVEL,
      on ? 1 : 0
    );
    // Convert 0.0-1.0 to 0-255
    level255 =
      volume !== undefined
        ? roundHalfEven(Math.min(1, volume) * 255)
        : undefined;
  }

  return {
    on,
    online: true,
    brightness: Math.trunc(100 * ((level255 ?? fallback) / 255)),
  };
};

/**
 * Determine the registry service and its arguments for a Google command.
 * Domain-specific cases are checked before the generic ones; unknown
 * commands turn the entity off.
 */
export const determineService = (
  entityId: string,
  command: string,
  params: CommandParameters
): ServiceInvocation => {
  const domain = domainOf(entityId);
  const args = { entityId };

  if (
    domain === DOMAINS.MEDIA_PLAYER &&
    command === GOOGLE_COMMANDS.BRIGHTNESS_ABSOLUTE
  ) {
    return {
      service: SERVICES.VOLUME_SET,
      args: { ...args, volume: (params.brightness ?? 0) / 100 },
    };
  }

  if (domain === DOMAINS.COVER) {
    if (command === GOOGLE_COMMANDS.BRIGHTNESS_ABSOLUTE) {
      return {
        service: SERVICES.SET_COVER_POSITION,
        args: { ...args, position: params.brightness ?? 0 },
      };
    }
    if (command === GOOGLE_COMMANDS.ON_OFF) {
      return {
        service:
          params.on === true ? SERVICES.OPEN_COVER : SERVICES.CLOSE_COVER,
        args,
      };
    }
  }

  if (command === GOOGLE_COMMANDS.BRIGHTNESS_ABSOLUTE) {
    // Missing brightness gives NaN
    return {
      service: SERVICES.TURN_ON,
      args: {
        ...args,
        brightness: Math.round((Number(params.brightness) / 100) * 255),
      },
    };
  }

  return {
    service:
      command === GOOGLE_COMMANDS.ON_OFF && params.on === true
        ? SERVICES.TURN_ON
        : SERVICES.TURN_OFF,
    args,
  };
};

export const makeActionsResponse = <T>(
  requestId: string,
  payload: T
): SmartHomeResponseBase<T> => ({ requestId, payload });

/**
 * Map registry entities to the SYNC response payload, skipping entities
 * without a Google counterpart
 */
export const mapSyncResponse = (
  agentUserId: string,
  entities: EntitySnapshot[]
): SyncResponsePayload => ({
  agentUserId,
  devices: entities
    .map(entityToDevice)
    .filter(device => device !== undefined),
});

/**
 * Map requested device ids to the QUERY response payload.
 * Ids unknown to the registry are reported offline.
 */
export const mapQueryResponse = (
  deviceIds: string[],
  getEntity: (entityId: string) => EntitySnapshot | undefined
): QueryResponsePayload => ({
  devices: Object.fromEntries(
    deviceIds.map((id): [string, QueryDeviceState] => {
      const entity = getEntity(id);
      return [id, entity ? queryDevice(entity) : { online: false }];
    })
  ),
});
