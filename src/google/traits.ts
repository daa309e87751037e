/**
 * Capability map between registry domains and Google Smart Home device types
 * and traits
 */

import { DOMAINS, FEATURES } from "../registry/types.ts";

export const TYPE_PREFIX = "action.devices.types.";
export const TRAIT_PREFIX = "action.devices.traits.";

export const GOOGLE_DEVICE_TYPES = {
  SCENE: "SCENE",
  SWITCH: "SWITCH",
  LIGHT: "LIGHT",
} as const;

export const GOOGLE_TRAITS = {
  ACTIVATE_SCENE: "ActivateScene",
  ON_OFF: "OnOff",
  BRIGHTNESS: "Brightness",
  COLOR_SPECTRUM: "ColorSpectrum",
  COLOR_TEMPERATURE: "ColorTemperature",
} as const;

export type GoogleDeviceType =
  (typeof GOOGLE_DEVICE_TYPES)[keyof typeof GOOGLE_DEVICE_TYPES];
export type GoogleTrait = (typeof GOOGLE_TRAITS)[keyof typeof GOOGLE_TRAITS];

export interface CapabilityEntry {
  readonly deviceType: GoogleDeviceType;
  readonly baseTrait: GoogleTrait;
  /** Feature flag / trait pairs, in the order traits are reported */
  readonly featureTraits: ReadonlyArray<readonly [number, GoogleTrait]>;
}

export const CAPABILITY_MAP: ReadonlyMap<string, CapabilityEntry> = new Map<
  string,
  CapabilityEntry
>([
  [
    DOMAINS.GROUP,
    {
      deviceType: GOOGLE_DEVICE_TYPES.SCENE,
      baseTrait: GOOGLE_TRAITS.ACTIVATE_SCENE,
      featureTraits: [],
    },
  ],
  [
    DOMAINS.SWITCH,
    {
      deviceType: GOOGLE_DEVICE_TYPES.SWITCH,
      baseTrait: GOOGLE_TRAITS.ON_OFF,
      featureTraits: [],
    },
  ],
  [
    DOMAINS.FAN,
    {
      deviceType: GOOGLE_DEVICE_TYPES.SWITCH,
      baseTrait: GOOGLE_TRAITS.ON_OFF,
      featureTraits: [],
    },
  ],
  [
    DOMAINS.LIGHT,
    {
      deviceType: GOOGLE_DEVICE_TYPES.LIGHT,
      baseTrait: GOOGLE_TRAITS.ON_OFF,
      featureTraits: [
        [FEATURES.LIGHT_BRIGHTNESS, GOOGLE_TRAITS.BRIGHTNESS],
        [FEATURES.LIGHT_RGB_COLOR, GOOGLE_TRAITS.COLOR_SPECTRUM],
        [FEATURES.LIGHT_COLOR_TEMP, GOOGLE_TRAITS.COLOR_TEMPERATURE],
      ],
    },
  ],
  // Covers and media players are exposed as lights, with position and volume
  // standing in for brightness
  [
    DOMAINS.COVER,
    {
      deviceType: GOOGLE_DEVICE_TYPES.LIGHT,
      baseTrait: GOOGLE_TRAITS.ON_OFF,
      featureTraits: [[FEATURES.COVER_SET_POSITION, GOOGLE_TRAITS.BRIGHTNESS]],
    },
  ],
  [
    DOMAINS.MEDIA_PLAYER,
    {
      deviceType: GOOGLE_DEVICE_TYPES.LIGHT,
      baseTrait: GOOGLE_TRAITS.ON_OFF,
      featureTraits: [[FEATURES.MEDIA_VOLUME_SET, GOOGLE_TRAITS.BRIGHTNESS]],
    },
  ],
]);

export const getCapability = (domain: string): CapabilityEntry | undefined =>
  CAPABILITY_MAP.get(domain);

export const toGoogleType = (deviceType: GoogleDeviceType): string =>
  `${TYPE_PREFIX}${deviceType}`;

export const toGoogleTrait = (trait: GoogleTrait): string =>
  `${TRAIT_PREFIX}${trait}`;
