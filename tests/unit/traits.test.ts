import { describe, expect, it } from "vitest";
import {
  CAPABILITY_MAP,
  GOOGLE_TRAITS,
  getCapability,
  toGoogleTrait,
  toGoogleType,
} from "../../src/google/traits.ts";

describe("Capability map", () => {
  it("should cover every supported domain", () => {
    expect([...CAPABILITY_MAP.keys()]).toEqual([
      "group",
      "switch",
      "fan",
      "light",
      "cover",
      "media_player",
    ]);
  });

  it("should expose groups as scenes", () => {
    expect(getCapability("group")).toEqual({
      deviceType: "SCENE",
      baseTrait: "ActivateScene",
      featureTraits: [],
    });
  });

  it("should declare light feature traits in reporting order", () => {
    expect(getCapability("light")?.featureTraits).toEqual([
      [1, GOOGLE_TRAITS.BRIGHTNESS],
      [16, GOOGLE_TRAITS.COLOR_SPECTRUM],
      [2, GOOGLE_TRAITS.COLOR_TEMPERATURE],
    ]);
  });

  it("should not declare duplicate traits for any domain", () => {
    for (const { baseTrait, featureTraits } of CAPABILITY_MAP.values()) {
      const traits = [baseTrait, ...featureTraits.map(([, trait]) => trait)];
      expect(new Set(traits).size).toBe(traits.length);
    }
  });

  it("should return undefined for unknown domains", () => {
    expect(getCapability("climate")).toBeUndefined();
    expect(getCapability("toString")).toBeUndefined();
    expect(getCapability("Light")).toBeUndefined();
  });

  it("should prefix device types and traits", () => {
    expect(toGoogleType("SWITCH")).toBe("action.devices.types.SWITCH");
    expect(toGoogleTrait("OnOff")).toBe("action.devices.traits.OnOff");
  });
});
