import type { RawDevice } from "./adapter";
import type { DeviceStyle } from "./styles";

/**
 * Politique d'acceptation des périphériques.
 */
export interface DevicePolicy {
  /** Accepter les télécommandes TV (micro gamepad) */
  supportsMicro: boolean;
  /** Accepter les manettes virtuelles (logicielles) */
  supportsVirtual: boolean;
  virtualVendorName: string;
  virtualProductCategory: string;
}

export const DEFAULT_DEVICE_POLICY: DevicePolicy = {
  supportsMicro: false,
  supportsVirtual: false,
  virtualVendorName: "Gamepad",
  virtualProductCategory: "MFi",
};

export type Classification =
  | { accepted: true; style: DeviceStyle; micro: boolean }
  | { accepted: false; reason: "virtual" | "micro" | "unsupported" };

/** Manette virtuelle: nom constructeur et catégorie produit génériques. */
export function isVirtualDevice(device: RawDevice, policy: DevicePolicy): boolean {
  return device.vendorName === policy.virtualVendorName && device.productCategory === policy.virtualProductCategory;
}

/**
 * Détermine la variante d'un périphérique à partir de ses capacités.
 */
export function classifyDevice(device: RawDevice, policy: DevicePolicy): Classification {
  if (!policy.supportsVirtual && isVirtualDevice(device, policy)) return { accepted: false, reason: "virtual" };
  const caps = device.capabilities;
  switch (caps.profile) {
    case "extended": {
      let style: DeviceStyle = "extended";
      if (caps.touchpad) style = caps.adaptiveTriggers ? "dualSense" : "dualShock";
      else if (caps.paddles) style = "xbox";
      return { accepted: true, style, micro: false };
    }
    case "micro":
      if (!policy.supportsMicro) return { accepted: false, reason: "micro" };
      return { accepted: true, style: caps.directional ? "directional" : "micro", micro: true };
    default:
      return { accepted: false, reason: "unsupported" };
  }
}
