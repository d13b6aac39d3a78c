import type { Address } from "@townsim/schemas";

/** Prefix that keeps spawn-location keys disjoint from `world:sector:...` addresses. */
export const SPAWN_NAMESPACE = "<spawn_loc>";

export function spawnAddress(name: string): Address {
  return `${SPAWN_NAMESPACE}${name}`;
}

export function joinAddress(...segments: string[]): Address {
  return segments.join(":");
}

/** Last non-empty segment of an address, e.g. the object name. */
export function addressLeaf(address: Address): string {
  const segments = address.split(":").filter((s) => s.length > 0);
  return segments[segments.length - 1] ?? "";
}
