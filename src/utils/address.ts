import type { Address } from "../types";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

// Usable as a funds or ownership destination: well formed and not the zero address
export function isValidDestination(value: unknown): value is Address {
  return isAddress(value) && value.toLowerCase() !== ZERO_ADDRESS;
}

export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}
