/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { MAX_ASN, MAX_PER_PAGE } from "@netviz/engine";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = Number.MAX_SAFE_INTEGER): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse a positive integer argument
 */
export function parsePositiveInt(value: string, name: string, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = parseNonNegativeInt(value, name, max);
  if (parsed === 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }
  return parsed;
}

/**
 * Parse --page (1-indexed)
 */
export function parsePage(value: string): number {
  return parsePositiveInt(value, "--page");
}

/**
 * Parse --per-page (1..100)
 */
export function parsePerPage(value: string): number {
  return parsePositiveInt(value, "--per-page", MAX_PER_PAGE);
}

/**
 * Parse --asn, accepting an optional "AS" prefix (e.g., "AS64500")
 */
export function parseAsn(value: string): number {
  const trimmed = value.trim().replace(/^as/i, "");
  return parseNonNegativeInt(trimmed, "--asn", MAX_ASN);
}
