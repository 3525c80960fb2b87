/**
 * Internal Helpers
 *
 * Shared utility functions used across calendar modules.
 */

/** Modulo that is never negative (JS % keeps the dividend's sign). */
export function floorMod(a: number, m: number): number {
  return ((a % m) + m) % m
}

export function dateKey(number: number, name: number): string {
  return `${number}:${name}`
}
