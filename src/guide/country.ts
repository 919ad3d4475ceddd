/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * country.ts: Country inference for guide lineups.
 */

// Lineup IDs start with the three-letter country code, as in "USA-NY31519-X" or "CAN-OTA-M5V".
const LINEUP_COUNTRY_PATTERN = /^([A-Z]{3})-/;

/**
 * Infers a lineup's country from its ID. This is a last resort, used only when no market is known for the lineup.
 * @param lineupId - The lineup identifier.
 * @returns The country code, or undefined when the ID has no country prefix.
 */
export function inferCountryFromLineupId(lineupId: string): string | undefined {

  return LINEUP_COUNTRY_PATTERN.exec(lineupId.trim().toUpperCase())?.[1];
}
