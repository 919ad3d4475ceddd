/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * dedupe.ts: Station de-duplication and user store merging.
 */
import type { StationRecord } from "../types/index.js";
import { sortByName } from "./store.js";

/**
 * Result of de-duplicating a batch of staged stations.
 */
export interface DedupeResult {

  duplicatesRemoved: number;
  records: StationRecord[];
}

/**
 * Result of merging a batch into the user store.
 */
export interface UserMergeResult {

  added: number;
  records: StationRecord[];
  updated: number;
}

function unionCountries(...lists: (readonly string[] | undefined)[]): string[] {

  const countries = new Set<string>();

  for(const list of lists) {

    for(const country of list ?? []) {

      countries.add(country);
    }
  }

  return [...countries].sort();
}

/**
 * Collapses records that share a stationId. The same station usually shows up in several lineups, often with a name in only some of them:
 *
 * - The variant with the longest non-empty name is kept. The first variant seen wins ties, including the tie where no variant has a name.
 * - availableIn becomes the sorted union of every variant's availableIn (and country when a variant has no availableIn).
 * - The result is sorted by name.
 *
 * @param records - The staged records in discovery order.
 * @returns The unique records and how many duplicates were dropped.
 */
export function dedupeStations(records: readonly StationRecord[]): DedupeResult {

  const groups = new Map<string, { best: StationRecord; countries: string[] }>();

  for(const record of records) {

    const countries = record.availableIn ?? [record.country];
    const group = groups.get(record.stationId);

    if(!group) {

      groups.set(record.stationId, { best: record, countries: [...countries] });

      continue;
    }

    group.countries.push(...countries);

    if((record.name?.length ?? 0) > (group.best.name?.length ?? 0)) {

      group.best = record;
    }
  }

  const unique = [...groups.values()].map(({ best, countries }) => ({ ...best, availableIn: unionCountries(countries) }));

  return { duplicatesRemoved: records.length - unique.length, records: sortByName(unique) };
}

/**
 * Merges a batch of fetched stations into the user store. A batch record replaces the stored record with the same stationId, keeping the union of both availableIn
 * lists and the stored record's lineup trace when it has one. Stored records the batch does not mention are kept as they are.
 * @param existing - The current user store.
 * @param incoming - The de-duplicated batch.
 * @returns The merged store, sorted by name, with add and update counts.
 */
export function mergeIntoUserStore(existing: readonly StationRecord[], incoming: readonly StationRecord[]): UserMergeResult {

  const merged = new Map<string, StationRecord>();

  for(const record of existing) {

    merged.set(record.stationId, record);
  }

  let added = 0;
  let updated = 0;

  for(const record of incoming) {

    const current = merged.get(record.stationId);

    if(!current) {

      merged.set(record.stationId, record);
      added++;

      continue;
    }

    const next: StationRecord = { ...record, availableIn: unionCountries(current.availableIn ?? [current.country], record.availableIn ?? [record.country]) };
    const lineupTracing = current.lineupTracing ?? record.lineupTracing;

    if(lineupTracing) {

      next.lineupTracing = lineupTracing;
    }

    merged.set(record.stationId, next);
    updated++;
  }

  return { added, records: sortByName([...merged.values()]), updated };
}
