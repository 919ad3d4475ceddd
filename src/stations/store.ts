/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * store.ts: Station record store access for StationBase.
 */
import type { LineupTrace, Nullable, StationRecord, StationSource, VideoQuality } from "../types/index.js";
import { LOG, formatError, isMissingFileError, isPlainObject } from "../utils/index.js";
import type { StationPaths } from "../config/paths.js";
import { VIDEO_QUALITIES } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";

const { promises: fsPromises } = fs;

/*
 * STATION STORES
 *
 * Three files hold station records, each a JSON array of StationRecord:
 *
 * - Base store: the distributed snapshot. Read-only at runtime.
 * - User store: grown locally by the caching pipeline.
 * - Combined view: the base store merged with the user store. Derived and safe to delete.
 *
 * Every write goes to a temp file beside the target and is renamed over it, so a reader never observes a half-written store. Records are normalized on read, which
 * lets the base snapshot carry guide-service field shapes (videoQuality as { videoType }, preferredImage.uri) while our own writes use the flat StationRecord form.
 */

/**
 * Which store a file holds.
 */
export type StoreKind = "base" | "combined" | "user";

// Files smaller than this are parsed to tell "[]" (and whitespace variants) apart from a real store.
const EMPTY_PROBE_LIMIT = 16;

// Number of user store backups kept in the backup directory.
export const USER_BACKUP_RETENTION = 5;

/*
 * RECORD NORMALIZATION
 */

function optionalString(value: unknown): string | undefined {

  if(typeof value !== "string") {

    return undefined;
  }

  const trimmed = value.trim();

  return (trimmed.length > 0) ? trimmed : undefined;
}

/**
 * Parses a video quality value, which the guide service reports either as a string or as an object with a videoType field.
 * @param value - The raw value.
 * @returns The video quality, or undefined when it is absent or unrecognized.
 */
export function parseVideoQuality(value: unknown): VideoQuality | undefined {

  const raw = isPlainObject(value) ? value.videoType : value;

  if(typeof raw !== "string") {

    return undefined;
  }

  const upper = raw.trim().toUpperCase();

  return VIDEO_QUALITIES.find((quality) => quality === upper);
}

function parseSource(value: unknown): StationSource | undefined {

  return ((value === "api") || (value === "base") || (value === "user")) ? value : undefined;
}

function parseCountryList(value: unknown): string[] | undefined {

  if(!Array.isArray(value)) {

    return undefined;
  }

  const countries = [...new Set(value.filter((entry): entry is string => typeof entry === "string").map((entry) => entry.trim().toUpperCase())
    .filter((entry) => entry.length > 0))].sort();

  return (countries.length > 0) ? countries : undefined;
}

function parseLineupTrace(value: unknown): LineupTrace[] | undefined {

  if(!Array.isArray(value)) {

    return undefined;
  }

  for(const entry of value) {

    if(!isPlainObject(entry)) {

      continue;
    }

    const lineupId = optionalString(entry.lineupId);

    if(!lineupId) {

      continue;
    }

    const trace: LineupTrace = { country: optionalString(entry.country)?.toUpperCase() ?? "UNK", lineupId };
    const lineupName = optionalString(entry.lineupName);
    const location = optionalString(entry.location);
    const type = optionalString(entry.type);

    if(lineupName) {

      trace.lineupName = lineupName;
    }

    if(location) {

      trace.location = location;
    }

    if(type) {

      trace.type = type;
    }

    // Only the primary trace is kept.
    return [trace];
  }

  return undefined;
}

/**
 * Normalizes a raw station object into a StationRecord. Accepts both the guide service's field shapes and our stored shape:
 *
 * - videoQuality: "HDTV" or { videoType: "HDTV" }. Unrecognized values are dropped.
 * - logoURI or preferredImage.uri.
 * - language or the first entry of bcastLangs.
 * - network or affiliateCallSign.
 * - country, falling back to the first availableIn entry, then "UNK".
 *
 * @param raw - The raw object.
 * @returns The normalized record, or null when the object has no usable stationId.
 */
export function normalizeStation(raw: unknown): Nullable<StationRecord> {

  if(!isPlainObject(raw)) {

    return null;
  }

  const stationId = (typeof raw.stationId === "number") ? String(raw.stationId) : optionalString(raw.stationId);

  if(!stationId) {

    return null;
  }

  const availableIn = parseCountryList(raw.availableIn);
  const country = optionalString(raw.country)?.toUpperCase() ?? availableIn?.[0] ?? "UNK";
  const record: StationRecord = { country, stationId };

  const name = optionalString(raw.name);
  const callSign = optionalString(raw.callSign);
  const videoQuality = parseVideoQuality(raw.videoQuality);
  const preferredImage = raw.preferredImage;
  const logoURI = optionalString(raw.logoURI) ?? (isPlainObject(preferredImage) ? optionalString(preferredImage.uri) : undefined);
  const bcastLangs = raw.bcastLangs;
  const language = optionalString(raw.language) ?? (Array.isArray(bcastLangs) ? optionalString(bcastLangs[0]) : undefined);
  const network = optionalString(raw.network) ?? optionalString(raw.affiliateCallSign);
  const description = optionalString(raw.description);
  const source = parseSource(raw.source);
  const lineupTracing = parseLineupTrace(raw.lineupTracing);

  if(name) {

    record.name = name;
  }

  if(callSign) {

    record.callSign = callSign;
  }

  if(videoQuality) {

    record.videoQuality = videoQuality;
  }

  if(network) {

    record.network = network;
  }

  if(language) {

    record.language = language;
  }

  if(logoURI) {

    record.logoURI = logoURI;
  }

  if(description) {

    record.description = description;
  }

  if(source) {

    record.source = source;
  }

  if(availableIn) {

    record.availableIn = availableIn;
  }

  if(lineupTracing) {

    record.lineupTracing = lineupTracing;
  }

  return record;
}

/**
 * Normalizes an array of raw station objects, dropping entries without a stationId.
 * @param raw - The raw value, expected to be an array.
 * @returns The normalized records, or an empty array when the value is not an array.
 */
export function normalizeStations(raw: unknown): StationRecord[] {

  if(!Array.isArray(raw)) {

    return [];
  }

  const records: StationRecord[] = [];

  for(const entry of raw) {

    const record = normalizeStation(entry);

    if(record) {

      records.push(record);
    }
  }

  return records;
}

/*
 * ORDERING
 */

/**
 * Compares two records by name. Records without a name sort first. Names are compared by UTF-16 code unit, so the order does not depend on the locale.
 * @param a - The first record.
 * @param b - The second record.
 * @returns A negative number, zero, or a positive number.
 */
export function compareByName(a: StationRecord, b: StationRecord): number {

  const nameA = a.name ?? "";
  const nameB = b.name ?? "";

  if(nameA === nameB) {

    return 0;
  }

  return (nameA < nameB) ? -1 : 1;
}

/**
 * Returns a copy of the records sorted by name. Array.prototype.sort is stable, so records with equal names keep their relative order.
 * @param records - The records to sort.
 * @returns The sorted copy.
 */
export function sortByName(records: readonly StationRecord[]): StationRecord[] {

  return [...records].sort(compareByName);
}

/*
 * FILE ACCESS
 */

/**
 * Returns a file's modification time in milliseconds, or 0 when the file does not exist.
 * @param file - The file path.
 * @returns The modification time.
 */
export async function fileMtime(file: string): Promise<number> {

  try {

    const stats = await fsPromises.stat(file);

    return stats.mtimeMs;
  } catch(error) {

    if(isMissingFileError(error)) {

      return 0;
    }

    throw error;
  }
}

/**
 * Determines whether a store holds no records. A store is empty when the file is missing, has zero bytes, or is small enough to be "[]" and parses to an empty
 * array (or does not parse at all).
 * @param file - The store path.
 * @returns True if the store is empty.
 */
export async function isStoreEmpty(file: string): Promise<boolean> {

  let size: number;

  try {

    size = (await fsPromises.stat(file)).size;
  } catch(error) {

    if(isMissingFileError(error)) {

      return true;
    }

    throw error;
  }

  if(size === 0) {

    return true;
  }

  if(size >= EMPTY_PROBE_LIMIT) {

    return false;
  }

  try {

    const parsed: unknown = JSON.parse(await fsPromises.readFile(file, "utf-8"));

    return !Array.isArray(parsed) || (parsed.length === 0);
  } catch {

    return true;
  }
}

/**
 * Reads and normalizes every record in a store. A missing file reads as an empty store.
 * @param file - The store path.
 * @returns The records in file order.
 * @throws If the file exists but is not a JSON array.
 */
export async function readStations(file: string): Promise<StationRecord[]> {

  let content: string;

  try {

    content = await fsPromises.readFile(file, "utf-8");
  } catch(error) {

    if(isMissingFileError(error)) {

      return [];
    }

    throw error;
  }

  if(content.trim().length === 0) {

    return [];
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    throw new Error("Station store " + file + " is not valid JSON: " + formatError(error) + ".", { cause: error });
  }

  if(!Array.isArray(parsed)) {

    throw new Error("Station store " + file + " does not contain a JSON array.");
  }

  return normalizeStations(parsed);
}

/**
 * Writes a file through a temp file and rename. The parent directory is created when needed.
 * @param file - The target path.
 * @param content - The file content.
 */
export async function writeFileAtomic(file: string, content: string): Promise<void> {

  await fsPromises.mkdir(path.dirname(file), { recursive: true });

  // Each writer gets its own temp file so concurrent writes of the same target never rename each other's file away.
  const tempPath = file + "." + randomUUID() + ".tmp";

  await fsPromises.writeFile(tempPath, content, "utf-8");
  await fsPromises.rename(tempPath, file);
}

/**
 * Writes a store atomically.
 * @param file - The store path.
 * @param records - The records to write.
 */
export async function writeStations(file: string, records: readonly StationRecord[]): Promise<void> {

  await writeFileAtomic(file, JSON.stringify(records, null, 2) + "\n");

  LOG.debug("cache:store", "Wrote %s records to %s.", records.length, file);
}

/**
 * Copies the user store into the backup directory and prunes old backups, keeping the newest USER_BACKUP_RETENTION copies. Nothing happens when the user store is
 * empty.
 * @param paths - The station file layout.
 * @param now - The backup timestamp. Defaults to the current time.
 * @returns The backup path, or null when there was nothing to back up.
 */
export async function backupUserStore(paths: StationPaths, now: Date = new Date()): Promise<Nullable<string>> {

  if(await isStoreEmpty(paths.userStationsFile)) {

    return null;
  }

  await fsPromises.mkdir(paths.backupDir, { recursive: true });

  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  const backupFile = path.join(paths.backupDir, "all_stations_user." + stamp + ".json");

  await fsPromises.copyFile(paths.userStationsFile, backupFile);

  const backups = (await fsPromises.readdir(paths.backupDir)).filter((name) => name.startsWith("all_stations_user.") && name.endsWith(".json")).sort();

  // Timestamps sort lexically, so the oldest backups come first.
  for(const stale of backups.slice(0, Math.max(0, backups.length - USER_BACKUP_RETENTION))) {

    try {

      await fsPromises.unlink(path.join(paths.backupDir, stale));
    } catch(error) {

      LOG.warn("Unable to remove old user store backup %s: %s.", stale, formatError(error));
    }
  }

  LOG.debug("cache:store", "Backed up the user store to %s.", backupFile);

  return backupFile;
}

/*
 * STATUS
 */

/**
 * Summary of a single store file.
 */
export interface StoreFileStatus {

  empty: boolean;
  exists: boolean;
  modified: number;
  path: string;
  records: number;
  size: number;
}

/**
 * Summary of all three stores.
 */
export interface StoreStatus {

  base: StoreFileStatus;
  combined: StoreFileStatus;
  user: StoreFileStatus;
}

/**
 * Describes a single store file. Record counts are only computed for stores that parse; an unreadable store reports zero records.
 * @param file - The store path.
 * @returns The file status.
 */
export async function describeStore(file: string): Promise<StoreFileStatus> {

  let size = 0;
  let modified = 0;
  let exists = false;

  try {

    const stats = await fsPromises.stat(file);

    exists = true;
    size = stats.size;
    modified = stats.mtimeMs;
  } catch(error) {

    if(!isMissingFileError(error)) {

      throw error;
    }
  }

  let records = 0;

  if(exists && (size > 0)) {

    try {

      records = (await readStations(file)).length;
    } catch(error) {

      LOG.warn("Unable to read %s: %s.", file, formatError(error));
    }
  }

  return { empty: records === 0, exists, modified, path: file, records, size };
}

/**
 * Describes the base store, the user store, and the combined view.
 * @param paths - The station file layout.
 * @returns The store status.
 */
export async function getStoreStatus(paths: StationPaths): Promise<StoreStatus> {

  const [ base, user, combined ] = await Promise.all([ describeStore(paths.baseStationsFile), describeStore(paths.userStationsFile),
    describeStore(paths.combinedStationsFile) ]);

  return { base, combined, user };
}
