/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * staging.ts: Per-lineup staging files for the caching pipeline.
 */
import { LOG, formatError, isMissingFileError, isPlainObject } from "../utils/index.js";
import type { LineupTrace, StationRecord } from "../types/index.js";
import { normalizeStations, writeFileAtomic } from "./store.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * STAGING
 *
 * Stations fetched for a lineup are written to staging/<lineupId>.json before the lineup is recorded in the ledger. If a run is interrupted after that point, the
 * next run finds the staged file and folds its stations into the user store even though the ledger says the lineup needs no fetching. Staged files are removed
 * once their stations have been merged.
 */

/**
 * The stations fetched for one lineup, with the lineup details needed to tag them.
 */
export interface StagedLineup {

  country: string;
  lineupId: string;
  lineupName?: string;
  location?: string;
  stations: StationRecord[];
  type?: string;
}

/**
 * A staged lineup and the file it was read from.
 */
export interface StagedFile {

  file: string;
  lineup: StagedLineup;
}

/**
 * Returns the staging file path for a lineup. Lineup IDs are percent-encoded so any ID maps to a single file name.
 * @param stagingDir - The staging directory.
 * @param lineupId - The lineup identifier.
 * @returns The file path.
 */
export function stagingFileFor(stagingDir: string, lineupId: string): string {

  return path.join(stagingDir, encodeURIComponent(lineupId) + ".json");
}

/**
 * Writes a lineup's stations to its staging file.
 * @param stagingDir - The staging directory.
 * @param lineup - The staged lineup.
 * @returns The file path.
 */
export async function stageLineup(stagingDir: string, lineup: StagedLineup): Promise<string> {

  const file = stagingFileFor(stagingDir, lineup.lineupId);

  await writeFileAtomic(file, JSON.stringify(lineup) + "\n");

  LOG.debug("cache:pipeline", "Staged %s stations for lineup %s.", lineup.stations.length, lineup.lineupId);

  return file;
}

function parseStagedLineup(raw: unknown): StagedLineup | null {

  if(!isPlainObject(raw) || (typeof raw.lineupId !== "string") || (typeof raw.country !== "string")) {

    return null;
  }

  const lineup: StagedLineup = { country: raw.country, lineupId: raw.lineupId, stations: normalizeStations(raw.stations) };

  if(typeof raw.lineupName === "string") {

    lineup.lineupName = raw.lineupName;
  }

  if(typeof raw.location === "string") {

    lineup.location = raw.location;
  }

  if(typeof raw.type === "string") {

    lineup.type = raw.type;
  }

  return lineup;
}

/**
 * Reads every staged lineup, in file name order. Files that cannot be read or parsed are skipped with a warning and left in place.
 * @param stagingDir - The staging directory.
 * @returns The staged lineups.
 */
export async function readStagedLineups(stagingDir: string): Promise<StagedFile[]> {

  let names: string[];

  try {

    names = await fsPromises.readdir(stagingDir);
  } catch(error) {

    if(isMissingFileError(error)) {

      return [];
    }

    throw error;
  }

  const staged: StagedFile[] = [];

  for(const name of names.filter((entry) => entry.endsWith(".json")).sort()) {

    const file = path.join(stagingDir, name);

    try {

      const lineup = parseStagedLineup(JSON.parse(await fsPromises.readFile(file, "utf-8")));

      if(!lineup) {

        LOG.warn("Ignoring malformed staging file %s.", file);

        continue;
      }

      staged.push({ file, lineup });
    } catch(error) {

      LOG.warn("Unable to read staging file %s: %s.", file, formatError(error));
    }
  }

  return staged;
}

/**
 * Removes consumed staging files. A file that cannot be removed is logged and left behind; its stations merge again harmlessly on the next run.
 * @param files - The files to remove.
 */
export async function removeStagedFiles(files: readonly string[]): Promise<void> {

  for(const file of files) {

    try {

      await fsPromises.unlink(file);
    } catch(error) {

      if(!isMissingFileError(error)) {

        LOG.warn("Unable to remove staging file %s: %s.", file, formatError(error));
      }
    }
  }
}

/**
 * Tags a staged lineup's stations with their origin: country, availableIn, source "user", and the lineup as the primary trace.
 * @param lineup - The staged lineup.
 * @returns The tagged records.
 */
export function tagStagedStations(lineup: StagedLineup): StationRecord[] {

  const trace: LineupTrace = { country: lineup.country, lineupId: lineup.lineupId };

  if(lineup.lineupName) {

    trace.lineupName = lineup.lineupName;
  }

  if(lineup.location) {

    trace.location = lineup.location;
  }

  if(lineup.type) {

    trace.type = lineup.type;
  }

  return lineup.stations.map((station): StationRecord => ({

    ...station,
    availableIn: [lineup.country],
    country: lineup.country,
    lineupTracing: [{ ...trace }],
    source: "user"
  }));
}
