import path from "node:path";
import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { ScanError, errorMessage } from "./errors.js";
import { isImageFile } from "./utils.js";
import type { FileRecord } from "./types.js";

export function toFileRecord(filePath: string, stats: Stats): FileRecord {
  return Object.freeze({
    path: path.resolve(filePath),
    mode: stats.mode & 0o777,
    uid: stats.uid,
    gid: stats.gid,
    size: stats.size,
  });
}

/** Recursively collects supported images under `dir`, sorted by path. */
export async function findImages(dir: string): Promise<FileRecord[]> {
  const root = path.resolve(dir);

  let rootStats: Stats;
  try {
    rootStats = await fs.stat(root);
  } catch (err) {
    throw new ScanError(`Working directory does not exist: ${dir}`, { cause: err });
  }
  if (!rootStats.isDirectory()) {
    throw new ScanError(`Working directory is not a directory: ${dir}`);
  }

  let entries: string[];
  try {
    entries = await fs.readdir(root, { recursive: true });
  } catch (err) {
    throw new ScanError(`Cannot scan ${dir}: ${errorMessage(err)}`, { cause: err });
  }

  const records: FileRecord[] = [];
  for (const entry of entries.filter((e) => isImageFile(e))) {
    const filePath = path.join(root, entry);
    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (err) {
      console.warn(`Warning: cannot stat ${filePath}, leaving it out: ${errorMessage(err)}`);
      continue;
    }
    if (stats.isFile()) {
      records.push(toFileRecord(filePath, stats));
    }
  }

  return records.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
