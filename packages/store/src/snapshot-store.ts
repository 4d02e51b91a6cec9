/**
 * @coffer/store — Snapshot persistence.
 *
 * Saves a StoreSnapshot as one JSON file next to a SHA-256 hash of its
 * canonical (RFC 8785) form, and refuses to load a file whose content
 * no longer matches the hash.
 *
 * The file is written to a temporary sibling first and then renamed, so
 * a crash mid-write leaves the previous snapshot in place.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { StoreSnapshot, Tables } from "./types.js";
import { StoreError } from "./types.js";

export function computeSnapshotHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/** On-disk envelope. */
export interface StoredSnapshot {
  readonly stateHash: string;
  readonly state: unknown;
}

/**
 * Turns the verified, still-untyped state back into a snapshot.
 * Throwing rejects the file.
 */
export type SnapshotParser<T> = (state: unknown) => StoreSnapshot<T>;

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return typeof v["stateHash"] === "string" && "state" in v;
}

export class FileSnapshotStore<T extends Tables<T>> {
  private readonly _path: string;
  private readonly _parse: SnapshotParser<T>;

  constructor(path: string, parse: SnapshotParser<T>) {
    this._path = path;
    this._parse = parse;
  }

  get path(): string {
    return this._path;
  }

  exists(): boolean {
    return existsSync(this._path);
  }

  save(snapshot: StoreSnapshot<T>): void {
    mkdirSync(dirname(this._path), { recursive: true });
    const stored: StoredSnapshot = {
      stateHash: computeSnapshotHash(snapshot),
      state: snapshot,
    };
    const tmp = `${this._path}.tmp`;
    writeFileSync(tmp, JSON.stringify(stored, null, 2), "utf-8");
    renameSync(tmp, this._path);
  }

  /**
   * @returns undefined when no snapshot was ever saved
   * @throws StoreError SNAPSHOT_CORRUPT for unreadable, tampered or malformed files
   */
  load(): StoreSnapshot<T> | undefined {
    if (!this.exists()) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this._path, "utf-8"));
    } catch (err: unknown) {
      throw corrupt(this._path, err instanceof Error ? err.message : String(err));
    }

    if (!isStoredSnapshot(parsed)) {
      throw corrupt(this._path, "missing stateHash or state");
    }
    if (computeSnapshotHash(parsed.state) !== parsed.stateHash) {
      throw corrupt(this._path, "stateHash does not match content");
    }

    try {
      return this._parse(parsed.state);
    } catch (err: unknown) {
      throw corrupt(this._path, err instanceof Error ? err.message : String(err));
    }
  }
}

function corrupt(path: string, reason: string): StoreError {
  return new StoreError("SNAPSHOT_CORRUPT", `Snapshot '${path}' is corrupt: ${reason}`, {
    path,
    reason,
  });
}
