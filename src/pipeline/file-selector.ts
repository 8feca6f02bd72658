/**
 * File Selector.
 *
 * Treats a directory listing as the unit-of-work queue for a stage. Listing
 * goes through a {@link FileSource} so tests can substitute an in-memory list
 * without touching storage.
 */

import { readdirSync, statSync, type Stats } from "node:fs";
import path from "node:path";

import { DirectoryNotFoundError } from "./errors.js";

import type { FilePredicate } from "./predicates.js";

/**
 * Read-only view of storage used for unit-of-work discovery.
 */
export interface FileSource {
  /** Whether `dirPath` exists and is a directory */
  isDirectory(dirPath: string): boolean;
  /** Whether `filePath` exists and is a regular file */
  isFile(filePath: string): boolean;
  /** Entry names of `dirPath`, non-recursive, in native listing order */
  list(dirPath: string): string[];
}

/**
 * A discovered file name paired with the directory it was found in.
 */
export interface FileMatch {
  /** Entry name as listed */
  readonly name: string;
  /** Directory the entry was listed from */
  readonly dir: string;
  /** `dir/name` */
  readonly path: string;
}

function statOrUndefined(target: string): Stats | undefined {
  return statSync(target, { throwIfNoEntry: false });
}

/**
 * FileSource backed by the local filesystem.
 */
export const fsFileSource: FileSource = {
  isDirectory(dirPath) {
    return statOrUndefined(dirPath)?.isDirectory() ?? false;
  },
  isFile(filePath) {
    return statOrUndefined(filePath)?.isFile() ?? false;
  },
  list(dirPath) {
    return readdirSync(dirPath);
  },
};

/**
 * FileSource that adds planned files to a real listing.
 */
export interface OverlaySource extends FileSource {
  /** Treat `paths` as existing files from now on */
  add(paths: readonly string[]): void;
}

/**
 * Lay planned paths over `base`, so work that was only reported (a dry run)
 * is visible to later listings as if it had been done.
 */
export function createOverlaySource(base: FileSource): OverlaySource {
  const planned = new Map<string, Set<string>>();

  const plannedIn = (dirPath: string): Set<string> | undefined =>
    planned.get(path.resolve(dirPath));

  return {
    add(paths) {
      for (const filePath of paths) {
        const resolved = path.resolve(filePath);
        const dir = path.dirname(resolved);
        const names = planned.get(dir) ?? new Set<string>();
        names.add(path.basename(resolved));
        planned.set(dir, names);
      }
    },
    isDirectory(dirPath) {
      return base.isDirectory(dirPath) || plannedIn(dirPath) !== undefined;
    },
    isFile(filePath) {
      if (base.isFile(filePath)) {
        return true;
      }
      return (
        plannedIn(path.dirname(path.resolve(filePath)))?.has(
          path.basename(filePath),
        ) ?? false
      );
    },
    list(dirPath) {
      const names = base.isDirectory(dirPath) ? base.list(dirPath) : [];
      const extra = [...(plannedIn(dirPath) ?? [])].filter(
        (name) => !names.includes(name),
      );
      return [...names, ...extra];
    },
  };
}

/**
 * Select the entries of `dir` whose names satisfy `predicate`.
 *
 * The directory is checked eagerly, so a missing directory fails before the
 * caller does any work. Listing happens once, when the sequence is first
 * iterated; the sequence is single-use, and calling `selectFiles` again
 * performs a fresh listing. Directories are visible to the predicate too.
 *
 * @throws DirectoryNotFoundError if `dir` does not exist or is not a directory
 */
export function selectFiles(
  dir: string,
  predicate: FilePredicate,
  source: FileSource = fsFileSource,
): IterableIterator<FileMatch> {
  if (!source.isDirectory(dir)) {
    throw new DirectoryNotFoundError(dir);
  }

  return matches(dir, predicate, source);
}

function* matches(
  dir: string,
  predicate: FilePredicate,
  source: FileSource,
): Generator<FileMatch, void, undefined> {
  for (const name of source.list(dir)) {
    if (predicate(name)) {
      yield { name, dir, path: path.join(dir, name) };
    }
  }
}
