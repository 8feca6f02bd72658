/**
 * Declarative file-name predicates for the File Selector.
 *
 * Predicates look only at the name string, never at file contents, so a
 * selection can be reasoned about (and tested) without touching storage.
 *
 * @example
 * ```typescript
 * const sortedBams = allOf(startsWith("sorted."), endsWith(".bam"));
 * sortedBams("sorted.sample.bam"); // true
 * ```
 */

/**
 * Pure function of a file name.
 */
export type FilePredicate = (name: string) => boolean;

export function endsWith(suffix: string): FilePredicate {
  return (name) => name.endsWith(suffix);
}

export function startsWith(prefix: string): FilePredicate {
  return (name) => name.startsWith(prefix);
}

export function contains(substring: string): FilePredicate {
  return (name) => name.includes(substring);
}

/** Matches when every predicate matches. `allOf()` matches everything. */
export function allOf(...predicates: FilePredicate[]): FilePredicate {
  return (name) => predicates.every((predicate) => predicate(name));
}

/** Matches when at least one predicate matches. `anyOf()` matches nothing. */
export function anyOf(...predicates: FilePredicate[]): FilePredicate {
  return (name) => predicates.some((predicate) => predicate(name));
}

export function not(predicate: FilePredicate): FilePredicate {
  return (name) => !predicate(name);
}

/**
 * Strip the last extension from a file name, keeping leading-dot names intact.
 *
 * `"trimmed.sample_1.fastq"` becomes `"trimmed.sample_1"`; `".hidden"` is
 * returned unchanged.
 */
export function stripExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  if (dot <= 0) {
    return name;
  }
  // Dots that only lead the name (e.g. "..config") do not start an extension
  if (/^\.+$/.test(name.slice(0, dot))) {
    return name;
  }
  return name.slice(0, dot);
}
