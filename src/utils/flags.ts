/**
 * Flag list helpers.
 *
 * Some flags take their argument as the next token (`-F dir`, `-framework Foo`).
 * Those pairs are one unit for deduplication, so `-F a -F b` keeps both pairs
 * while a repeated `-F a` is dropped.
 */

export type SeparatedArgFlags = ReadonlySet<string> | readonly string[];

function toSet(flags: SeparatedArgFlags): ReadonlySet<string> {
  return flags instanceof Set ? flags : new Set(flags);
}

/**
 * Split a flat flag list into units. A separated-argument flag followed by
 * a value becomes a two-element unit; a trailing one stays alone.
 */
export function groupFlags(flags: readonly string[], separatedArgFlags: SeparatedArgFlags = []): string[][] {
  const separated = toSet(separatedArgFlags);
  const units: string[][] = [];

  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    if (separated.has(flag) && i + 1 < flags.length) {
      units.push([flag, flags[i + 1]]);
      i++;
    } else {
      units.push([flag]);
    }
  }

  return units;
}

/**
 * Remove repeated flag units, keeping the first occurrence of each.
 */
export function deduplicateFlags(flags: readonly string[], separatedArgFlags: SeparatedArgFlags = []): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const unit of groupFlags(flags, separatedArgFlags)) {
    // NUL never appears in a command-line argument
    const key = unit.join('\0');
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(...unit);
  }

  return result;
}

/**
 * Append `incoming` to `existing`, skipping units already present.
 */
export function mergeFlags(
  existing: readonly string[],
  incoming: readonly string[],
  separatedArgFlags: SeparatedArgFlags = []
): string[] {
  return deduplicateFlags([...existing, ...incoming], separatedArgFlags);
}

/**
 * Ordered union of plain values: first-seen order, exact duplicates removed.
 */
export function mergeUnique<T>(existing: readonly T[], incoming: Iterable<T>): T[] {
  const result = [...existing];
  const seen = new Set(existing);
  for (const value of incoming) {
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}
