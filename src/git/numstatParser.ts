/**
 * @fileoverview Parsing of `--numstat` output.
 *
 * Each line is `<additions>\t<deletions>\t<path>`; binary files report `-`
 * for both counts.
 *
 * @module git/numstatParser
 */

export interface NumstatEntry {
  path: string;
  /** Undefined for binary files. */
  additions?: number;
  /** Undefined for binary files. */
  deletions?: number;
}

function parseCount(value: string): number | undefined | null {
  if (value === '-') {
    return undefined;
  }
  return /^\d+$/.test(value) ? Number(value) : null;
}

/**
 * @returns undefined when the line is not a numstat line
 */
export function parseNumstatLine(line: string): NumstatEntry | undefined {
  const match = /^(\S+)\s+(\S+)\s+(.+)$/.exec(line.trim());
  if (!match) {
    return undefined;
  }
  const additions = parseCount(match[1]);
  const deletions = parseCount(match[2]);
  if (additions === null || deletions === null) {
    return undefined;
  }
  return {
    path: match[3],
    ...(additions !== undefined ? { additions } : {}),
    ...(deletions !== undefined ? { deletions } : {}),
  };
}

/**
 * Parse numstat lines, skipping anything that is not one.
 */
export function parseNumstat(lines: readonly string[]): NumstatEntry[] {
  const entries: NumstatEntry[] = [];
  for (const line of lines) {
    const entry = parseNumstatLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}
