/**
 * @fileoverview Parsing of `--help` output into command-line options.
 *
 * An option line starts with `-` and carries at least one long form; its
 * description follows after two or more spaces and may continue on
 * indented lines:
 *
 * ```
 * -a, --no-rebuild               Do not rebuild project dependencies.
 * --build-cache                  Enables the build cache. Gradle will try to
 *                                reuse outputs from previous builds.
 * ```
 *
 * @module build/helpParser
 */

const DESCRIPTION_GAP = '  ';

function descriptionStart(line: string): number {
  return line.indexOf(DESCRIPTION_GAP);
}

/**
 * The first long option of an option line, without its value placeholder.
 */
function optionToken(trimmedLine: string): string | undefined {
  if (!trimmedLine.startsWith('-')) {
    return undefined;
  }
  const start = descriptionStart(trimmedLine);
  const segment = start >= 0 ? trimmedLine.slice(0, start) : trimmedLine;
  for (const token of segment.split(',')) {
    const normalized = token.trim();
    if (normalized.startsWith('--')) {
      return normalized.split(' ')[0];
    }
  }
  return undefined;
}

function inlineDescription(trimmedLine: string): string {
  const start = descriptionStart(trimmedLine);
  return start < 0 ? '' : trimmedLine.slice(start).trim();
}

/**
 * Map each long option to its description, in the order listed.
 */
export function parseHelpOptions(helpOutput: string): Map<string, string> {
  const options = new Map<string, string>();
  let current: string | undefined;
  let description: string[] = [];

  const commit = (): void => {
    if (current !== undefined) {
      options.set(current, description.join(' ').trim());
    }
    current = undefined;
    description = [];
  };

  for (const line of helpOutput.split(/\r?\n/)) {
    const trimmed = line.trimStart();
    const token = optionToken(trimmed);
    if (token) {
      commit();
      current = token;
      const inline = inlineDescription(trimmed);
      if (inline) {
        description.push(inline);
      }
      continue;
    }
    if (current === undefined) {
      continue;
    }
    // A blank or unindented line ends the description.
    if (trimmed.length === 0 || trimmed.length === line.length) {
      commit();
      continue;
    }
    description.push(trimmed.trim());
  }
  commit();
  return options;
}
