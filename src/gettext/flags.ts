const FUZZY = 'fuzzy';

export function isFlagComment(line: string): boolean {
  return line.trim().startsWith('#,');
}

function splitFlags(line: string): string[] {
  return line
    .trim()
    .slice(2)
    .split(',')
    .map(flag => flag.trim())
    .filter(flag => flag !== '');
}

export function hasFuzzyFlag(line: string): boolean {
  return isFlagComment(line) && splitFlags(line).includes(FUZZY);
}

/**
 * Removes `fuzzy` from a `#,` line. Returns "" when nothing else is left;
 * any other line is returned unchanged.
 */
export function stripFuzzyFlag(line: string): string {
  if (!isFlagComment(line)) {
    return line;
  }
  const rest = splitFlags(line).filter(flag => flag !== FUZZY);
  return rest.length === 0 ? '' : `#, ${rest.join(', ')}`;
}

/** Puts `fuzzy` first on a `#,` line without duplicating it. */
export function mergeFuzzyFlag(line: string): string {
  if (!isFlagComment(line)) {
    return line;
  }
  return `#, ${[FUZZY, ...splitFlags(line).filter(flag => flag !== FUZZY)].join(', ')}`;
}

export const FUZZY_COMMENT = `#, ${FUZZY}`;
