/**
 * Shared formatting utilities for UI output.
 */

/**
 * Join the lines that are present; `false`, `null` and `undefined` entries
 * are skipped so callers can write conditional lines inline.
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
