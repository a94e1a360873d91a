export const FALLBACK_SLUG = 'unnamed';

/**
 * Turns a human readable alias into a filesystem safe slug.
 *
 * "Hallway lights when motion" -> "hallway_lights_when_motion"
 * "../../etc/passwd"           -> "etc_passwd"
 * "!!!"                        -> "unnamed"
 */
export function deriveSlug(rawName: string): string {
  if (typeof rawName !== 'string') {
    throw new Error('Name must be a string');
  }

  const slug = rawName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  return slug || FALLBACK_SLUG;
}

/**
 * Title for headers and READMEs: "hallway_lighting" -> "Hallway Lighting".
 * Every letter after a non-letter is capitalised: "hallway2lights" -> "Hallway2Lights".
 */
export function humanize(value: string): string {
  const cleaned = value.replace(/[_-]+/g, ' ').trim();
  if (!cleaned) return 'Automation';

  return cleaned
    .toLowerCase()
    .replace(
      /(^|\P{L})(\p{L})/gu,
      (_match, before: string, letter: string) => before + letter.toUpperCase(),
    );
}
