/**
 * Version naming convention for leaf directories: a fixed one-character marker followed by
 * decimal digits (`v003`, `v12`).
 *
 * Both sides of a comparison are rendered to a canonical decimal string (no leading zeros),
 * so `v003` and a reference version of `3` (or `"003"`) compare equal. Anything that does not
 * follow the convention renders to `null` and never matches.
 */

const DIGITS = /^[0-9]+$/;

function canonicalDigits(digits: string): string {
  const stripped = digits.replace(/^0+/, '');
  return stripped === '' ? '0' : stripped;
}

/**
 * `parseVersionName('v003') === '3'`; `parseVersionName('take2') === null`.
 */
export function parseVersionName(name: string, prefix = 'v'): string | null {
  if (prefix.length !== 1 || !name.startsWith(prefix)) return null;
  const remainder = name.slice(1);
  if (!DIGITS.test(remainder)) return null;
  return canonicalDigits(remainder);
}

/**
 * Render a reference's version (as reported by the scene graph) to the same canonical form.
 */
export function renderReferenceVersion(version: string | number): string | null {
  if (typeof version === 'number') {
    return Number.isSafeInteger(version) && version >= 0 ? String(version) : null;
  }
  const trimmed = version.trim();
  return DIGITS.test(trimmed) ? canonicalDigits(trimmed) : null;
}
