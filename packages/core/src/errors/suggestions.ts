/**
 * Suggestion helpers
 * Pure functions that turn a misspelt key into hints for the error message.
 */

/**
 * Simple edit-distance-like function. Not full Levenshtein: we approximate
 * distance by counting positional char differences plus the absolute length
 * delta. Good enough for small typos in parameter names.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (longer.length === 0) return shorter.length;
  if (shorter.length === 0) return longer.length;

  let distance = Math.abs(a.length - b.length);
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Return up to 3 close matches for a misspelt name. Route names compare
 * case-insensitively, so casing never counts towards the distance.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 2
): string[] {
  const normalized = input.toLowerCase();
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(normalized, option.toLowerCase()),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}

/**
 * Suggestions attached to an unsatisfied required value.
 */
export function suggestRequiredValueFix(
  key: string,
  parameterNames: readonly string[],
  defaultKeys: readonly string[]
): string[] {
  const folded = key.toLowerCase();
  const candidates = Array.from(
    new Set([...parameterNames, ...defaultKeys])
  ).filter((name) => name.toLowerCase() !== folded);
  const close = didYouMean(key, candidates);
  const suggestions = close.map((name) => `Did you mean '${name}'?`);
  suggestions.push(
    `Add a '{${key}}' parameter to the template, or a default '${key}' equal to the required value.`
  );
  return suggestions;
}
