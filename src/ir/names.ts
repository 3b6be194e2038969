/** Naming helpers for derived identifiers (reverse relations, inline types, indexes). */

export function snakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

export function pascalCase(name: string): string {
  return name
    .split(/[_\s-]+/)
    .filter(part => part.length > 0)
    .map(part => part[0].toUpperCase() + part.slice(1))
    .join('');
}

/** Simple English plural of the last word: box → boxes, category → categories, skill → skills. */
export function pluralize(word: string): string {
  if (/(s|x|z|ch|sh)$/i.test(word)) return `${word}es`;
  if (/[^aeiou]y$/i.test(word)) return `${word.slice(0, -1)}ies`;
  return `${word}s`;
}

/** Reverse relation name used when `as` is omitted: PlayerSkill → player_skills. */
export function defaultReverseName(sourceTable: string): string {
  return pluralize(snakeCase(sourceTable));
}

export function indexName(fields: readonly string[]): string {
  return `By${fields.map(pascalCase).join('')}`;
}
