/**
 * Length as Postgres counts it for `varchar(n)`: code points, so a surrogate
 * pair such as an emoji is one character.
 */
export function charLength(value: string): number {
  return [...value].length
}

/** Refinement for a `varchar(max)` column. */
export function atMostChars(max: number): (value: string) => boolean {
  return (value) => charLength(value) <= max
}
