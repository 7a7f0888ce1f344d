/**
 * Compiled heading patterns used to find the target statement page.
 * Patterns run against lower-cased, whitespace-collapsed page text.
 */
export interface PageHeadingRules {
  readonly standalone: readonly RegExp[];
  readonly generic: readonly RegExp[];
  readonly consolidatedMarker: string;
}
