/**
 * Annotation merging
 */

import type { AnnotationSet } from '../domain/types';

/**
 * Existing entries are kept; incoming values win on key collision.
 * Returns a new object, leaving both inputs untouched.
 */
export function mergeAnnotations(
  existing: AnnotationSet | undefined,
  incoming: AnnotationSet,
): AnnotationSet {
  return { ...(existing ?? {}), ...incoming };
}

/**
 * True when every entry of `expected` is present in `actual` with the same value
 */
export function containsAnnotations(actual: AnnotationSet, expected: AnnotationSet): boolean {
  return Object.entries(expected).every(([key, value]) => actual[key] === value);
}

/**
 * Keys whose value differs between `before` and `after`, including added keys
 */
export function changedAnnotationKeys(before: AnnotationSet, after: AnnotationSet): string[] {
  return Object.keys(after).filter((key) => before[key] !== after[key]);
}
