/**
 * Readers for untrusted scene fields.
 */
import type { Scene } from './types.js';

/** Non-empty strings and finite numbers identify scenes; anything else does not. */
export function asSceneKey(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Props as an ordered, de-duplicated list of strings. Null when the field is not a list. */
export function readProps(scene: Scene): string[] | null {
  const { props } = scene;
  if (!Array.isArray(props)) return null;
  const seen = new Set<string>();
  for (const prop of props) {
    if (typeof prop === 'string') seen.add(prop);
  }
  return [...seen];
}
