import type { Pattern } from './pattern.js';

/**
 * Whether the pattern matches the empty sequence:
 *
 *   ∅, literal     false
 *   ε, p*          true
 *   pq             nullable(p) && nullable(q)
 *   p|q            nullable(p) || nullable(q)
 *
 * Each node works this out from its children when it is built, so the
 * answer is a field read however deep the pattern is.
 */
export function nullable(pattern: Pattern): boolean {
  return pattern.nullable;
}
