/**
 * Approximate size accounting for the context window.
 *
 * Estimates are character based and deliberately cheap. They are good enough
 * to decide when to consolidate and must not be used as a hard token limit.
 * Swap in an exact tokenizer by passing a different SizeEstimator.
 */

export type SizeEstimator = (text: string) => number;

export const DEFAULT_CHARS_PER_TOKEN = 4;

export function charEstimator(charsPerToken = DEFAULT_CHARS_PER_TOKEN): SizeEstimator {
  if (!Number.isFinite(charsPerToken) || charsPerToken <= 0) {
    throw new RangeError(`charsPerToken must be a positive finite number; got ${charsPerToken}`);
  }
  return (text: string) => Math.ceil(text.length / charsPerToken);
}

export const approximateSize: SizeEstimator = charEstimator();
