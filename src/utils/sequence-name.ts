/**
 * Sequence file naming
 * Siril writes preprocessed lights as <seq>_<token>.fit; merged output is
 * renumbered as <seq>_<index padded to 5 digits>.fit
 */

const INDEX_WIDTH = 5;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Matcher for preprocessed light files of a sequence
 * Anchored at the start only, so "pp_light_0001.fits" matches too
 */
export function createSequenceMatcher(seqName: string): RegExp {
  return new RegExp(`^${escapeRegExp(seqName)}_.*\\.fit`);
}

/**
 * @example
 * sequenceFileName("pp_light", 12) // "pp_light_00012.fit"
 */
export function sequenceFileName(seqName: string, index: number): string {
  return `${seqName}_${String(index).padStart(INDEX_WIDTH, "0")}.fit`;
}
