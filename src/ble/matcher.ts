/** Advertised names of rings that speak this protocol. Matched from the start of the name. */
export const RING_NAME_PATTERNS: readonly RegExp[] = [
  /^R0[1-7]_[A-Z0-9]+/,
  /^R10_[A-Z0-9]+/,
  /^VK-5098/,
  /^MERLIN/,
  /^Hello Ring/,
  /^RING1/,
  /^boAtring/,
  /^TR-R02/,
  /^SE/,
  /^EVOLVEO/,
  /^GL-SR2/,
  /^Blaupunkt/,
  /^KSIX RING/,
];

/** Compile user-supplied patterns, anchored at the start like the built-in ones. */
export function compileNamePatterns(sources: readonly string[]): RegExp[] {
  return sources.map((src) => new RegExp(src.startsWith('^') ? src : `^${src}`));
}

export function isRingName(
  name: string | undefined | null,
  patterns: readonly RegExp[] = RING_NAME_PATTERNS,
): boolean {
  if (!name) return false;
  return patterns.some((p) => p.test(name));
}
