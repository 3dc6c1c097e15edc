import type { Fingerprint, SubclassFingerprint } from "@suitebridge/protocol";

/**
 * Matches module level values that are instances of `RunnableSuite`.
 */
export const RunnableSuiteFingerprint: SubclassFingerprint = Object.freeze({
  type: "subclass",
  isModule: true,
  superclassName: "RunnableSuite",
  requireNoArgConstructor: false,
});

const supported: readonly Fingerprint[] = Object.freeze([
  RunnableSuiteFingerprint,
]);

/**
 * The fingerprints this adapter can run. Always the same array.
 */
export function fingerprints(): readonly Fingerprint[] {
  return supported;
}

export function isSupported(fingerprint: Fingerprint): boolean {
  return supported.includes(fingerprint);
}
