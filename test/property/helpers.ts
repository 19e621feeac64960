import * as fc from "fast-check";
import type { Credential, CredentialStatus } from "../../lib/types.js";

export const arbRatio = fc.oneof(
  fc.constant(undefined),
  fc.constant(-1),
  fc.double({ min: 0, max: 1, noNaN: true }),
);

export const arbStatus: fc.Arbitrary<CredentialStatus> = fc.constantFrom("active", "low-quota", "invalid");

export const arbToken = fc.stringMatching(/^[A-Za-z0-9_-]{1,12}$/);

export const arbCredential: fc.Arbitrary<Credential> = fc
  .record({
    id: fc.integer({ min: 1, max: 50 }).map(String),
    accessToken: arbToken,
    refreshToken: arbToken,
    status: arbStatus,
    lastKnownRatio: arbRatio,
  })
  .map(({ lastKnownRatio, ...rest }) => (lastKnownRatio === undefined ? rest : { ...rest, lastKnownRatio }));

/**
 * Pools with distinct ids and distinct refresh tokens, as the store keeps them.
 */
export const arbPool = fc.uniqueArray(arbCredential, {
  maxLength: 8,
  selector: (credential) => credential.id,
}).map((pool) => {
  const seen = new Set<string>();
  return pool.filter((credential) => {
    if (seen.has(credential.refreshToken)) return false;
    seen.add(credential.refreshToken);
    return true;
  });
});

export const arbWarnThreshold = fc.double({ min: 0.05, max: 1, noNaN: true });
