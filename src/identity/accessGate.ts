import { PermissionDeniedError } from '../errors';
import { IdentityVerifier } from './identityVerifier';

/**
 * Wrap `operation` so it only runs once `requiredFingerprint` verifies.
 * Otherwise the returned function rejects with PermissionDeniedError and the
 * operation is never called.
 */
export function gate<A extends unknown[], R>(
  verifier: IdentityVerifier,
  requiredFingerprint: string,
  operation: (...args: A) => R | Promise<R>,
): (...args: A) => Promise<R> {
  return async (...args: A): Promise<R> => {
    const outcome = await verifier.check(requiredFingerprint);
    if (!outcome.valid) {
      console.log(`Gate: denied ${requiredFingerprint}: ${outcome.reason}`);
      throw new PermissionDeniedError(requiredFingerprint, outcome.reason);
    }
    return operation(...args);
  };
}
