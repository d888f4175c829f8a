/**
 * Escrow Signature Verification
 *
 * Recovers the signer of an EIP-191 personal signature over a 32-byte digest
 * and compares it to the identity the operation expects.
 */

import {
  isAddressEqual,
  recoverMessageAddress,
  zeroAddress,
  type Address,
  type Hex,
} from "viem";

import type { AuthorizationToken } from "./types.js";

/**
 * Capability checking that `token` authorizes `digest` on behalf of
 * `expectedSigner`.
 */
export type AuthorizationVerifier = (
  expectedSigner: Address,
  digest: Hex,
  token: AuthorizationToken
) => Promise<boolean>;

/**
 * Recover the address that signed `digest`, or undefined if the token is not
 * a recoverable signature.
 */
export async function recoverAuthorizer(
  digest: Hex,
  token: AuthorizationToken
): Promise<Address | undefined> {
  try {
    return await recoverMessageAddress({
      message: { raw: digest },
      signature: token,
    });
  } catch {
    return undefined;
  }
}

export const verifyAuthorization: AuthorizationVerifier = async (
  expectedSigner,
  digest,
  token
) => {
  if (isAddressEqual(expectedSigner, zeroAddress)) return false;
  const recovered = await recoverAuthorizer(digest, token);
  if (!recovered) return false;
  return isAddressEqual(recovered, expectedSigner);
};
