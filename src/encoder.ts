import { SigstoreVerificationInputV1, SigstoreVerificationInputV2 } from './models'

/**
 * Writes a V1 request the way V1 hosts read it: externally tagged, as an
 * object whose only key is the variant name.
 *
 * @example
 * encodeSigstoreVerificationInputV1({
 *   type: 'SigstorePubKeyVerify',
 *   image: 'registry.testing.lan/busybox:1.0.0',
 *   pub_keys: [pem],
 *   annotations: null
 * })
 * // {"SigstorePubKeyVerify":{"image":"registry.testing.lan/busybox:1.0.0","pub_keys":[...],"annotations":null}}
 */
export function encodeSigstoreVerificationInputV1(
  input: SigstoreVerificationInputV1
): string {
  const { type, ...fields } = input
  return JSON.stringify({ [type]: fields })
}

/**
 * Writes a V2 request the way V2 hosts read it: internally tagged, with the
 * variant name in a leading `type` field.
 */
export function encodeSigstoreVerificationInputV2(
  input: SigstoreVerificationInputV2
): string {
  const { type, ...fields } = input
  return JSON.stringify({ type, ...fields })
}
