import {
  CallbackRequest,
  DecodedVerificationRequest,
  SigstoreVerificationInputV1,
  SigstoreVerificationInputV2
} from './models'

// Every arm copies its fields as they are. The switches have no default arm:
// a variant left unmapped fails to compile instead of failing at call time.

export function fromSigstoreVerificationInputV1(
  input: SigstoreVerificationInputV1
): CallbackRequest {
  switch (input.type) {
    case 'SigstorePubKeyVerify':
      return {
        type: 'SigstorePubKeyVerify',
        image: input.image,
        pub_keys: input.pub_keys,
        annotations: input.annotations
      }
    case 'SigstoreKeylessVerify':
      return {
        type: 'SigstoreKeylessVerify',
        image: input.image,
        keyless: input.keyless,
        annotations: input.annotations
      }
  }
}

export function fromSigstoreVerificationInputV2(
  input: SigstoreVerificationInputV2
): CallbackRequest {
  switch (input.type) {
    case 'SigstorePubKeyVerify':
      return {
        type: 'SigstorePubKeyVerify',
        image: input.image,
        pub_keys: input.pub_keys,
        annotations: input.annotations
      }
    case 'SigstoreKeylessVerify':
      return {
        type: 'SigstoreKeylessVerify',
        image: input.image,
        keyless: input.keyless,
        annotations: input.annotations
      }
    case 'SigstoreKeylessPrefixVerify':
      return {
        type: 'SigstoreKeylessPrefixVerify',
        image: input.image,
        keyless_prefix: input.keyless_prefix,
        annotations: input.annotations
      }
    case 'SigstoreGithubActionsVerify':
      return {
        type: 'SigstoreGithubActionsVerify',
        image: input.image,
        owner: input.owner,
        repo: input.repo,
        annotations: input.annotations
      }
  }
}

/**
 * Converts a decoded verification request with the converter of the
 * generation it was decoded under.
 */
export function toCallbackRequest(
  decoded: DecodedVerificationRequest
): CallbackRequest {
  switch (decoded.version) {
    case 'v1':
      return fromSigstoreVerificationInputV1(decoded.request)
    case 'v2':
      return fromSigstoreVerificationInputV2(decoded.request)
  }
}
