import {
  SigstoreGithubActionsVerifyFields,
  SigstoreKeylessPrefixVerifyFields,
  SigstoreKeylessVerifyFields,
  SigstorePubKeyVerifyFields
} from './schemas'

/**
 * Compute the manifest digest of an OCI object (an image or anything else
 * that can be stored into an OCI registry).
 */
export interface OciManifestDigest {
  type: 'OciManifestDigest'
  image: string
}

/**
 * Verify that the manifest digest of an OCI object is signed by Sigstore,
 * using public keys mode.
 */
export interface SigstorePubKeyVerify extends SigstorePubKeyVerifyFields {
  type: 'SigstorePubKeyVerify'
}

/**
 * Verify the signature of an OCI object using Sigstore keyless mode.
 */
export interface SigstoreKeylessVerify extends SigstoreKeylessVerifyFields {
  type: 'SigstoreKeylessVerify'
}

/**
 * Verify the signature of an OCI object using Sigstore keyless mode, where
 * each subject is matched by URL prefix.
 */
export interface SigstoreKeylessPrefixVerify
  extends SigstoreKeylessPrefixVerifyFields {
  type: 'SigstoreKeylessPrefixVerify'
}

/**
 * Verify the signature of an OCI object using Sigstore keyless mode, signed
 * from a GitHub Actions workflow of `owner` (and optionally `repo`).
 */
export interface SigstoreGithubActionsVerify
  extends SigstoreGithubActionsVerifyFields {
  type: 'SigstoreGithubActionsVerify'
}

/**
 * Lookup the addresses for a given hostname via DNS.
 */
export interface DNSLookupHost {
  type: 'DNSLookupHost'
  host: string
}

/**
 * First generation of verification requests. Frozen: never add or reshape a
 * variant here.
 */
export type SigstoreVerificationInputV1 =
  | SigstorePubKeyVerify
  | SigstoreKeylessVerify

/**
 * Second generation of verification requests. This is the open generation
 * new verification capabilities go into.
 */
export type SigstoreVerificationInputV2 =
  | SigstorePubKeyVerify
  | SigstoreKeylessVerify
  | SigstoreKeylessPrefixVerify
  | SigstoreGithubActionsVerify

/**
 * Every request the host knows how to dispatch. `OciManifestDigest` and
 * `DNSLookupHost` have no versioned wrapper.
 */
export type CallbackRequest =
  | OciManifestDigest
  | SigstorePubKeyVerify
  | SigstoreKeylessVerify
  | SigstoreKeylessPrefixVerify
  | SigstoreGithubActionsVerify
  | DNSLookupHost

export type CallbackRequestType = CallbackRequest['type']

/**
 * A verification request together with the schema generation it was
 * decoded under.
 */
export type DecodedVerificationRequest =
  | { version: 'v1'; request: SigstoreVerificationInputV1 }
  | { version: 'v2'; request: SigstoreVerificationInputV2 }

export interface ManifestDigestResponse {
  digest: string
}

export interface VerificationResponse {
  is_trusted: boolean
  digest: string
}

export interface LookupResponse {
  ips: string[]
}

export type CallbackResponsePayload =
  | ManifestDigestResponse
  | VerificationResponse
  | LookupResponse
