import {
  CallbackRequest,
  CallbackRequestType,
  DNSLookupHost,
  OciManifestDigest,
  SigstoreVerificationInputV1,
  SigstoreVerificationInputV2
} from './models'
import {
  sigstoreVerificationV1Variants,
  sigstoreVerificationV2Variants
} from './schemas'

// These resolve at compile time; each constant only type-checks when the
// relation holds.
type IsNever<T> = [T] extends [never] ? true : false
type Equals<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2
    ? true
    : false

describe('request generations', () => {
  it('should keep every V1 variant in V2', () => {
    const v1InV2: SigstoreVerificationInputV1 extends SigstoreVerificationInputV2
      ? true
      : false = true
    expect(v1InV2).toBe(true)
  })

  it('should give every versioned variant a canonical counterpart', () => {
    const v1Canonical: SigstoreVerificationInputV1 extends CallbackRequest
      ? true
      : false = true
    const v2Canonical: SigstoreVerificationInputV2 extends CallbackRequest
      ? true
      : false = true
    expect(v1Canonical).toBe(true)
    expect(v2Canonical).toBe(true)
  })

  it('should have no versioned constructor for DNS lookups', () => {
    const notInV1: IsNever<
      Extract<SigstoreVerificationInputV1, { type: 'DNSLookupHost' }>
    > = true
    const notInV2: IsNever<
      Extract<SigstoreVerificationInputV2, { type: 'DNSLookupHost' }>
    > = true
    const notWrappable: DNSLookupHost extends SigstoreVerificationInputV2
      ? true
      : false = false
    expect([notInV1, notInV2, notWrappable]).toEqual([true, true, false])
  })

  it('should have no versioned constructor for manifest digests', () => {
    const notWrappable: OciManifestDigest extends SigstoreVerificationInputV2
      ? true
      : false = false
    expect(notWrappable).toBe(false)
  })

  it('should match the variant tags to the schema tables', () => {
    const v1Tags: Equals<
      SigstoreVerificationInputV1['type'],
      keyof typeof sigstoreVerificationV1Variants
    > = true
    const v2Tags: Equals<
      SigstoreVerificationInputV2['type'],
      keyof typeof sigstoreVerificationV2Variants
    > = true
    const canonicalTags: Equals<
      CallbackRequestType,
      | SigstoreVerificationInputV2['type']
      | 'OciManifestDigest'
      | 'DNSLookupHost'
    > = true
    expect([v1Tags, v2Tags, canonicalTags]).toEqual([true, true, true])
  })
})

describe('schema tables', () => {
  it('should keep V1 variants in V2 with identical fields', () => {
    for (const [variant, schema] of Object.entries(
      sigstoreVerificationV1Variants
    )) {
      expect(Object.keys(sigstoreVerificationV2Variants)).toContain(variant)
      const v2Schema = Object.entries(sigstoreVerificationV2Variants).find(
        ([name]) => name === variant
      )?.[1]
      expect(Object.keys(v2Schema?.shape ?? {})).toEqual(
        Object.keys(schema.shape)
      )
    }
  })

  it('should only add variants in V2', () => {
    expect(Object.keys(sigstoreVerificationV2Variants)).toEqual([
      'SigstorePubKeyVerify',
      'SigstoreKeylessVerify',
      'SigstoreKeylessPrefixVerify',
      'SigstoreGithubActionsVerify'
    ])
  })
})
