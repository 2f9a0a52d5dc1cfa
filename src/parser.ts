import * as core from '@actions/core'
import { z } from 'zod'
import {
  REQUEST_VERSIONS,
  RequestVersion,
  sigstoreVerificationV1Variants,
  sigstoreVerificationV2Variants,
  stringPayloadSchema
} from './schemas'
import {
  DecodedVerificationRequest,
  SigstoreVerificationInputV1,
  SigstoreVerificationInputV2
} from './models'
import { MalformedRequestError, UnsupportedVersionError } from './errors'
import { describeFirstIssue, isRecord, payloadToString } from './utils'

function parseJson(payload: string | Uint8Array): unknown {
  let json: string
  try {
    json = payloadToString(payload)
  } catch (error) {
    core.info(
      `UTF-8 decode error: ${error instanceof Error ? error.message : 'Unknown error'}`
    )
    throw new MalformedRequestError('invalid UTF-8 payload')
  }

  // Duplicate keys are not rejected: the last occurrence wins
  try {
    return JSON.parse(json)
  } catch (error) {
    core.info(
      `JSON parse error: ${error instanceof Error ? error.message : 'Unknown error'}`
    )
    core.info(`Input: ${json}`)
    throw new MalformedRequestError('invalid JSON payload')
  }
}

function unknownVariant(
  variant: string,
  expected: readonly string[]
): MalformedRequestError {
  return new MalformedRequestError(
    `unknown variant \`${variant}\`, expected one of ${expected.map(v => `\`${v}\``).join(', ')}`,
    variant
  )
}

function parseFields<T extends z.ZodType>(
  schema: T,
  fields: unknown,
  variant: string
): z.output<T> {
  const result = schema.safeParse(fields)

  if (!result.success) {
    core.info(`Validation errors: ${JSON.stringify(result.error.issues)}`)
    throw new MalformedRequestError(
      `malformed ${variant} request: ${describeFirstIssue(result.error)}`,
      variant
    )
  }

  return result.data
}

/**
 * Splits an externally tagged value, `{"<Variant>": {...fields}}`, into its
 * tag and fields.
 */
function splitExternalTag(value: unknown): [string, unknown] {
  if (typeof value === 'string') {
    // a bare string is how a fieldless variant is tagged; none exist here
    return [value, undefined]
  }
  if (!isRecord(value)) {
    throw new MalformedRequestError(
      'expected an object with a single variant key'
    )
  }

  const keys = Object.keys(value)
  if (keys.length !== 1) {
    throw new MalformedRequestError(
      `expected an object with a single variant key, found ${keys.length} keys`
    )
  }

  return [keys[0], value[keys[0]]]
}

/**
 * Reads the `type` field of an internally tagged value,
 * `{"type": "<Variant>", ...fields}`.
 */
function splitInternalTag(value: unknown): [string, unknown] {
  if (!isRecord(value)) {
    throw new MalformedRequestError('expected an object with a `type` field')
  }

  const tag = value['type']
  if (typeof tag !== 'string') {
    throw new MalformedRequestError('missing or invalid `type` field')
  }

  return [tag, value]
}

/**
 * Decodes a first generation verification request. V1 payloads are
 * externally tagged.
 */
export function parseSigstoreVerificationInputV1(
  payload: string | Uint8Array
): SigstoreVerificationInputV1 {
  const [variant, fields] = splitExternalTag(parseJson(payload))
  const schemas = sigstoreVerificationV1Variants

  switch (variant) {
    case 'SigstorePubKeyVerify':
      return {
        type: 'SigstorePubKeyVerify',
        ...parseFields(schemas.SigstorePubKeyVerify, fields, variant)
      }
    case 'SigstoreKeylessVerify':
      return {
        type: 'SigstoreKeylessVerify',
        ...parseFields(schemas.SigstoreKeylessVerify, fields, variant)
      }
    default:
      throw unknownVariant(variant, Object.keys(schemas))
  }
}

/**
 * Decodes a second generation verification request. V2 payloads are
 * internally tagged with a `type` field.
 */
export function parseSigstoreVerificationInputV2(
  payload: string | Uint8Array
): SigstoreVerificationInputV2 {
  const [variant, fields] = splitInternalTag(parseJson(payload))
  const schemas = sigstoreVerificationV2Variants

  switch (variant) {
    case 'SigstorePubKeyVerify':
      return {
        type: 'SigstorePubKeyVerify',
        ...parseFields(schemas.SigstorePubKeyVerify, fields, variant)
      }
    case 'SigstoreKeylessVerify':
      return {
        type: 'SigstoreKeylessVerify',
        ...parseFields(schemas.SigstoreKeylessVerify, fields, variant)
      }
    case 'SigstoreKeylessPrefixVerify':
      return {
        type: 'SigstoreKeylessPrefixVerify',
        ...parseFields(schemas.SigstoreKeylessPrefixVerify, fields, variant)
      }
    case 'SigstoreGithubActionsVerify':
      return {
        type: 'SigstoreGithubActionsVerify',
        ...parseFields(schemas.SigstoreGithubActionsVerify, fields, variant)
      }
    default:
      throw unknownVariant(variant, Object.keys(schemas))
  }
}

function decodeVersioned(
  version: RequestVersion,
  payload: string | Uint8Array
): DecodedVerificationRequest {
  switch (version) {
    case 'v1':
      return { version, request: parseSigstoreVerificationInputV1(payload) }
    case 'v2':
      return { version, request: parseSigstoreVerificationInputV2(payload) }
  }
}

export function isRequestVersion(version: string): version is RequestVersion {
  return REQUEST_VERSIONS.some(v => v === version)
}

/**
 * Decodes a verification request under the version tag agreed with the
 * guest.
 *
 * @param version - Version tag, e.g. `v2`.
 * @param payload - UTF-8 JSON payload.
 * @param supportedVersions - Versions this host accepts. Defaults to all known versions.
 * @throws UnsupportedVersionError if the tag is unknown or not supported.
 * @throws MalformedRequestError if the payload does not match the version's shape.
 */
export function decodeVerificationRequest(
  version: string,
  payload: string | Uint8Array,
  supportedVersions: readonly RequestVersion[] = REQUEST_VERSIONS
): DecodedVerificationRequest {
  if (!isRequestVersion(version) || !supportedVersions.includes(version)) {
    throw new UnsupportedVersionError(version, supportedVersions)
  }

  const decoded = decodeVersioned(version, payload)
  core.debug(`decoded ${version} ${decoded.request.type} request`)
  return decoded
}

function parseStringPayload(
  payload: string | Uint8Array,
  variant: string
): string {
  return parseFields(stringPayloadSchema, parseJson(payload), variant)
}

/**
 * Decodes the image reference sent with a manifest digest request.
 */
export function parseImage(payload: string | Uint8Array): string {
  return parseStringPayload(payload, 'OciManifestDigest')
}

/**
 * Decodes the hostname sent with a DNS lookup request.
 */
export function parseHost(payload: string | Uint8Array): string {
  return parseStringPayload(payload, 'DNSLookupHost')
}
