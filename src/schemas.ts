/**
 * Zod schemas for validating the payloads a guest sends to its host.
 *
 * Variant schemas only describe the fields of a request. The variant tag is
 * handled by the parser, since V1 and V2 carry it differently.
 */

import { z } from 'zod'
import { isRecord } from './utils'

export const REQUEST_VERSIONS = ['v1', 'v2'] as const

/**
 * Annotations that must have been provided by all signers. A missing field
 * decodes to `null`, which is not the same constraint as an empty map.
 *
 * `__proto__` cannot be kept as a plain object key, so it is rejected
 * before the record is copied.
 */
export const annotationsSchema = z
  .custom<unknown>(
    value => !(isRecord(value) && Object.hasOwn(value, '__proto__')),
    'Reserved annotation key `__proto__`'
  )
  .pipe(z.record(z.string(), z.string()))
  .nullable()
  .default(null)

/**
 * A keyless signature that must be found, matched exactly on subject.
 */
export const keylessInfoSchema = z.object({
  issuer: z.string(),
  subject: z.string()
})

/**
 * A keyless signature where `url_prefix` is a URL prefix of the subject.
 */
export const keylessPrefixInfoSchema = z.object({
  issuer: z.string(),
  url_prefix: z.string()
})

// `image` points to the object, e.g. `registry.testing.lan/busybox:1.0.0`

export const sigstorePubKeyVerifySchema = z.object({
  image: z.string(),
  pub_keys: z.array(z.string()),
  annotations: annotationsSchema
})

export const sigstoreKeylessVerifySchema = z.object({
  image: z.string(),
  keyless: z.array(keylessInfoSchema),
  annotations: annotationsSchema
})

export const sigstoreKeylessPrefixVerifySchema = z.object({
  image: z.string(),
  keyless_prefix: z.array(keylessPrefixInfoSchema),
  annotations: annotationsSchema
})

export const sigstoreGithubActionsVerifySchema = z.object({
  image: z.string(),
  owner: z.string(),
  repo: z.string().nullable().default(null),
  annotations: annotationsSchema
})

/**
 * Variants understood by the first schema generation. Frozen.
 */
export const sigstoreVerificationV1Variants = {
  SigstorePubKeyVerify: sigstorePubKeyVerifySchema,
  SigstoreKeylessVerify: sigstoreKeylessVerifySchema
} as const

/**
 * Variants understood by the second schema generation: everything from V1
 * plus the prefix and GitHub Actions modes.
 */
export const sigstoreVerificationV2Variants = {
  ...sigstoreVerificationV1Variants,
  SigstoreKeylessPrefixVerify: sigstoreKeylessPrefixVerifySchema,
  SigstoreGithubActionsVerify: sigstoreGithubActionsVerifySchema
} as const

/**
 * Payload of the manifest digest and DNS lookup operations: a bare string.
 */
export const stringPayloadSchema = z.string()

export const configSchema = z.object({
  supportedVersions: z
    .array(z.enum(REQUEST_VERSIONS))
    .min(1, 'At least one request version must be supported')
    .default([...REQUEST_VERSIONS]),
  maxPayloadSize: z
    .number()
    .int()
    .positive()
    .default(16 * 1024 * 1024)
})

// Types inferred from schemas ensure runtime validation and static types stay in sync
export type RequestVersion = (typeof REQUEST_VERSIONS)[number]
export type Annotations = Record<string, string>
export type KeylessInfo = z.infer<typeof keylessInfoSchema>
export type KeylessPrefixInfo = z.infer<typeof keylessPrefixInfoSchema>
export type SigstorePubKeyVerifyFields = z.infer<
  typeof sigstorePubKeyVerifySchema
>
export type SigstoreKeylessVerifyFields = z.infer<
  typeof sigstoreKeylessVerifySchema
>
export type SigstoreKeylessPrefixVerifyFields = z.infer<
  typeof sigstoreKeylessPrefixVerifySchema
>
export type SigstoreGithubActionsVerifyFields = z.infer<
  typeof sigstoreGithubActionsVerifySchema
>
