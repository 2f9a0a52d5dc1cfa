import { z } from 'zod'

/**
 * Describes the first issue of a failed validation, e.g. `pub_keys: Invalid input`.
 * @param error - The error returned by a failed `safeParse`.
 * @returns A single line naming the offending field and what was wrong with it.
 */
export function describeFirstIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) {
    return 'invalid input'
  }
  const path = issue.path.map(segment => String(segment)).join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Decodes a payload received across the guest/host boundary into text.
 * @param payload - UTF-8 text, either already decoded or as raw bytes.
 * @throws TypeError if the bytes are not valid UTF-8.
 */
export function payloadToString(payload: string | Uint8Array): string {
  return typeof payload === 'string' ? payload : utf8.decode(payload)
}

/**
 * Size of a payload in bytes, as it crossed the boundary.
 */
export function payloadSize(payload: string | Uint8Array): number {
  return typeof payload === 'string'
    ? Buffer.byteLength(payload, 'utf-8')
    : payload.byteLength
}

/**
 * Checks that a decoded JSON value is a plain object rather than an array,
 * a primitive or `null`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
