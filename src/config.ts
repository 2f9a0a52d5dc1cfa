import * as core from '@actions/core'
import { configSchema, RequestVersion } from './schemas'
import { describeFirstIssue } from './utils'

export interface Config {
  // Request generations this host build accepts
  supportedVersions: RequestVersion[]
  // Largest payload, in bytes, a guest may send
  maxPayloadSize: number
}

/**
 * Validates a raw configuration object, filling in defaults.
 */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw)

  if (!result.success) {
    core.info(`Validation errors: ${JSON.stringify(result.error.issues)}`)
    throw new Error(`Invalid configuration: ${describeFirstIssue(result.error)}`)
  }

  return result.data
}

/**
 * Reads the host configuration from its inputs.
 *
 * - `supported-versions`: comma separated version tags, e.g. `v1,v2`
 * - `max-payload-size`: maximum payload size in bytes
 */
export function getConfig(): Config {
  const versions = core.getInput('supported-versions')
  const maxPayloadSize = core.getInput('max-payload-size')

  return parseConfig({
    supportedVersions: versions
      ? versions
          .split(',')
          .map(v => v.trim())
          .filter(v => v.length > 0)
      : undefined,
    maxPayloadSize: maxPayloadSize ? Number(maxPayloadSize) : undefined
  })
}
