import * as core from '@actions/core'
import { Config } from './config'
import { toCallbackRequest } from './convert'
import {
  CallbackErrorKind,
  isCallbackError,
  MalformedRequestError,
  UnknownOperationError
} from './errors'
import {
  CallbackRequest,
  CallbackResponsePayload,
  LookupResponse,
  ManifestDigestResponse,
  SigstoreGithubActionsVerify,
  SigstoreKeylessPrefixVerify,
  SigstoreKeylessVerify,
  SigstorePubKeyVerify,
  VerificationResponse
} from './models'
import { decodeVerificationRequest, parseHost, parseImage } from './parser'
import { payloadSize } from './utils'

/**
 * The capabilities a host provides to its guests. Implementations talk to
 * OCI registries, Sigstore and DNS.
 */
export interface HostCapabilities {
  ociManifestDigest(image: string): Promise<ManifestDigestResponse>
  verifyPubKeys(request: SigstorePubKeyVerify): Promise<VerificationResponse>
  verifyKeyless(request: SigstoreKeylessVerify): Promise<VerificationResponse>
  verifyKeylessPrefix(
    request: SigstoreKeylessPrefixVerify
  ): Promise<VerificationResponse>
  verifyGithubActions(
    request: SigstoreGithubActionsVerify
  ): Promise<VerificationResponse>
  dnsLookupHost(host: string): Promise<LookupResponse>
}

export type CallbackResponse =
  | { success: true; payload: string }
  | { success: false; error: { kind: CallbackErrorKind; message: string } }

const VERIFY_OPERATION = /^(v\d+)\/verify$/

/**
 * Calls the capability matching the request's variant.
 */
export async function dispatchCallbackRequest(
  request: CallbackRequest,
  capabilities: HostCapabilities
): Promise<CallbackResponsePayload> {
  switch (request.type) {
    case 'OciManifestDigest':
      return capabilities.ociManifestDigest(request.image)
    case 'SigstorePubKeyVerify':
      return capabilities.verifyPubKeys(request)
    case 'SigstoreKeylessVerify':
      return capabilities.verifyKeyless(request)
    case 'SigstoreKeylessPrefixVerify':
      return capabilities.verifyKeylessPrefix(request)
    case 'SigstoreGithubActionsVerify':
      return capabilities.verifyGithubActions(request)
    case 'DNSLookupHost':
      return capabilities.dnsLookupHost(request.host)
  }
}

/**
 * Entry point for guest callbacks: decodes the payload of an operation,
 * converts it to a `CallbackRequest` and dispatches it.
 */
export class CallbackHandler {
  constructor(
    private readonly config: Config,
    private readonly capabilities: HostCapabilities
  ) {}

  /**
   * Decodes the payload sent to `namespace`/`operation` into a canonical
   * request.
   * @throws UnsupportedVersionError, MalformedRequestError or UnknownOperationError
   */
  decode(
    namespace: string,
    operation: string,
    payload: string | Uint8Array
  ): CallbackRequest {
    const size = payloadSize(payload)
    if (size > this.config.maxPayloadSize) {
      throw new MalformedRequestError(
        `payload too large: ${size} bytes (max ${this.config.maxPayloadSize})`
      )
    }

    if (namespace === 'oci') {
      const verify = VERIFY_OPERATION.exec(operation)
      if (verify) {
        return toCallbackRequest(
          decodeVerificationRequest(
            verify[1],
            payload,
            this.config.supportedVersions
          )
        )
      }
      if (operation === 'v1/manifest_digest') {
        return { type: 'OciManifestDigest', image: parseImage(payload) }
      }
    }

    if (namespace === 'net' && operation === 'v1/dns_lookup_host') {
      return { type: 'DNSLookupHost', host: parseHost(payload) }
    }

    throw new UnknownOperationError(namespace, operation)
  }

  /**
   * Handles a single guest callback. Never rejects: every failure is
   * reported in the returned response.
   */
  async handle(
    namespace: string,
    operation: string,
    payload: string | Uint8Array
  ): Promise<CallbackResponse> {
    const route = `${namespace}/${operation}`

    let request: CallbackRequest
    try {
      request = this.decode(namespace, operation, payload)
    } catch (error) {
      return this.failure(route, error)
    }

    core.debug(`[${route}] dispatching ${request.type}`)
    try {
      const response = await dispatchCallbackRequest(request, this.capabilities)
      return { success: true, payload: JSON.stringify(response) }
    } catch (error) {
      return this.failure(route, error)
    }
  }

  private failure(route: string, error: unknown): CallbackResponse {
    const kind: CallbackErrorKind = isCallbackError(error)
      ? error.kind
      : 'CapabilityFailure'
    const message = error instanceof Error ? error.message : String(error)

    core.warning(`[${route}] ${kind}: ${message}`)
    return { success: false, error: { kind, message } }
  }
}
