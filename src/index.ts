export {
  CallbackHandler,
  dispatchCallbackRequest,
  type CallbackResponse,
  type HostCapabilities
} from './callbacks'
export { getConfig, parseConfig, type Config } from './config'
export {
  fromSigstoreVerificationInputV1,
  fromSigstoreVerificationInputV2,
  toCallbackRequest
} from './convert'
export {
  encodeSigstoreVerificationInputV1,
  encodeSigstoreVerificationInputV2
} from './encoder'
export {
  isCallbackError,
  MalformedRequestError,
  UnknownOperationError,
  UnsupportedVersionError,
  type CallbackError,
  type CallbackErrorKind
} from './errors'
export type * from './models'
export {
  decodeVerificationRequest,
  isRequestVersion,
  parseHost,
  parseImage,
  parseSigstoreVerificationInputV1,
  parseSigstoreVerificationInputV2
} from './parser'
export {
  REQUEST_VERSIONS,
  sigstoreVerificationV1Variants,
  sigstoreVerificationV2Variants,
  type Annotations,
  type KeylessInfo,
  type KeylessPrefixInfo,
  type RequestVersion
} from './schemas'
