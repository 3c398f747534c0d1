export {
  HEADER_SIG,
  HEADER_SIG_INPUT,
  HEADER_SIG_VERSION,
  SIG_VERSION_V1,
  DOMAIN_REQUEST_V1,
  DOMAIN_RESPONSE_V1,
  DEFAULT_SIGNED_HTTP_POLICY,
  bodyBytes,
  decodeSignatureHeaders,
  encodeSignatureHeaders,
  messageToSign,
  parseHex32,
  signWithDomain,
  signatureHeaderPairs,
  validateTimeWindow,
  verifyWithDomain,
  type BodyInput,
  type DecodedSignature,
  type EncodedSignatureHeaders,
  type HttpRequestMeta,
  type SignatureHeaderValues,
  type SignedHttpPolicy,
  type SignedResponse,
} from './wire.js';
export {
  encodeRequestClaims,
  encodeResponseClaims,
  parseRequestClaims,
  parseResponseClaims,
  type InvokeRequestClaims,
  type InvokeResponseClaims,
} from './claims.js';
export { headersFromGetter, headersFromRecord, toHeaderRecord, type HeaderRecord } from './headers.js';
export { KeyTable, StaticResponderKey, type InvokerKeyResolver, type ResponderKeyResolver } from './keys.js';
export { AllowedLeaders, loadAllowedLeaders, parseAllowedLeaders } from './allowed-leaders.js';
export { InMemoryReplayStore, type ReplayDecision, type ReplayStore } from './replay-store.js';
export {
  SignedHttpEngineV1,
  systemClock,
  type Clock,
  type SignedHttpContext,
  type SignedHttpEngineOptions,
} from './engine.js';
export { OutboundSession, SignedHttpInvoker, type VerifiedOutboundResponse } from './invoker.js';
export {
  AuthenticatedRequest,
  InboundSession,
  ResponderRejection,
  SignedHttpResponder,
  withInboundSession,
  type AuthContext,
  type ResponderDecision,
  type ResponderRejectionKind,
} from './responder.js';
