export { DEFAULT_REQUEST_TIMEOUT_MS, MeshAgent } from './agent.js';
export type { MeshAgentOptions } from './agent.js';
export type { MeshIdentity } from './identity/keys.js';
export {
  generateIdentity,
  identityFromSecretKey,
  publicKeyHex,
  sign,
  verify,
  verifyHex,
} from './identity/keys.js';
export { canonicalize } from './identity/serialize.js';
export {
  createRequestEnvelope,
  verifyRequestEnvelope,
  createResponseEnvelope,
  verifyResponseEnvelope,
} from './protocol/envelope.js';
export type {
  RequestContext,
  RequestEnvelope,
  ResponseEnvelope,
  ServiceDescriptor,
  ServiceErrorResult,
  ServiceHandler,
} from './protocol/types.js';
export { ServiceRegistry } from './protocol/services.js';
export type { PayloadValidation } from './protocol/validation.js';
export { validatePayload } from './protocol/validation.js';
export type {
  NegotiatePayload,
  NegotiateResult,
  MeshCounterpartyOptions,
  ServeNegotiationOptions,
} from './negotiation.js';
export {
  NEGOTIATE_SERVICE,
  NEGOTIATE_SERVICE_DESCRIPTOR,
  meshCounterparty,
  serveNegotiation,
} from './negotiation.js';
export type { Transport } from './transport/interface.js';
export { LocalNetwork, LocalTransport } from './transport/local.js';
