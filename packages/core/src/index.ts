export {
  UnsupportedParameterTypeError,
  InvalidSchemaError,
  ImplementationNotFoundError,
  CallTimeoutError,
  CallAbortedError,
  ConversationBusyError,
  BackendRequestError,
  errorMessage,
} from './errors.js';
export type { Logger } from './logger.js';
export { consoleLogger, silentLogger } from './logger.js';
export type { CallOptions } from './timeout.js';
export { runWithDeadline } from './timeout.js';
export type {
  DeclarationProperty,
  JsonSchema,
  OpenAiProperty,
  ParameterKind,
  StandardApiParameter,
} from './schema/parameters.js';
export {
  Parameter,
  StringParameter,
  EnumParameter,
  NumberParameter,
  ArrayParameter,
  parameterFromStandardApi,
  parameterFromJsonSchema,
} from './schema/parameters.js';
export type {
  FlatToolSchema,
  FunctionDeclaration,
  OpenAiTool,
  StandardApiTool,
  ToolArguments,
  ToolFunction,
  ToolResult,
} from './schema/tool.js';
export { Tool, ToolSet, formatToolResult, toolFromStandardApi } from './schema/tool.js';
export type { TaskSchemaData } from './schema/task-schema.js';
export { TaskSchema } from './schema/task-schema.js';
export type { ProtocolMetadata } from './protocol.js';
export { Protocol, protocolId } from './protocol.js';
export type { ExtractionFailure, ProtocolExtraction, TagExtraction } from './extraction.js';
export {
  DEFAULT_PROTOCOL_NAME,
  FINAL_PROTOCOL_TAG,
  IMPLEMENTATION_TAG,
  extractTagged,
  extractProtocol,
  extractImplementation,
  parseProtocolMetadata,
  stripCodeFences,
} from './extraction.js';
export type {
  Conversation,
  ConversationCategory,
  ConversationSpec,
  Toolformer,
} from './backend/types.js';
export { SequentialConversation } from './backend/types.js';
export type { HttpToolformerOptions } from './backend/openai.js';
export { OpenAiToolformer } from './backend/openai.js';
export { GeminiToolformer } from './backend/gemini.js';
export type { CheckOptions, ProtocolCheckerOptions } from './checker.js';
export { ProtocolChecker, buildCheckerMessage, isAffirmativeVerdict } from './checker.js';
export type {
  Counterparty,
  CounterpartyReply,
  NegotiateOptions,
  NegotiationOutcome,
  NegotiationRound,
  NegotiationState,
  ProtocolNegotiatorOptions,
} from './negotiator.js';
export {
  DEFAULT_MAX_ROUNDS,
  OPENING_MESSAGE,
  ProtocolNegotiator,
  buildNegotiatorPrompt,
} from './negotiator.js';
export type { ReceiverNegotiatorOptions } from './receiver-negotiator.js';
export { ReceiverNegotiator, buildReceiverPrompt } from './receiver-negotiator.js';
export type { AdapterProgrammerOptions, EntryPointBinding } from './programmer.js';
export {
  AdapterProgrammer,
  CANONICAL_ENTRY_POINT,
  DEFAULT_MAX_ATTEMPTS,
  MISSING_IMPLEMENTATION_NUDGE,
  SOLICITED_ENTRY_POINT,
  bindEntryPoint,
} from './programmer.js';
