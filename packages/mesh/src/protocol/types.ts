import type { JsonSchema } from '@pactwire/core';

/** A named service an agent answers requests for. */
export interface ServiceDescriptor {
  name: string;
  description: string;
  /** JSON schema of the request payload; requests are checked against it before the handler runs. */
  payloadSchema?: JsonSchema;
}

export interface RequestContext {
  /** Public key (hex) of the requesting agent. */
  from: string;
  requestId: string;
  /** Aborted when the serving agent stops. */
  signal: AbortSignal;
}

export type ServiceHandler = (payload: unknown, context: RequestContext) => Promise<unknown>;

export interface RequestEnvelope {
  requestId: string;
  from: string;
  to: string;
  service: string;
  payload: unknown;
  timestamp: number;
  signature: string;
}

export interface ResponseEnvelope {
  requestId: string;
  from: string;
  result: unknown;
  timestamp: number;
  signature: string;
}

/** Result a serving agent sends back when it could not run the handler. */
export interface ServiceErrorResult {
  error: string;
}
