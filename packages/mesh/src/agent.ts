import { z } from 'zod';
import {
  type CallOptions,
  type Logger,
  errorMessage,
  runWithDeadline,
  silentLogger,
} from '@pactwire/core';
import { type MeshIdentity, generateIdentity } from './identity/keys.js';
import { canonicalize } from './identity/serialize.js';
import {
  createRequestEnvelope,
  createResponseEnvelope,
  verifyRequestEnvelope,
  verifyResponseEnvelope,
} from './protocol/envelope.js';
import { ServiceRegistry } from './protocol/services.js';
import type {
  RequestEnvelope,
  ResponseEnvelope,
  ServiceDescriptor,
  ServiceErrorResult,
  ServiceHandler,
} from './protocol/types.js';
import { validatePayload } from './protocol/validation.js';
import type { Transport } from './transport/interface.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

interface PendingRequest {
  resolve: (response: ResponseEnvelope) => void;
  reject: (error: Error) => void;
}

/** Wire messages exchanged over a transport. */
type WireMessage =
  | { type: 'request'; envelope: RequestEnvelope }
  | { type: 'response'; envelope: ResponseEnvelope };

const wireMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('request'),
    envelope: z.object({
      requestId: z.string(),
      from: z.string(),
      to: z.string(),
      service: z.string(),
      payload: z.unknown(),
      timestamp: z.number(),
      signature: z.string(),
    }),
  }),
  z.object({
    type: z.literal('response'),
    envelope: z.object({
      requestId: z.string(),
      from: z.string(),
      result: z.unknown(),
      timestamp: z.number(),
      signature: z.string(),
    }),
  }),
]);

export interface MeshAgentOptions {
  /** Use this identity instead of generating a new one. */
  identity?: MeshIdentity;
  /** Deadline for requests that pass none. Default 30_000. */
  requestTimeoutMs?: number;
  logger?: Logger;
}

/** Signs, sends and answers service requests over a Transport. */
export class MeshAgent {
  readonly identity: MeshIdentity;
  readonly services = new ServiceRegistry();
  private readonly pending = new Map<string, PendingRequest>();
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private lifetime = new AbortController();
  private started = false;

  constructor(
    private readonly transport: Transport,
    options: MeshAgentOptions = {},
  ) {
    this.identity = options.identity ?? generateIdentity();
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  get peerId(): string {
    return this.transport.peerId;
  }

  register(descriptor: ServiceDescriptor, handler: ServiceHandler): void {
    this.services.register(descriptor, handler);
    if (this.started) {
      this.transport.advertise(this.services.list()).catch((error: unknown) => {
        this.logger.warn(`Could not advertise ${descriptor.name}: ${errorMessage(error)}`);
      });
    }
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.lifetime = new AbortController();
    this.transport.onMessage((peerId, msg) => this.handleMessage(peerId, msg));
    await this.transport.start();
    await this.transport.advertise(this.services.list());
    this.started = true;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.lifetime.abort();
    await this.transport.stop();
    for (const [requestId, pending] of this.pending) {
      pending.reject(new Error('Agent stopped'));
      this.pending.delete(requestId);
    }
  }

  /** Resolves with the signed response; the result may be a ServiceErrorResult. */
  async request(
    peerId: string,
    service: string,
    payload: unknown,
    options: CallOptions = {},
  ): Promise<ResponseEnvelope> {
    if (!this.started) {
      throw new Error('MeshAgent: start() before sending requests');
    }
    const envelope = createRequestEnvelope(this.identity, peerId, service, payload);
    const wireMsg: WireMessage = { type: 'request', envelope };
    const bytes = canonicalize(wireMsg);

    return await runWithDeadline(
      `request ${service}`,
      (signal) =>
        new Promise<ResponseEnvelope>((resolve, reject) => {
          this.pending.set(envelope.requestId, { resolve, reject });
          signal.addEventListener('abort', () => this.pending.delete(envelope.requestId), {
            once: true,
          });
          this.transport.send(peerId, bytes).catch((error: unknown) => {
            this.pending.delete(envelope.requestId);
            reject(error instanceof Error ? error : new Error(String(error)));
          });
        }),
      { signal: options.signal, timeoutMs: options.timeoutMs ?? this.requestTimeoutMs },
    );
  }

  async discover(service: string): Promise<string[]> {
    return this.transport.discover(service);
  }

  private handleMessage(peerId: string, msg: Uint8Array): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder().decode(msg));
    } catch {
      this.logger.debug(`Dropping malformed message from ${peerId}`);
      return;
    }

    const wire = wireMessageSchema.safeParse(parsed);
    if (!wire.success) {
      this.logger.debug(`Dropping unrecognised message from ${peerId}`);
      return;
    }

    const message = wire.data;
    switch (message.type) {
      case 'request': {
        const { payload, ...rest } = message.envelope;
        this.handleRequest(peerId, { ...rest, payload }).catch((error: unknown) => {
          this.logger.warn(`Could not answer ${peerId}: ${errorMessage(error)}`);
        });
        break;
      }
      case 'response': {
        const { result, ...rest } = message.envelope;
        this.handleResponse({ ...rest, result });
        break;
      }
    }
  }

  private async handleRequest(peerId: string, envelope: RequestEnvelope): Promise<void> {
    const result = await this.serve(envelope);
    const response = createResponseEnvelope(this.identity, envelope.requestId, result);
    const wireMsg: WireMessage = { type: 'response', envelope: response };
    await this.transport.send(peerId, canonicalize(wireMsg));
  }

  private async serve(envelope: RequestEnvelope): Promise<unknown> {
    if (!verifyRequestEnvelope(envelope)) {
      return failure('invalid signature');
    }
    if (envelope.to !== this.peerId) {
      return failure(`request addressed to ${envelope.to}`);
    }
    const entry = this.services.get(envelope.service);
    if (!entry) {
      return failure(`unknown service: ${envelope.service}`);
    }
    const validation = validatePayload(entry.descriptor, envelope.payload);
    if (!validation.valid) {
      return failure(validation.error);
    }

    try {
      return await entry.handler(envelope.payload, {
        from: envelope.from,
        requestId: envelope.requestId,
        signal: this.lifetime.signal,
      });
    } catch (error) {
      this.logger.warn(`Service ${envelope.service} failed: ${errorMessage(error)}`);
      return failure(errorMessage(error));
    }
  }

  private handleResponse(response: ResponseEnvelope): void {
    const pending = this.pending.get(response.requestId);
    if (!pending) {
      return;
    }
    this.pending.delete(response.requestId);

    if (!verifyResponseEnvelope(response)) {
      pending.reject(new Error('Invalid response signature'));
      return;
    }
    pending.resolve(response);
  }
}

function failure(error: string): ServiceErrorResult {
  return { error };
}
