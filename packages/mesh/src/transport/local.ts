import type { ServiceDescriptor } from '../protocol/types.js';
import type { Transport } from './interface.js';

interface Member {
  transport: LocalTransport;
  services: ServiceDescriptor[];
}

/** In-memory switchboard that LocalTransports join. */
export class LocalNetwork {
  private readonly members = new Map<string, Member>();

  join(transport: LocalTransport): void {
    const existing = this.members.get(transport.peerId);
    if (existing && existing.transport !== transport) {
      throw new Error(`LocalTransport: peer id already in use: ${transport.peerId}`);
    }
    this.members.set(transport.peerId, { transport, services: [] });
  }

  leave(transport: LocalTransport): void {
    if (this.members.get(transport.peerId)?.transport === transport) {
      this.members.delete(transport.peerId);
    }
  }

  member(peerId: string): Member | undefined {
    return this.members.get(peerId);
  }

  discover(service: string): string[] {
    return [...this.members]
      .filter(([, member]) => member.services.some((descriptor) => descriptor.name === service))
      .map(([peerId]) => peerId);
  }
}

const sharedNetwork = new LocalNetwork();

/**
 * In-memory transport: no ports, no networking, instant delivery. Transports created without a
 * network all share one per process.
 */
export class LocalTransport implements Transport {
  readonly peerId: string;
  private messageHandler: ((peerId: string, msg: Uint8Array) => void) | undefined;
  private started = false;

  constructor(
    peerId?: string,
    private readonly network: LocalNetwork = sharedNetwork,
  ) {
    this.peerId = peerId ?? crypto.randomUUID();
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.network.join(this);
    this.started = true;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.network.leave(this);
    this.started = false;
  }

  onMessage(handler: (peerId: string, msg: Uint8Array) => void): void {
    this.messageHandler = handler;
  }

  async send(peerId: string, message: Uint8Array): Promise<void> {
    if (!this.started) {
      throw new Error('LocalTransport: cannot send before start()');
    }
    const member = this.network.member(peerId);
    if (!member) {
      throw new Error(`LocalTransport: peer not found: ${peerId}`);
    }
    member.transport.deliver(this.peerId, message);
  }

  /** Internal: hand a message to this transport's handler. */
  deliver(fromPeerId: string, message: Uint8Array): void {
    this.messageHandler?.(fromPeerId, message);
  }

  async advertise(services: ServiceDescriptor[]): Promise<void> {
    const member = this.network.member(this.peerId);
    if (!this.started || !member) {
      throw new Error('LocalTransport: cannot advertise before start()');
    }
    member.services = [...services];
  }

  async discover(service: string): Promise<string[]> {
    return this.network.discover(service);
  }
}
