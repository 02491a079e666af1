import type { ServiceDescriptor } from '../protocol/types.js';

/**
 * Message passing and discovery between agents. MeshAgent works the same over any
 * implementation; LocalTransport keeps everything in process.
 */
export interface Transport {
  start(): Promise<void>;

  stop(): Promise<void>;

  /** Send raw bytes to a peer by peerId. */
  send(peerId: string, message: Uint8Array): Promise<void>;

  /** Register handler for incoming messages. Called with (sender peerId, raw message bytes). */
  onMessage(handler: (peerId: string, msg: Uint8Array) => void): void;

  /** Announce the services this peer answers. Replaces any earlier announcement. */
  advertise(services: ServiceDescriptor[]): Promise<void>;

  /** PeerIds that advertise the named service. */
  discover(service: string): Promise<string[]>;

  readonly peerId: string;
}
