import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex } from '@noble/hashes/utils.js';

export interface ProtocolMetadata {
  name: string;
  description: string;
  multiround: boolean;
  /** Header keys other than name, description and multiround. */
  extra: Readonly<Record<string, string>>;
}

/** Content address of a protocol document: lowercase hex SHA-256 of its UTF-8 bytes. */
export function protocolId(document: string): string {
  return bytesToHex(sha256(new TextEncoder().encode(document)));
}

/** A negotiated wire contract. Built only with every field populated, never mutated afterwards. */
export class Protocol {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly multiround: boolean;
  readonly metadata: Readonly<ProtocolMetadata>;

  constructor(
    readonly document: string,
    metadata: ProtocolMetadata,
  ) {
    this.id = protocolId(document);
    this.name = metadata.name;
    this.description = metadata.description;
    this.multiround = metadata.multiround;
    this.metadata = Object.freeze({ ...metadata, extra: Object.freeze({ ...metadata.extra }) });
    Object.freeze(this);
  }

  toJSON(): { id: string; name: string; description: string; multiround: boolean; document: string } {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      multiround: this.multiround,
      document: this.document,
    };
  }
}
