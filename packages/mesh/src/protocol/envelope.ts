import * as ed from '@noble/ed25519';
import { type MeshIdentity, publicKeyHex, sign, verifyHex } from '../identity/keys.js';
import { canonicalize } from '../identity/serialize.js';
import type { RequestEnvelope, ResponseEnvelope } from './types.js';

const { bytesToHex } = ed.etc;

function signHex(identity: MeshIdentity, unsigned: unknown): string {
  return bytesToHex(sign(canonicalize(unsigned), identity.secretKey));
}

export function createRequestEnvelope(
  identity: MeshIdentity,
  to: string,
  service: string,
  payload: unknown,
): RequestEnvelope {
  const unsigned = {
    requestId: crypto.randomUUID(),
    from: publicKeyHex(identity),
    to,
    service,
    payload,
    timestamp: Date.now(),
  };
  return { ...unsigned, signature: signHex(identity, unsigned) };
}

export function verifyRequestEnvelope(envelope: RequestEnvelope): boolean {
  const { signature, ...unsigned } = envelope;
  return verifyHex(signature, canonicalize(unsigned), envelope.from);
}

export function createResponseEnvelope(
  identity: MeshIdentity,
  requestId: string,
  result: unknown,
): ResponseEnvelope {
  const unsigned = {
    requestId,
    from: publicKeyHex(identity),
    result,
    timestamp: Date.now(),
  };
  return { ...unsigned, signature: signHex(identity, unsigned) };
}

export function verifyResponseEnvelope(response: ResponseEnvelope): boolean {
  const { signature, ...unsigned } = response;
  return verifyHex(signature, canonicalize(unsigned), response.from);
}
