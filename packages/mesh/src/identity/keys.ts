import * as ed from '@noble/ed25519';
import { sha512 } from '@noble/hashes/sha2.js';

ed.hashes.sha512 = (...msgs: Uint8Array[]) => sha512(ed.etc.concatBytes(...msgs));

/** Ed25519 keypair an agent signs its envelopes with. */
export interface MeshIdentity {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

export function generateIdentity(): MeshIdentity {
  return identityFromSecretKey(ed.utils.randomSecretKey());
}

export function identityFromSecretKey(secretKey: Uint8Array): MeshIdentity {
  return { publicKey: ed.getPublicKey(secretKey), secretKey };
}

/** Hex public key, the `from` field of every envelope the identity signs. */
export function publicKeyHex(identity: MeshIdentity): string {
  return ed.etc.bytesToHex(identity.publicKey);
}

export function sign(message: Uint8Array, secretKey: Uint8Array): Uint8Array {
  return ed.sign(message, secretKey);
}

/** False for a bad signature and for malformed keys or signatures alike. */
export function verify(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): boolean {
  try {
    return ed.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** Hex-encoded variant of verify, as carried in envelopes. */
export function verifyHex(signatureHex: string, message: Uint8Array, publicKeyHex: string): boolean {
  try {
    return verify(ed.etc.hexToBytes(signatureHex), message, ed.etc.hexToBytes(publicKeyHex));
  } catch {
    return false;
  }
}
