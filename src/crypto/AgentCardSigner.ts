import { schnorr } from '@noble/curves/secp256k1.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';
import { Canonicalizer } from './Canonicalizer.js';
import type { AgentCard, AgentCardSignature } from '../types/agent-card.js';

/** Signing service for agent cards. The server only calls through this interface. */
export interface AgentCardSigner {
  sign(card: AgentCard): AgentCardSignature;
  verify(card: AgentCard, signature: AgentCardSignature): boolean;
}

export interface SignatureHeader {
  alg: string;
  kid?: string;
}

export const SCHNORR_ALG = 'BIP340';

function toBase64Url(bytes: Uint8Array | string): string {
  return Buffer.from(bytes).toString('base64url');
}

function parseHeader(encoded: string): SignatureHeader | undefined {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
    if (typeof parsed !== 'object' || parsed === null || !('alg' in parsed)) return undefined;
    const alg = parsed.alg;
    if (typeof alg !== 'string') return undefined;
    const kid = 'kid' in parsed && typeof parsed.kid === 'string' ? parsed.kid : undefined;
    return kid === undefined ? { alg } : { alg, kid };
  } catch {
    return undefined;
  }
}

/**
 * Detached BIP-340 schnorr signatures over the canonical card.
 * Signing input is `protected + "." + base64url(canonical card)`, hashed with SHA-256.
 */
export class SchnorrCardSigner implements AgentCardSigner {
  private readonly privateKey: Uint8Array;
  readonly publicKey: string;

  constructor(
    privateKeyHex: string,
    private readonly keyId?: string,
  ) {
    this.privateKey = hexToBytes(privateKeyHex);
    this.publicKey = bytesToHex(schnorr.getPublicKey(this.privateKey));
  }

  static signingHash(card: AgentCard, protectedHeader: string): Uint8Array {
    const payload = toBase64Url(Canonicalizer.agentCard(card));
    return sha256(new TextEncoder().encode(`${protectedHeader}.${payload}`));
  }

  sign(card: AgentCard): AgentCardSignature {
    const header: SignatureHeader = { alg: SCHNORR_ALG, kid: this.keyId ?? this.publicKey };
    const protectedHeader = toBase64Url(JSON.stringify(header));
    const hash = SchnorrCardSigner.signingHash(card, protectedHeader);
    // Zero aux randomness keeps signatures deterministic.
    const sig = schnorr.sign(hash, this.privateKey, new Uint8Array(32));
    return { protected: protectedHeader, signature: toBase64Url(sig) };
  }

  verify(card: AgentCard, signature: AgentCardSignature): boolean {
    return SchnorrCardSigner.verifyWithKey(card, signature, this.publicKey);
  }

  /** Verify against an x-only public key (64 hex chars). */
  static verifyWithKey(card: AgentCard, signature: AgentCardSignature, publicKeyHex: string): boolean {
    const header = parseHeader(signature.protected);
    if (!header || header.alg !== SCHNORR_ALG) return false;
    try {
      const hash = SchnorrCardSigner.signingHash(card, signature.protected);
      return schnorr.verify(Buffer.from(signature.signature, 'base64url'), hash, hexToBytes(publicKeyHex));
    } catch {
      return false;
    }
  }
}

/** Return a copy of the card carrying one signature from each signer. */
export function signAgentCard(card: AgentCard, signers: AgentCardSigner[]): AgentCard {
  const { signatures: _signatures, ...unsigned } = card;
  if (signers.length === 0) return { ...unsigned };
  return { ...unsigned, signatures: signers.map((signer) => signer.sign(unsigned)) };
}
