import { describe, it, expect } from 'vitest';
import { SCHNORR_ALG, SchnorrCardSigner, signAgentCard } from '../../src/crypto/AgentCardSigner.js';
import { OTHER_PRIVATE_KEY, TEST_PRIVATE_KEY, testCard } from '../helpers/fixtures.js';

function header(encoded: string): unknown {
  return JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
}

describe('SchnorrCardSigner', () => {
  const signer = new SchnorrCardSigner(TEST_PRIVATE_KEY);

  it('derives a 32-byte x-only public key', () => {
    expect(signer.publicKey).toMatch(/^[0-9a-f]{64}$/);
  });

  it('signs and verifies a card', () => {
    const card = testCard();
    const signature = signer.sign(card);
    expect(header(signature.protected)).toEqual({ alg: SCHNORR_ALG, kid: signer.publicKey });
    expect(signer.verify(card, signature)).toBe(true);
    expect(SchnorrCardSigner.verifyWithKey(card, signature, signer.publicKey)).toBe(true);
  });

  it('uses the configured key id', () => {
    const named = new SchnorrCardSigner(TEST_PRIVATE_KEY, 'card-key-1');
    expect(header(named.sign(testCard()).protected)).toEqual({ alg: SCHNORR_ALG, kid: 'card-key-1' });
  });

  it('is deterministic', () => {
    const card = testCard();
    expect(signer.sign(card)).toEqual(signer.sign(card));
  });

  it('detects a modified card', () => {
    const card = testCard();
    const signature = signer.sign(card);
    expect(signer.verify({ ...card, description: 'Something else' }, signature)).toBe(false);
  });

  it('tolerates default-valued fields added after signing', () => {
    const card = testCard();
    const signature = signer.sign(card);
    expect(signer.verify({ ...card, supportsAuthenticatedExtendedCard: false, security: [] }, signature)).toBe(true);
  });

  it('rejects a signature from another key', () => {
    const card = testCard();
    const other = new SchnorrCardSigner(OTHER_PRIVATE_KEY);
    expect(signer.verify(card, other.sign(card))).toBe(false);
  });

  it('rejects an unknown algorithm and garbage', () => {
    const card = testCard();
    const signature = signer.sign(card);
    const es256 = Buffer.from(JSON.stringify({ alg: 'ES256' })).toString('base64url');
    expect(signer.verify(card, { ...signature, protected: es256 })).toBe(false);
    expect(signer.verify(card, { protected: 'garbage', signature: 'garbage' })).toBe(false);
  });
});

describe('signAgentCard', () => {
  it('adds one signature per signer and replaces old ones', () => {
    const a = new SchnorrCardSigner(TEST_PRIVATE_KEY);
    const b = new SchnorrCardSigner(OTHER_PRIVATE_KEY);
    const card = { ...testCard(), signatures: [{ protected: 'old', signature: 'old' }] };

    const signed = signAgentCard(card, [a, b]);
    expect(signed.signatures).toHaveLength(2);
    const [first, second] = signed.signatures ?? [];
    expect(first && a.verify(signed, first)).toBe(true);
    expect(second && b.verify(signed, second)).toBe(true);
  });

  it('returns an unsigned copy without signers', () => {
    const card = { ...testCard(), signatures: [{ protected: 'old', signature: 'old' }] };
    expect(signAgentCard(card, [])).not.toHaveProperty('signatures');
  });
});
