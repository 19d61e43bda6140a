export { Canonicalizer } from './Canonicalizer.js';
export { SchnorrCardSigner, SCHNORR_ALG, signAgentCard } from './AgentCardSigner.js';
export type { AgentCardSigner, SignatureHeader } from './AgentCardSigner.js';
