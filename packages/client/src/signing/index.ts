export { DEFAULT_SIGNING_ALGORITHMS, RequestSigner, UNSIGNED } from './signer.js';
export type { SigningAlgorithm, SigningContext } from './signer.js';
