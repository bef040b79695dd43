export { createCachedLookup, DEFAULT_DNS_TTL } from './dns.js';
export { HttpSession } from './session.js';
export type { HttpSessionOptions, SendOptions, TransportSession } from './session.js';
