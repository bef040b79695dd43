import { lookup as dnsLookup, type LookupAddress } from 'node:dns';
import type { LookupFunction } from 'node:net';

/**
 * Seconds a resolved address list is reused
 */
export const DEFAULT_DNS_TTL = 10;

type ResolveAll = (
  hostname: string,
  callback: (error: NodeJS.ErrnoException | null, addresses: LookupAddress[]) => void,
) => void;

const resolveAll: ResolveAll = (hostname, callback) => {
  dnsLookup(hostname, { all: true }, callback);
};

/**
 * Build a `lookup` function for socket connections that caches every
 * address of a host for `ttl` seconds.
 */
export function createCachedLookup(
  ttl = DEFAULT_DNS_TTL,
  resolve: ResolveAll = resolveAll,
): LookupFunction {
  const cache = new Map<string, { addresses: LookupAddress[]; expiresAt: number }>();

  return (hostname, options, callback) => {
    const respond = (addresses: LookupAddress[]): void => {
      const wanted =
        options.family === 4 || options.family === 6
          ? addresses.filter((entry) => entry.family === options.family)
          : addresses;

      if (options.all) {
        callback(null, wanted);
        return;
      }
      const [first] = wanted;
      if (!first) {
        const error: NodeJS.ErrnoException = new Error(`getaddrinfo ENOTFOUND ${hostname}`);
        error.code = 'ENOTFOUND';
        callback(error, '');
        return;
      }
      callback(null, first.address, first.family);
    };

    const cached = cache.get(hostname);
    if (cached && cached.expiresAt > Date.now()) {
      respond(cached.addresses);
      return;
    }

    resolve(hostname, (error, addresses) => {
      if (error) {
        callback(error, '');
        return;
      }
      cache.set(hostname, { addresses, expiresAt: Date.now() + ttl * 1000 });
      respond(addresses);
    });
  };
}
