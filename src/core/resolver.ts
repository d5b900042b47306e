/**
 * Host resolution ahead of port probing
 */

import { lookup as dnsLookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import { CacheManager } from './cache.js';
import { HostResolutionError, errorMessage } from './errors.js';

export type LookupFn = (host: string) => Promise<string>;

const defaultLookup: LookupFn = async (host) => {
  const { address } = await dnsLookup(host);
  return address;
};

/**
 * Resolves a host to one address, caching successful lookups.
 */
export class HostResolver {
  private cache: CacheManager<string>;
  private lookup: LookupFn;

  constructor(lookup: LookupFn = defaultLookup, ttl = 5 * 60 * 1000) {
    this.lookup = lookup;
    this.cache = new CacheManager<string>(256, ttl);
  }

  /**
   * @throws HostResolutionError when the name does not resolve
   */
  async resolve(host: string): Promise<string> {
    if (isIP(host)) return host;

    try {
      return await this.cache.getOrSet(`host:${host.toLowerCase()}`, () => this.lookup(host));
    } catch (err) {
      throw new HostResolutionError(host, errorMessage(err));
    }
  }
}
