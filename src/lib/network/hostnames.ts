import * as dns from 'dns/promises';
import { logger } from '../logger';
import { errorMessage } from '../result';
import { IpAddress } from './addresses';

export type ReverseResolver = (ip: string) => Promise<string[]>;

const defaultResolver: ReverseResolver = ip => dns.reverse(ip);

/**
 * Reverse DNS for one address, bounded by `timeoutMs`. Any failure, timeout
 * included, leaves the hostname unknown.
 */
export async function resolveHostname(
  ip: IpAddress,
  timeoutMs: number,
  resolver: ReverseResolver = defaultResolver,
): Promise<string | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>(resolve => {
    timer = setTimeout(() => resolve(undefined), timeoutMs);
  });

  try {
    const lookup = resolver(ip.toString()).then(names => {
      const name = names[0]?.replace(/\.$/, '');
      return name ? name : undefined;
    });
    return await Promise.race([lookup, timeout]);
  } catch (e) {
    logger.debug('Hostnames', `PTR lookup failed for ${ip}: ${errorMessage(e)}`);
    return undefined;
  } finally {
    clearTimeout(timer);
  }
}
