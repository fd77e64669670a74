import { Executor } from '../executor';
import { logger } from '../logger';
import { errorMessage } from '../result';
import { IpAddress } from './addresses';

const PROC_ROUTE = '/proc/net/route';
const RESOLV_CONF = '/etc/resolv.conf';

/**
 * /proc/net/route stores addresses as little-endian hex: `0101A8C0` is
 * 192.168.1.1.
 */
export function parseHexIpv4(hex: string): IpAddress | null {
  if (!/^[0-9a-f]{8}$/i.test(hex)) return null;
  const value = parseInt(hex, 16);
  return IpAddress.fromV4Octets([
    value & 0xff,
    (value >>> 8) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 24) & 0xff,
  ]);
}

/** Gateway of the first default route (destination 00000000), if any. */
export function parseDefaultGateway(content: string): IpAddress | undefined {
  for (const line of content.split('\n').slice(1)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 3 || parts[1] !== '00000000') continue;
    const gateway = parseHexIpv4(parts[2]);
    if (gateway) return gateway;
  }
  return undefined;
}

export function parseNameservers(content: string): IpAddress[] {
  const servers: IpAddress[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) continue;
    const parts = line.split(/\s+/);
    if (parts[0] !== 'nameserver' || parts.length < 2) continue;
    const address = IpAddress.parse(parts[1], 'nameserver');
    if (address.success) {
      servers.push(address.value);
    } else {
      logger.debug('Gateway', address.error.message);
    }
  }
  return servers;
}

export async function readDefaultGateway(executor: Executor, routePath: string = PROC_ROUTE): Promise<IpAddress | undefined> {
  try {
    return parseDefaultGateway(await executor.readFile(routePath));
  } catch (e) {
    logger.debug('Gateway', `Cannot read ${routePath}: ${errorMessage(e)}`);
    return undefined;
  }
}

export async function readDnsServers(executor: Executor, resolvPath: string = RESOLV_CONF): Promise<IpAddress[]> {
  try {
    return parseNameservers(await executor.readFile(resolvPath));
  } catch (e) {
    logger.debug('Gateway', `Cannot read ${resolvPath}: ${errorMessage(e)}`);
    return [];
  }
}
