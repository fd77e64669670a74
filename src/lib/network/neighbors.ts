import { Executor, DEFAULT_COMMAND_TIMEOUT_MS } from '../executor';
import { isRecord, ownValue } from '../json';
import { logger } from '../logger';
import { Result, ok, fail, errorMessage } from '../result';
import { InterfaceName, IpAddress, MacAddress } from './addresses';
import { CollectionError, NeighborEntry, NeighborState, sourceUnavailable } from './types';

/** One neighbor table row as reported by the platform, before validation. */
export interface RawNeighbor {
  ip: string;
  mac?: string;
  state: string;
}

export interface NeighborSource {
  readonly name: string;
  /** Rows in table order; rejects when the table cannot be opened. */
  readNeighbors(interfaceName: string): Promise<RawNeighbor[]>;
}

/**
 * `ip -j neigh show dev <name>` from iproute2. Covers both the ARP cache and
 * the IPv6 neighbor cache of one interface.
 */
export class IpNeighborSource implements NeighborSource {
  readonly name = 'ip neigh';

  constructor(private executor: Executor, private timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS) {}

  async readNeighbors(interfaceName: string): Promise<RawNeighbor[]> {
    const { stdout } = await this.executor.exec(
      'ip', ['-j', 'neigh', 'show', 'dev', interfaceName],
      { timeoutMs: this.timeoutMs },
    );
    return parseIpNeighJson(stdout);
  }
}

export function parseIpNeighJson(stdout: string): RawNeighbor[] {
  // iproute2 prints nothing at all for an empty table on some versions
  if (stdout.trim() === '') return [];

  const data: unknown = JSON.parse(stdout);
  if (!Array.isArray(data)) {
    throw new Error('ip neigh output is not a JSON array');
  }

  const rows: RawNeighbor[] = [];
  for (const item of data) {
    if (!isRecord(item) || typeof item.dst !== 'string') continue;
    const state = Array.isArray(item.state) && typeof item.state[0] === 'string' ? item.state[0] : '';
    rows.push({
      ip: item.dst,
      mac: typeof item.lladdr === 'string' ? item.lladdr : undefined,
      state,
    });
  }
  return rows;
}

const PROC_ARP = '/proc/net/arp';

// ATF_COM / ATF_PERM from <net/if_arp.h>
const ATF_COM = 0x2;
const ATF_PERM = 0x4;

/**
 * The kernel's IPv4 ARP table. Columns:
 * `IP address  HW type  Flags  HW address  Mask  Device`.
 */
export class ProcArpSource implements NeighborSource {
  readonly name = PROC_ARP;

  constructor(private executor: Executor, private path: string = PROC_ARP) {}

  async readNeighbors(interfaceName: string): Promise<RawNeighbor[]> {
    const content = await this.executor.readFile(this.path);
    return parseProcArp(content)
      .filter(row => row.device === interfaceName)
      .map(row => ({ ip: row.ip, mac: row.mac, state: row.state }));
  }
}

export function parseProcArp(content: string): Array<RawNeighbor & { device: string }> {
  const rows: Array<RawNeighbor & { device: string }> = [];
  for (const line of content.split('\n').slice(1)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 6) continue;

    const [ip, , flagsText, hwAddress, , device] = parts;
    const flags = parseInt(flagsText, 16);
    let state: string;
    if (Number.isNaN(flags)) {
      state = 'UNKNOWN';
    } else if (flags & ATF_PERM) {
      state = 'PERMANENT';
    } else if (flags & ATF_COM) {
      state = 'REACHABLE';
    } else {
      state = 'INCOMPLETE';
    }

    rows.push({
      ip,
      mac: /^(00:){5}00$/.test(hwAddress) ? undefined : hwAddress,
      state,
      device,
    });
  }
  return rows;
}

const STATE_MAP: Readonly<Record<string, NeighborState>> = {
  REACHABLE: 'reachable',
  PERMANENT: 'reachable',
  NOARP: 'reachable',
  STALE: 'stale',
  DELAY: 'stale',
  PROBE: 'stale',
  FAILED: 'failed',
  INCOMPLETE: 'failed',
};

export function mapNeighborState(raw: string): NeighborState {
  return ownValue(STATE_MAP, raw.toUpperCase()) ?? 'unknown';
}

export class NeighborCollector {
  constructor(private source: NeighborSource) {}

  async listNeighbors(interfaceName: InterfaceName): Promise<Result<NeighborEntry[], CollectionError>> {
    let rows: RawNeighbor[];
    try {
      rows = await this.source.readNeighbors(interfaceName.value);
    } catch (e) {
      logger.warn('Neighbors', `Cannot read ${this.source.name} for ${interfaceName}: ${errorMessage(e)}`);
      return fail(sourceUnavailable(this.source.name, errorMessage(e)));
    }

    const entries: NeighborEntry[] = [];
    for (const row of rows) {
      const ip = IpAddress.parse(row.ip);
      if (!ip.success) {
        logger.warn('Neighbors', `${interfaceName}: dropping entry, ${ip.error.message}`);
        continue;
      }

      let mac: MacAddress | undefined;
      if (row.mac !== undefined) {
        const parsed = MacAddress.parse(row.mac);
        if (!parsed.success) {
          logger.warn('Neighbors', `${interfaceName}: dropping ${ip.value}, ${parsed.error.message}`);
          continue;
        }
        mac = parsed.value;
      }

      entries.push({
        interface: interfaceName,
        ip: ip.value,
        mac,
        state: mapNeighborState(row.state),
      });
    }

    logger.debug('Neighbors', `${interfaceName}: ${entries.length} entries from ${this.source.name}`);
    return ok(entries);
  }
}
