import { describe, it, expect, vi } from 'vitest';
import { Executor, LocalExecutor } from '../../src/lib/executor';
import {
  parseDefaultGateway,
  parseHexIpv4,
  parseNameservers,
  readDefaultGateway,
  readDnsServers,
} from '../../src/lib/network/gateway';
import { resolveHostname } from '../../src/lib/network/hostnames';
import { loadVendorLookup, parseOuiTable } from '../../src/lib/network/vendor';
import { ip, mac } from './fixtures';

const PROC_ROUTE = [
  'Iface\tDestination\tGateway \tFlags\tRefCnt\tUse\tMetric\tMask\t\tMTU\tWindow\tIRTT',
  'wlan0\t0001A8C0\t00000000\t0001\t0\t0\t600\t00FFFFFF\t0\t0\t0',
  'eth0\t00000000\t0101A8C0\t0003\t0\t0\t100\t00000000\t0\t0\t0',
  'wlan0\t00000000\tFE00A8C0\t0003\t0\t0\t600\t00000000\t0\t0\t0',
  '',
].join('\n');

const RESOLV_CONF = [
  '# Generated by NetworkManager',
  'search lan',
  'nameserver 192.168.1.1',
  '; nameserver 10.9.9.9',
  'nameserver fd00::53',
  'nameserver not-an-address',
  'options edns0',
].join('\n');

function readingExecutor(readFile: Executor['readFile']): Executor {
  return {
    exec: vi.fn().mockRejectedValue(new Error('not used')),
    readFile,
    exists: vi.fn().mockResolvedValue(false),
    readdir: vi.fn().mockResolvedValue([]),
  };
}

describe('default gateway', () => {
  it('decodes little-endian hex addresses', () => {
    expect(parseHexIpv4('0101A8C0')?.toString()).toBe('192.168.1.1');
    expect(parseHexIpv4('FE00A8C0')?.toString()).toBe('192.168.0.254');
    expect(parseHexIpv4('xyz')).toBeNull();
  });

  it('takes the first default route', () => {
    expect(parseDefaultGateway(PROC_ROUTE)?.toString()).toBe('192.168.1.1');
  });

  it('is undefined without a default route or a readable table', async () => {
    expect(parseDefaultGateway(PROC_ROUTE.split('\n').slice(0, 2).join('\n'))).toBeUndefined();
    const executor = readingExecutor(vi.fn().mockRejectedValue(new Error('ENOENT')));
    expect(await readDefaultGateway(executor)).toBeUndefined();
  });

  it('reads /proc/net/route through the executor', async () => {
    const readFile = vi.fn().mockResolvedValue(PROC_ROUTE);
    const gateway = await readDefaultGateway(readingExecutor(readFile));
    expect(gateway?.toString()).toBe('192.168.1.1');
    expect(readFile).toHaveBeenCalledWith('/proc/net/route');
  });
});

describe('DNS servers', () => {
  it('collects valid nameserver lines and skips comments', () => {
    expect(parseNameservers(RESOLV_CONF).map(String)).toEqual(['192.168.1.1', 'fd00::53']);
  });

  it('falls back to none when resolv.conf is unreadable', async () => {
    const executor = readingExecutor(vi.fn().mockRejectedValue(new Error('EACCES')));
    expect(await readDnsServers(executor)).toEqual([]);
  });
});

describe('resolveHostname', () => {
  it('returns the first PTR name without the trailing dot', async () => {
    const resolver = vi.fn().mockResolvedValue(['nas.lan.', 'nas-alias.lan.']);
    expect(await resolveHostname(ip('192.168.1.30'), 100, resolver)).toBe('nas.lan');
    expect(resolver).toHaveBeenCalledWith('192.168.1.30');
  });

  it('is undefined when the lookup fails', async () => {
    const resolver = vi.fn().mockRejectedValue(Object.assign(new Error('getHostByAddr ENOTFOUND'), { code: 'ENOTFOUND' }));
    expect(await resolveHostname(ip('192.168.1.31'), 100, resolver)).toBeUndefined();
  });

  it('is undefined when the lookup outlives the timeout', async () => {
    const resolver = vi.fn(() => new Promise<string[]>(() => undefined));
    expect(await resolveHostname(ip('192.168.1.32'), 10, resolver)).toBeUndefined();
  });

  it('is undefined for an empty answer', async () => {
    expect(await resolveHostname(ip('192.168.1.33'), 100, async () => [])).toBeUndefined();
  });
});

describe('vendor lookup', () => {
  it('normalises prefixes and skips malformed entries', () => {
    const table = parseOuiTable(JSON.stringify([
      { prefix: 'aa:bb:cc', organization: { name: 'Acme' } },
      { prefix: 'AABBC', organization: { name: 'Too Short' } },
      { prefix: '001122' },
      'junk',
    ]));
    expect([...table.entries()]).toEqual([['AABBCC', 'Acme']]);
  });

  it('rejects a table that is not an array', () => {
    expect(() => parseOuiTable('{}')).toThrow('OUI table must be a JSON array');
  });

  it('loads the bundled table', async () => {
    const lookup = await loadVendorLookup(new LocalExecutor());
    expect(lookup(mac('b8:27:eb:12:34:56'))).toBe('Raspberry Pi Foundation');
    expect(lookup(mac('52:54:00:12:34:56'))).toBe('QEMU/KVM');
    expect(lookup(mac('02:00:00:00:00:01'))).toBeUndefined();
  });

  it('knows no vendors when the table cannot be loaded', async () => {
    const executor = readingExecutor(vi.fn().mockRejectedValue(new Error('ENOENT')));
    const lookup = await loadVendorLookup(executor, '/nonexistent/oui.json');
    expect(lookup(mac('b8:27:eb:12:34:56'))).toBeUndefined();
  });
});
