import os, { NetworkInterfaceInfo } from 'os';
import path from 'path';
import { Executor } from '../executor';
import { ownValue } from '../json';
import { logger } from '../logger';
import { Result, ok, fail, errorMessage } from '../result';
import { InterfaceName, IpAddress, MacAddress } from './addresses';
import { CollectionError, Interface, InterfaceKind, OperState, sourceUnavailable } from './types';

/** One interface as reported by the platform, before validation. */
export interface RawInterface {
  name: string;
  /** ARPHRD_* hardware type, as the decimal text found in sysfs. */
  hardwareType?: string;
  wireless?: boolean;
  operState?: string;
  mac?: string;
  addresses: string[];
}

export interface InterfaceSource {
  readonly name: string;
  readInterfaces(): Promise<RawInterface[]>;
}

export type AddressTable = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

const SYSFS_NET = '/sys/class/net';

/**
 * Linux interface table: one directory per interface under /sys/class/net,
 * including interfaces that are down. Bound addresses come from the
 * runtime's own address table since sysfs does not carry them.
 */
export class SysfsInterfaceSource implements InterfaceSource {
  readonly name = SYSFS_NET;

  constructor(
    private executor: Executor,
    private addressTable: AddressTable = () => os.networkInterfaces(),
    private root: string = SYSFS_NET,
  ) {}

  async readInterfaces(): Promise<RawInterface[]> {
    const names = await this.executor.readdir(this.root);
    const table = this.addressTable();
    return Promise.all(names.map(async (name): Promise<RawInterface> => {
      const dir = path.posix.join(this.root, name);
      const [hardwareType, operState, mac, wirelessDir, phyLink] = await Promise.all([
        this.readAttribute(dir, 'type'),
        this.readAttribute(dir, 'operstate'),
        this.readAttribute(dir, 'address'),
        this.executor.exists(path.posix.join(dir, 'wireless')),
        this.executor.exists(path.posix.join(dir, 'phy80211')),
      ]);
      return {
        name,
        hardwareType,
        operState,
        mac,
        wireless: wirelessDir || phyLink,
        addresses: (table[name] ?? []).map(info => info.address),
      };
    }));
  }

  private async readAttribute(dir: string, attribute: string): Promise<string | undefined> {
    try {
      const value = (await this.executor.readFile(path.posix.join(dir, attribute))).trim();
      return value.length > 0 ? value : undefined;
    } catch (e) {
      logger.debug('Interfaces', `Cannot read ${attribute} of ${dir}: ${errorMessage(e)}`);
      return undefined;
    }
  }
}

/**
 * ARPHRD hardware type → kind. Ethernet-framed wireless adapters report
 * type 1, so the wireless marker decides between ethernet and wifi.
 */
export const HARDWARE_KINDS: Readonly<Record<string, InterfaceKind>> = {
  '1': 'ethernet',
  '772': 'loopback',
  '801': 'wifi',
  '802': 'wifi',
  '803': 'wifi',
};

export function classifyKind(raw: Pick<RawInterface, 'hardwareType' | 'wireless'>): InterfaceKind {
  if (raw.wireless) return 'wifi';
  if (raw.hardwareType === undefined) return 'other';
  return ownValue(HARDWARE_KINDS, raw.hardwareType) ?? 'other';
}

export function parseOperState(raw: string | undefined): OperState {
  switch (raw?.toLowerCase()) {
    case 'up':
      return 'up';
    case 'down':
    case 'lowerlayerdown':
    case 'notpresent':
      return 'down';
    default:
      return 'unknown';
  }
}

export interface InterfaceCollectorOptions {
  /** Per-interface kind overrides, keyed by interface name. */
  kindOverrides?: Record<string, InterfaceKind>;
}

export class InterfaceCollector {
  constructor(private source: InterfaceSource, private options: InterfaceCollectorOptions = {}) {}

  async listInterfaces(): Promise<Result<Interface[], CollectionError>> {
    let rawInterfaces: RawInterface[];
    try {
      rawInterfaces = await this.source.readInterfaces();
    } catch (e) {
      logger.error('Interfaces', `Interface table ${this.source.name} is unreadable`, e);
      return fail(sourceUnavailable(this.source.name, errorMessage(e)));
    }

    const interfaces: Interface[] = [];
    for (const raw of rawInterfaces) {
      const name = InterfaceName.parse(raw.name);
      if (!name.success) {
        logger.warn('Interfaces', `Skipping interface: ${name.error.message}`);
        continue;
      }
      interfaces.push(this.toInterface(name.value, raw));
    }

    logger.debug('Interfaces', `Found ${interfaces.length} interfaces`);
    return ok(interfaces);
  }

  private toInterface(name: InterfaceName, raw: RawInterface): Interface {
    const addresses: IpAddress[] = [];
    for (const text of raw.addresses) {
      const address = IpAddress.parse(text, 'address');
      if (address.success) {
        addresses.push(address.value);
      } else {
        logger.debug('Interfaces', `${name}: dropping ${address.error.message}`);
      }
    }
    addresses.sort(IpAddress.compare);

    let mac: MacAddress | undefined;
    if (raw.mac !== undefined) {
      const parsed = MacAddress.parse(raw.mac);
      // Point-to-point and tunnel devices report an all-zero or non-MAC address
      if (parsed.success && !parsed.value.isZero()) mac = parsed.value;
    }

    return {
      name,
      kind: ownValue(this.options.kindOverrides, name.value) ?? classifyKind(raw),
      operState: parseOperState(raw.operState),
      addresses,
      mac,
    };
  }
}
