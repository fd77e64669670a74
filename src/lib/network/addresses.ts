import { Result, ok, fail } from '../result';

export interface InvalidFormat {
  kind: 'InvalidFormat';
  field: string;
  raw: string;
  message: string;
}

export function invalidFormat(field: string, raw: string, reason: string): InvalidFormat {
  return {
    kind: 'InvalidFormat',
    field,
    raw,
    message: `Invalid ${field} "${raw}": ${reason}`,
  };
}

function compareBytes(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Linux IFNAMSIZ is 16 including the terminating NUL
const MAX_INTERFACE_NAME = 15;

export class InterfaceName {
  private constructor(readonly value: string) {}

  static parse(raw: string): Result<InterfaceName, InvalidFormat> {
    if (raw.length === 0) {
      return fail(invalidFormat('interface', raw, 'name is empty'));
    }
    if (raw.length > MAX_INTERFACE_NAME) {
      return fail(invalidFormat('interface', raw, `name is longer than ${MAX_INTERFACE_NAME} characters`));
    }
    if (raw === '.' || raw === '..' || /[\s/:]/.test(raw)) {
      return fail(invalidFormat('interface', raw, 'name contains a reserved character'));
    }
    return ok(new InterfaceName(raw));
  }

  static compare(a: InterfaceName, b: InterfaceName): number {
    return compareStrings(a.value, b.value);
  }

  equals(other: InterfaceName): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}

const MAC_PATTERN = /^[0-9a-f]{2}([:-])[0-9a-f]{2}(\1[0-9a-f]{2}){4}$/i;

export class MacAddress {
  private constructor(readonly bytes: readonly number[]) {}

  /**
   * Accepts `aa:bb:cc:dd:ee:ff` or `AA-BB-CC-DD-EE-FF`; the canonical text
   * form is always lowercase and colon-separated.
   */
  static parse(raw: string): Result<MacAddress, InvalidFormat> {
    if (!MAC_PATTERN.test(raw)) {
      return fail(invalidFormat('mac', raw, 'expected six hex octets separated by ":" or "-"'));
    }
    const bytes = raw.split(/[:-]/).map(octet => parseInt(octet, 16));
    return ok(new MacAddress(bytes));
  }

  static compare(a: MacAddress, b: MacAddress): number {
    return compareBytes(a.bytes, b.bytes);
  }

  /** First three octets as six uppercase hex digits, the IEEE OUI key. */
  get oui(): string {
    return this.bytes.slice(0, 3).map(b => b.toString(16).padStart(2, '0')).join('').toUpperCase();
  }

  isZero(): boolean {
    return this.bytes.every(b => b === 0);
  }

  equals(other: MacAddress): boolean {
    return MacAddress.compare(this, other) === 0;
  }

  toString(): string {
    return this.bytes.map(b => b.toString(16).padStart(2, '0')).join(':');
  }
}

export type IpFamily = 'v4' | 'v6';

function parseIpv4Octets(raw: string): number[] | null {
  const parts = raw.split('.');
  if (parts.length !== 4) return null;
  const octets: number[] = [];
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    if (part.length > 1 && part.startsWith('0')) return null;
    const value = Number(part);
    if (value > 255) return null;
    octets.push(value);
  }
  return octets;
}

function parseIpv6Groups(groups: string[], allowTrailingV4: boolean): number[] | null {
  const words: number[] = [];
  for (let i = 0; i < groups.length; i++) {
    const group = groups[i];
    if (allowTrailingV4 && i === groups.length - 1 && group.includes('.')) {
      const octets = parseIpv4Octets(group);
      if (!octets) return null;
      words.push((octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]);
      continue;
    }
    if (!/^[0-9a-f]{1,4}$/i.test(group)) return null;
    words.push(parseInt(group, 16));
  }
  return words;
}

function parseIpv6Words(raw: string): number[] | null {
  const halves = raw.split('::');
  if (halves.length > 2) return null;

  if (halves.length === 1) {
    const words = parseIpv6Groups(raw.split(':'), true);
    return words && words.length === 8 ? words : null;
  }

  const [headText, tailText] = halves;
  const head = headText === '' ? [] : parseIpv6Groups(headText.split(':'), false);
  const tail = tailText === '' ? [] : parseIpv6Groups(tailText.split(':'), true);
  if (!head || !tail) return null;
  const missing = 8 - head.length - tail.length;
  if (missing < 1) return null;
  return [...head, ...new Array<number>(missing).fill(0), ...tail];
}

function formatIpv6(words: readonly number[]): string {
  // RFC 5952: compress the longest run of two or more zero words, leftmost on ties
  let bestStart = -1;
  let bestLength = 1;
  for (let i = 0; i < words.length; i++) {
    if (words[i] !== 0) continue;
    let j = i;
    while (j < words.length && words[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = words.map(w => w.toString(16));
  if (bestStart < 0) return hex.join(':');
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

export class IpAddress {
  private constructor(
    readonly family: IpFamily,
    readonly bytes: readonly number[],
    readonly zone?: string,
  ) {}

  /**
   * Parses an IPv4 dotted quad or an IPv6 literal (with `::` compression, an
   * embedded trailing dotted quad and an optional `%zone`).
   */
  static parse(raw: string, field = 'ip'): Result<IpAddress, InvalidFormat> {
    if (raw.includes(':')) {
      let address = raw;
      let zone: string | undefined;
      const zoneIndex = raw.indexOf('%');
      if (zoneIndex >= 0) {
        address = raw.slice(0, zoneIndex);
        zone = raw.slice(zoneIndex + 1);
        if (!/^[0-9A-Za-z_.-]+$/.test(zone)) {
          return fail(invalidFormat(field, raw, 'invalid IPv6 zone'));
        }
      }
      const words = parseIpv6Words(address);
      if (!words) {
        return fail(invalidFormat(field, raw, 'not a valid IPv6 address'));
      }
      const bytes = words.flatMap(w => [w >> 8, w & 0xff]);
      return ok(new IpAddress('v6', bytes, zone));
    }

    const octets = parseIpv4Octets(raw);
    if (!octets) {
      return fail(invalidFormat(field, raw, 'not a valid IPv4 address'));
    }
    return ok(new IpAddress('v4', octets));
  }

  static fromV4Octets(octets: readonly [number, number, number, number]): IpAddress {
    return new IpAddress('v4', [...octets]);
  }

  /** IPv4 before IPv6, numeric within a family. The zone is not part of the identity. */
  static compare(a: IpAddress, b: IpAddress): number {
    if (a.family !== b.family) return a.family === 'v4' ? -1 : 1;
    return compareBytes(a.bytes, b.bytes);
  }

  equals(other: IpAddress): boolean {
    return IpAddress.compare(this, other) === 0;
  }

  /**
   * Loopback, RFC 1918 private and IPv6 link-local/unique-local ranges:
   * addresses that cannot be reached from outside the host's own network.
   */
  isLocal(): boolean {
    const [a, b] = this.bytes;
    if (this.family === 'v4') {
      return a === 127 || a === 10 || (a === 192 && b === 168) || (a === 172 && b >= 16 && b <= 31);
    }
    const loopback = this.bytes.slice(0, 15).every(byte => byte === 0) && this.bytes[15] === 1;
    return loopback || (a & 0xfe) === 0xfc || (a === 0xfe && (b & 0xc0) === 0x80);
  }

  toString(): string {
    if (this.family === 'v4') return this.bytes.join('.');
    const words: number[] = [];
    for (let i = 0; i < 16; i += 2) {
      words.push((this.bytes[i] << 8) | this.bytes[i + 1]);
    }
    const text = formatIpv6(words);
    return this.zone ? `${text}%${this.zone}` : text;
  }
}
