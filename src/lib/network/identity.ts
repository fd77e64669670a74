import { DeviceIdentity, DeviceType, NeighborEntry, NetworkSnapshot } from './types';

export const DEVICE_LABELS: Readonly<Record<DeviceType, { emoji: string; label: string }>> = {
  television: { emoji: '📺', label: 'Television' },
  printer: { emoji: '🖨', label: 'Printer' },
  router: { emoji: '🌐', label: 'Router' },
  computer: { emoji: '💻', label: 'Computer' },
  nas: { emoji: '🗄', label: 'NAS' },
  mobile: { emoji: '📞', label: 'Mobile Device' },
  tablet: { emoji: '📋', label: 'Tablet' },
  speaker: { emoji: '🔊', label: 'Speaker' },
  streaming: { emoji: '📺', label: 'Streaming Device' },
  'smart-home': { emoji: '🏠', label: 'Smart Home' },
  unknown: { emoji: '🖥', label: 'Device' },
};

export interface IdentityHints {
  hostname?: string;
  vendor?: string;
  isGateway?: boolean;
}

// Checked in order; the first brand found in the vendor or hostname wins
const BRAND_TYPES: ReadonlyArray<[brand: string, type: DeviceType]> = [
  ['brother', 'printer'],
  ['canon', 'printer'],
  ['epson', 'printer'],
  ['xerox', 'printer'],
  ['hp', 'printer'],
  ['synology', 'nas'],
  ['qnap', 'nas'],
  ['sonos', 'speaker'],
  ['roku', 'streaming'],
  ['philips lighting', 'smart-home'],
  ['nest', 'smart-home'],
  ['raspberry pi', 'computer'],
];

const HOSTNAME_BRANDS = ['samsung', 'lg', 'sony', 'brother', 'hp', 'canon', 'epson', 'apple', 'google', 'amazon'];

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(token => token !== '');
}

/** `brand` appears as a word (or word prefix, as in `hpprinter`) of `text`. */
function mentions(text: string, brand: string): boolean {
  const words = tokens(text);
  const brandWords = tokens(brand);
  return words.some((_, i) =>
    brandWords.every((word, j) => {
      const candidate = words[i + j];
      if (candidate === undefined) return false;
      return j === brandWords.length - 1 ? candidate.startsWith(word) : candidate === word;
    }));
}

function typeFromHostname(hostname: string): DeviceType | undefined {
  const name = hostname.toLowerCase();
  if (name.includes('router') || name.includes('gateway')) return 'router';
  if (name.includes('nas')) return 'nas';
  if (name.includes('printer')) return 'printer';
  // Tablets first: "galaxy-tab" also contains "galaxy"
  if (name.includes('ipad') || name.includes('tablet') || name.includes('-tab-') || name.startsWith('tab')) {
    return 'tablet';
  }
  if (name.includes('iphone') || name.includes('galaxy') || name.includes('pixel') || name.includes('android')) {
    return 'mobile';
  }
  if (name.includes('laptop') || name.includes('desktop') || name.includes('macbook') || name.includes('-pc')) {
    return 'computer';
  }
  if (mentions(name, 'tv') || name.includes('chromecast') || name.includes('firetv')) return 'television';
  return undefined;
}

function typeFromBrand(hints: IdentityHints): DeviceType | undefined {
  for (const [brand, type] of BRAND_TYPES) {
    if ((hints.vendor && mentions(hints.vendor, brand)) || (hints.hostname && mentions(hints.hostname, brand))) {
      return type;
    }
  }
  return undefined;
}

function brandFromHostname(hostname: string): string | undefined {
  const brand = HOSTNAME_BRANDS.find(candidate => mentions(hostname, candidate));
  if (!brand) return undefined;
  return brand.length <= 2 ? brand.toUpperCase() : brand[0].toUpperCase() + brand.slice(1);
}

/**
 * Best guess at what a neighbor is, from what the kernel tables and the
 * passive lookups tell us. Gateway role beats brand, brand beats hostname
 * patterns.
 */
export function inferIdentity(hints: IdentityHints): DeviceIdentity {
  const type: DeviceType = (hints.isGateway ? 'router' : undefined)
    ?? typeFromBrand(hints)
    ?? (hints.hostname ? typeFromHostname(hints.hostname) : undefined)
    ?? 'unknown';
  const manufacturer = hints.vendor ?? (hints.hostname ? brandFromHostname(hints.hostname) : undefined);
  return manufacturer === undefined ? { type } : { type, manufacturer };
}

export function formatDeviceType(type: DeviceType): string {
  const { emoji, label } = DEVICE_LABELS[type];
  return `${emoji} ${label}`;
}

/** Attaches an identity to every neighbor; the snapshot itself is left as is. */
export function identifyDevices(snapshot: NetworkSnapshot): NetworkSnapshot {
  const identify = (entry: NeighborEntry): NeighborEntry => ({
    ...entry,
    identity: inferIdentity({
      hostname: entry.hostname,
      vendor: entry.vendor,
      isGateway: snapshot.gateway?.equals(entry.ip) ?? false,
    }),
  });

  const neighborsByInterface = new Map<string, NeighborEntry[]>();
  for (const [name, entries] of snapshot.neighborsByInterface) {
    neighborsByInterface.set(name, entries.map(identify));
  }
  return { ...snapshot, neighborsByInterface };
}
