import path from 'path';
import { Executor } from '../executor';
import { logger } from '../logger';
import { errorMessage } from '../result';
import { isRecord } from '../json';
import { MacAddress } from './addresses';

/** Entry of the OUI table file. */
interface OuiEntry {
  prefix: string; // first six hex digits of the MAC, no separators
  organization: {
    name: string;
  };
}

// Same relative location from src/lib/network and dist/lib/network
export const DEFAULT_OUI_PATH = path.join(__dirname, '..', '..', '..', 'data', 'oui.json');

function isOuiEntry(value: unknown): value is OuiEntry {
  return isRecord(value)
    && typeof value.prefix === 'string'
    && isRecord(value.organization)
    && typeof value.organization.name === 'string';
}

export function parseOuiTable(json: string): Map<string, string> {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) {
    throw new Error('OUI table must be a JSON array');
  }
  const table = new Map<string, string>();
  for (const item of data) {
    if (!isOuiEntry(item)) continue;
    const prefix = item.prefix.replace(/[:-]/g, '').toUpperCase();
    if (/^[0-9A-F]{6}$/.test(prefix)) {
      table.set(prefix, item.organization.name);
    }
  }
  return table;
}

export type VendorLookup = (mac: MacAddress) => string | undefined;

/**
 * Loads the OUI table and returns a lookup over it. A missing or broken table
 * yields a lookup that knows no vendors.
 */
export async function loadVendorLookup(executor: Executor, ouiPath: string = DEFAULT_OUI_PATH): Promise<VendorLookup> {
  let table = new Map<string, string>();
  try {
    table = parseOuiTable(await executor.readFile(ouiPath));
    logger.debug('Vendor', `Loaded ${table.size} OUIs from ${ouiPath}`);
  } catch (e) {
    logger.warn('Vendor', `Cannot load OUI table ${ouiPath}: ${errorMessage(e)}`);
  }
  return mac => table.get(mac.oui);
}
