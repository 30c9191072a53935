import fs from 'fs/promises';
import os from 'os';
import type { NetworkInterfaceInfo } from 'os';
import { errorMessage } from './errors';

export const LOOPBACK_LABEL = 'localhost';

const ROUTE_TABLE = '/proc/net/route';

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface LanDiscoveryOptions {
  /** Skips discovery entirely */
  publicHost?: string;
  readGateway?: () => Promise<string>;
  listInterfaces?: () => InterfaceTable;
}

function ipv4ToInt(address: string): number {
  const parts = address.split('.').map(Number);
  if (parts.length !== 4 || parts.some((part) => !Number.isInteger(part) || part < 0 || part > 255)) {
    throw new Error(`Not an IPv4 address: ${address}`);
  }
  return ((parts[0] << 24) | (parts[1] << 16) | (parts[2] << 8) | parts[3]) >>> 0;
}

/**
 * Find the default route's gateway in the text of /proc/net/route.
 * Addresses there are little-endian hex, so 0101A8C0 is 192.168.1.1.
 */
export function parseDefaultGateway(routeTable: string): string | undefined {
  for (const line of routeTable.split('\n').slice(1)) {
    const [, destination, gateway] = line.trim().split(/\s+/);
    if (destination !== '00000000' || !gateway || !/^[0-9A-Fa-f]{8}$/.test(gateway)) {
      continue;
    }
    const octets = [6, 4, 2, 0].map((offset) => parseInt(gateway.slice(offset, offset + 2), 16));
    return octets.join('.');
  }
  return undefined;
}

export async function readDefaultGateway(): Promise<string> {
  const gateway = parseDefaultGateway(await fs.readFile(ROUTE_TABLE, 'utf8'));
  if (!gateway) {
    throw new Error('No default route found');
  }
  return gateway;
}

/**
 * Pick the IPv4 address of the interface whose subnet contains the gateway.
 */
export function findAddressForGateway(gateway: string, interfaces: InterfaceTable): string | undefined {
  const gatewayInt = ipv4ToInt(gateway);

  for (const name of Object.keys(interfaces)) {
    for (const info of interfaces[name] ?? []) {
      if (info.family !== 'IPv4' || info.internal) continue;

      const mask = ipv4ToInt(info.netmask);
      if (((ipv4ToInt(info.address) & mask) >>> 0) === ((gatewayInt & mask) >>> 0)) {
        return info.address;
      }
    }
  }
  return undefined;
}

function firstExternalAddress(interfaces: InterfaceTable): string | undefined {
  for (const name of Object.keys(interfaces)) {
    const match = (interfaces[name] ?? []).find((info) => info.family === 'IPv4' && !info.internal);
    if (match) return match.address;
  }
  return undefined;
}

/**
 * Address other devices on the LAN can reach this machine at.
 * Falls back to the first external IPv4 address, then to "localhost";
 * never rejects.
 */
export async function discoverLanAddress(options: LanDiscoveryOptions = {}): Promise<string> {
  if (options.publicHost) {
    return options.publicHost;
  }

  const readGateway = options.readGateway ?? readDefaultGateway;
  const listInterfaces = options.listInterfaces ?? os.networkInterfaces;
  const interfaces = listInterfaces();

  try {
    const gateway = await readGateway();
    const address = findAddressForGateway(gateway, interfaces);
    if (address) {
      return address;
    }
    console.warn(`No interface found on the subnet of gateway ${gateway}`);
  } catch (err) {
    console.warn(`Default gateway lookup failed: ${errorMessage(err)}`);
  }

  return firstExternalAddress(interfaces) ?? LOOPBACK_LABEL;
}
