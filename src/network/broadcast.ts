/**
 * Broadcast destination selection
 *
 * Pro DJ Link gear listens for broadcasts. The limited broadcast
 * 255.255.255.255 is used unless the interface only has a link-local
 * address (no DHCP server answered) or a local-only broadcast was asked
 * for; then the subnet's directed broadcast address is used.
 */

import * as os from 'os';

export const GLOBAL_BROADCAST = '255.255.255.255';

export type InterfaceAddress = Pick<os.NetworkInterfaceInfo, 'address' | 'netmask' | 'family' | 'internal'>;

function ipv4ToInt(ip: string): number {
  const parts = ip.split('.').map((p) => Number(p));
  if (parts.length !== 4 || parts.some((p) => !Number.isInteger(p) || p < 0 || p > 255)) {
    throw new Error(`Invalid IPv4 address: ${ip}`);
  }
  return ((parts[0] << 24) | (parts[1] << 16) | (parts[2] << 8) | parts[3]) >>> 0;
}

function intToIpv4(n: number): string {
  return [n >>> 24, (n >>> 16) & 0xff, (n >>> 8) & 0xff, n & 0xff].join('.');
}

/** Directed broadcast address of the subnet `address` lives in */
export function subnetBroadcast(address: string, netmask: string): string {
  const mask = ipv4ToInt(netmask);
  return intToIpv4((ipv4ToInt(address) | ~mask) >>> 0);
}

/** Whether the subnet lies inside 169.254.0.0/16 */
export function isLinkLocal(address: string, netmask: string): boolean {
  const network = (ipv4ToInt(address) & ipv4ToInt(netmask)) >>> 0;
  const linkLocal = ipv4ToInt('169.254.0.0');
  const linkLocalMask = ipv4ToInt('255.255.0.0');
  return ((network & linkLocalMask) >>> 0) === linkLocal
    && ((ipv4ToInt(netmask) & linkLocalMask) >>> 0) === linkLocalMask;
}

/**
 * Pick the broadcast address for packets leaving through an interface
 * with the given addresses.
 */
export function resolveDestination(addresses: readonly InterfaceAddress[] | undefined, localBroadcast: boolean): string {
  const ipv4 = addresses?.find((a) => a.family === 'IPv4');
  if (!ipv4) {
    throw new Error('No IPv4 address on network interface');
  }

  if (localBroadcast || isLinkLocal(ipv4.address, ipv4.netmask)) {
    return subnetBroadcast(ipv4.address, ipv4.netmask);
  }
  return GLOBAL_BROADCAST;
}

/** Resolve against the host's current configuration of `interfaceName` */
export function resolveInterfaceDestination(interfaceName: string, localBroadcast: boolean): string {
  const addresses = os.networkInterfaces()[interfaceName];
  if (!addresses) {
    throw new Error(`Network interface not found: ${interfaceName}`);
  }
  return resolveDestination(addresses, localBroadcast);
}
