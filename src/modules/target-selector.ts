import { isIP } from 'node:net';
import type { DiscoveredHost, ServiceFingerprint, TargetDescriptor } from '../types/index.js';
import { HOSTNAME_DEVICE_HINTS, MAC_VENDOR_PREFIXES } from '../constants.js';
import { NetstrikeError } from '../error-handling.js';

/** `index` is 1-based, as shown in the host table. */
export type TargetSelection = { address: string } | { index: number };

export function selectTarget(hosts: readonly DiscoveredHost[], selection: TargetSelection): DiscoveredHost {
  if ('index' in selection) {
    const host = hosts[selection.index - 1];
    if (!Number.isInteger(selection.index) || !host) {
      throw new NetstrikeError(
        `Invalid selection ${selection.index}: choose between 1 and ${hosts.length}`,
        'InvalidTargetError'
      );
    }
    return host;
  }

  const address = selection.address.trim();
  if (isIP(address) === 0) {
    throw new NetstrikeError(`Invalid IP address: ${selection.address}`, 'InvalidTargetError');
  }

  const known = hosts.find((host) => host.address === address);
  if (known) return known;

  console.log(`[target] ${address} was not discovered, targeting it directly`);
  return { address, macAddress: null, hostname: null };
}

/** Freeze the selected host and its open services into one orchestration target. */
export function buildTargetDescriptor(host: DiscoveredHost, services: readonly ServiceFingerprint[]): TargetDescriptor {
  if (isIP(host.address) === 0) {
    throw new NetstrikeError(`Invalid IP address: ${host.address}`, 'InvalidTargetError');
  }

  return Object.freeze({
    address: host.address,
    ...(host.hostname ? { hostname: host.hostname } : {}),
    ...(host.macAddress ? { macAddress: host.macAddress } : {}),
    openServices: Object.freeze(services.map((service) => Object.freeze({ ...service }))),
  });
}

/** Best guess at what kind of device a host is, from its hostname or MAC vendor. */
export function describeDevice(host: DiscoveredHost): string {
  const hostname = host.hostname?.toLowerCase() ?? '';
  if (hostname) {
    for (const [label, keywords] of HOSTNAME_DEVICE_HINTS) {
      if (keywords.some((keyword) => hostname.includes(keyword))) return label;
    }
  }

  const vendor = MAC_VENDOR_PREFIXES[host.macAddress?.toUpperCase().slice(0, 8) ?? ''];
  return vendor ? `${vendor} Device` : 'Unknown Device';
}
