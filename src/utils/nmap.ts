import { parseString } from 'xml2js';
import type { TransportProtocol } from '../types/index.js';

export interface NmapPort {
  port: number;
  protocol: TransportProtocol;
  state: string;
  serviceName: string;
  product?: string;
  version?: string;
}

export interface NmapHost {
  address: string;
  macAddress: string | null;
  hostname: string | null;
  status: string;
  ports: NmapPort[];
}

type XmlElement = Record<string, unknown>;

function isElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: XmlElement | undefined, name: string): XmlElement[] {
  const value = node?.[name];
  if (Array.isArray(value)) return value.filter(isElement);
  return isElement(value) ? [value] : [];
}

function attr(node: XmlElement | undefined, name: string): string | undefined {
  const attrs = node?.$;
  if (!isElement(attrs)) return undefined;
  const value = attrs[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Flatten nmap's `-oX` document into hosts with their ports. Works for both
 * ping sweeps (no `<ports>`) and service scans.
 */
export function parseNmapXml(xml: string): Promise<NmapHost[]> {
  return new Promise((resolve, reject) => {
    parseString(xml, (err: Error | null, result: unknown) => {
      if (err) return reject(err);

      const nmapRun = isElement(result) ? children(result, 'nmaprun')[0] : undefined;
      const hosts: NmapHost[] = [];

      for (const host of children(nmapRun, 'host')) {
        const addresses = children(host, 'address');
        const ip = addresses.find((entry) => attr(entry, 'addrtype') !== 'mac');
        const mac = addresses.find((entry) => attr(entry, 'addrtype') === 'mac');
        const address = attr(ip, 'addr');
        if (!address) continue;

        const hostnameEntry = children(children(host, 'hostnames')[0], 'hostname')[0];
        const ports: NmapPort[] = [];

        for (const port of children(children(host, 'ports')[0], 'port')) {
          const portId = parseInt(attr(port, 'portid') ?? '', 10);
          if (Number.isNaN(portId)) continue;

          const service = children(port, 'service')[0];
          const product = attr(service, 'product');
          const version = attr(service, 'version');
          ports.push({
            port: portId,
            protocol: attr(port, 'protocol') === 'udp' ? 'udp' : 'tcp',
            state: attr(children(port, 'state')[0], 'state') ?? 'unknown',
            serviceName: attr(service, 'name') ?? 'unknown',
            ...(product ? { product } : {}),
            ...(version ? { version } : {}),
          });
        }

        hosts.push({
          address,
          macAddress: attr(mac, 'addr') ?? null,
          hostname: attr(hostnameEntry, 'name') ?? null,
          status: attr(children(host, 'status')[0], 'state') ?? 'unknown',
          ports,
        });
      }

      resolve(hosts);
    });
  });
}
