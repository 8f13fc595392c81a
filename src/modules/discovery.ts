import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { DiscoveredHost, DiscoveryResult } from '../types/index.js';
import { parseNmapXml } from '../utils/nmap.js';
import { runCommand, type CommandRunner } from '../utils/process.js';
import { NetstrikeError, errorMessage } from '../error-handling.js';

export interface DiscoveryOptions {
  runner?: CommandRunner;
  interfaces?: NodeJS.Dict<os.NetworkInterfaceInfo[]>;
}

/**
 * Phase 1: Host Discovery
 * Ping sweep with nmap, falling back to the ARP cache when nmap is missing.
 */
export async function discoverHosts(range?: string, options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
  const startTime = Date.now();
  const runner = options.runner ?? runCommand;
  const target = range ?? localSubnet(options.interfaces ?? os.networkInterfaces());

  if (!target) {
    throw new NetstrikeError('No IPv4 interface found to derive a scan range from', 'InvalidTargetError');
  }

  console.log(`[discovery] Sweeping ${target}...`);

  let hosts: DiscoveredHost[];
  let method: DiscoveryResult['method'] = 'nmap';
  try {
    const xml = await runner('nmap', ['-sn', '-T4', '-oX', '-', target]);
    hosts = (await parseNmapXml(xml))
      .filter((host) => host.status === 'up')
      .map(({ address, macAddress, hostname }) => ({ address, macAddress, hostname }));
  } catch (error) {
    console.warn(`[discovery] nmap sweep failed (${errorMessage(error)}), reading the ARP cache instead`);
    method = 'arp';
    const arpOutput = await runner('arp', ['-a']);
    hosts = parseArpTable(arpOutput).filter((host) => inRange(host.address, target));
  }

  const unique = deduplicateHosts(hosts);
  console.log(`[discovery] ${unique.length} host(s) up via ${method}`);

  return {
    range: target,
    method,
    hosts: unique,
    scanDurationMs: Date.now() - startTime,
  };
}

export async function runDiscovery(
  range: string | undefined,
  outputDir: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult> {
  const result = await discoverHosts(range, options);

  const deliverablePath = path.join(outputDir, 'deliverables', 'discovery_results.json');
  await fs.mkdir(path.dirname(deliverablePath), { recursive: true });
  await fs.writeFile(deliverablePath, JSON.stringify(result, null, 2));

  return result;
}

/** The /24 around the first non-internal IPv4 address. */
export function localSubnet(interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]>): string | null {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family !== 'IPv4' || entry.internal) continue;
      const [a, b, c] = entry.address.split('.');
      return `${a}.${b}.${c}.0/24`;
    }
  }
  return null;
}

const UNIX_ARP_LINE = /^(\S+)\s+\((\d{1,3}(?:\.\d{1,3}){3})\)\s+at\s+([0-9a-f]{1,2}(?::[0-9a-f]{1,2}){5})\b/i;
const WINDOWS_ARP_LINE = /^\s*(\d{1,3}(?:\.\d{1,3}){3})\s+([0-9a-f]{2}(?:-[0-9a-f]{2}){5})\s+dynamic\b/i;

/** Parse `arp -a` output in either the BSD/Linux or the Windows layout. */
export function parseArpTable(output: string): DiscoveredHost[] {
  const hosts: DiscoveredHost[] = [];

  for (const line of output.split(/\r?\n/)) {
    const unix = UNIX_ARP_LINE.exec(line);
    if (unix) {
      hosts.push({
        address: unix[2],
        macAddress: normalizeMac(unix[3]),
        hostname: unix[1] === '?' ? null : unix[1],
      });
      continue;
    }

    const windows = WINDOWS_ARP_LINE.exec(line);
    if (windows) {
      hosts.push({ address: windows[1], macAddress: normalizeMac(windows[2]), hostname: null });
    }
  }

  return hosts;
}

function normalizeMac(mac: string): string {
  return mac
    .split(/[:-]/)
    .map((octet) => octet.padStart(2, '0').toUpperCase())
    .join(':');
}

/** True when `address` falls inside an `a.b.c.d/n` range. Single addresses must match exactly. */
export function inRange(address: string, range: string): boolean {
  const [base, bitsText] = range.split('/');
  if (bitsText === undefined) return address === base;

  const bits = parseInt(bitsText, 10);
  const toNumber = (ip: string) => ip.split('.').reduce((acc, octet) => acc * 256 + parseInt(octet, 10), 0);
  const block = 2 ** (32 - bits);
  return Math.floor(toNumber(address) / block) === Math.floor(toNumber(base) / block);
}

function deduplicateHosts(hosts: DiscoveredHost[]): DiscoveredHost[] {
  const seen = new Set<string>();
  return hosts.filter((host) => {
    if (seen.has(host.address)) return false;
    seen.add(host.address);
    return true;
  });
}
