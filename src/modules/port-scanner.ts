import { createConnection } from 'node:net';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { PortScanResult, ScanningConfig, ServiceFingerprint } from '../types/index.js';
import { COMMON_PORTS, DEFAULTS, PORT_SERVICE_MAP } from '../constants.js';
import { parseNmapXml } from '../utils/nmap.js';
import { runCommand, type CommandRunner } from '../utils/process.js';
import { mapLimit } from '../utils/concurrency.js';
import { NetstrikeError, errorMessage } from '../error-handling.js';

export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface PortScanOptions {
  ports?: number[];
  timeoutMs?: number;
  concurrency?: number;
  useNmap?: boolean;
  runner?: CommandRunner;
  probe?: PortProbe;
}

/**
 * Phase 2: Port Scanning
 * nmap service detection when available, a plain TCP connect sweep otherwise.
 */
export async function scanPorts(address: string, options: PortScanOptions = {}): Promise<PortScanResult> {
  const startTime = Date.now();
  const ports = options.ports && options.ports.length > 0 ? options.ports : [...COMMON_PORTS];

  if (options.useNmap ?? true) {
    try {
      const services = await nmapServiceScan(address, ports, options.runner ?? runCommand);
      if (services.length > 0) {
        return finish(address, 'nmap', ports, services, startTime);
      }
      console.log(`[port-scan] nmap found no open ports on ${address}, trying TCP connect fallback...`);
    } catch (error) {
      console.error(`[port-scan] nmap scan failed for ${address}: ${errorMessage(error)}`);
    }
  }

  const services = await tcpConnectScan(
    address,
    ports,
    options.timeoutMs ?? DEFAULTS.PORT_SCAN_TIMEOUT_MS,
    options.concurrency ?? DEFAULTS.PORT_SCAN_CONCURRENCY,
    options.probe ?? tcpProbe
  );
  return finish(address, 'tcp-connect', ports, services, startTime);
}

export async function runPortScan(
  address: string,
  scanning: ScanningConfig,
  outputDir: string,
  overrides: Pick<PortScanOptions, 'runner' | 'probe'> = {}
): Promise<PortScanResult> {
  const result = await scanPorts(address, {
    ports: scanning.ports,
    timeoutMs: scanning.timeout_ms,
    concurrency: scanning.concurrency,
    useNmap: scanning.use_nmap,
    ...overrides,
  });

  const deliverablePath = path.join(outputDir, 'deliverables', 'port_scan_results.json');
  await fs.mkdir(path.dirname(deliverablePath), { recursive: true });
  await fs.writeFile(deliverablePath, JSON.stringify(result, null, 2));

  return result;
}

function finish(
  address: string,
  method: PortScanResult['method'],
  ports: number[],
  services: ServiceFingerprint[],
  startTime: number
): PortScanResult {
  const sorted = [...services].sort((a, b) => a.port - b.port);
  console.log(`[port-scan] ${address}: ${sorted.length} open of ${ports.length} scanned (${method})`);
  return { address, method, portsScanned: ports.length, services: sorted, scanDurationMs: Date.now() - startTime };
}

async function nmapServiceScan(address: string, ports: number[], runner: CommandRunner): Promise<ServiceFingerprint[]> {
  const args = [
    '-sV',                    // Service version detection
    '--version-intensity', '5',
    '-p', ports.join(','),
    '-T4',
    '--open',
    '-oX', '-',
    '--host-timeout', '60s',
    address,
  ];

  const xml = await runner('nmap', args);
  const hosts = await parseNmapXml(xml);

  return hosts
    .filter((host) => host.address === address)
    .flatMap((host) => host.ports)
    .filter((port) => port.state === 'open')
    .map(({ port, protocol, serviceName, product, version }) => ({
      port,
      protocol,
      serviceName,
      ...(product ? { product } : {}),
      ...(version ? { version } : {}),
    }));
}

async function tcpConnectScan(
  address: string,
  ports: number[],
  timeoutMs: number,
  concurrency: number,
  probe: PortProbe
): Promise<ServiceFingerprint[]> {
  const results = await mapLimit(ports, concurrency, async (port) =>
    (await probe(address, port, timeoutMs)) ? port : null
  );

  const open: ServiceFingerprint[] = [];
  for (const result of results) {
    if (result.status === 'fulfilled' && result.value !== null) {
      open.push({ port: result.value, protocol: 'tcp', serviceName: PORT_SERVICE_MAP[result.value] ?? 'unknown' });
    }
  }
  return open;
}

export const tcpProbe: PortProbe = (host, port, timeoutMs) => {
  return new Promise((resolve) => {
    const socket = createConnection({ host, port, timeout: timeoutMs }, () => {
      socket.destroy();
      resolve(true);
    });
    socket.on('error', () => {
      socket.destroy();
      resolve(false);
    });
    socket.on('timeout', () => {
      socket.destroy();
      resolve(false);
    });
  });
};

/** Parse a port list such as `21,22,80-85`. */
export function parsePortSpec(spec: string): number[] {
  const ports = new Set<number>();

  for (const part of spec.split(',').map((piece) => piece.trim()).filter(Boolean)) {
    const range = /^(\d+)-(\d+)$/.exec(part);
    const [start, end] = range ? [parseInt(range[1], 10), parseInt(range[2], 10)] : [Number(part), Number(part)];

    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end > 65535 || start > end) {
      throw new NetstrikeError(`Invalid port specification: ${part}`, 'ConfigurationError');
    }
    for (let port = start; port <= end; port++) ports.add(port);
  }

  return [...ports].sort((a, b) => a - b);
}
