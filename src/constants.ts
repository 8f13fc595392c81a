import type { ModuleName, ModuleRank, PhaseName } from './types/index.js';

// ─── Scanning ────────────────────────────────────────────────────

export const COMMON_PORTS = [
  21, 22, 23, 25, 53, 80, 110, 111, 135, 139, 143, 443, 445, 993, 995,
  1433, 1723, 3306, 3389, 5432, 5900, 6379, 8080, 8443,
] as const;

// Used when nmap is unavailable and the TCP fallback cannot identify a service.
export const PORT_SERVICE_MAP: Record<number, string> = {
  21: 'ftp',
  22: 'ssh',
  23: 'telnet',
  25: 'smtp',
  53: 'domain',
  80: 'http',
  110: 'pop3',
  111: 'rpcbind',
  135: 'msrpc',
  139: 'netbios-ssn',
  143: 'imap',
  443: 'https',
  445: 'microsoft-ds',
  993: 'imaps',
  995: 'pop3s',
  1433: 'ms-sql-s',
  1723: 'pptp',
  3306: 'mysql',
  3389: 'ms-wbt-server',
  5432: 'postgresql',
  5900: 'vnc',
  6379: 'redis',
  8080: 'http-proxy',
  8443: 'https-alt',
};

// ─── Module Definitions ─────────────────────────────────────────

export const MODULE_PHASE_MAP: Record<ModuleName, PhaseName> = {
  'discovery': 'discovery',
  'port-scan': 'scanning',
  'exploitation': 'exploitation',
  'report': 'reporting',
};

// ─── Catalog Ranking ────────────────────────────────────────────

// Lower is attempted first.
export const RANK_ORDER: Record<ModuleRank, number> = {
  excellent: 0,
  great: 1,
  good: 2,
  normal: 3,
  average: 4,
  low: 5,
  manual: 6,
};

export const MODULE_RANKS: readonly ModuleRank[] = [
  'excellent', 'great', 'good', 'normal', 'average', 'low', 'manual',
];

// ─── Device Hints ───────────────────────────────────────────────

// Hostname keywords checked in order; the first match names the device type.
export const HOSTNAME_DEVICE_HINTS: ReadonlyArray<[string, string[]]> = [
  ['Router/Gateway', ['router', 'gateway', 'rt-', 'linksys', 'netgear', 'asus']],
  ['Mobile Device', ['android', 'iphone', 'samsung', 'mobile']],
  ['Computer', ['laptop', 'desktop', 'pc', 'windows', 'ubuntu']],
  ['Printer', ['printer', 'canon', 'hp', 'epson']],
  ['Smart TV/Media', ['tv', 'smart', 'roku', 'chromecast']],
  ['Security Camera', ['camera', 'cam', 'security']],
];

export const MAC_VENDOR_PREFIXES: Record<string, string> = {
  '00:50:56': 'VMware',
  '00:0C:29': 'VMware',
  '08:00:27': 'VirtualBox',
  '52:54:00': 'QEMU',
  '00:1C:42': 'Parallels',
  'B8:27:EB': 'Raspberry Pi',
  'DC:A6:32': 'Raspberry Pi',
};

// ─── Timing & Limits ────────────────────────────────────────────

export const DEFAULTS = {
  TIMEOUT_PER_ATTEMPT_MS: 120_000,
  FRAMEWORK_STARTUP_TIMEOUT_MS: 120_000,
  COMMAND_TIMEOUT_MS: 30_000,
  RECOVERY_GRACE_MS: 10_000,
  SESSION_POLL_INTERVAL_MS: 5_000,
  PORT_SCAN_TIMEOUT_MS: 1_000,
  PORT_SCAN_CONCURRENCY: 100,
  OUTPUT_SUMMARY_CHARS: 400,
  HEARTBEAT_INTERVAL_MS: 2_000,
  ARTIFACT_DIRECTORY: './artifacts',
  OUTPUT_DIRECTORY: './audit-logs',
  CONFIRMATION_WAIT: '24 hours',
} as const;
