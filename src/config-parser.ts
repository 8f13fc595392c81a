import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { Ajv, type SchemaObject } from 'ajv';
import ajvFormats from 'ajv-formats';
import type {
  ArtifactConfig,
  ExploitationConfig,
  FrameworkConfig,
  MarkerConfig,
  NetstrikeConfig,
  ReportingConfig,
  ScanningConfig,
} from './types/index.js';
import { COMMON_PORTS, DEFAULTS } from './constants.js';
import { NetstrikeError } from './error-handling.js';
import { compileMarkers } from './framework/outcome-classifier.js';
import type { OrchestrationOptions } from './exploitation/controller.js';
import { parsePortSpec } from './modules/port-scanner.js';

const DANGEROUS_PATTERNS = [
  /\.\.\//,
  /javascript:/i,
  /data:/i,
  /file:/i,
];

const MAX_CONFIG_SIZE = 1024 * 1024; // 1MB

/** Shape of a config file before defaults are applied. */
export interface RawConfig {
  framework?: Partial<FrameworkConfig>;
  exploitation?: Partial<Omit<ExploitationConfig, 'markers'>> & { markers?: Partial<MarkerConfig> };
  artifacts?: Partial<ArtifactConfig>;
  scanning?: Partial<ScanningConfig>;
  reporting?: Partial<ReportingConfig>;
}

// FAILSAFE_SCHEMA leaves every scalar a string; these get converted before validation.
const NUMERIC_FIELDS: Record<string, string[]> = {
  framework: ['startup_timeout_ms', 'command_timeout_ms', 'recovery_grace_ms'],
  exploitation: ['timeout_per_attempt_ms', 'confirmation_timeout_ms', 'max_candidates', 'session_poll_interval_ms'],
  scanning: ['timeout_ms', 'concurrency'],
  reporting: ['output_summary_chars'],
};

const BOOLEAN_FIELDS: Record<string, string[]> = {
  exploitation: ['confirm_each_attempt', 'record_failed_attempts', 'describe_options'],
  scanning: ['use_nmap'],
};

export async function parseConfig(configPath: string): Promise<NetstrikeConfig> {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new NetstrikeError(`Configuration file not found: ${resolved}`, 'ConfigurationError');
  }

  const stats = fs.statSync(resolved);
  if (stats.size > MAX_CONFIG_SIZE) {
    throw new NetstrikeError(`Configuration file too large (max ${MAX_CONFIG_SIZE} bytes)`, 'ConfigurationError');
  }

  return parseConfigContent(fs.readFileSync(resolved, 'utf-8'));
}

export function parseConfigContent(content: string): NetstrikeConfig {
  validateDangerousPatterns(content);

  const parsed: unknown = yaml.load(content, {
    schema: yaml.FAILSAFE_SCHEMA,
    json: false,
  });

  if (!isRecord(parsed)) {
    throw new NetstrikeError('Configuration file is empty or invalid YAML', 'ConfigurationError');
  }

  const coerced = coerceTypes(parsed);
  if (!validateSchema(coerced)) {
    throw new NetstrikeError('Configuration validation failed', 'ConfigurationError');
  }

  return applyDefaults(coerced);
}

function validateDangerousPatterns(content: string): void {
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(content)) {
      throw new NetstrikeError(
        `Security violation: dangerous pattern detected in config (${pattern.source})`,
        'ConfigurationError'
      );
    }
  }
}

function loadSchema(): SchemaObject {
  const schemaPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '..',
    'configs',
    'config-schema.json'
  );
  const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  return schema;
}

function validateSchema(config: Record<string, unknown>): config is Record<string, unknown> & RawConfig {
  const ajv = new Ajv({ allErrors: true, strict: false });
  ajvFormats.default(ajv);

  const validate = ajv.compile<RawConfig>(loadSchema());
  if (validate(config)) return true;

  const messages = (validate.errors ?? []).map((e) => `  ${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
  throw new NetstrikeError(`Configuration validation failed:\n${messages.join('\n')}`, 'ConfigurationError');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerceTypes(raw: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(raw);

  for (const [sectionName, keys] of Object.entries(NUMERIC_FIELDS)) {
    const section = result[sectionName];
    if (!isRecord(section)) continue;
    for (const key of keys) {
      const value = section[key];
      if (typeof value === 'string' && /^\d+$/.test(value.trim())) section[key] = parseInt(value, 10);
    }
  }

  for (const [sectionName, keys] of Object.entries(BOOLEAN_FIELDS)) {
    const section = result[sectionName];
    if (!isRecord(section)) continue;
    for (const key of keys) {
      const value = section[key];
      if (value === 'true' || value === 'false') section[key] = value === 'true';
    }
  }

  // Ports may be a list or a spec string such as "21,22,8000-8100"
  const scanning = result.scanning;
  if (isRecord(scanning)) {
    const ports = scanning.ports;
    if (typeof ports === 'string') {
      scanning.ports = parsePortSpec(ports);
    } else if (Array.isArray(ports)) {
      scanning.ports = ports.map((p) => (typeof p === 'string' && /^\d+$/.test(p.trim()) ? parseInt(p, 10) : p));
    }
  }

  return result;
}

function applyDefaults(raw: RawConfig): NetstrikeConfig {
  const exploitation = raw.exploitation ?? {};

  return {
    framework: {
      msf_path: 'msfconsole',
      startup_timeout_ms: DEFAULTS.FRAMEWORK_STARTUP_TIMEOUT_MS,
      command_timeout_ms: DEFAULTS.COMMAND_TIMEOUT_MS,
      recovery_grace_ms: DEFAULTS.RECOVERY_GRACE_MS,
      ...raw.framework,
    },

    exploitation: {
      timeout_per_attempt_ms: DEFAULTS.TIMEOUT_PER_ATTEMPT_MS,
      confirm_each_attempt: false,
      session_poll_interval_ms: DEFAULTS.SESSION_POLL_INTERVAL_MS,
      record_failed_attempts: false,
      describe_options: true,
      global_options: {},
      module_options: {},
      ...exploitation,
      markers: {
        success: [],
        failure: [],
        configuration_error: [],
        ...exploitation.markers,
      },
    },

    artifacts: {
      directory: DEFAULTS.ARTIFACT_DIRECTORY,
      ...raw.artifacts,
    },

    scanning: {
      ports: [...COMMON_PORTS],
      timeout_ms: DEFAULTS.PORT_SCAN_TIMEOUT_MS,
      concurrency: DEFAULTS.PORT_SCAN_CONCURRENCY,
      use_nmap: true,
      ...raw.scanning,
    },

    reporting: {
      format: 'markdown',
      output_summary_chars: DEFAULTS.OUTPUT_SUMMARY_CHARS,
      ...raw.reporting,
    },
  };
}

export function getDefaultConfig(): NetstrikeConfig {
  return applyDefaults({});
}

/** Environment variables win over the file; `.env` is loaded by the entry points. */
export function applyEnvOverrides(config: NetstrikeConfig, env: NodeJS.ProcessEnv = process.env): NetstrikeConfig {
  const timeout = env.NETSTRIKE_TIMEOUT_PER_ATTEMPT_MS;
  if (timeout !== undefined && !/^\d+$/.test(timeout)) {
    throw new NetstrikeError(`NETSTRIKE_TIMEOUT_PER_ATTEMPT_MS must be a number of milliseconds, got "${timeout}"`, 'ConfigurationError');
  }

  return {
    ...config,
    framework: {
      ...config.framework,
      ...(env.NETSTRIKE_MSF_PATH ? { msf_path: env.NETSTRIKE_MSF_PATH } : {}),
    },
    exploitation: {
      ...config.exploitation,
      ...(timeout ? { timeout_per_attempt_ms: parseInt(timeout, 10) } : {}),
    },
    artifacts: {
      ...config.artifacts,
      ...(env.NETSTRIKE_ARTIFACT_DIR ? { directory: env.NETSTRIKE_ARTIFACT_DIR } : {}),
    },
  };
}

export function resolveOutputDir(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(explicit ?? env.NETSTRIKE_OUTPUT_DIR ?? DEFAULTS.OUTPUT_DIRECTORY);
}

/** Map the file's snake_case sections onto the controller's options. */
export function toOrchestrationConfig(config: NetstrikeConfig): OrchestrationOptions {
  const { framework, exploitation } = config;

  return {
    timeoutPerAttemptMs: exploitation.timeout_per_attempt_ms,
    commandTimeoutMs: framework.command_timeout_ms,
    recoveryGraceMs: framework.recovery_grace_ms,
    confirmEachAttempt: exploitation.confirm_each_attempt,
    ...(exploitation.confirmation_timeout_ms !== undefined
      ? { confirmationTimeoutMs: exploitation.confirmation_timeout_ms }
      : {}),
    sessionPollIntervalMs: exploitation.session_poll_interval_ms,
    recordFailedAttempts: exploitation.record_failed_attempts,
    globalOptions: { ...exploitation.global_options },
    moduleOptions: { ...exploitation.module_options },
    markers: compileMarkers(exploitation.markers),
  };
}
