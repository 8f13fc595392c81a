import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  applyEnvOverrides,
  getDefaultConfig,
  parseConfig,
  parseConfigContent,
  resolveOutputDir,
  toOrchestrationConfig,
} from '../src/config-parser.js';
import { COMMON_PORTS } from '../src/constants.js';
import { DEFAULT_MARKERS } from '../src/constants-msf.js';

const EXAMPLE_CONFIG = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'configs', 'example-config.yaml');

describe('parseConfigContent', () => {
  it('reads the example configuration', () => {
    const config = parseConfigContent(fs.readFileSync(EXAMPLE_CONFIG, 'utf-8'));

    expect(config.framework).toEqual({
      msf_path: 'msfconsole',
      startup_timeout_ms: 120000,
      command_timeout_ms: 30000,
      recovery_grace_ms: 10000,
    });
    expect(config.exploitation.max_candidates).toBe(10);
    expect(config.exploitation.confirmation_timeout_ms).toBeUndefined();
    expect(config.exploitation.global_options).toEqual({ LHOST: '192.168.1.50', LPORT: '4444' });
    expect(config.exploitation.module_options).toEqual({
      'exploit/unix/ftp/vsftpd_234_backdoor': { PAYLOAD: 'cmd/unix/interact' },
    });
    expect(config.exploitation.markers).toEqual({
      success: ['\\bbackdoor shell spawned\\b'],
      failure: [],
      configuration_error: [],
    });
    expect(config.scanning.ports).toEqual([21, 22, 23, 25, 80, 139, 443, 445, 3306, 5432, 5900, 8080]);
    expect(config.scanning.use_nmap).toBe(true);
  });

  it('fills every omitted key with its default', () => {
    const config = parseConfigContent('framework:\n  msf_path: /opt/msf/msfconsole\n');

    expect(config.framework.msf_path).toBe('/opt/msf/msfconsole');
    expect(config.framework.command_timeout_ms).toBe(30000);
    expect(config.exploitation).toMatchObject({
      timeout_per_attempt_ms: 120000,
      confirm_each_attempt: false,
      record_failed_attempts: false,
      describe_options: true,
      markers: { success: [], failure: [], configuration_error: [] },
    });
    expect(config.scanning.ports).toEqual([...COMMON_PORTS]);
    expect(config.reporting).toEqual({ format: 'markdown', output_summary_chars: 400 });
  });

  it('converts numbers and booleans written as strings', () => {
    const config = parseConfigContent(
      'exploitation:\n  timeout_per_attempt_ms: "5000"\n  confirm_each_attempt: true\nscanning:\n  ports:\n    - 21\n    - "445"\n'
    );

    expect(config.exploitation.timeout_per_attempt_ms).toBe(5000);
    expect(config.exploitation.confirm_each_attempt).toBe(true);
    expect(config.scanning.ports).toEqual([21, 445]);
  });

  it('rejects an empty file', () => {
    expect(() => parseConfigContent('')).toThrow('Configuration file is empty or invalid YAML');
  });

  it('rejects path traversal in values', () => {
    expect(() => parseConfigContent('artifacts:\n  directory: ../../etc\n')).toThrow(/^Security violation/);
  });

  it('reports schema violations by path', () => {
    expect(() => parseConfigContent('exploitation:\n  timeout_per_attempt_ms: 10\n')).toThrow(
      '/exploitation/timeout_per_attempt_ms: must be >= 1000'
    );
    expect(() => parseConfigContent('exploitation:\n  timeout_per_attempt_ms: soon\n')).toThrow(
      '/exploitation/timeout_per_attempt_ms: must be integer'
    );
    expect(() => parseConfigContent('unexpected: 1\n')).toThrow('/: must NOT have additional properties');
  });

  it('rejects option names the console would not accept', () => {
    expect(() => parseConfigContent('exploitation:\n  global_options:\n    "bad name": x\n')).toThrow(
      'Configuration validation failed'
    );
  });

  it('rejects a malformed port spec', () => {
    expect(() => parseConfigContent('scanning:\n  ports: "21,70000"\n')).toThrow('Invalid port specification: 70000');
  });
});

describe('parseConfig', () => {
  it('loads a file from disk', async () => {
    const config = await parseConfig(EXAMPLE_CONFIG);
    expect(config.artifacts.directory).toBe('./artifacts');
  });

  it('fails for a missing file', async () => {
    await expect(parseConfig('/nonexistent/netstrike.yaml')).rejects.toMatchObject({
      type: 'ConfigurationError',
      message: 'Configuration file not found: /nonexistent/netstrike.yaml',
    });
  });
});

describe('applyEnvOverrides', () => {
  it('lets the environment override the file', () => {
    const config = applyEnvOverrides(getDefaultConfig(), {
      NETSTRIKE_MSF_PATH: '/opt/msf/msfconsole',
      NETSTRIKE_TIMEOUT_PER_ATTEMPT_MS: '5000',
      NETSTRIKE_ARTIFACT_DIR: '/var/lib/netstrike',
    });

    expect(config.framework.msf_path).toBe('/opt/msf/msfconsole');
    expect(config.exploitation.timeout_per_attempt_ms).toBe(5000);
    expect(config.artifacts.directory).toBe('/var/lib/netstrike');
  });

  it('leaves the config alone without variables', () => {
    expect(applyEnvOverrides(getDefaultConfig(), {})).toEqual(getDefaultConfig());
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => applyEnvOverrides(getDefaultConfig(), { NETSTRIKE_TIMEOUT_PER_ATTEMPT_MS: '2m' })).toThrow(
      'NETSTRIKE_TIMEOUT_PER_ATTEMPT_MS must be a number of milliseconds, got "2m"'
    );
  });
});

describe('resolveOutputDir', () => {
  it('prefers the explicit path, then the environment', () => {
    expect(resolveOutputDir('out', { NETSTRIKE_OUTPUT_DIR: '/tmp/env' })).toBe(path.resolve('out'));
    expect(resolveOutputDir(undefined, { NETSTRIKE_OUTPUT_DIR: '/tmp/env' })).toBe('/tmp/env');
    expect(resolveOutputDir(undefined, {})).toBe(path.resolve('./audit-logs'));
  });
});

describe('toOrchestrationConfig', () => {
  it('maps the config onto controller options', () => {
    const options = toOrchestrationConfig(getDefaultConfig());

    expect(options).toMatchObject({
      timeoutPerAttemptMs: 120000,
      commandTimeoutMs: 30000,
      recoveryGraceMs: 10000,
      confirmEachAttempt: false,
      sessionPollIntervalMs: 5000,
      recordFailedAttempts: false,
      globalOptions: {},
      moduleOptions: {},
    });
    expect(options).not.toHaveProperty('confirmationTimeoutMs');
    expect(options.markers.success).toHaveLength(DEFAULT_MARKERS.success.length);
  });

  it('compiles configured markers and carries the confirmation timeout', () => {
    const config = parseConfigContent(
      'exploitation:\n  confirmation_timeout_ms: 60000\n  markers:\n    failure:\n      - "connection refused"\n'
    );

    const options = toOrchestrationConfig(config);

    expect(options.confirmationTimeoutMs).toBe(60000);
    expect(options.markers.failure).toHaveLength(DEFAULT_MARKERS.failure.length + 1);
  });
});
