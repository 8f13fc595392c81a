import type { MarkerConfig, OutputVerdict } from '../types/index.js';
import { DEFAULT_MARKERS, type MarkerSet } from '../constants-msf.js';
import { NetstrikeError, errorMessage } from '../error-handling.js';

/** Extend the default marker set with patterns from the config file. */
export function compileMarkers(config: Partial<MarkerConfig> = {}, base: MarkerSet = DEFAULT_MARKERS): MarkerSet {
  return {
    success: [...base.success, ...compilePatterns(config.success ?? [], 'success')],
    failure: [...base.failure, ...compilePatterns(config.failure ?? [], 'failure')],
    configurationError: [
      ...base.configurationError,
      ...compilePatterns(config.configuration_error ?? [], 'configuration_error'),
    ],
  };
}

function compilePatterns(patterns: string[], group: string): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, 'im');
    } catch (error) {
      throw new NetstrikeError(
        `Invalid ${group} marker /${pattern}/: ${errorMessage(error)}`,
        'ConfigurationError'
      );
    }
  });
}

/**
 * Classify module output. A session opening outranks everything else, since
 * modules often print failure lines for earlier stages before one lands.
 * `unknown` is not terminal: the caller keeps watching until its deadline.
 */
export function classifyOutput(output: string, markers: MarkerSet): OutputVerdict {
  if (markers.success.some((pattern) => pattern.test(output))) return 'succeeded';
  if (markers.configurationError.some((pattern) => pattern.test(output))) return 'misconfigured';
  if (markers.failure.some((pattern) => pattern.test(output))) return 'failed';
  return 'unknown';
}

/** Ids of the `sessions -l` rows connected to the address. */
export function targetSessionIds(output: string, address: string): number[] {
  const escaped = address.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const row = new RegExp(`^\\s*(\\d+)\\s.*(?:->\\s*${escaped}:\\d+|\\(${escaped}\\))`, 'gm');
  return Array.from(output.matchAll(row), (match) => Number(match[1]));
}
