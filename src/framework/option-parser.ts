import type { ModuleOption, ModuleRank } from '../types/index.js';
import { MODULE_RANKS } from '../constants.js';

const OPTIONS_HEADER = /^(\s*)Name\s+Current Setting\s+Required\s+Description\s*$/;
const SECTION_TITLE = /^\s*(?:Module|Payload|Auxiliary action|Exploit target)\b.*:\s*$/;

/**
 * Parse the option tables printed by `show options`.
 *
 * Rows are sliced by the header's column offsets rather than split on
 * whitespace, since "Current Setting" is blank for unset options.
 */
export function parseOptionsTable(output: string): Record<string, ModuleOption> {
  const options: Record<string, ModuleOption> = {};
  const lines = output.split(/\r?\n/);

  let columns: { name: number; setting: number; required: number; description: number } | null = null;

  for (const line of lines) {
    if (OPTIONS_HEADER.test(line)) {
      columns = {
        name: line.indexOf('Name'),
        setting: line.indexOf('Current Setting'),
        required: line.indexOf('Required'),
        description: line.indexOf('Description'),
      };
      continue;
    }

    if (!columns) continue;

    if (line.trim() === '' || SECTION_TITLE.test(line)) {
      columns = null;
      continue;
    }
    if (/^\s*-+(\s+-+)*\s*$/.test(line)) continue;

    const name = line.slice(columns.name, columns.setting).trim();
    const setting = line.slice(columns.setting, columns.required).trim();
    const required = line.slice(columns.required, columns.description).trim().toLowerCase();
    const description = line.slice(columns.description).trim();

    if (!/^[A-Za-z][\w:]*$/.test(name) || (required !== 'yes' && required !== 'no')) continue;

    // Payload options repeat module option names (LHOST etc.); the first table wins.
    if (options[name]) continue;

    options[name] = {
      required: required === 'yes',
      ...(setting ? { defaultValue: setting } : {}),
      description,
    };
  }

  return options;
}

export interface ModuleInfo {
  name: string | null;
  rank: ModuleRank | null;
  disclosureDate: string | null;
  checkSupported: boolean;
}

/** Pull the header fields out of `info <module>` output. */
export function parseModuleInfo(output: string): ModuleInfo {
  const field = (label: string): string | null => {
    const match = new RegExp(`^\\s*${label}:\\s*(.+?)\\s*$`, 'm').exec(output);
    return match ? match[1] : null;
  };

  const rankText = field('Rank')?.toLowerCase() ?? null;
  const rank = MODULE_RANKS.find((candidate) => candidate === rankText) ?? null;
  const disclosed = field('Disclosed');
  const disclosureMatch = disclosed ? /\d{4}-\d{2}-\d{2}/.exec(disclosed) : null;
  const check = field('Check supported');

  return {
    name: field('Name'),
    rank,
    disclosureDate: disclosureMatch ? disclosureMatch[0] : null,
    checkSupported: check !== null && /^yes/i.test(check),
  };
}
