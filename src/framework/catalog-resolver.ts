import type {
  ExploitCandidate,
  ModuleOption,
  ModuleRank,
  ResolvedCatalog,
  ServiceFingerprint,
  TargetDescriptor,
} from '../types/index.js';
import type { FrameworkAdapter } from './msf-adapter.js';
import { parseModuleInfo, parseOptionsTable } from './option-parser.js';
import { RANK_ORDER } from '../constants.js';
import {
  MSF_LOAD_FAILURE,
  MSF_SEARCH_HEADER,
  MSF_SEARCH_INDEX_ROW,
  MSF_SEARCH_ROW,
  MSF_SEARCH_SUBROW,
} from '../constants-msf.js';
import { NetstrikeError, isNetstrikeError } from '../error-handling.js';

// ─── Search Output Parsing ──────────────────────────────────────

export interface SearchRow {
  listingIndex: number;
  moduleId: string;
  disclosureDate?: string;
  rank: ModuleRank;
  checkSupported: boolean;
  description: string;
}

export interface SearchParseResult {
  rows: SearchRow[];
  skippedLines: number;
}

export function parseSearchOutput(output: string): SearchParseResult {
  const rows: SearchRow[] = [];
  let skippedLines = 0;

  const headerMatch = MSF_SEARCH_HEADER.exec(output);
  if (!headerMatch) return { rows, skippedLines };

  const table = output.slice(headerMatch.index + headerMatch[0].length);

  for (const line of table.split(/\r?\n/)) {
    if (!MSF_SEARCH_INDEX_ROW.test(line) || MSF_SEARCH_SUBROW.test(line)) continue;

    const match = MSF_SEARCH_ROW.exec(line);
    if (!match) {
      skippedLines++;
      continue;
    }

    const [, index, moduleId, date, rank, check, description] = match;
    const listingIndex = parseInt(index, 10);
    const normalizedRank = rank.toLowerCase();
    if (!isModuleRank(normalizedRank)) {
      skippedLines++;
      continue;
    }

    rows.push({
      listingIndex,
      moduleId,
      ...(date ? { disclosureDate: date } : {}),
      rank: normalizedRank,
      checkSupported: check.toLowerCase() === 'yes',
      description: description.trim(),
    });
  }

  return { rows, skippedLines };
}

function isModuleRank(value: string): value is ModuleRank {
  return value in RANK_ORDER;
}

/**
 * Stable ordering: rank, then newest disclosure date, then original position.
 * Entries without a disclosure date sort after dated ones of the same rank.
 */
export function rankCandidates<T extends { rank: ModuleRank; disclosureDate?: string }>(items: readonly T[]): T[] {
  return items
    .map((item, position) => ({ item, position }))
    .sort((a, b) => {
      const byRank = RANK_ORDER[a.item.rank] - RANK_ORDER[b.item.rank];
      if (byRank !== 0) return byRank;

      const dateA = a.item.disclosureDate;
      const dateB = b.item.disclosureDate;
      if (dateA !== dateB) {
        if (!dateA) return 1;
        if (!dateB) return -1;
        return dateA < dateB ? 1 : -1;
      }

      return a.position - b.position;
    })
    .map(({ item }) => item);
}

export function buildSearchQueries(service: ServiceFingerprint): string[] {
  const term = sanitizeTerm(service.product ?? service.serviceName);
  if (!term || term === 'unknown') return [];

  const version = service.version ? sanitizeTerm(service.version) : '';
  const base = `search type:exploit ${term}`;
  return version ? [`${base} ${version}`, base] : [base];
}

function sanitizeTerm(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]+/g, ' ').trim();
}

// ─── Resolver ───────────────────────────────────────────────────

export interface CatalogResolverOptions {
  commandTimeoutMs: number;
  recoveryGraceMs: number;
  maxCandidates?: number;
  describeOptions: boolean;
}

type UndescribedCandidate = Omit<ExploitCandidate, 'requiredOptions'>;

export class ExploitCatalogResolver {
  constructor(
    private readonly adapter: FrameworkAdapter,
    private readonly options: CatalogResolverOptions
  ) {}

  async resolve(service: ServiceFingerprint): Promise<ExploitCandidate[]> {
    const { candidates } = await this.resolveService(service);
    return candidates;
  }

  async resolveService(service: ServiceFingerprint): Promise<ResolvedCatalog> {
    const { candidates, skippedLines } = await this.searchService(service);
    return { candidates: await this.describeAll(candidates), skippedLines };
  }

  /**
   * Candidate list for every open service of a target, merged into the single
   * order the controller will attempt.
   */
  async resolveTarget(target: TargetDescriptor): Promise<ResolvedCatalog> {
    const merged: UndescribedCandidate[] = [];
    const seen = new Set<string>();
    let skippedLines = 0;

    for (const service of target.openServices) {
      const result = await this.searchService(service);
      skippedLines += result.skippedLines;

      for (const candidate of result.candidates) {
        const key = `${candidate.moduleId}@${candidate.service.port}`;
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(candidate);
      }
    }

    const ranked = this.cap(rankCandidates(merged));
    console.log(`[resolver] ${ranked.length} candidate(s) for ${target.address} (${skippedLines} unparseable line(s) skipped)`);

    return { candidates: await this.describeAll(ranked), skippedLines };
  }

  /** Build a candidate for an operator-chosen module without searching the catalog. */
  async describe(moduleId: string, service: ServiceFingerprint): Promise<ExploitCandidate> {
    const infoOutput = await this.adapter.execute(`info ${moduleId}`, this.options.commandTimeoutMs);
    if (MSF_LOAD_FAILURE.test(infoOutput) || /Invalid module/i.test(infoOutput)) {
      throw new NetstrikeError(`Unknown module: ${moduleId}`, 'ConfigurationError');
    }

    const info = parseModuleInfo(infoOutput);
    return {
      moduleId,
      rank: info.rank ?? 'manual',
      ...(info.disclosureDate ? { disclosureDate: info.disclosureDate } : {}),
      description: info.name ?? moduleId,
      checkSupported: info.checkSupported,
      listingIndex: 0,
      service,
      requiredOptions: await this.fetchOptions(moduleId),
    };
  }

  private async searchService(
    service: ServiceFingerprint
  ): Promise<{ candidates: UndescribedCandidate[]; skippedLines: number }> {
    const queries = buildSearchQueries(service);
    if (queries.length === 0) {
      console.log(`[resolver] Port ${service.port}: no usable search term for service "${service.serviceName}"`);
      return { candidates: [], skippedLines: 0 };
    }

    let skippedLines = 0;
    for (const query of queries) {
      const output = await this.search(query);
      if (output === null) continue;
      const parsed = parseSearchOutput(output);
      skippedLines += parsed.skippedLines;

      const rows = parsed.rows.filter((row) => row.moduleId.startsWith('exploit/'));
      if (rows.length === 0) continue;

      const candidates = this.cap(rankCandidates(rows)).map((row) => ({ ...row, service }));
      console.log(`[resolver] Port ${service.port}: "${query}" matched ${rows.length} exploit module(s)`);
      return { candidates, skippedLines };
    }

    return { candidates: [], skippedLines };
  }

  private async search(query: string): Promise<string | null> {
    try {
      return await this.adapter.execute(query, this.options.commandTimeoutMs);
    } catch (error) {
      if (!isNetstrikeError(error, 'TimeoutError')) throw error;
      console.warn(`[resolver] "${query}" timed out, skipping`);
      await this.adapter.recover(this.options.recoveryGraceMs);
      return null;
    }
  }

  private cap<T>(items: T[]): T[] {
    const max = this.options.maxCandidates;
    return max !== undefined && max >= 0 ? items.slice(0, max) : items;
  }

  private async describeAll(candidates: UndescribedCandidate[]): Promise<ExploitCandidate[]> {
    const described: ExploitCandidate[] = [];
    for (const candidate of candidates) {
      const requiredOptions = this.options.describeOptions ? await this.fetchOptions(candidate.moduleId) : {};
      described.push(Object.freeze({ ...candidate, requiredOptions: Object.freeze(requiredOptions) }));
    }
    return described;
  }

  private async fetchOptions(moduleId: string): Promise<Record<string, ModuleOption>> {
    try {
      const useOutput = await this.adapter.execute(`use ${moduleId}`, this.options.commandTimeoutMs);
      if (MSF_LOAD_FAILURE.test(useOutput)) return {};

      const optionsOutput = await this.adapter.execute('show options', this.options.commandTimeoutMs);
      await this.adapter.execute('back', this.options.commandTimeoutMs);
      return parseOptionsTable(optionsOutput);
    } catch (error) {
      if (isNetstrikeError(error, 'TimeoutError')) {
        console.warn(`[resolver] Timed out describing ${moduleId}, continuing without option metadata`);
        await this.adapter.recover(this.options.recoveryGraceMs);
        return {};
      }
      throw error;
    }
  }
}
