import { DurationSample, LookbackWindow } from '../types';
import { DataUnavailableError, getErrorMessage } from '../utils/errors';
import { RetryOptions, withRetry } from '../utils/retry';
import { InMemoryDurationCatalog, normalizeTestName } from './duration-catalog';

export interface StatsClientOptions {
  apiUrl: string;
  apiUser?: string;
  apiKey?: string;
  retry?: Partial<RetryOptions>;
}

export interface StatsQuery {
  project: string;
  taskName: string;
  buildVariant: string;
  window: LookbackWindow;
}

/**
 * One row of the test_stats endpoint, one per test and day
 */
export interface TestStatsEntry {
  test_file: string;
  date: string;
  num_pass: number;
  avg_duration_pass: number;
}

function isTestStatsEntry(value: unknown): value is TestStatsEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'test_file' in value &&
    typeof value.test_file === 'string' &&
    'date' in value &&
    typeof value.date === 'string' &&
    'num_pass' in value &&
    typeof value.num_pass === 'number' &&
    'avg_duration_pass' in value &&
    typeof value.avg_duration_pass === 'number'
  );
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Extract the rel="next" target from a Link header
 */
export function nextPageUrl(linkHeader: string | null): string | undefined {
  if (!linkHeader) return undefined;
  for (const part of linkHeader.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (match) return match[1];
  }
  return undefined;
}

export function toSamples(entries: readonly TestStatsEntry[]): DurationSample[] {
  return entries
    .filter(e => e.num_pass > 0)
    .map(e => ({
      test: normalizeTestName(e.test_file),
      durationSecs: e.avg_duration_pass,
      observedAt: new Date(`${e.date}T00:00:00Z`),
    }));
}

class HttpStatusError extends Error {
  constructor(readonly status: number, url: string) {
    super(`GET ${url} failed with HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Client for the CI provider's historic test stats.
 */
export class HistoricStatsClient {
  constructor(private readonly options: StatsClientOptions) {}

  buildUrl(query: StatsQuery): string {
    const base = this.options.apiUrl.replace(/\/+$/, '');
    const params = new URLSearchParams({
      after_date: formatDate(query.window.start),
      before_date: formatDate(query.window.end),
      group_num_days: '1',
      variants: query.buildVariant,
      tasks: query.taskName,
    });
    return `${base}/rest/v2/projects/${encodeURIComponent(query.project)}/test_stats?${params.toString()}`;
  }

  async fetchEntries(query: StatsQuery): Promise<TestStatsEntry[]> {
    const entries: TestStatsEntry[] = [];
    let url: string | undefined = this.buildUrl(query);
    const visited = new Set<string>();

    try {
      while (url && !visited.has(url)) {
        visited.add(url);
        const page: { body: unknown; next?: string } = await this.getPage(url);
        if (!Array.isArray(page.body)) {
          throw new DataUnavailableError(`Unexpected test stats response from ${url}`);
        }
        entries.push(...page.body.filter(isTestStatsEntry));
        url = page.next;
      }
    } catch (err: unknown) {
      if (err instanceof DataUnavailableError) throw err;
      const status = err instanceof HttpStatusError ? err.status : undefined;
      throw new DataUnavailableError(
        `Could not fetch test stats for ${query.taskName}: ${getErrorMessage(err)}`,
        status,
      );
    }

    return entries;
  }

  async fetchCatalog(query: StatsQuery): Promise<InMemoryDurationCatalog> {
    const entries = await this.fetchEntries(query);
    return new InMemoryDurationCatalog(toSamples(entries));
  }

  private async getPage(url: string): Promise<{ body: unknown; next?: string }> {
    return withRetry(
      async () => {
        const response = await fetch(url, { headers: this.headers() });
        if (!response.ok) {
          throw new HttpStatusError(response.status, url);
        }
        const body: unknown = await response.json();
        return { body, next: nextPageUrl(response.headers.get('link')) };
      },
      {
        // Client errors other than throttling will not get better on retry
        shouldRetry: err =>
          !(err instanceof HttpStatusError && err.status < 500 && err.status !== 429),
        ...this.options.retry,
      },
    );
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.apiUser) headers['Api-User'] = this.options.apiUser;
    if (this.options.apiKey) headers['Api-Key'] = this.options.apiKey;
    return headers;
  }
}
