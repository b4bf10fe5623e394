import { z } from 'zod';
import { Injectable } from '../../shared/decorators';
import { IndicatorFetchError, isRateLimitError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { fetchWithRetry, RetryOptions, sleep } from '../../shared/retry';
import { SerialExecutor } from '../../shared/serial-executor';
import { IIndicatorHistoryProvider } from '../../domain/interfaces/services.interface';
import { IndicatorSample, IndicatorType } from '../../domain/types/indicator.type';

const FredObservationSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  value: z.string(),
});

const FredResponseSchema = z.object({
  observations: z.array(FredObservationSchema),
});

export type FredObservation = z.infer<typeof FredObservationSchema>;

export const FRED_SERIES: Record<IndicatorType, string> = {
  [IndicatorType.VIX]: 'VIXCLS',
  [IndicatorType.DXY]: 'DTWEXBGS',
  [IndicatorType.M2]: 'M2SL',
};

export interface FredApiClientOptions {
  apiKey?: string;
  baseUrl: string;
  requestsPerSecond?: number;
  retry?: RetryOptions;
  now?: () => number;
}

const DAY_MS = 86_400_000;

// 4xx other than 429 means the request itself is wrong
function isRetryable(error: unknown): boolean {
  if (isRateLimitError(error)) return true;
  if (error instanceof IndicatorFetchError) return error.statusCode >= 500;
  return true;
}

/** FRED reports gaps as "." and dates as plain calendar days (taken as UTC). */
export function toSamples(observations: readonly FredObservation[]): IndicatorSample[] {
  const samples: IndicatorSample[] = [];
  for (const observation of observations) {
    const value = Number(observation.value);
    if (observation.value === '.' || !Number.isFinite(value)) continue;
    samples.push({ timestamp: Date.parse(`${observation.date}T00:00:00Z`), value });
  }
  return samples.sort((a, b) => a.timestamp - b.timestamp);
}

@Injectable()
export class FredApiClient implements IIndicatorHistoryProvider {
  readonly providerId = 'fred';
  private readonly logger = new Logger(FredApiClient.name);
  private readonly requests = new SerialExecutor();
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private lastRequestTime = 0;

  constructor(private readonly options: FredApiClientOptions) {
    this.minIntervalMs = 1000 / (options.requestsPerSecond ?? 2);
    this.now = options.now ?? Date.now;
  }

  async fetchIndicatorHistory(indicator: IndicatorType, days: number): Promise<IndicatorSample[]> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new IndicatorFetchError('FRED_API_KEY is not configured', 401, 'FRED', indicator);
    }

    const seriesId = FRED_SERIES[indicator];
    const start = new Date(this.now() - days * DAY_MS).toISOString().slice(0, 10);
    const url = new URL(`${this.options.baseUrl}/series/observations`);
    url.searchParams.set('series_id', seriesId);
    url.searchParams.set('api_key', apiKey);
    url.searchParams.set('file_type', 'json');
    url.searchParams.set('observation_start', start);

    const observations = await this.requests.run(() =>
      fetchWithRetry(() => this.request(url, indicator), {
        shouldRetry: isRetryable,
        ...this.options.retry,
      }),
    );
    const samples = toSamples(observations);
    this.logger.debug(`Fetched ${samples.length} ${indicator} samples (${seriesId} since ${start})`);
    return samples;
  }

  private async request(url: URL, indicator: IndicatorType): Promise<FredObservation[]> {
    await this.rateLimit();

    const response = await fetch(url.toString());
    if (!response.ok) {
      throw new IndicatorFetchError(
        `FRED API returned HTTP ${response.status}`,
        response.status,
        'FRED',
        indicator,
      );
    }

    const parsed = FredResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new IndicatorFetchError(
        `Invalid FRED response: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
        response.status,
        'FRED',
        indicator,
      );
    }
    return parsed.data.observations;
  }

  private async rateLimit(): Promise<void> {
    const elapsed = this.now() - this.lastRequestTime;
    if (elapsed < this.minIntervalMs) {
      await sleep(this.minIntervalMs - elapsed);
    }
    this.lastRequestTime = this.now();
  }
}
