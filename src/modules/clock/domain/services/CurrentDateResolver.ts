import type { ISystemClock } from '../../application/ports/ISystemClock';
import type { ITimeSource } from '../../application/ports/ITimeSource';
import { GregorianDate } from '../../../calendar/domain/value-objects/GregorianDate';
import type { ILogger } from '../../../../shared/logger';
import { FALLBACK_TODAY, PLAUSIBLE_YEAR_WINDOW } from '../../config/time-source-config';

/**
 * Which branch produced "today"
 *
 * - `local`: the system clock, trusted as-is
 * - `online`: the first external time source that answered plausibly
 * - `fallback`: the fixed default date; callers should warn the user
 */
export type ResolvedToday =
  | { source: 'local'; date: GregorianDate }
  | { source: 'online'; date: GregorianDate; endpoint: string }
  | { source: 'fallback'; date: GregorianDate };

export type TodaySource = ResolvedToday['source'];

export interface YearWindow {
  min: number;
  max: number;
}

export interface CurrentDateResolverOptions {
  plausibleYears?: YearWindow;
  fallback?: GregorianDate;
}

/**
 * CurrentDateResolver
 *
 * **Resolution order:**
 * 1. System clock, if it reads and its year lies in the plausible window
 * 2. Each time source in order; the first plausible answer wins
 * 3. The fallback date (2000-01-01)
 *
 * **Error Handling:**
 * - NEVER throws - every clock or source failure is logged and skipped
 * - No retries beyond the ordered list of sources
 */
export class CurrentDateResolver {
  private readonly plausibleYears: YearWindow;
  private readonly fallback: GregorianDate;

  /**
   * @param clock - Local system clock
   * @param timeSources - External sources, tried in order
   * @param logger - Pino logger for structured logging
   * @param options - Overrides for the plausible window and fallback date
   */
  public constructor(
    private readonly clock: ISystemClock,
    private readonly timeSources: readonly ITimeSource[],
    private readonly logger: ILogger,
    options: CurrentDateResolverOptions = {}
  ) {
    this.plausibleYears = options.plausibleYears ?? PLAUSIBLE_YEAR_WINDOW;
    this.fallback =
      options.fallback ?? GregorianDate.of(FALLBACK_TODAY.year, FALLBACK_TODAY.month, FALLBACK_TODAY.day);
  }

  public isPlausible(date: GregorianDate): boolean {
    return date.year >= this.plausibleYears.min && date.year <= this.plausibleYears.max;
  }

  public async resolveToday(): Promise<ResolvedToday> {
    const local = this.readClock();
    if (local !== null && this.isPlausible(local)) {
      return { source: 'local', date: local };
    }

    this.logger.warn({
      msg: 'System clock not trusted, trying time sources',
      clockDate: local?.toString() ?? null,
      sources: this.timeSources.length,
    });

    for (const source of this.timeSources) {
      try {
        const date = await source.fetchToday();
        if (this.isPlausible(date)) {
          this.logger.info({
            msg: 'Using date from time source',
            endpoint: source.endpoint,
            date: date.toString(),
          });
          return { source: 'online', date, endpoint: source.endpoint };
        }
        this.logger.warn({
          msg: 'Time source returned implausible date',
          endpoint: source.endpoint,
          date: date.toString(),
        });
      } catch (error) {
        this.logger.warn({
          msg: 'Time source failed',
          endpoint: source.endpoint,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.warn({ msg: 'Using fallback date', date: this.fallback.toString() });
    return { source: 'fallback', date: this.fallback };
  }

  private readClock(): GregorianDate | null {
    try {
      return this.clock.today();
    } catch (error) {
      this.logger.warn({
        msg: 'System clock could not be read',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
