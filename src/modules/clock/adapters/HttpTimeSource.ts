import axios, { type AxiosInstance, isAxiosError } from 'axios';
import type { ITimeSource } from '../application/ports/ITimeSource';
import { GregorianDate } from '../../calendar/domain/value-objects/GregorianDate';
import { TimeSourceResponseSchema } from '../../../shared/validation/schemas';
import { TimeSourceUnavailableError } from '../../../domain/errors/TimeSourceUnavailableError';
import { isDomainError } from '../../../domain/errors/DomainError';
import { logger } from '../../../shared/logger';

/**
 * HttpTimeSource
 *
 * Fetches today's date from an HTTP(S) endpoint that answers with a JSON
 * object whose `datetime` field starts with YYYY-MM-DD (worldtimeapi.org
 * style).
 *
 * **Features:**
 * - Per-request timeout, no retries
 * - Response validation using Zod schemas
 * - Every failure becomes TimeSourceUnavailableError
 */
export class HttpTimeSource implements ITimeSource {
  private readonly axiosInstance: AxiosInstance;

  /**
   * @param endpoint - URL to GET
   * @param timeoutMs - Abort the request after this many milliseconds
   */
  public constructor(
    public readonly endpoint: string,
    timeoutMs: number
  ) {
    this.axiosInstance = axios.create({
      timeout: timeoutMs,
      headers: {
        Accept: 'application/json',
      },
    });
  }

  public async fetchToday(): Promise<GregorianDate> {
    const startTime = Date.now();

    logger.debug({ msg: 'Time source request started', endpoint: this.endpoint });

    try {
      const response = await this.axiosInstance.get<unknown>(this.endpoint);

      const parsed = TimeSourceResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new TimeSourceUnavailableError(
          this.endpoint,
          `unexpected payload: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
        );
      }

      const [year, month, day] = parsed.data.datetime
        .slice(0, 10)
        .split('-')
        .map((part) => parseInt(part, 10));
      const date = GregorianDate.of(year ?? NaN, month ?? NaN, day ?? NaN);

      logger.debug({
        msg: 'Time source request succeeded',
        endpoint: this.endpoint,
        date: date.toString(),
        durationMs: Date.now() - startTime,
      });

      return date;
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof TimeSourceUnavailableError) {
        throw error;
      }

      if (isAxiosError(error)) {
        logger.debug({
          msg: 'Time source request failed',
          endpoint: this.endpoint,
          error: error.message,
          statusCode: error.response?.status,
          durationMs: duration,
        });
        throw new TimeSourceUnavailableError(this.endpoint, error.message);
      }

      // InvalidCalendarDateError from a datetime such as 2025-13-40
      if (isDomainError(error)) {
        throw new TimeSourceUnavailableError(this.endpoint, error.message);
      }

      throw new TimeSourceUnavailableError(
        this.endpoint,
        `unexpected error: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
