import { CliApp } from './CliApp';
import { getSessionConfig } from './cli-config';
import type { IOutput, IPrompter } from './io/types';
import { CalendarMath } from '../../../modules/calendar/domain/services/CalendarMath';
import { JalaliConverter } from '../../../modules/calendar/domain/services/JalaliConverter';
import { createJalaliCalendar } from '../../../modules/calendar/adapters/jalali/createJalaliCalendar';
import { getJalaliBackendConfig } from '../../../modules/calendar/config/jalali-backend-config';
import { CalculateAgeUseCase } from '../../../modules/calendar/application/use-cases/CalculateAgeUseCase';
import { ConvertGregorianToJalaliUseCase } from '../../../modules/calendar/application/use-cases/ConvertGregorianToJalaliUseCase';
import { ConvertJalaliToGregorianUseCase } from '../../../modules/calendar/application/use-cases/ConvertJalaliToGregorianUseCase';
import type { ISystemClock } from '../../../modules/clock/application/ports/ISystemClock';
import { SystemClock } from '../../../modules/clock/adapters/SystemClock';
import { HttpTimeSource } from '../../../modules/clock/adapters/HttpTimeSource';
import { getTimeSourceConfig } from '../../../modules/clock/config/time-source-config';
import { CurrentDateResolver } from '../../../modules/clock/domain/services/CurrentDateResolver';
import { logger as defaultLogger, type ILogger } from '../../../shared/logger';

export interface CreateCliAppOptions {
  prompter: IPrompter;
  output: IOutput;
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
  clock?: ISystemClock;
  logger?: ILogger;
}

/**
 * Factory function to create the CLI with all of its collaborators
 *
 * Reads configuration from the environment (Jalali backend, time sources,
 * language, colors) and wires use cases, services and adapters together.
 *
 * @returns Configured CliApp, ready to run()
 */
export function createCliApp(options: CreateCliAppOptions): CliApp {
  const env = options.env ?? process.env;
  const logger = options.logger ?? defaultLogger;

  const backend = getJalaliBackendConfig(env);
  const jalaliConverter = new JalaliConverter(createJalaliCalendar(backend));
  logger.debug({ msg: 'Jalali backend selected', backend });

  const timeSourceConfig = getTimeSourceConfig(env);
  const currentDateResolver = new CurrentDateResolver(
    options.clock ?? new SystemClock(),
    timeSourceConfig.urls.map((url) => new HttpTimeSource(url, timeSourceConfig.timeoutMs)),
    logger
  );

  const calendarMath = new CalendarMath();

  return new CliApp({
    prompter: options.prompter,
    output: options.output,
    session: getSessionConfig(env, options.isTTY ?? process.stdout.isTTY === true),
    calculateAge: new CalculateAgeUseCase(calendarMath, jalaliConverter),
    convertGregorianToJalali: new ConvertGregorianToJalaliUseCase(jalaliConverter),
    convertJalaliToGregorian: new ConvertJalaliToGregorianUseCase(jalaliConverter),
    jalaliConverter,
    currentDateResolver,
    logger,
  });
}
