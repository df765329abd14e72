import type { SessionConfig } from './cli-config';
import { otherLanguage } from './i18n/Translator';
import { CardRenderer } from './render/CardRenderer';
import { PromptInterruptedError, type IOutput, type IPrompter } from './io/types';
import type { CalculateAgeUseCase } from '../../../modules/calendar/application/use-cases/CalculateAgeUseCase';
import type { ConvertGregorianToJalaliUseCase } from '../../../modules/calendar/application/use-cases/ConvertGregorianToJalaliUseCase';
import type { ConvertJalaliToGregorianUseCase } from '../../../modules/calendar/application/use-cases/ConvertJalaliToGregorianUseCase';
import type { AgeReport } from '../../../modules/calendar/application/types/AgeReport';
import type { ConversionResult } from '../../../modules/calendar/application/types/ConversionResult';
import type { JalaliConverter } from '../../../modules/calendar/domain/services/JalaliConverter';
import { normalizeDigits } from '../../../modules/calendar/domain/services/DateParser';
import type {
  CurrentDateResolver,
  ResolvedToday,
} from '../../../modules/clock/domain/services/CurrentDateResolver';
import { isDomainError, type DomainError } from '../../../domain/errors/DomainError';
import { InvalidFormatError } from '../../../domain/errors/InvalidFormatError';
import { InvalidCalendarDateError } from '../../../domain/errors/InvalidCalendarDateError';
import { FutureBirthdateError } from '../../../domain/errors/FutureBirthdateError';
import { CapabilityUnavailableError } from '../../../domain/errors/CapabilityUnavailableError';
import { DateOutOfRangeError } from '../../../domain/errors/DateOutOfRangeError';
import type { ILogger } from '../../../shared/logger';

const BACK_COMMANDS: ReadonlySet<string> = new Set(['b', 'back']);
const YES_ANSWERS: ReadonlySet<string> = new Set(['y', 'yes', 'بله', 'آره']);

type InputCalendar = 'gregorian' | 'jalali';
type ConversionDirection = 'toGregorian' | 'toJalali';

export interface CliAppDependencies {
  prompter: IPrompter;
  output: IOutput;
  session: SessionConfig;
  calculateAge: CalculateAgeUseCase;
  convertGregorianToJalali: ConvertGregorianToJalaliUseCase;
  convertJalaliToGregorian: ConvertJalaliToGregorianUseCase;
  jalaliConverter: JalaliConverter;
  currentDateResolver: CurrentDateResolver;
  logger: ILogger;
}

/**
 * CliApp - Interactive menu driving the age and conversion use cases
 *
 * **Menu:**
 * - 1) Age from a Gregorian birthdate
 * - 2) Age from a Jalali birthdate
 * - 3) Jalali → Gregorian
 * - 4) Gregorian → Jalali
 * - 5) Language
 * - 0) Exit
 *
 * **Error Handling:**
 * - Domain errors are printed and the same prompt is asked again
 * - PromptInterruptedError ends the session with a farewell; run() resolves normally
 * - Anything else propagates to the caller
 */
export class CliApp {
  private session: SessionConfig;
  private renderer: CardRenderer;

  public constructor(private readonly deps: CliAppDependencies) {
    this.session = deps.session;
    this.renderer = new CardRenderer(deps.session);
  }

  public get currentSession(): SessionConfig {
    return this.session;
  }

  public async run(): Promise<void> {
    try {
      await this.mainMenu();
    } catch (error) {
      if (!(error instanceof PromptInterruptedError)) {
        throw error;
      }
      this.write('');
      this.write(this.renderer.paint(this.renderer.t('interrupted'), 'green'));
    } finally {
      this.deps.prompter.close();
    }
  }

  private async mainMenu(): Promise<void> {
    for (;;) {
      this.write('');
      this.writeAll(this.renderer.mainMenu());

      const choice = normalizeDigits(await this.ask(this.renderer.t('select'))).trim();
      switch (choice) {
        case '1':
          await this.ageFlow('gregorian');
          break;
        case '2':
          await this.ageFlow('jalali');
          break;
        case '3':
          await this.conversionFlow('toGregorian');
          break;
        case '4':
          await this.conversionFlow('toJalali');
          break;
        case '5':
          await this.languageMenu();
          break;
        case '0':
          this.write(this.renderer.paint(this.renderer.t('goodbye'), 'green'));
          return;
        default:
          this.write(this.renderer.paint(this.renderer.t('invalidChoice'), 'red'));
      }
    }
  }

  private async ageFlow(calendar: InputCalendar): Promise<void> {
    if (calendar === 'jalali' && !this.requireJalali()) {
      return;
    }
    this.deps.logger.debug({ msg: 'Age flow started', calendar });

    const resolved = await this.deps.currentDateResolver.resolveToday();
    this.announceToday(resolved);

    const question =
      calendar === 'gregorian' ? 'enterBirthdateGregorian' : 'enterBirthdateJalali';
    for (;;) {
      const raw = await this.askForEntry(this.renderer.t(question));
      if (raw === null) {
        return;
      }

      let report: AgeReport;
      try {
        report =
          calendar === 'gregorian'
            ? this.deps.calculateAge.fromGregorianInput(raw, resolved.date)
            : this.deps.calculateAge.fromJalaliInput(raw, resolved.date);
      } catch (error) {
        this.reportError(error);
        continue;
      }

      this.write('');
      this.writeAll(this.renderer.ageCard(report));
      this.write('');

      const again = (await this.ask(this.renderer.t('tryAnother'))).trim().toLowerCase();
      if (!YES_ANSWERS.has(again)) {
        return;
      }
    }
  }

  private async conversionFlow(direction: ConversionDirection): Promise<void> {
    if (!this.requireJalali()) {
      return;
    }
    this.deps.logger.debug({ msg: 'Conversion flow started', direction });

    const question = direction === 'toGregorian' ? 'enterJalaliDate' : 'enterGregorianDate';
    const title =
      direction === 'toGregorian' ? 'convertJalaliToGregorian' : 'convertGregorianToJalali';
    for (;;) {
      const raw = await this.askForEntry(this.renderer.t(question));
      if (raw === null) {
        return;
      }

      let result: ConversionResult;
      try {
        result =
          direction === 'toGregorian'
            ? this.deps.convertJalaliToGregorian.execute(raw)
            : this.deps.convertGregorianToJalali.execute(raw);
      } catch (error) {
        this.reportError(error);
        continue;
      }

      this.write('');
      this.writeAll(this.renderer.conversionCard(this.renderer.t(title), result));
      this.write('');
    }
  }

  private async languageMenu(): Promise<void> {
    this.write('');
    this.writeAll(this.renderer.languageMenu());

    const choice = normalizeDigits(await this.ask(this.renderer.languagePrompt())).trim();
    if (choice === '1') {
      this.session = { ...this.session, language: otherLanguage(this.session.language) };
      this.renderer = new CardRenderer(this.session);
      this.deps.logger.debug({ msg: 'Language switched', language: this.session.language });
    }
  }

  private requireJalali(): boolean {
    if (this.deps.jalaliConverter.isAvailable()) {
      return true;
    }
    this.write(this.renderer.paint(this.renderer.t('needJalali'), 'red'));
    return false;
  }

  private announceToday(resolved: ResolvedToday): void {
    switch (resolved.source) {
      case 'fallback':
        this.write(
          this.renderer.paint(
            this.renderer.t('fallbackWarning', { date: resolved.date.toString() }),
            'red'
          )
        );
        break;
      case 'online':
        this.write(
          this.renderer.paint(this.renderer.t('onlineInfo', { endpoint: resolved.endpoint }), 'blue')
        );
        break;
      case 'local':
        break;
    }
  }

  /**
   * Reads a date entry with digits normalized; null when the user asked to go back
   */
  private async askForEntry(question: string): Promise<string | null> {
    const raw = normalizeDigits(await this.ask(question)).trim();
    return BACK_COMMANDS.has(raw.toLowerCase()) ? null : raw;
  }

  private reportError(error: unknown): void {
    if (!isDomainError(error)) {
      throw error;
    }
    this.write(
      this.renderer.paint(this.renderer.t('error', { message: this.describe(error) }), 'red')
    );
  }

  private describe(error: DomainError): string {
    const { t } = this.renderer;
    if (error instanceof InvalidFormatError) {
      return t(error.calendar === 'gregorian' ? 'errorFormatGregorian' : 'errorFormatJalali');
    }
    if (error instanceof InvalidCalendarDateError) {
      return t(error.calendar === 'gregorian' ? 'errorInvalidGregorian' : 'errorInvalidJalali', {
        value: error.value,
      });
    }
    if (error instanceof DateOutOfRangeError) {
      return t('errorOutOfRange', { value: error.value, backend: error.backend });
    }
    if (error instanceof FutureBirthdateError) {
      return t('errorFutureBirthdate');
    }
    if (error instanceof CapabilityUnavailableError) {
      return t('needJalali');
    }
    return error.message;
  }

  private ask(question: string): Promise<string> {
    return this.deps.prompter.ask(this.renderer.paint(question, 'yellow'));
  }

  private write(line: string): void {
    this.deps.output.writeLine(line);
  }

  private writeAll(lines: readonly string[]): void {
    lines.forEach((line) => this.write(line));
  }
}
