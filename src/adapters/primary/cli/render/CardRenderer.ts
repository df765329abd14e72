import type { SessionConfig } from '../cli-config';
import {
  createTranslator,
  isRightToLeft,
  otherLanguage,
  type Language,
  type Translate,
} from '../i18n/Translator';
import { paint, type Color } from './ansi';
import type { AgeReport } from '../../../../modules/calendar/application/types/AgeReport';
import type { ConversionResult } from '../../../../modules/calendar/application/types/ConversionResult';

/** Total box width, borders included */
export const BOX_WIDTH = 56;
const INNER_WIDTH = BOX_WIDTH - 2;

/**
 * CardRenderer
 *
 * Turns structured results into box-drawn lines for one session. Persian
 * sessions right-align content and put the value before the label; text is
 * printed in logical order (no glyph shaping).
 *
 * Padding is computed on the uncolored text so ANSI sequences never shift
 * the right border.
 */
export class CardRenderer {
  public readonly t: Translate;
  private readonly rtl: boolean;

  public constructor(private readonly session: SessionConfig) {
    this.t = createTranslator(session.language);
    this.rtl = isRightToLeft(session.language);
  }

  public paint(text: string, color: Color): string {
    return paint(text, color, this.session.color);
  }

  public title(text: string): string {
    const label = ` ${text.trim()} `;
    const fill = '═'.repeat(Math.max(0, INNER_WIDTH - label.length));
    return this.rtl ? `╔${fill}${label}╗` : `╔${label}${fill}╗`;
  }

  public line(label: string, value: string, color?: Color): string {
    const plain = this.rtl ? `${value}  ${label}` : `${label}: ${value}`;
    if (plain.length >= INNER_WIDTH) {
      return `║${plain.slice(0, INNER_WIDTH)}║`;
    }

    const padding = ' '.repeat(INNER_WIDTH - plain.length);
    const shown = color ? this.paint(value, color) : value;
    const content = this.rtl ? `${padding}${shown}  ${label}` : `${label}: ${shown}${padding}`;
    return `║${content}║`;
  }

  public bottom(): string {
    return `╚${'═'.repeat(INNER_WIDTH)}╝`;
  }

  public mainMenu(): string[] {
    const { t } = this;
    return [
      this.title(t('mainMenu')),
      this.line('1)', t('ageGregorianInput')),
      this.line('2)', t('ageJalaliInput')),
      this.line('3)', t('convertJalaliToGregorian')),
      this.line('4)', t('convertGregorianToJalali')),
      this.line('5)', t('menuLanguage')),
      this.line('0)', t('menuExit')),
      this.bottom(),
    ];
  }

  public languageMenu(): string[] {
    const { t } = this;
    return [
      this.title(t('languageMenu')),
      this.line(t('currentLanguage'), this.languageName(this.session.language), 'cyan'),
      this.line(t('switchTo'), this.languageName(otherLanguage(this.session.language)), 'green'),
      this.bottom(),
    ];
  }

  public languagePrompt(): string {
    const alternative = this.languageName(otherLanguage(this.session.language));
    const arrow = this.rtl ? '← ' : '-> ';
    return `${arrow}[1] ${this.t('switchTo')} ${alternative} | [0] ${this.t('back')}: `;
  }

  public ageCard(report: AgeReport): string[] {
    const { t } = this;
    const lines = [
      this.title(t('ageCard')),
      this.line(t('birthGregorian'), report.born.toString(), 'green'),
      this.line(t('todayGregorian'), report.today.toString(), 'green'),
    ];

    if (report.jalali) {
      lines.push(
        this.line(t('birthJalali'), report.jalali.born.toString(), 'magenta'),
        this.line(t('todayJalali'), report.jalali.today.toString(), 'magenta')
      );
    }

    const { years, months, days } = report.age;
    lines.push(this.line(t('age'), t('yearsMonthsDays', { years, months, days }), 'cyan'));

    if (report.jalali) {
      lines.push(
        this.line(t('nextBirthdayGregorian'), report.nextBirthday.date.toString(), 'blue'),
        this.line(t('nextBirthdayJalali'), report.jalali.nextBirthday.toString(), 'blue')
      );
    } else {
      lines.push(this.line(t('nextBirthday'), report.nextBirthday.date.toString(), 'blue'));
    }

    lines.push(
      this.line(t('in'), t('days', { count: report.nextBirthday.daysUntil }), 'cyan'),
      this.bottom()
    );
    return lines;
  }

  public conversionCard(titleText: string, result: ConversionResult): string[] {
    return [
      this.title(titleText),
      this.line(this.t('conversionGregorian'), result.gregorian.toString(), 'green'),
      this.line(this.t('conversionJalali'), result.jalali.toString(), 'magenta'),
      this.bottom(),
    ];
  }

  private languageName(language: Language): string {
    return language === 'fa' ? this.t('languageFa') : this.t('languageEn');
  }
}
