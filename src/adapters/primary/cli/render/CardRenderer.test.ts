import { CardRenderer, BOX_WIDTH } from './CardRenderer';
import { GregorianDate } from '../../../../modules/calendar/domain/value-objects/GregorianDate';
import { JalaliDate } from '../../../../modules/calendar/domain/value-objects/JalaliDate';
import type { AgeReport } from '../../../../modules/calendar/application/types/AgeReport';

const boxed = (content: string): string => `║${content.padEnd(BOX_WIDTH - 2)}║`;
const boxedRight = (content: string): string => `║${content.padStart(BOX_WIDTH - 2)}║`;

describe('CardRenderer', () => {
  const report: AgeReport = {
    born: GregorianDate.of(1990, 7, 15),
    today: GregorianDate.of(2025, 10, 18),
    age: { years: 35, months: 3, days: 3 },
    nextBirthday: { date: GregorianDate.of(2026, 7, 15), daysUntil: 270 },
  };

  describe('English, no colors', () => {
    const renderer = new CardRenderer({ language: 'en', color: false });

    it('should draw a title bar across the full width', () => {
      const title = renderer.title('AGE CALCULATOR');

      expect(title).toBe(`╔ AGE CALCULATOR ${'═'.repeat(38)}╗`);
      expect(title).toHaveLength(BOX_WIDTH);
    });

    it('should draw the bottom border', () => {
      expect(renderer.bottom()).toBe(`╚${'═'.repeat(54)}╝`);
    });

    it('should left-align label and value', () => {
      const line = renderer.line('Age', '35 years, 3 months, 3 days');

      expect(line).toBe(boxed('Age: 35 years, 3 months, 3 days'));
      expect(line).toHaveLength(BOX_WIDTH);
    });

    it('should truncate lines that do not fit', () => {
      const line = renderer.line('Label', 'x'.repeat(80));

      expect(line).toBe(`║Label: ${'x'.repeat(47)}║`);
      expect(line).toHaveLength(BOX_WIDTH);
    });

    it('should render the main menu', () => {
      const lines = renderer.mainMenu();

      expect(lines).toHaveLength(8);
      expect(lines[1]).toBe(boxed('1): Calculate Age (Gregorian input)'));
      expect(lines[6]).toBe(boxed('0): Exit'));
    });

    it('should render an age card without Jalali lines', () => {
      const lines = renderer.ageCard(report);

      expect(lines).toEqual([
        renderer.title('AGE CALCULATOR'),
        boxed('Birthdate (G): 1990-07-15'),
        boxed('Today (G): 2025-10-18'),
        boxed('Age: 35 years, 3 months, 3 days'),
        boxed('Next BD: 2026-07-15'),
        boxed('In: 270 days'),
        renderer.bottom(),
      ]);
    });

    it('should render an age card with Jalali lines', () => {
      const lines = renderer.ageCard({
        ...report,
        jalali: {
          born: JalaliDate.of(1369, 4, 24),
          today: JalaliDate.of(1404, 7, 26),
          nextBirthday: JalaliDate.of(1405, 4, 24),
        },
      });

      expect(lines).toEqual([
        renderer.title('AGE CALCULATOR'),
        boxed('Birthdate (G): 1990-07-15'),
        boxed('Today (G): 2025-10-18'),
        boxed('Birthdate (J): 1369-04-24'),
        boxed('Today (J): 1404-07-26'),
        boxed('Age: 35 years, 3 months, 3 days'),
        boxed('Next BD (G): 2026-07-15'),
        boxed('Next BD (J): 1405-04-24'),
        boxed('In: 270 days'),
        renderer.bottom(),
      ]);
    });

    it('should render a conversion card', () => {
      const lines = renderer.conversionCard('Convert Gregorian → Shamsi', {
        gregorian: GregorianDate.of(2025, 10, 18),
        jalali: JalaliDate.of(1404, 7, 26),
      });

      expect(lines[1]).toBe(boxed('Gregorian / میلادی: 2025-10-18'));
      expect(lines[2]).toBe(boxed('Jalali / شمسی: 1404-07-26'));
      expect(lines).toHaveLength(4);
    });

    it('should offer Persian in the language menu', () => {
      expect(renderer.languageMenu()).toEqual([
        renderer.title('LANGUAGE'),
        boxed('Current: English'),
        boxed('Switch to: Persian (فارسی)'),
        renderer.bottom(),
      ]);
      expect(renderer.languagePrompt()).toBe('-> [1] Switch to Persian (فارسی) | [0] Back: ');
    });
  });

  describe('Persian, no colors', () => {
    const renderer = new CardRenderer({ language: 'fa', color: false });

    it('should put the title text at the right end', () => {
      expect(renderer.title('منوی اصلی')).toBe(
        `╔${'═'.repeat(54 - ' منوی اصلی '.length)} منوی اصلی ╗`
      );
    });

    it('should right-align with the value before the label', () => {
      expect(renderer.line('سن', '35 سال')).toBe(boxedRight('35 سال  سن'));
    });

    it('should use the right-to-left arrow in the language prompt', () => {
      expect(renderer.languagePrompt()).toBe('← [1] تغییر به انگلیسی | [0] بازگشت: ');
    });
  });

  describe('colors', () => {
    it('should color only the value and keep the border aligned', () => {
      const renderer = new CardRenderer({ language: 'en', color: true });

      expect(renderer.line('Age', 'v', 'cyan')).toBe(`║Age: \u001b[36mv\u001b[0m${' '.repeat(48)}║`);
    });

    it('should pad before the colored value in right-to-left lines', () => {
      const renderer = new CardRenderer({ language: 'fa', color: true });

      expect(renderer.line('سن', 'v', 'cyan')).toBe(`║${' '.repeat(49)}\u001b[36mv\u001b[0m  سن║`);
    });
  });
});
