// src/tests/TranscriptStripper.test.ts
import { TranscriptStripper } from '../services/TranscriptStripper';

const num = (n: number): string => String(n).padStart(11);
const footer = (page: number): string => String(page).padStart(72);

describe('TranscriptStripper', () => {
  let stripper: TranscriptStripper;

  beforeEach(() => {
    stripper = new TranscriptStripper();
  });

  it('should remove headers, numbers, spacing and footer', () => {
    const formatted = [
      '', '', '', '', '',
      `${num(1)}                           EXAMINATION`,
      '',
      `${num(2)}    BY MS. RIVERA:`,
      '',
      `${num(3)}         Q    Good morning.  Please state your name.`,
      '',
      `${num(4)}         A    Casey Brennan.`,
      '',
      '',
      footer(1)
    ].join('\n');

    expect(stripper.strip(formatted)).toBe([
      '                       EXAMINATION',
      'BY MS. RIVERA:',
      '     Q    Good morning.  Please state your name.',
      '     A    Casey Brennan.'
    ].join('\n'));
  });

  it('should drop padding lines and page break markers', () => {
    const formatted = [
      `${num(1)}    First page text`,
      '',
      '',
      footer(1),
      '\f',
      '', '', '', '',
      `${num(1)}    Second page text`,
      '',
      `${num(2)}`,
      '',
      `${num(3)}`,
      '',
      '',
      footer(2)
    ].join('\n');

    expect(stripper.strip(formatted)).toBe('First page text\nSecond page text');
  });

  it('should keep numbered lines whose content is empty or digits', () => {
    const formatted = `${num(1)}    \n\n${num(2)}    2024\n\n${footer(1)}`;

    expect(stripper.strip(formatted)).toBe('\n2024');
  });

  it('should discard a digits-only line found among content lines', () => {
    const text = 'Plain line one\n   17\nPlain line two';

    expect(stripper.strip(text)).toBe('Plain line one\nPlain line two');
  });

  it('should leave plain text unchanged apart from blank lines', () => {
    const text = '     Q    Where were you?\n\n     A    At home.';

    expect(stripper.strip(text)).toBe('     Q    Where were you?\n     A    At home.');
    expect(stripper.strip(stripper.strip(text))).toBe('     Q    Where were you?\n     A    At home.');
  });

  it('should accept Windows line endings', () => {
    const formatted = `\r\n${num(1)}    Line one\r\n\r\n${num(2)}    Line two\r\n`;

    expect(stripper.strip(formatted)).toBe('Line one\nLine two');
  });

  it('should return an empty string for empty input', () => {
    expect(stripper.strip('')).toBe('');
    expect(stripper.strip('\n\n\n')).toBe('');
  });
});
