// src/tests/TranscriptPaginator.test.ts
import { TranscriptPaginator } from '../services/TranscriptPaginator';
import { LINES_PER_PAGE, PAGE_BREAK } from '../config/layout';

const num = (n: number): string => String(n).padStart(11);
const footer = (page: number): string => String(page).padStart(72);
const header = '\n\n\n\n\n';

function contentLines(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `Line ${i + 1} of testimony`);
}

function countOccurrences(text: string, search: string): number {
  return text.split(search).length - 1;
}

describe('TranscriptPaginator', () => {
  let paginator: TranscriptPaginator;

  beforeEach(() => {
    paginator = new TranscriptPaginator();
  });

  it('should number a short document and pad it to 25 lines', () => {
    const result = paginator.paginate('alpha\nbeta\ngamma');

    let expected = header;
    expected += `${num(1)}    alpha\n\n`;
    expected += `${num(2)}    beta\n\n`;
    expected += `${num(3)}    gamma\n\n`;
    for (let n = 4; n <= 25; n++) {
      expected += `${num(n)}\n\n`;
    }
    expected += `\n${footer(1)}`;

    expect(result.pageCount).toBe(1);
    expect(result.text).toBe(expected);
  });

  it('should right-align line numbers in 11 columns followed by 4 spaces', () => {
    const lines = paginator.paginate(contentLines(12).join('\n')).text.split('\n');

    expect(lines[5]).toBe('          1    Line 1 of testimony');
    expect(lines[27]).toBe('         12    Line 12 of testimony');
  });

  it('should right-align the page number in 72 columns', () => {
    const lines = paginator.paginate('only line').text.split('\n');
    const last = lines[lines.length - 1];

    expect(last).toHaveLength(72);
    expect(last.trim()).toBe('1');
  });

  it('should drop blank lines from the input', () => {
    const result = paginator.paginate('\n\nfirst\n   \n\nsecond\n');
    const lines = result.text.split('\n');

    expect(lines[5]).toBe(`${num(1)}    first`);
    expect(lines[7]).toBe(`${num(2)}    second`);
    expect(lines[9]).toBe(num(3));
  });

  it('should keep leading indentation of content lines', () => {
    const lines = paginator.paginate('     Q    Where do you work?').text.split('\n');

    expect(lines[5]).toBe(`${num(1)}         Q    Where do you work?`);
  });

  it('should fill exactly one page with 25 lines and no page break', () => {
    const result = paginator.paginate(contentLines(LINES_PER_PAGE).join('\n'));

    expect(result.pageCount).toBe(1);
    expect(result.text).not.toContain(PAGE_BREAK);
    expect(result.text.endsWith(`${num(25)}    Line 25 of testimony\n\n\n${footer(1)}`)).toBe(true);
    expect(countOccurrences(result.text, footer(1))).toBe(1);
  });

  it('should start page 2 at line 1 for the 26th content line', () => {
    const result = paginator.paginate(contentLines(26).join('\n'));

    expect(result.pageCount).toBe(2);
    expect(result.text).toContain(
      `${num(25)}    Line 25 of testimony\n\n\n${footer(1)}\n${PAGE_BREAK}${header}${num(1)}    Line 26 of testimony\n\n${num(2)}\n\n`
    );
    expect(result.text.endsWith(`${num(25)}\n\n\n${footer(2)}`)).toBe(true);
    expect(countOccurrences(result.text, PAGE_BREAK)).toBe(1);
  });

  it('should end two full pages on the second footer', () => {
    const result = paginator.paginate(contentLines(50).join('\n'));

    expect(result.pageCount).toBe(2);
    expect(countOccurrences(result.text, PAGE_BREAK)).toBe(1);
    expect(result.text.endsWith(`${num(25)}    Line 50 of testimony\n\n\n${footer(2)}`)).toBe(true);
  });

  it('should emit only the header for a document without content', () => {
    expect(paginator.paginate('')).toEqual({ text: header, pageCount: 1 });
    expect(paginator.paginate('\n  \n\t\n')).toEqual({ text: header, pageCount: 1 });
  });
});
