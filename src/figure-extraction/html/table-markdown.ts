import { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { extractCaptionText } from '../captions/caption-extractor';

/**
 * Markdown for an HTML table: first row as header, then a dash separator,
 * then the remaining rows. Cells keep inline math as `$...$`.
 * Returns null for a table without rows or with an empty header row.
 */
export function tableToMarkdown($: CheerioAPI, table: Element): string | null {
  const rows = $(table)
    .find('tr')
    .toArray()
    .map((row) =>
      $(row)
        .children('th, td')
        .toArray()
        .map((cell) => escapeCell(extractCaptionText(cell))),
    );

  if (rows.length === 0) {
    return null;
  }

  const [header, ...body] = rows;
  if (header.length === 0) {
    return null;
  }

  const lines = [formatRow(header), `|${header.map(() => '---').join('|')}|`];
  for (const cells of body) {
    if (cells.length === 0) {
      continue;
    }
    const padded = cells.length < header.length ? [...cells, ...Array<string>(header.length - cells.length).fill('')] : cells;
    lines.push(formatRow(padded));
  }
  return lines.join('\n');
}

function formatRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}
