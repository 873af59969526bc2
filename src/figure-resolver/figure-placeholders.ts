import { parseCanonicalId } from '../figure-extraction/identifiers/figure-id';
import { FigureResolveFn, ResolvedFigure } from './interfaces/resolved-figure.interface';

const FIGURE_PLACEHOLDER = /<FIGURE_ID>(\d+)(?:\.([a-z]))?<\/FIGURE_ID>/g;

/**
 * Replaces `<FIGURE_ID>3</FIGURE_ID>` / `<FIGURE_ID>3.a</FIGURE_ID>` tokens in
 * generated text. The first mention of a figure becomes a Markdown figure
 * block, later mentions (and figures with nothing to show) become `Figure 3`.
 * `resolve` is called once per distinct token.
 */
export async function substituteFigurePlaceholders(text: string, resolve: FigureResolveFn): Promise<string> {
  const tokens = new Set<string>();
  for (const match of text.matchAll(FIGURE_PLACEHOLDER)) {
    tokens.add(tokenDisplayId(match[1], match[2]));
  }
  if (tokens.size === 0) {
    return text;
  }

  const resolved = new Map<string, ResolvedFigure>();
  for (const token of tokens) {
    resolved.set(token, await resolve(token));
  }

  const placed = new Set<string>();
  const substituted = text.replace(FIGURE_PLACEHOLDER, (_match, number: string, letter: string | undefined) => {
    const displayId = tokenDisplayId(number, letter);
    const figure = resolved.get(displayId);
    if (!figure || placed.has(displayId)) {
      return `Figure ${displayId}`;
    }
    placed.add(displayId);
    return renderFigure(figure) ?? `Figure ${displayId}`;
  });
  return substituted.replace(/\n{3,}/g, '\n\n');
}

export function renderFigure(figure: ResolvedFigure): string | null {
  const label = figureLabel(figure);
  const captionLine = figure.caption ? `*${label}: ${singleLine(figure.caption)}*` : `*${label}*`;

  if (figure.type === 'table' && figure.content) {
    return `\n\n${captionLine}\n\n${figure.content}\n\n`;
  }

  const images = figure.subfigures?.length
    ? figure.subfigures.flatMap((subfigure) => (subfigure.url ? [markdownImage(subfigure.caption, subfigure.url)] : []))
    : figure.url
      ? [markdownImage(figure.caption, figure.url)]
      : [];
  if (images.length === 0) {
    return null;
  }
  return `\n\n${images.join('\n')}\n${captionLine}\n\n`;
}

/** `Figure 3`, `Figure 3.a`, `Table A1`. */
export function figureLabel(figure: ResolvedFigure): string {
  const prefix = figure.type === 'table' ? 'Table' : 'Figure';
  const appendix = parseCanonicalId(figure.id)?.appendix ? 'A' : '';
  return `${prefix} ${appendix}${figure.displayId}`;
}

function tokenDisplayId(number: string, letter: string | undefined): string {
  return letter ? `${number}.${letter}` : number;
}

function markdownImage(alt: string, url: string): string {
  return `![${singleLine(alt).replace(/[[\]]/g, '')}](${url})`;
}

function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
