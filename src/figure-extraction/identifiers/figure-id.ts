/**
 * Figure identifier grammars.
 *
 * Three dialects meet here and are kept apart on purpose:
 *  - structural ids from the ar5iv HTML rendering (`S3.F2`, `A4.T1`, `S3.F2.sf1`),
 *  - canonical storage ids (`fig2`, `appendix_tab1`, `fig2_a`),
 *  - display ids used by the API and placeholders (`2`, `2.a`).
 */

export type FigureKind = 'fig' | 'tab';

export interface CanonicalIdParts {
  appendix: boolean;
  kind: FigureKind;
  number: number;
  letter: string | null;
}

export interface DisplayIdParts {
  number: number;
  letter: string | null;
}

export interface CaptionLabel {
  kind: FigureKind;
  number: number;
}

const SECTION_TOKEN = /^[A-Z]*x?\d+$/;
const ELEMENT_TOKEN = /^([FT])(\d+)$/;
const APPENDIX_TOKEN = /^A\d+$/;
const CANONICAL_ID = /^(appendix_)?(fig|tab)(\d+)(?:_([a-z]))?$/;
const DISPLAY_ID = /^(\d+)(?:\.([a-z]))?$/;
const LOOSE_DISPLAY_ID = /(\d+)(?:[._]?([a-zA-Z]))?/;
const PANEL_SUFFIX = /(?:^|\.)sf(\d+)$/i;
const CAPTION_LABEL = /^\s*(Figure|Table)\s*(\d+)\s*:/i;

/**
 * Maps a structural HTML id to a canonical id.
 * `S3.F2` -> `fig2`, `A4.T1` -> `appendix_tab1`, `S3.F2.sf1` -> `fig2`.
 * Returns null when the id carries no figure/table element token.
 */
export function normalizeRawId(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }

  const tokens = raw.trim().split('.');
  for (let index = 0; index < tokens.length; index++) {
    const element = ELEMENT_TOKEN.exec(tokens[index]);
    if (!element) {
      if (SECTION_TOKEN.test(tokens[index])) {
        continue;
      }
      return null;
    }

    const number = Number(element[2]);
    if (number <= 0) {
      return null;
    }
    return formatCanonicalId({
      appendix: index > 0 && APPENDIX_TOKEN.test(tokens[0]),
      kind: element[1] === 'T' ? 'tab' : 'fig',
      number,
      letter: null,
    });
  }

  return null;
}

/**
 * Loose grammar for user supplied references: `figure1` -> `1`,
 * `fig1_a` / `fig1.a` -> `1.a`, `appendix_fig2` -> `2`.
 */
export function toDisplayId(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }

  const stripped = raw
    .toLowerCase()
    .replace(/figure/g, '')
    .replace(/fig/g, '')
    .replace(/appendix/g, '')
    .replace(/_/g, '');

  const match = LOOSE_DISPLAY_ID.exec(stripped);
  if (!match) {
    return null;
  }

  const number = Number(match[1]);
  const letter = match[2]?.toLowerCase();
  return letter ? `${number}.${letter}` : `${number}`;
}

export function parseDisplayId(displayId: string): DisplayIdParts | null {
  const match = DISPLAY_ID.exec(displayId.trim());
  if (!match) {
    return null;
  }
  return { number: Number(match[1]), letter: match[2] ?? null };
}

export function parseCanonicalId(id: string): CanonicalIdParts | null {
  const match = CANONICAL_ID.exec(id);
  if (!match) {
    return null;
  }
  return {
    appendix: match[1] !== undefined,
    kind: match[2] === 'tab' ? 'tab' : 'fig',
    number: Number(match[3]),
    letter: match[4] ?? null,
  };
}

export function formatCanonicalId(parts: CanonicalIdParts): string {
  const base = `${parts.appendix ? 'appendix_' : ''}${parts.kind}${parts.number}`;
  return parts.letter ? subfigureStorageId(base, parts.letter) : base;
}

export function subfigureStorageId(parentId: string, letter: string): string {
  return `${parentId}_${letter}`;
}

export function displayIdFromCanonical(id: string): string | null {
  const parts = parseCanonicalId(id);
  if (!parts) {
    return null;
  }
  return parts.letter ? `${parts.number}.${parts.letter}` : `${parts.number}`;
}

/**
 * Canonical ids a bare display number may refer to, in lookup order.
 */
export function mainIdCandidates(number: number): string[] {
  return [`fig${number}`, `tab${number}`, `appendix_fig${number}`, `appendix_tab${number}`];
}

export function letterFromIndex(index: number): string | null {
  if (!Number.isInteger(index) || index < 0 || index > 25) {
    return null;
  }
  return String.fromCharCode(97 + index);
}

/**
 * Subfigure letter for a panel: an explicit `.sf<n>` suffix maps 1 -> a,
 * otherwise the 0-based position among the parent's panels is used.
 */
export function subfigureLetter(panelRawId: string | null | undefined, position: number): string | null {
  const suffix = panelRawId ? PANEL_SUFFIX.exec(panelRawId.trim()) : null;
  if (suffix) {
    return letterFromIndex(Number(suffix[1]) - 1);
  }
  return letterFromIndex(position);
}

/**
 * `Figure 3: ...` -> { kind: 'fig', number: 3 }. Only consulted when a block has
 * no structural id.
 */
export function captionLabel(rawCaption: string | null | undefined): CaptionLabel | null {
  if (!rawCaption) {
    return null;
  }
  const match = CAPTION_LABEL.exec(rawCaption);
  if (!match) {
    return null;
  }
  const number = Number(match[2]);
  if (number <= 0) {
    return null;
  }
  return { kind: match[1].toLowerCase() === 'table' ? 'tab' : 'fig', number };
}
