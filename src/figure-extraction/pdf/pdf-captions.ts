import { FigureKind, formatCanonicalId } from '../identifiers/figure-id';
import { PdfBox, PdfPageContent } from './pdf-content.interface';

const CAPTION_START = /^(Figure|Fig\.?|Table|Tab\.?)\s*([A-Z]?\d+)\s*[:.]\s*(.*)$/i;
const NUMERIC_LABEL = /^\d+$/;
const APPENDIX_LABEL = /^A(\d+)$/i;

export interface PdfCaption {
  kind: FigureKind;
  /** Canonical id, or null when the label carries no usable number (`S1`). */
  id: string | null;
  label: string;
  /** Caption text without its `Figure N:` prefix. */
  text: string;
  pageNumber: number;
  /** Box of the caption's first line. */
  box: PdfBox | null;
  /** Position in document order. */
  order: number;
}

/**
 * Finds caption-like paragraphs. A caption starts at a line beginning with
 * `Figure|Fig.|Table|Tab.` and a label, and runs until the next caption line
 * or the end of the page. The first caption seen for an id wins.
 */
export function scanCaptions(pages: PdfPageContent[]): PdfCaption[] {
  const captions: PdfCaption[] = [];
  const seenIds = new Set<string>();

  for (const page of pages) {
    let current: { caption: PdfCaption; parts: string[] } | null = null;

    const close = (): void => {
      if (!current) {
        return;
      }
      const { caption, parts } = current;
      current = null;
      if (caption.id && seenIds.has(caption.id)) {
        return;
      }
      if (caption.id) {
        seenIds.add(caption.id);
      }
      captions.push({ ...caption, text: parts.join(' ').replace(/\s+/g, ' ').trim(), order: captions.length });
    };

    for (const line of page.lines) {
      const match = CAPTION_START.exec(line.text.trim());
      if (match) {
        close();
        const kind: FigureKind = match[1].toLowerCase().startsWith('tab') ? 'tab' : 'fig';
        current = {
          caption: {
            kind,
            id: labelToId(kind, match[2]),
            label: match[2],
            text: '',
            pageNumber: page.pageNumber,
            box: line.box,
            order: 0,
          },
          parts: [match[3]],
        };
      } else if (current) {
        current.parts.push(line.text);
      }
    }
    close();
  }

  return captions;
}

function labelToId(kind: FigureKind, label: string): string | null {
  if (NUMERIC_LABEL.test(label)) {
    const number = Number(label);
    return number > 0 ? formatCanonicalId({ appendix: false, kind, number, letter: null }) : null;
  }
  const appendix = APPENDIX_LABEL.exec(label);
  if (appendix && Number(appendix[1]) > 0) {
    return formatCanonicalId({ appendix: true, kind, number: Number(appendix[1]), letter: null });
  }
  return null;
}
