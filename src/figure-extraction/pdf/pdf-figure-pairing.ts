import sharp from 'sharp';
import { PdfCaption } from './pdf-captions';
import { PageImage, PdfBox, PdfPageContent } from './pdf-content.interface';

/**
 * A region that may hold a figure: an embedded image, or a whole page when
 * the page has captions but no embedded image of usable size.
 */
export interface PdfFigureCandidate {
  pageNumber: number;
  box: PdfBox | null;
  /** Embedded image as PNG; null for a whole-page candidate. */
  image: Buffer | null;
}

export interface PdfFigurePair {
  candidate: PdfFigureCandidate;
  caption: PdfCaption;
  /** Paired by layout on the same page rather than by order. */
  structural: boolean;
}

export function collectCandidates(pages: PdfPageContent[], captions: PdfCaption[], minImageSize: number): PdfFigureCandidate[] {
  const candidates: PdfFigureCandidate[] = [];
  const seenKeys = new Set<string>();

  for (const page of pages) {
    const images = page.images.filter(
      (image) => image.width >= minImageSize && image.height >= minImageSize && !seenKeys.has(image.key),
    );
    for (const image of images) {
      seenKeys.add(image.key);
      candidates.push({ pageNumber: page.pageNumber, box: image.box, image: image.data });
    }

    if (images.length === 0 && captions.some((caption) => caption.pageNumber === page.pageNumber)) {
      candidates.push({ pageNumber: page.pageNumber, box: null, image: null });
    }
  }

  return candidates;
}

/**
 * Pairs candidates with captions. A boxed candidate takes the nearest unmatched
 * boxed caption on its page. Anything else takes the oldest unmatched caption
 * found so far in document order. Candidates left without a caption are dropped.
 */
export function pairFiguresWithCaptions(
  pages: PdfPageContent[],
  captions: PdfCaption[],
  minImageSize: number,
): PdfFigurePair[] {
  const candidates = collectCandidates(pages, captions, minImageSize);
  const pending: PdfCaption[] = [];
  const pairs: PdfFigurePair[] = [];
  let nextCaption = 0;

  for (const page of pages) {
    while (nextCaption < captions.length && captions[nextCaption].pageNumber <= page.pageNumber) {
      pending.push(captions[nextCaption]);
      nextCaption++;
    }

    for (const candidate of candidates.filter((entry) => entry.pageNumber === page.pageNumber)) {
      const nearest = candidate.box ? nearestCaption(candidate.box, page.pageNumber, pending) : null;
      const caption = nearest ?? pending[0];
      if (!caption) {
        continue;
      }
      pending.splice(pending.indexOf(caption), 1);
      pairs.push({ candidate, caption, structural: nearest !== null });
    }
  }

  return pairs;
}

function nearestCaption(box: PdfBox, pageNumber: number, pending: PdfCaption[]): PdfCaption | null {
  let best: PdfCaption | null = null;
  let bestGap = Infinity;
  for (const caption of pending) {
    if (caption.pageNumber !== pageNumber || !caption.box) {
      continue;
    }
    const gap = verticalGap(box, caption.box);
    if (gap < bestGap) {
      best = caption;
      bestGap = gap;
    }
  }
  return best;
}

export function verticalGap(a: PdfBox, b: PdfBox): number {
  if (b.y >= a.y + a.height) {
    return b.y - (a.y + a.height);
  }
  if (a.y >= b.y + b.height) {
    return a.y - (b.y + b.height);
  }
  return 0;
}

export function unionBox(a: PdfBox, b: PdfBox): PdfBox {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(a.x + a.width, b.x + b.width) - x,
    height: Math.max(a.y + a.height, b.y + b.height) - y,
  };
}

/**
 * Crops `box` grown by `margin` points out of a page rendered at `dpi`.
 * Returns null when the region falls outside the page.
 */
export async function cropPageRegion(page: PageImage, box: PdfBox, dpi: number, margin: number): Promise<Buffer | null> {
  const scale = dpi / 72;
  const left = Math.max(0, Math.floor((box.x - margin) * scale));
  const top = Math.max(0, Math.floor((box.y - margin) * scale));
  const right = Math.min(page.width, Math.ceil((box.x + box.width + margin) * scale));
  const bottom = Math.min(page.height, Math.ceil((box.y + box.height + margin) * scale));

  if (right <= left || bottom <= top) {
    return null;
  }
  return sharp(page.png)
    .extract({ left, top, width: right - left, height: bottom - top })
    .png()
    .toBuffer();
}
