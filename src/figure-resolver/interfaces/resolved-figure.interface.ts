import { FigureType } from '../../figure-extraction/interfaces/figure.interface';

export interface ResolvedSubfigure {
  /** Storage id, e.g. `fig3_a`. */
  id: string;
  displayId: string;
  caption: string;
  url: string | null;
}

/**
 * What the reader-facing API and placeholder substitution see of a figure.
 * Resolution never fails: an unknown figure comes back with a generic caption
 * and no url.
 */
export interface ResolvedFigure {
  /** Canonical id, e.g. `fig3`, `appendix_tab1`, `fig3_a`. */
  id: string;
  displayId: string;
  type: FigureType;
  caption: string;
  url: string | null;
  /** Subfigures only. */
  parentCaption?: string;
  /** Main figures with panels only. */
  subfigures?: ResolvedSubfigure[];
  /** Markdown body of a table. */
  content?: string;
}

export type FigureResolveFn = (displayId: string) => Promise<ResolvedFigure>;
