/**
 * Remote registry row, stored at `papers/{paperId}/figures/{figureId}`.
 * `figureId` is a canonical id; subfigures use the `fig2_a` storage form.
 */
export interface PaperFigureDocument {
  figureId: string;
  caption: string;
  type: 'figure' | 'table';
  remoteUrl: string | null;
  updatedAt: Date | null;
}

export type PaperFigureUpsert = Omit<PaperFigureDocument, 'updatedAt'>;
