export const PDF_CONTENT_READER = Symbol('PDF_CONTENT_READER');
export const PDF_RASTERIZER = Symbol('PDF_RASTERIZER');

/** Page-space rectangle in PDF points, origin at the top-left corner. */
export interface PdfBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PdfTextLine {
  text: string;
  box: PdfBox | null;
}

export interface PdfEmbeddedImage {
  /** PNG bytes. */
  data: Buffer;
  /** Pixel dimensions of the image itself, not of its placement. */
  width: number;
  height: number;
  /** Where the image is drawn on the page, when the content stream says so. */
  box: PdfBox | null;
  /** Object reference; the same image drawn on several pages shares it. */
  key: string;
}

export interface PdfPageContent {
  /** 1-based. */
  pageNumber: number;
  width: number;
  height: number;
  /** Reading order, top to bottom. */
  lines: PdfTextLine[];
  images: PdfEmbeddedImage[];
}

export interface PageImage {
  pageNumber: number;
  png: Buffer;
  width: number;
  height: number;
}

export interface PdfContentReader {
  /** Throws SourceUnavailableError when the document cannot be opened. */
  readPages(pdf: Buffer): Promise<PdfPageContent[]>;
}

export interface PdfRasterizer {
  /** Renders the given pages, or every page. Pages that fail to render are left out. */
  rasterize(pdf: Buffer, dpi: number, pageNumbers?: number[]): Promise<PageImage[]>;
}
