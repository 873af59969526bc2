import { Injectable, Logger } from '@nestjs/common';
import { decodePDFRawStream, PDFArray, PDFDict, PDFDocument, PDFName, PDFNumber, PDFRawStream, PDFRef, PDFStream } from 'pdf-lib';
import type { TextItem } from 'pdfjs-dist/types/src/display/api';
import sharp from 'sharp';
import { debugLog } from '../../common/debug-logger';
import { errorMessage, SourceUnavailableError } from '../../common/errors';
import { PdfBox, PdfContentReader, PdfEmbeddedImage, PdfPageContent, PdfTextLine } from './pdf-content.interface';
import { findImagePlacements, ImagePlacement } from './pdf-image-placements';
import { loadPdfjs } from './pdfjs-loader';

type ColorSpaceKind = 'DeviceRGB' | 'DeviceGray' | 'DeviceCMYK';

/** Text items whose baselines differ by less than this share a line. */
const LINE_TOLERANCE = 2;

interface PageLayout {
  lines: PdfTextLine[];
  /** Boxes already in top-left page coordinates. */
  placements: ImagePlacement[];
}

interface ImageStream {
  name: string;
  ref: PDFRef | null;
  stream: PDFStream;
  /** Resources of the page or form that owns the image, for named colour spaces. */
  resources: PDFDict;
}

/**
 * Reads embedded image bytes with `pdf-lib`; positioned text and image
 * placements come from `pdfjs-dist`.
 */
@Injectable()
export class PdfLibContentReader implements PdfContentReader {
  private readonly logger = new Logger(PdfLibContentReader.name);

  async readPages(pdf: Buffer): Promise<PdfPageContent[]> {
    let document: PDFDocument;
    try {
      document = await PDFDocument.load(pdf, { ignoreEncryption: true });
    } catch (error) {
      throw new SourceUnavailableError(`Unable to open PDF: ${errorMessage(error)}`, { cause: error });
    }

    const layouts = await this.readLayouts(pdf);
    const pages: PdfPageContent[] = [];

    for (const [index, page] of document.getPages().entries()) {
      const { width, height } = page.getSize();
      const layout = layouts[index];
      const streams: ImageStream[] = [];
      this.collectImageStreams(page.node.Resources(), new Set<PDFDict>(), streams);
      pages.push({
        pageNumber: index + 1,
        width,
        height,
        lines: layout?.lines ?? [],
        images: await this.readImages(streams, index + 1, layout?.placements ?? []),
      });
    }

    debugLog(
      `PDF read: ${pages.length} pages, ${pages.reduce((sum, page) => sum + page.images.length, 0)} embedded images`,
    );
    return pages;
  }

  /** Image XObjects of a page, including those nested in form XObjects. */
  private collectImageStreams(resources: PDFDict | undefined, visited: Set<PDFDict>, found: ImageStream[]): void {
    const xObjects = resources?.lookupMaybe(PDFName.of('XObject'), PDFDict);
    if (!resources || !xObjects) {
      return;
    }
    for (const [name, value] of xObjects.entries()) {
      const stream = xObjects.lookupMaybe(name, PDFStream);
      const subtype = stream?.dict.lookupMaybe(PDFName.of('Subtype'), PDFName);
      if (!stream || !subtype) {
        continue;
      }
      const kind = normalizeName(subtype);
      if (kind === 'Image') {
        found.push({ name: normalizeName(name), ref: value instanceof PDFRef ? value : null, stream, resources });
      } else if (kind === 'Form' && !visited.has(stream.dict)) {
        visited.add(stream.dict);
        this.collectImageStreams(stream.dict.lookupMaybe(PDFName.of('Resources'), PDFDict), visited, found);
      }
    }
  }

  /**
   * pdfjs reports its own object ids, so a placement is matched to an image by
   * pixel size, in drawing order.
   */
  private async readImages(
    streams: ImageStream[],
    pageNumber: number,
    placements: ImagePlacement[],
  ): Promise<PdfEmbeddedImage[]> {
    const unclaimed = [...placements];
    const seen = new Set<string>();
    const images: PdfEmbeddedImage[] = [];

    for (const { name, ref, stream, resources } of streams) {
      const key = ref ? ref.toString() : `${pageNumber}:${name}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const png = await this.convertImageStreamToPng(stream, resources);
      if (!png) {
        continue;
      }
      const width = stream.dict.lookup(PDFName.of('Width'), PDFNumber).asNumber();
      const height = stream.dict.lookup(PDFName.of('Height'), PDFNumber).asNumber();
      const match = unclaimed.findIndex((placement) => placement.width === width && placement.height === height);
      const placement = match === -1 ? null : unclaimed.splice(match, 1)[0];
      images.push({ data: png, width, height, box: placement ? placement.box : null, key });
    }
    return images;
  }

  private async convertImageStreamToPng(stream: PDFStream, resources: PDFDict): Promise<Buffer | null> {
    const filterEntry =
      stream.dict.lookupMaybe(PDFName.of('Filter'), PDFName) ?? stream.dict.lookupMaybe(PDFName.of('Filter'), PDFArray);
    const colorSpaceEntry =
      stream.dict.lookupMaybe(PDFName.of('ColorSpace'), PDFName) ??
      stream.dict.lookupMaybe(PDFName.of('ColorSpace'), PDFArray);
    const filterNames = getFilterNames(filterEntry);
    const width = stream.dict.lookup(PDFName.of('Width'), PDFNumber).asNumber();
    const height = stream.dict.lookup(PDFName.of('Height'), PDFNumber).asNumber();
    const bitsPerComponent = stream.dict.lookupMaybe(PDFName.of('BitsPerComponent'), PDFNumber)?.asNumber() ?? 8;

    try {
      if (filterNames.some((name) => name === 'DCTDecode' || name === 'JPXDecode')) {
        return await sharp(Buffer.from(stream.getContents())).png().toBuffer();
      }

      if (
        (filterNames.length === 0 || filterNames.every((name) => name === 'FlateDecode')) &&
        stream instanceof PDFRawStream &&
        bitsPerComponent === 8
      ) {
        const channels = getChannelCount(resolveColorSpace(colorSpaceEntry, resources));
        if (!channels) {
          return null;
        }
        const decoded = decodePDFRawStream(stream).decode();
        return await sharp(Buffer.from(decoded), { raw: { width, height, channels } })
          .toColourspace('srgb')
          .png()
          .toBuffer();
      }
    } catch (error) {
      this.logger.warn(`Unable to convert PDF image stream: ${errorMessage(error)}`);
    }
    return null;
  }

  /** Per page (0-based), text lines and image placements. An unreadable document yields no layout. */
  private async readLayouts(pdf: Buffer): Promise<PageLayout[]> {
    const pdfjs = await loadPdfjs().catch((error: unknown) => {
      this.logger.warn(`pdfjs unavailable: ${errorMessage(error)}`);
      return null;
    });
    if (!pdfjs) {
      return [];
    }
    const document = await pdfjs
      .getDocument({ data: new Uint8Array(pdf), isEvalSupported: false, useSystemFonts: true })
      .promise.catch((error: unknown) => {
        this.logger.warn(`PDF layout unavailable: ${errorMessage(error)}`);
        return null;
      });
    if (!document) {
      return [];
    }

    try {
      const layouts: PageLayout[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const [left, , , top] = page.view;
        const content = await page.getTextContent();
        const items = content.items.filter((item): item is TextItem => 'str' in item);
        const operatorList = await page.getOperatorList();
        layouts.push({
          lines: groupLines(items, left, top),
          placements: findImagePlacements(operatorList, pdfjs.OPS).map((placement) => ({
            ...placement,
            box: toTopLeft(placement.box, left, top),
          })),
        });
      }
      return layouts;
    } finally {
      await document.destroy();
    }
  }
}

function toTopLeft(box: PdfBox, left: number, top: number): PdfBox {
  return { x: box.x - left, y: top - (box.y + box.height), width: box.width, height: box.height };
}

interface PositionedText {
  text: string;
  box: PdfBox;
  hasEOL: boolean;
}

/** Joins text items into lines; coordinates become top-left based. */
export function groupLines(items: TextItem[], left: number, top: number): PdfTextLine[] {
  const positioned: PositionedText[] = items.map((item) => {
    const height = Math.abs(Number(item.height)) || Math.abs(Number(item.transform[3])) || 0;
    const baseline = Number(item.transform[5]);
    return {
      text: item.str,
      hasEOL: item.hasEOL,
      box: { x: Number(item.transform[4]) - left, y: top - baseline - height, width: Number(item.width), height },
    };
  });

  const lines: PdfTextLine[] = [];
  let parts: PositionedText[] = [];

  const flush = (): void => {
    const text = parts
      .reduce((joined, part, index) => {
        const previous = parts[index - 1];
        const gap = previous ? part.box.x - (previous.box.x + previous.box.width) : 0;
        const needsSpace = gap > 1 && !joined.endsWith(' ') && !part.text.startsWith(' ');
        return joined + (needsSpace ? ' ' : '') + part.text;
      }, '')
      .replace(/\s+/g, ' ')
      .trim();
    if (text) {
      lines.push({ text, box: parts.map((part) => part.box).reduce(unite) });
    }
    parts = [];
  };

  for (const item of positioned) {
    const last = parts[parts.length - 1];
    if (last && Math.abs(last.box.y + last.box.height - (item.box.y + item.box.height)) > LINE_TOLERANCE) {
      flush();
    }
    parts.push(item);
    if (item.hasEOL) {
      flush();
    }
  }
  flush();

  return lines;
}

function unite(a: PdfBox, b: PdfBox): PdfBox {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(a.x + a.width, b.x + b.width) - x,
    height: Math.max(a.y + a.height, b.y + b.height) - y,
  };
}

function getFilterNames(filter: PDFName | PDFArray | undefined): string[] {
  if (!filter) {
    return [];
  }
  if (filter instanceof PDFName) {
    return [normalizeName(filter)];
  }
  const names: string[] = [];
  for (let index = 0; index < filter.size(); index++) {
    const value = filter.lookupMaybe(index, PDFName);
    if (value) {
      names.push(normalizeName(value));
    }
  }
  return names;
}

function resolveColorSpace(value: PDFName | PDFArray | undefined, resources: PDFDict): ColorSpaceKind | null {
  if (!value) {
    return 'DeviceRGB';
  }
  if (value instanceof PDFName) {
    const name = normalizeName(value);
    if (name === 'DeviceRGB' || name === 'DeviceGray' || name === 'DeviceCMYK') {
      return name;
    }
    const referenced = resources.lookupMaybe(PDFName.of('ColorSpace'), PDFDict)?.lookupMaybe(value, PDFArray);
    return referenced ? resolveColorSpace(referenced.lookupMaybe(0, PDFName), resources) : null;
  }
  const base = value.lookupMaybe(0, PDFName);
  return base ? resolveColorSpace(base, resources) : null;
}

function getChannelCount(colorSpace: ColorSpaceKind | null): 1 | 3 | 4 | null {
  switch (colorSpace) {
    case 'DeviceGray':
      return 1;
    case 'DeviceRGB':
      return 3;
    case 'DeviceCMYK':
      return 4;
    default:
      return null;
  }
}

function normalizeName(name: PDFName): string {
  const raw = name.asString();
  return raw.startsWith('/') ? raw.slice(1) : raw;
}
