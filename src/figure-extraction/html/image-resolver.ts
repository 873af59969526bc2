import { Injectable, Logger } from '@nestjs/common';
import { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import sharp from 'sharp';
import { debugLog } from '../../common/debug-logger';
import { errorMessage } from '../../common/errors';
import { HttpFetchService } from '../../http/http-fetch.service';
import { ElementOutcome, extracted, skipped } from '../interfaces/figure.interface';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

export function isPng(bytes: Buffer): boolean {
  return bytes.length >= PNG_SIGNATURE.length && bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE);
}

export async function ensurePng(bytes: Buffer): Promise<Buffer> {
  return isPng(bytes) ? bytes : sharp(bytes).png().toBuffer();
}

/** `data:image/png;base64,...` -> bytes. Null when src is not a data URI. */
export function decodeDataUri(src: string): Buffer | null {
  const match = /^data:([^,]*?),(.*)$/s.exec(src.trim());
  if (!match) {
    return null;
  }
  const isBase64 = /;base64$/i.test(match[1]);
  return isBase64 ? Buffer.from(match[2], 'base64') : Buffer.from(decodeURIComponent(match[2]), 'utf-8');
}

/**
 * Path-only rendition of an inline SVG: every `<path d>` drawn solid black on
 * the original canvas size. Null when the canvas size or the paths are missing.
 */
export function buildSimplifiedSvg($: CheerioAPI, svg: Element): string | null {
  const { width, height } = svgCanvasSize(svg);
  if (!width || !height) {
    return null;
  }

  const paths = $(svg)
    .find('path')
    .toArray()
    .map((pathNode) => pathNode.attribs.d)
    .filter((d): d is string => Boolean(d));
  if (paths.length === 0) {
    return null;
  }

  const viewBox = svg.attribs.viewBox ?? svg.attribs.viewbox;
  return [
    `<svg xmlns="${SVG_NAMESPACE}" width="${width}" height="${height}"${viewBox ? ` viewBox="${escapeAttribute(viewBox)}"` : ''}>`,
    ...paths.map((d) => `<path d="${escapeAttribute(d)}" fill="black"/>`),
    '</svg>',
  ].join('');
}

function svgCanvasSize(svg: Element): { width: number | null; height: number | null } {
  const width = parseFloat(svg.attribs.width ?? '');
  const height = parseFloat(svg.attribs.height ?? '');
  if (width > 0 && height > 0) {
    return { width, height };
  }
  const viewBox = (svg.attribs.viewBox ?? svg.attribs.viewbox ?? '').trim().split(/[\s,]+/).map(Number);
  if (viewBox.length === 4 && viewBox[2] > 0 && viewBox[3] > 0) {
    return { width: viewBox[2], height: viewBox[3] };
  }
  return { width: null, height: null };
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Resolves the image of a figure block or panel to PNG bytes, trying an inline
 * data URI, then inline SVG, then a remote `<img>` reference.
 */
@Injectable()
export class ImageResolver {
  private readonly logger = new Logger(ImageResolver.name);

  constructor(private readonly httpFetchService: HttpFetchService) {}

  async resolve($: CheerioAPI, element: Element, baseUrl: string | null): Promise<ElementOutcome<Buffer>> {
    const images = $(element).find('img').toArray();
    if (element.name === 'img') {
      images.unshift(element);
    }

    const dataImage = images.find((img) => imageSource(img)?.startsWith('data:'));
    if (dataImage) {
      return this.fromDataUri(imageSource(dataImage) ?? '');
    }

    const svg = element.name === 'svg' ? element : $(element).find('svg').first().get(0);
    if (svg) {
      return this.fromSvg($, svg);
    }

    const remote = images.map(imageSource).find((src): src is string => Boolean(src));
    if (remote) {
      return this.fromRemote(remote, baseUrl);
    }

    return skipped('no image, data URI or inline SVG');
  }

  private async fromDataUri(src: string): Promise<ElementOutcome<Buffer>> {
    try {
      const bytes = decodeDataUri(src);
      if (!bytes || bytes.length === 0) {
        return skipped('empty data URI');
      }
      return extracted(await ensurePng(bytes));
    } catch (error) {
      return skipped(`undecodable data URI: ${errorMessage(error)}`);
    }
  }

  private async fromSvg($: CheerioAPI, svg: Element): Promise<ElementOutcome<Buffer>> {
    const markup = withSvgNamespace($.html(svg));
    try {
      return extracted(await sharp(Buffer.from(markup)).png().toBuffer());
    } catch (error) {
      this.logger.warn(`SVG rasterization failed, retrying with simplified paths: ${errorMessage(error)}`);
    }

    const simplified = buildSimplifiedSvg($, svg);
    if (!simplified) {
      return skipped('inline SVG could not be rasterized');
    }
    try {
      return extracted(await sharp(Buffer.from(simplified)).png().toBuffer());
    } catch (error) {
      return skipped(`simplified SVG could not be rasterized: ${errorMessage(error)}`);
    }
  }

  private async fromRemote(src: string, baseUrl: string | null): Promise<ElementOutcome<Buffer>> {
    const url = resolveImageUrl(src, baseUrl);
    if (!url) {
      return skipped(`relative image reference ${src} without a base URL`);
    }

    try {
      debugLog(`Downloading figure image ${url}`);
      const bytes = await this.httpFetchService.fetchBytes(url);
      return extracted(await ensurePng(bytes));
    } catch (error) {
      return skipped(`image ${url} unavailable: ${errorMessage(error)}`);
    }
  }
}

export function resolveImageUrl(src: string, baseUrl: string | null): string | null {
  if (URL.canParse(src)) {
    return new URL(src).toString();
  }
  if (!baseUrl || !URL.canParse(src, baseUrl)) {
    return null;
  }
  return new URL(src, baseUrl).toString();
}

function imageSource(img: Element): string | undefined {
  return img.attribs.src || img.attribs['data-src'] || undefined;
}

function withSvgNamespace(markup: string): string {
  return /^<svg[^>]*\sxmlns=/i.test(markup) ? markup : markup.replace(/^<svg/i, `<svg xmlns="${SVG_NAMESPACE}"`);
}
