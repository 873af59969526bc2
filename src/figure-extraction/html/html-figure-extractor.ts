import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';
import { debugLog } from '../../common/debug-logger';
import { errorMessage } from '../../common/errors';
import { HttpFetchService } from '../../http/http-fetch.service';
import { cleanCaption, extractCaption, extractCaptionText } from '../captions/caption-extractor';
import { ExtractionContext } from '../extraction-context';
import {
  captionLabel,
  FigureKind,
  formatCanonicalId,
  normalizeRawId,
  parseCanonicalId,
  subfigureLetter,
  subfigureStorageId,
} from '../identifiers/figure-id';
import {
  createFigureRecord,
  createTableRecord,
  ElementOutcome,
  extracted,
  FigureExtractor,
  FigureRegistry,
  PaperSource,
  RegistryRecord,
  skipped,
  SubfigureEntry,
} from '../interfaces/figure.interface';
import { ImageResolver } from './image-resolver';
import { tableToMarkdown } from './table-markdown';

/** LaTeXML lays out display equations as tables. */
const EQUATION_TABLE = /\bltx_(?:equation|equationgroup|eqn_table)\b/;

interface BlockPlan {
  element: Element;
  kind: FigureKind;
  /** Structural or caption-derived id; null until a positional id is assigned. */
  id: string | null;
  rawCaption: string;
}

/**
 * Extracts figures, tables and subfigure panels from the ar5iv HTML rendering.
 */
@Injectable()
export class HtmlFigureExtractor implements FigureExtractor {
  readonly method = 'html';
  private readonly logger = new Logger(HtmlFigureExtractor.name);

  constructor(
    private readonly httpFetchService: HttpFetchService,
    private readonly imageResolver: ImageResolver,
  ) {}

  canExtract(source: PaperSource): boolean {
    return Boolean(source.html || source.htmlUrl);
  }

  async extract(source: PaperSource, outputDir: string): Promise<FigureRegistry> {
    const html = await this.loadHtml(source);
    const baseUrl = source.baseUrl ?? source.htmlUrl ?? null;
    const context = new ExtractionContext(source.paperId, outputDir, baseUrl);
    const $ = cheerio.load(html);

    const plans = this.findBlocks($).map((element) => this.planBlock($, element));
    for (const plan of plans) {
      if (plan.id) {
        context.reserve(plan.id);
      }
    }

    for (const [index, plan] of plans.entries()) {
      const id = plan.id ?? context.nextFreeId(plan.kind, index + 1);
      if (context.has(id)) {
        this.logger.warn(`[${source.paperId}] Skipping duplicate block ${id}`);
        continue;
      }

      const outcome =
        plan.kind === 'tab'
          ? await this.extractTable($, plan, id, context)
          : await this.extractFigure($, plan, id, context);

      if (outcome.kind === 'skipped') {
        this.logger.warn(`[${source.paperId}] Skipping ${id}: ${outcome.reason}`);
        continue;
      }
      context.add(outcome.value);
    }

    debugLog(`[${source.paperId}] HTML extraction found ${context.size} of ${plans.length} blocks`);
    return context.registry;
  }

  private async loadHtml(source: PaperSource): Promise<string> {
    if (source.html) {
      return source.html;
    }
    if (!source.htmlUrl) {
      throw new Error(`No HTML source for paper ${source.paperId}`);
    }
    // FetchError propagates: the orchestrator falls back to the PDF
    return this.httpFetchService.fetchText(source.htmlUrl);
  }

  /** Top-level figure blocks and standalone tables, in document order. */
  private findBlocks($: CheerioAPI): Element[] {
    return $('figure, table')
      .toArray()
      .filter((element) => {
        const $element = $(element);
        if ($element.parents('figure').length > 0) {
          return false;
        }
        if (element.name !== 'table') {
          return true;
        }
        return $element.parents('table').length === 0 && !EQUATION_TABLE.test(element.attribs.class ?? '');
      });
  }

  private planBlock($: CheerioAPI, element: Element): BlockPlan {
    const rawCaption = extractCaptionText(this.findOwnCaption($, element));
    const structural = normalizeRawId(element.attribs.id);
    if (structural) {
      return {
        element,
        kind: parseCanonicalId(structural)?.kind ?? 'fig',
        id: structural,
        rawCaption,
      };
    }

    const label = captionLabel(rawCaption);
    const kind: FigureKind =
      element.name === 'table' || $(element).hasClass('ltx_table') ? 'tab' : (label?.kind ?? 'fig');
    return {
      element,
      kind,
      id: label ? formatCanonicalId({ appendix: false, kind, number: label.number, letter: null }) : null,
      rawCaption,
    };
  }

  private async extractTable(
    $: CheerioAPI,
    plan: BlockPlan,
    id: string,
    context: ExtractionContext,
  ): Promise<ElementOutcome<RegistryRecord>> {
    const table = plan.element.name === 'table' ? plan.element : $(plan.element).find('table').first().get(0);
    if (!table) {
      return skipped('no table structure');
    }

    const markdown = tableToMarkdown($, table);
    if (!markdown) {
      return skipped('empty table');
    }

    try {
      const localPath = await context.writeArtifact(`${id}.md`, markdown);
      return extracted(createTableRecord(id, cleanCaption(plan.rawCaption), markdown, localPath));
    } catch (error) {
      return skipped(`could not write table: ${errorMessage(error)}`);
    }
  }

  private async extractFigure(
    $: CheerioAPI,
    plan: BlockPlan,
    id: string,
    context: ExtractionContext,
  ): Promise<ElementOutcome<RegistryRecord>> {
    const caption = cleanCaption(plan.rawCaption);
    const panels = this.findPanels($, plan.element);

    if (panels.length === 0) {
      const image = await this.imageResolver.resolve($, plan.element, context.baseUrl);
      if (image.kind === 'skipped') {
        return image;
      }
      try {
        const localPath = await context.writeArtifact(`${id}.png`, image.value);
        return extracted(createFigureRecord(id, caption, localPath));
      } catch (error) {
        return skipped(`could not write image: ${errorMessage(error)}`);
      }
    }

    const subfigures: SubfigureEntry[] = [];
    for (const [position, panel] of panels.entries()) {
      const letter = subfigureLetter(panel.attribs.id, position);
      if (!letter || subfigures.some((entry) => entry.id === letter)) {
        this.logger.warn(`[${context.paperId}] Skipping panel ${position + 1} of ${id}: no usable letter`);
        continue;
      }

      const image = await this.imageResolver.resolve($, panel, context.baseUrl);
      if (image.kind === 'skipped') {
        this.logger.warn(`[${context.paperId}] Skipping panel ${id}_${letter}: ${image.reason}`);
        continue;
      }

      try {
        await context.writeArtifact(`${subfigureStorageId(id, letter)}.png`, image.value);
      } catch (error) {
        this.logger.warn(`[${context.paperId}] Could not write panel ${id}_${letter}: ${errorMessage(error)}`);
        continue;
      }
      subfigures.push({
        id: letter,
        caption: extractCaption(this.findOwnCaption($, panel)) || `(${letter})`,
      });
    }

    if (subfigures.length === 0) {
      return skipped('no panel image could be resolved');
    }
    return extracted(createFigureRecord(id, caption, null, subfigures));
  }

  /** Panels whose nearest enclosing figure is the block itself. */
  private findPanels($: CheerioAPI, block: Element): Element[] {
    return $(block)
      .find('figure')
      .toArray()
      .filter((panel) => $(panel).parents('figure').first().get(0) === block);
  }

  /** The first caption not inside a nested figure or table. */
  private findOwnCaption($: CheerioAPI, block: Element): Element | undefined {
    return $(block)
      .find('figcaption, caption')
      .toArray()
      .find((caption) => $(caption).parents('figure, table').first().get(0) === block);
  }
}
