import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PaperSource } from '../figure-extraction/interfaces/figure.interface';

// ArXiv IDs can be in formats like:
// - 2507.11768 (new format: YYMM.NNNNN)
// - 1234.5678v1 (with version)
// - math.GT/0309136 (old format with subcategory)
// - hep-th/9901001 (old format)
const ARXIV_ID_PATTERN = /^(?:[a-z-]+(?:\.[a-z-]+)?\/\d{7}(?:v\d+)?|\d{4}\.\d{4,5}(?:v\d+)?)$/i;

@Injectable()
export class ArxivService {
  private readonly htmlBaseUrl: string;
  private readonly pdfBaseUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.htmlBaseUrl = this.configService
      .get<string>('ARXIV_HTML_BASE_URL', 'https://ar5iv.labs.arxiv.org/html')
      .replace(/\/+$/, '');
    this.pdfBaseUrl = this.configService
      .get<string>('ARXIV_PDF_BASE_URL', 'https://arxiv.org/pdf')
      .replace(/\/+$/, '');
  }

  /**
   * Extracts ArXiv ID from either a URL or ID string (public method)
   * @param input ArXiv URL (e.g., https://arxiv.org/abs/2507.11768) or ID (e.g., 2507.11768)
   * @returns The extracted ArXiv ID
   * @throws Error if the input is not a valid ArXiv URL or ID
   */
  public extractArxivId(input: string): string {
    return this.extractArxivIdInternal(input);
  }

  /**
   * HTML (ar5iv) and PDF locations for a paper. Relative image references in
   * the HTML resolve against baseUrl.
   */
  buildPaperSource(input: string): PaperSource {
    const paperId = this.extractArxivIdInternal(input);
    const htmlUrl = `${this.htmlBaseUrl}/${paperId}`;
    return {
      paperId,
      htmlUrl,
      baseUrl: `${htmlUrl}/`,
      pdfUrl: `${this.pdfBaseUrl}/${paperId}.pdf`,
    };
  }

  private extractArxivIdInternal(input: string): string {
    if (!input || typeof input !== 'string') {
      throw new Error('Invalid input: must be a non-empty string');
    }

    const trimmedInput = input.trim();

    // Check if it's a URL
    if (trimmedInput.includes('arxiv.org')) {
      // Match various ArXiv URL formats:
      // https://arxiv.org/abs/2507.11768
      // arxiv.org/abs/2507.11768
      // https://arxiv.org/pdf/2507.11768.pdf
      // https://ar5iv.labs.arxiv.org/html/2507.11768
      // https://arxiv.org/abs/math.GT/0309136
      const urlMatch = trimmedInput.match(
        /arxiv\.org\/(?:abs|pdf|html)\/(.+?)(?:\.pdf)?\/?(?:\?|#|$)/i,
      );

      const urlId = urlMatch?.[1]?.trim();
      if (urlId && ARXIV_ID_PATTERN.test(urlId)) {
        return urlId;
      }
      throw new Error(`Invalid ArXiv URL format: ${input}`);
    }

    if (ARXIV_ID_PATTERN.test(trimmedInput)) {
      return trimmedInput;
    }

    throw new Error(
      `Invalid ArXiv ID format: ${input}. Expected formats: '2507.11768', 'math.GT/0309136', or ArXiv URL`,
    );
  }
}
