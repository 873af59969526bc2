import * as cheerio from 'cheerio';
import { cleanCaption, extractCaption, extractCaptionText } from './caption-extractor';

function firstNode(html: string, selector: string) {
  const $ = cheerio.load(html);
  return $(selector).get(0);
}

describe('caption extractor', () => {
  describe('cleanCaption', () => {
    it('should strip a figure label', () => {
      expect(cleanCaption('Figure 3: A diagram of X')).toBe('A diagram of X');
      expect(cleanCaption('table 2:Results')).toBe('Results');
    });

    it('should strip a subfigure label', () => {
      expect(cleanCaption('(a) zoomed view')).toBe('zoomed view');
    });

    it('should keep a bare subfigure label', () => {
      expect(cleanCaption('(a)')).toBe('(a)');
    });

    it('should apply only one of the two rules', () => {
      expect(cleanCaption('Figure 1: (a) left panel')).toBe('(a) left panel');
    });

    it('should leave other text alone', () => {
      expect(cleanCaption('  Overview   of the model ')).toBe('Overview of the model');
    });

    it('should return an empty string for empty input', () => {
      expect(cleanCaption(null)).toBe('');
      expect(cleanCaption('')).toBe('');
    });
  });

  describe('extractCaptionText', () => {
    it('should replace math with its alttext source', () => {
      const node = firstNode(
        '<figcaption><span class="ltx_tag">Figure 3: </span>A diagram of <math alttext="x^2"><mi>x</mi><mn>2</mn></math> values</figcaption>',
        'figcaption',
      );

      expect(extractCaptionText(node)).toBe('Figure 3: A diagram of $x^2$ values');
      expect(extractCaption(node)).toBe('A diagram of $x^2$ values');
    });

    it('should fall back to rendered math text', () => {
      const node = firstNode('<p>Loss <math><mi>y</mi></math></p>', 'p');

      expect(extractCaptionText(node)).toBe('Loss $y$');
    });

    it('should not double wrap delimited math', () => {
      const node = firstNode('<p><math alttext="$z$"><mi>z</mi></math></p>', 'p');

      expect(extractCaptionText(node)).toBe('$z$');
    });

    it('should collapse whitespace across nested markup', () => {
      const node = firstNode('<p>  Two\n\n<b>lines</b>   here </p>', 'p');

      expect(extractCaptionText(node)).toBe('Two lines here');
    });

    it('should return an empty string for a missing node', () => {
      expect(extractCaptionText(undefined)).toBe('');
      expect(extractCaption(null)).toBe('');
    });
  });
});
