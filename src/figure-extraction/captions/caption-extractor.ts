import { AnyNode, Element, hasChildren, isTag, isText } from 'domhandler';

const LABEL_PREFIX = /^(Figure|Table)\s*\d+:\s*/i;
const SUBFIGURE_PREFIX = /^\(([a-z])\)\s*(.*)$/;

/**
 * Text of a markup subtree with every `<math>` node replaced by its LaTeX
 * source wrapped in `$...$`. Whitespace is collapsed.
 */
export function extractCaptionText(node: AnyNode | null | undefined): string {
  if (!node) {
    return '';
  }
  const parts: string[] = [];
  collectText(node, parts);
  return collapseWhitespace(parts.join(''));
}

/**
 * Strips a leading `Figure N:` / `Table N:` label or, failing that, a leading
 * `(a)` subfigure label. A subfigure label with nothing after it is kept.
 */
export function cleanCaption(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  const collapsed = collapseWhitespace(text);

  if (LABEL_PREFIX.test(collapsed)) {
    return collapsed.replace(LABEL_PREFIX, '').trim();
  }

  const subfigure = SUBFIGURE_PREFIX.exec(collapsed);
  if (subfigure) {
    const rest = subfigure[2].trim();
    return rest || `(${subfigure[1]})`;
  }

  return collapsed;
}

export function extractCaption(node: AnyNode | null | undefined): string {
  return cleanCaption(extractCaptionText(node));
}

export function mathToLatex(math: Element): string {
  const source = math.attribs.alttext?.trim() || collapseWhitespace(plainText(math));
  if (!source) {
    return '';
  }
  if (source.startsWith('$') && source.endsWith('$') && source.length > 1) {
    return source;
  }
  return `$${source}$`;
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (isTag(node)) {
    if (node.name === 'math') {
      parts.push(mathToLatex(node));
      return;
    }
    if (node.name === 'script' || node.name === 'style') {
      return;
    }
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

function plainText(node: AnyNode): string {
  if (isText(node)) {
    return node.data;
  }
  if (hasChildren(node)) {
    return node.children.map(plainText).join('');
  }
  return '';
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
