import type { Pdfjs } from './pdfjs-loader';
import { PdfBox } from './pdf-content.interface';

/** `[a b c d e f]`, as carried by the `transform` operator. */
export type Matrix = [number, number, number, number, number, number];

export type PlacementOps = Pick<
  Pdfjs['OPS'],
  'save' | 'restore' | 'transform' | 'paintFormXObjectBegin' | 'paintFormXObjectEnd' | 'paintImageXObject'
>;

export interface OperatorList {
  fnArray: number[];
  argsArray: unknown[];
}

export interface ImagePlacement {
  /** pdfjs object id, e.g. `img_p0_1`; not the resource name. */
  objId: string;
  /** Pixel dimensions reported with the paint operator. */
  width: number;
  height: number;
  /** Unit square under the current transform, in user space (origin bottom-left). */
  box: PdfBox;
}

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Where each image is painted on a page. Form XObjects arrive inlined in the
 * operator list between `paintFormXObjectBegin` and `paintFormXObjectEnd`, so
 * images nested in forms are placed too.
 */
export function findImagePlacements(operatorList: OperatorList, ops: PlacementOps): ImagePlacement[] {
  const placements: ImagePlacement[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;

  operatorList.fnArray.forEach((fn, index) => {
    const args = operatorList.argsArray[index];
    switch (fn) {
      case ops.save:
        stack.push(ctm);
        break;
      case ops.restore:
        ctm = stack.pop() ?? IDENTITY;
        break;
      case ops.transform: {
        const matrix = toMatrix(args);
        if (matrix) {
          ctm = multiply(matrix, ctm);
        }
        break;
      }
      case ops.paintFormXObjectBegin: {
        stack.push(ctm);
        const matrix = Array.isArray(args) ? toMatrix(args[0]) : null;
        if (matrix) {
          ctm = multiply(matrix, ctm);
        }
        break;
      }
      case ops.paintFormXObjectEnd:
        ctm = stack.pop() ?? IDENTITY;
        break;
      case ops.paintImageXObject: {
        if (!Array.isArray(args)) {
          break;
        }
        const [objId, width, height] = args;
        if (typeof objId === 'string' && typeof width === 'number' && typeof height === 'number') {
          placements.push({ objId, width, height, box: unitSquare(ctm) });
        }
        break;
      }
    }
  });

  return placements;
}

/** `left` applied first, then `right`. */
export function multiply(left: Matrix, right: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = left;
  const [a2, b2, c2, d2, e2, f2] = right;
  return [
    a1 * a2 + b1 * c2,
    a1 * b2 + b1 * d2,
    c1 * a2 + d1 * c2,
    c1 * b2 + d1 * d2,
    e1 * a2 + f1 * c2 + e2,
    e1 * b2 + f1 * d2 + f2,
  ];
}

function toMatrix(value: unknown): Matrix | null {
  const numbers: unknown[] = Array.isArray(value)
    ? value
    : value instanceof Float32Array || value instanceof Float64Array
      ? Array.from(value)
      : [];
  if (numbers.length !== 6 || !numbers.every((entry): entry is number => typeof entry === 'number')) {
    return null;
  }
  const [a, b, c, d, e, f] = numbers;
  return [a, b, c, d, e, f];
}

function unitSquare([a, b, c, d, e, f]: Matrix): PdfBox {
  const xs = [e, a + e, c + e, a + c + e];
  const ys = [f, b + f, d + f, b + d + f];
  const x = Math.min(...xs);
  const y = Math.min(...ys);
  return { x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y };
}
