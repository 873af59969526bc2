import { parseDisplayId, subfigureStorageId } from '../figure-extraction/identifiers/figure-id';
import { FigureRecord, FigureRegistry } from '../figure-extraction/interfaces/figure.interface';
import { findMainFigure } from './registry-lookup';

/**
 * Storage id of the image to use as a paper's thumbnail.
 *
 * Default policy, not a guarantee of the best picture:
 *  - `3.a` picks that subfigure when the parent lists it;
 *  - `3` picks fig3 when it has its own image, else its alphabetically first subfigure;
 *  - otherwise (no reference, or nothing matches) the first figure in the registry
 *    that yields an image under the rule above.
 * Tables are never chosen.
 */
export function selectThumbnail(displayId: string | null, registry: FigureRegistry): string | null {
  const parts = displayId ? parseDisplayId(displayId) : null;
  if (parts) {
    const main = findMainFigure(registry, parts.number);
    if (main && parts.letter) {
      const letter = parts.letter;
      if (main.subfigures.some((entry) => entry.id === letter)) {
        return subfigureStorageId(main.id, letter);
      }
    } else if (main) {
      const choice = imageOf(main);
      if (choice) {
        return choice;
      }
    }
  }

  for (const record of Object.values(registry)) {
    if (record.type !== 'figure') {
      continue;
    }
    const choice = imageOf(record);
    if (choice) {
      return choice;
    }
  }
  return null;
}

function imageOf(record: FigureRecord): string | null {
  if (record.localPath || record.remotePath) {
    return record.id;
  }
  const [first] = [...record.subfigures].sort((left, right) => left.id.localeCompare(right.id));
  return first ? subfigureStorageId(record.id, first.id) : null;
}
