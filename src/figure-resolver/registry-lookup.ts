import { mainIdCandidates } from '../figure-extraction/identifiers/figure-id';
import { FigureRecord, FigureRegistry, RegistryRecord } from '../figure-extraction/interfaces/figure.interface';

/** First of `fig<n>`, `tab<n>`, `appendix_fig<n>`, `appendix_tab<n>` present in the registry. */
export function findMainRecord(registry: FigureRegistry, number: number): RegistryRecord | null {
  for (const id of mainIdCandidates(number)) {
    const record: RegistryRecord | undefined = registry[id];
    if (record) {
      return record;
    }
  }
  return null;
}

export function findMainFigure(registry: FigureRegistry, number: number): FigureRecord | null {
  for (const id of mainIdCandidates(number)) {
    const record: RegistryRecord | undefined = registry[id];
    if (record?.type === 'figure') {
      return record;
    }
  }
  return null;
}
