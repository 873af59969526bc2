import { InvalidPaperIdError } from './errors';

/** Path and document-id safe form of a paper id; old-style arXiv ids contain a slash (`hep-th/9901001`). */
export function safePaperSegment(paperId: string): string {
  const segment = paperId.trim().replace(/[/\\]/g, '_');
  if (segment === '' || segment === '.' || segment === '..') {
    throw new InvalidPaperIdError(paperId);
  }
  return segment;
}
