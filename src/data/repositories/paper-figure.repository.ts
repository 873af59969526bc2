import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { errorMessage, PersistenceError } from '../../common/errors';
import { FirestoreService } from '../../firestore/firestore.service';
import { PaperFigureDocument, PaperFigureUpsert } from '../../firestore/interfaces/firestore.interfaces';

const figureDocumentSchema = z.object({
  figureId: z.string().optional(),
  caption: z.string().nullish(),
  type: z.enum(['figure', 'table']).optional(),
  remoteUrl: z.string().nullish(),
  updatedAt: z.unknown().optional(),
});

/**
 * Remote figure registry. Reads degrade to null / [] on failure or when
 * Firestore is not configured; writes raise PersistenceError.
 */
@Injectable()
export class PaperFigureRepository {
  private readonly logger = new Logger(PaperFigureRepository.name);

  constructor(private readonly firestoreService: FirestoreService) {}

  isEnabled(): boolean {
    return this.firestoreService.isEnabled();
  }

  async upsert(paperId: string, figure: PaperFigureUpsert): Promise<void> {
    const collection = this.firestoreService.getPaperFiguresCollection(paperId);
    if (!collection) {
      return;
    }
    try {
      await collection.doc(figure.figureId).set(
        {
          ...figure,
          updatedAt: new Date(),
        },
        { merge: true },
      );
    } catch (error) {
      throw new PersistenceError(`Failed to upsert figure ${figure.figureId} for paper ${paperId}`, {
        cause: error,
      });
    }
  }

  async findByPaper(paperId: string): Promise<PaperFigureDocument[]> {
    const collection = this.firestoreService.getPaperFiguresCollection(paperId);
    if (!collection) {
      return [];
    }
    try {
      const snapshot = await collection.get();
      return snapshot.docs
        .map((doc) => this.toDocument(doc.id, doc.data()))
        .filter((figure): figure is PaperFigureDocument => figure !== null);
    } catch (error) {
      this.logger.error(`Error fetching figures for paper ${paperId}: ${errorMessage(error)}`);
      return [];
    }
  }

  async findOne(paperId: string, figureId: string): Promise<PaperFigureDocument | null> {
    const collection = this.firestoreService.getPaperFiguresCollection(paperId);
    if (!collection) {
      return null;
    }
    try {
      const doc = await collection.doc(figureId).get();
      if (!doc.exists) {
        return null;
      }
      return this.toDocument(doc.id, doc.data());
    } catch (error) {
      this.logger.error(`Error fetching figure ${figureId} for paper ${paperId}: ${errorMessage(error)}`);
      return null;
    }
  }

  async getFigureUrl(paperId: string, figureId: string): Promise<string | null> {
    return (await this.findOne(paperId, figureId))?.remoteUrl ?? null;
  }

  async getFigureCaption(paperId: string, figureId: string): Promise<string | null> {
    const caption = (await this.findOne(paperId, figureId))?.caption;
    return caption ? caption : null;
  }

  async listFigureIds(paperId: string): Promise<string[]> {
    return (await this.findByPaper(paperId)).map((figure) => figure.figureId);
  }

  async deleteByPaper(paperId: string): Promise<number> {
    const collection = this.firestoreService.getPaperFiguresCollection(paperId);
    if (!collection) {
      return 0;
    }
    try {
      const snapshot = await collection.get();
      await Promise.all(snapshot.docs.map((doc) => doc.ref.delete()));
      return snapshot.size;
    } catch (error) {
      throw new PersistenceError(`Failed to delete figures for paper ${paperId}`, { cause: error });
    }
  }

  private toDocument(id: string, data: unknown): PaperFigureDocument | null {
    const parsed = figureDocumentSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed figure document ${id}`);
      return null;
    }
    return {
      figureId: parsed.data.figureId ?? id,
      caption: parsed.data.caption ?? '',
      type: parsed.data.type ?? 'figure',
      remoteUrl: parsed.data.remoteUrl ?? null,
      updatedAt: toDate(parsed.data.updatedAt),
    };
  }
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  // Firestore Timestamp
  if (typeof value === 'object' && value !== null && 'toDate' in value && typeof value.toDate === 'function') {
    const converted: unknown = value.toDate();
    return converted instanceof Date ? converted : null;
  }
  return null;
}
