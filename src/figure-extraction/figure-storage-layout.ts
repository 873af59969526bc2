import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { InvalidPaperIdError } from '../common/errors';
import { safePaperSegment } from '../common/paper-id';

/**
 * Where a paper's figure artifacts live: on disk, behind the static file
 * route, and under the remote object store.
 */
@Injectable()
export class FigureStorageLayout {
  readonly dataDir: string;
  readonly staticBaseUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.dataDir = path.resolve(this.configService.get<string>('FIGURES_DATA_DIR', 'data'));
    this.staticBaseUrl = this.configService
      .get<string>('FIGURES_STATIC_BASE_URL', '/static/papers')
      .replace(/\/+$/, '');
  }

  /** Always a directory inside dataDir; throws InvalidPaperIdError otherwise. */
  figuresDir(paperId: string): string {
    const dir = path.resolve(this.dataDir, safePaperSegment(paperId), 'figures');
    if (!dir.startsWith(this.dataDir + path.sep)) {
      throw new InvalidPaperIdError(paperId);
    }
    return dir;
  }

  staticUrl(paperId: string, fileName: string): string {
    return `${this.staticBaseUrl}/${encodeURIComponent(safePaperSegment(paperId))}/figures/${encodeURIComponent(fileName)}`;
  }

  remoteKey(paperId: string, figureId: string): string {
    return `figures/${safePaperSegment(paperId)}/${figureId}.png`;
  }

  remotePrefix(paperId: string): string {
    return `figures/${safePaperSegment(paperId)}`;
  }
}
