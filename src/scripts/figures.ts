import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { ArxivService } from '../arxiv/arxiv.service';
import { errorMessage } from '../common/errors';
import { FigureExtractionService } from '../figure-extraction/figure-extraction.service';
import { FigureSyncService } from '../figure-extraction/figure-sync.service';

const USAGE = [
  'Usage:',
  '  figures extract <arxiv id|url> [--force] [--no-upload]',
  '  figures sync <arxiv id|url>',
  '  figures clear <arxiv id|url>',
].join('\n');

/**
 * Runs the figure pipeline outside the HTTP server.
 * Exit codes: 0 success, 1 usage or unexpected error, 2 extraction found nothing.
 */
async function run(argv: string[]): Promise<number> {
  const [command, target, ...flags] = argv;
  if (!command || !target) {
    console.error(USAGE);
    return 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn', 'log'] });
  try {
    const source = app.get(ArxivService).buildPaperSource(target);
    switch (command) {
      case 'extract': {
        const result = await app.get(FigureExtractionService).extractFigures(source, {
          force: flags.includes('--force'),
          upload: !flags.includes('--no-upload'),
        });
        print({
          paperId: result.paperId,
          status: result.status,
          extractionMethod: result.extractionMethod,
          totalFound: result.totalFound,
          figures: Object.keys(result.registry),
          errors: result.errors ?? [],
        });
        return result.status === 'done' ? 0 : 2;
      }
      case 'sync':
        print(await app.get(FigureSyncService).syncPaper(source.paperId));
        return 0;
      case 'clear':
        print(await app.get(FigureExtractionService).clearFigureCache(source.paperId));
        return 0;
      default:
        console.error(`Unknown command: ${command}\n${USAGE}`);
        return 1;
    }
  } finally {
    await app.close();
  }
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`figures: ${errorMessage(error)}`);
    process.exitCode = 1;
  },
);
