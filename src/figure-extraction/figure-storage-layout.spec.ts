import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { InvalidPaperIdError } from '../common/errors';
import { FigureStorageLayout } from './figure-storage-layout';

describe('FigureStorageLayout', () => {
  const dataDir = path.resolve('/srv/data');
  let layout: FigureStorageLayout;

  beforeEach(async () => {
    const values: Record<string, string> = { FIGURES_DATA_DIR: '/srv/data', FIGURES_STATIC_BASE_URL: '/static/papers/' };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FigureStorageLayout,
        { provide: ConfigService, useValue: { get: jest.fn((key: string, fallback?: string) => values[key] ?? fallback) } },
      ],
    }).compile();

    layout = module.get<FigureStorageLayout>(FigureStorageLayout);
  });

  it('should keep every paper under the data dir', () => {
    expect(layout.figuresDir('2301.00001')).toBe(path.join(dataDir, '2301.00001', 'figures'));
    expect(layout.figuresDir('hep-th/9901001')).toBe(path.join(dataDir, 'hep-th_9901001', 'figures'));
    expect(layout.figuresDir('../..')).toBe(path.join(dataDir, '.._..', 'figures'));
  });

  it.each(['..', '.', '', ' '])('should refuse %p as a paper directory', (paperId) => {
    expect(() => layout.figuresDir(paperId)).toThrow(InvalidPaperIdError);
  });

  it('should build static urls and remote keys from the flattened id', () => {
    expect(layout.staticUrl('hep-th/9901001', 'fig1.png')).toBe('/static/papers/hep-th_9901001/figures/fig1.png');
    expect(layout.remoteKey('2301.00001', 'fig2_a')).toBe('figures/2301.00001/fig2_a.png');
    expect(layout.remotePrefix('2301.00001')).toBe('figures/2301.00001');
  });
});
