import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PaperFigureRepository } from '../data/repositories/paper-figure.repository';
import { FigureStorageLayout } from '../figure-extraction/figure-storage-layout';
import {
  createFigureRecord,
  createTableRecord,
  FigureRegistry,
} from '../figure-extraction/interfaces/figure.interface';
import { FigureMetadataStore } from '../figure-extraction/metadata/figure-metadata.store';
import { FigureReferenceResolver } from './figure-reference.resolver';

const PAPER_ID = '2301.00003';
const STATIC = `/static/papers/${PAPER_ID}/figures`;

describe('FigureReferenceResolver', () => {
  let resolver: FigureReferenceResolver;
  let dataDir: string;
  let figuresDir: string;
  let registry: FigureRegistry;
  let paperFigureRepository: {
    findOne: jest.Mock;
    getFigureUrl: jest.Mock;
    getFigureCaption: jest.Mock;
    listFigureIds: jest.Mock;
  };

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'resolver-'));
    figuresDir = path.join(dataDir, PAPER_ID, 'figures');
    paperFigureRepository = {
      findOne: jest.fn().mockResolvedValue(null),
      getFigureUrl: jest.fn().mockResolvedValue(null),
      getFigureCaption: jest.fn().mockResolvedValue(null),
      listFigureIds: jest.fn().mockResolvedValue([]),
    };
    registry = {
      fig1: createFigureRecord('fig1', 'Overview', path.join(figuresDir, 'fig1.png')),
      fig2: createFigureRecord('fig2', 'Panels', null, [
        { id: 'a', caption: 'left' },
        { id: 'b', caption: 'right', remotePath: 'https://storage.example/fig2_b.png' },
      ]),
      tab3: createTableRecord('tab3', 'Scores', '| a |\n|---|', path.join(figuresDir, 'tab3.md')),
      appendix_fig4: createFigureRecord('appendix_fig4', 'Extra', path.join(figuresDir, 'appendix_fig4.png')),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FigureReferenceResolver,
        FigureStorageLayout,
        FigureMetadataStore,
        { provide: ConfigService, useValue: { get: jest.fn((key: string, fallback?: unknown) => (key === 'FIGURES_DATA_DIR' ? dataDir : fallback)) } },
        { provide: PaperFigureRepository, useValue: paperFigureRepository },
      ],
    }).compile();

    resolver = module.get<FigureReferenceResolver>(FigureReferenceResolver);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('main figures', () => {
    it('should serve a local figure from the static route', async () => {
      expect(await resolver.resolve(PAPER_ID, '1', registry)).toEqual({
        id: 'fig1',
        displayId: '1',
        type: 'figure',
        caption: 'Overview',
        url: `${STATIC}/fig1.png`,
      });
    });

    it('should prefer the remote registry URL over the static route', async () => {
      paperFigureRepository.getFigureUrl.mockResolvedValue('https://storage.example/fig1.png');

      const resolved = await resolver.resolve(PAPER_ID, '1', registry);

      expect(resolved.url).toBe('https://storage.example/fig1.png');
      expect(paperFigureRepository.getFigureUrl).toHaveBeenCalledWith(PAPER_ID, 'fig1');
    });

    it('should list subfigures of a parent without its own image', async () => {
      expect(await resolver.resolve(PAPER_ID, '2', registry)).toEqual({
        id: 'fig2',
        displayId: '2',
        type: 'figure',
        caption: 'Panels',
        url: null,
        subfigures: [
          { id: 'fig2_a', displayId: '2.a', caption: 'left', url: `${STATIC}/fig2_a.png` },
          { id: 'fig2_b', displayId: '2.b', caption: 'right', url: 'https://storage.example/fig2_b.png' },
        ],
      });
    });

    it('should resolve tables with their markdown content', async () => {
      expect(await resolver.resolve(PAPER_ID, '3', registry)).toEqual({
        id: 'tab3',
        displayId: '3',
        type: 'table',
        caption: 'Scores',
        url: `${STATIC}/tab3.md`,
        content: '| a |\n|---|',
      });
    });

    it('should fall through to appendix ids', async () => {
      const resolved = await resolver.resolve(PAPER_ID, '4', registry);

      expect(resolved.id).toBe('appendix_fig4');
      expect(resolved.url).toBe(`${STATIC}/appendix_fig4.png`);
    });

    it('should use the remote row of a figure missing locally', async () => {
      paperFigureRepository.findOne.mockImplementation(async (_paperId: string, figureId: string) =>
        figureId === 'tab9'
          ? { figureId: 'tab9', caption: 'Remote table', type: 'table', remoteUrl: null, updatedAt: null }
          : null,
      );

      expect(await resolver.resolve(PAPER_ID, '9', registry)).toEqual({
        id: 'tab9',
        displayId: '9',
        type: 'table',
        caption: 'Remote table',
        url: null,
      });
      expect(paperFigureRepository.findOne.mock.calls.map((call: unknown[]) => call[1])).toEqual(['fig9', 'tab9']);
    });

    it('should answer with a generic caption when nothing is known', async () => {
      expect(await resolver.resolve(PAPER_ID, '8', {})).toEqual({
        id: 'fig8',
        displayId: '8',
        type: 'figure',
        caption: 'Figure 8',
        url: null,
      });
    });

    it('should not throw on an unparseable display id', async () => {
      expect(await resolver.resolve(PAPER_ID, 'x', registry)).toEqual({
        id: 'x',
        displayId: 'x',
        type: 'figure',
        caption: 'Figure x',
        url: null,
      });
    });
  });

  describe('subfigures', () => {
    it('should take the caption from the parent list and carry the parent caption', async () => {
      expect(await resolver.resolve(PAPER_ID, '2.a', registry)).toEqual({
        id: 'fig2_a',
        displayId: '2.a',
        type: 'figure',
        caption: 'left',
        url: `${STATIC}/fig2_a.png`,
        parentCaption: 'Panels',
      });
      expect(paperFigureRepository.getFigureCaption).not.toHaveBeenCalled();
    });

    it('should ask the remote registry for the parent caption first', async () => {
      paperFigureRepository.getFigureCaption.mockImplementation(async (_paperId: string, figureId: string) =>
        figureId === 'fig5' ? 'Remote caption' : null,
      );

      expect(await resolver.resolve(PAPER_ID, '5.a', {})).toEqual({
        id: 'fig5_a',
        displayId: '5.a',
        type: 'figure',
        caption: '(a)',
        url: null,
        parentCaption: 'Remote caption',
      });
    });

    it('should scan cached sidecars for the parent caption', async () => {
      await fs.mkdir(figuresDir, { recursive: true });
      await fs.writeFile(
        path.join(figuresDir, 'figures.json'),
        JSON.stringify({
          fig6: {
            id: 'fig6',
            caption: 'Cached caption',
            type: 'figure',
            has_subfigures: true,
            subfigures: [{ id: 'a', caption: 'only panel' }],
            content: null,
            path: null,
          },
        }),
      );

      const resolved = await resolver.resolve(PAPER_ID, '6.a', {});

      expect(resolved.parentCaption).toBe('Cached caption');
      expect(paperFigureRepository.listFigureIds).not.toHaveBeenCalled();
    });

    it('should scan remote ids carrying the parent number', async () => {
      paperFigureRepository.listFigureIds.mockResolvedValue(['fig7_a', 'tab7']);
      paperFigureRepository.getFigureCaption.mockImplementation(async (_paperId: string, figureId: string) =>
        figureId === 'tab7' ? 'Found by number' : null,
      );

      const resolved = await resolver.resolve(PAPER_ID, '7.b', {});

      expect(resolved.parentCaption).toBe('Found by number');
      expect(paperFigureRepository.getFigureCaption.mock.calls.map((call: unknown[]) => call[1])).toEqual([
        'fig7',
        'appendix_fig7',
        'tab7',
      ]);
    });

    it('should synthesize a parent caption as a last resort', async () => {
      const resolved = await resolver.resolve(PAPER_ID, '8.a', {});

      expect(resolved.parentCaption).toBe('Figure 8');
      expect(resolved.caption).toBe('(a)');
    });
  });

  it('should resolve every main entry in registry order', async () => {
    const all = await resolver.resolveAll(PAPER_ID, registry);

    expect(all.map((figure) => figure.id)).toEqual(['fig1', 'fig2', 'tab3', 'appendix_fig4']);
  });

  it('should substitute placeholders through the resolver', async () => {
    const markdown = await resolver.substitutePlaceholders(PAPER_ID, 'See <FIGURE_ID>1</FIGURE_ID>.', registry);

    expect(markdown).toBe(`See \n\n![Overview](${STATIC}/fig1.png)\n*Figure 1: Overview*\n\n.`);
  });

  describe('resolveThumbnail', () => {
    it('should pick the first panel of a parent without an image', async () => {
      const thumbnail = await resolver.resolveThumbnail(PAPER_ID, '2', registry);

      expect(thumbnail?.id).toBe('fig2_a');
      expect(thumbnail?.url).toBe(`${STATIC}/fig2_a.png`);
    });

    it('should return null for a registry without figures', async () => {
      expect(await resolver.resolveThumbnail(PAPER_ID, null, {})).toBeNull();
    });
  });
});
