import type * as PdfjsModule from 'pdfjs-dist';

export type Pdfjs = typeof PdfjsModule;

/** pdfjs-dist only ships ES modules; a compiled `import()` would become `require()`. */
const importEsm = new Function('specifier', 'return import(specifier)');

let loading: Promise<Pdfjs> | null = null;

/** The legacy (Node) build of pdfjs, loaded once. */
export function loadPdfjs(): Promise<Pdfjs> {
  if (!loading) {
    loading = load().catch((error: unknown) => {
      loading = null;
      throw error;
    });
  }
  return loading;
}

async function load(): Promise<Pdfjs> {
  const loaded: unknown = await importEsm('pdfjs-dist/legacy/build/pdf.mjs');
  if (!isPdfjs(loaded)) {
    throw new Error('pdfjs-dist/legacy/build/pdf.mjs did not export getDocument and OPS');
  }
  return loaded;
}

function isPdfjs(value: unknown): value is Pdfjs {
  return typeof value === 'object' && value !== null && 'getDocument' in value && 'OPS' in value;
}
