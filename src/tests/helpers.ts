import { getAppConfig, type AppConfig, type EnvSource } from '../lib/config';
import type {
  AnalysisResult,
  ChecklistResult,
  Collaborators,
  CrawlOutput,
  FieldMap,
  RenderedReport
} from '../lib/pipeline/types';

export const PRODUCT_URL = 'https://www.example-market.test/gmkt.inc/Goods/Goods.aspx?goodscode=1000001';
export const SHOP_URL = 'https://www.example-market.test/shop/sample-store';

export function testConfig(overrides: EnvSource = {}): AppConfig {
  return getAppConfig({ JOB_TIMEOUT_MS: '2000', COLLABORATOR_RETRIES: '0', ...overrides });
}

export function productFields(): FieldMap {
  return {
    product_name: 'Hydrating Serum 50ml',
    price: { sale_price: 4562, original_price: 6000 },
    reviews: { review_count: 128 },
    images: { thumbnail: 'https://img.example.test/thumb.jpg', detail_images: ['d1.jpg', 'd2.jpg', 'd3.jpg'] },
    description: 'Lightweight daily serum',
    shipping_info: { shipping_fee: 0 },
    category: 'Beauty'
  };
}

/** Agrees with productFields() except for the sale price (4500 vs 4562). */
export function productAnalysis(): AnalysisResult {
  return {
    overallScore: 72,
    product_analysis: {
      product_name: 'Hydrating Serum 50ml',
      price_analysis: { sale_price: 4500, original_price: '6,000円' },
      review_analysis: { review_count: 128 },
      image_analysis: { image_count: 3 }
    }
  };
}

export function productChecklist(): ChecklistResult {
  return {
    categories: [
      {
        name: 'Listing basics',
        items: [
          { id: 'item_001', title: 'Product name set', status: 'completed', autoChecked: true },
          { id: 'item_006', title: 'Sale price set', status: 'completed', autoChecked: true },
          { id: 'item_010', title: 'Free shipping threshold set', status: 'pending', autoChecked: true },
          { id: 'item_020', title: 'Brand story written', status: 'pending', autoChecked: false }
        ]
      }
    ]
  };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export type FakeCollaboratorOptions = {
  fields?: FieldMap;
  records?: FieldMap[];
  analysis?: AnalysisResult;
  checklist?: ChecklistResult;
  /** Awaited before the analysis result is returned. */
  analyzeGate?: Promise<void>;
  /** Awaited before the checklist result is returned. */
  checklistGate?: Promise<void>;
  failAt?: 'retrieve' | 'analyze' | 'evaluate' | 'render';
};

export type FakeCollaborators = Collaborators & {
  calls: string[];
  priorityHints: string[][];
};

export function fakeCollaborators(opts: FakeCollaboratorOptions = {}): FakeCollaborators {
  const calls: string[] = [];
  const priorityHints: string[][] = [];

  const maybeFail = (step: NonNullable<FakeCollaboratorOptions['failAt']>) => {
    calls.push(step);
    if (opts.failAt === step) throw new Error(`${step} service unavailable`);
  };

  return {
    calls,
    priorityHints,
    retrieval: {
      async retrieve(input): Promise<CrawlOutput> {
        maybeFail('retrieve');
        priorityHints.push(input.priorityFields);
        return { type: 'crawl', fields: opts.fields ?? productFields(), records: opts.records ?? [] };
      }
    },
    analysis: {
      async analyze() {
        maybeFail('analyze');
        if (opts.analyzeGate) await opts.analyzeGate;
        return opts.analysis ?? productAnalysis();
      }
    },
    checklist: {
      async evaluate() {
        maybeFail('evaluate');
        if (opts.checklistGate) await opts.checklistGate;
        return opts.checklist ?? productChecklist();
      }
    },
    renderer: {
      async render(input): Promise<RenderedReport> {
        maybeFail('render');
        return { format: 'markdown', document: `# Report for ${input.sourceRef}\n\nScore: ${input.analysis.overallScore}\n` };
      }
    }
  };
}

/** Resolves after pending microtasks and a macrotask turn. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export async function waitFor(check: () => Promise<boolean> | boolean, timeoutMs = 1000): Promise<void> {
  const started = Date.now();
  while (!(await check())) {
    if (Date.now() - started > timeoutMs) throw new Error('condition not met in time');
    await flush();
  }
}
