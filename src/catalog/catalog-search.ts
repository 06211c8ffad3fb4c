import * as fs from 'fs';
import * as path from 'path';
import { CatalogItem } from './catalog-fallback';
import { ajv, describeErrors } from '../validation/ajv';
import { logger } from '../observability/logger';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const CATALOG_DIR = path.resolve(PROJECT_ROOT, 'config', 'catalog');

export interface CatalogSearchResult {
  items: CatalogItem[];
  /** Matches in the whole catalog, not just the returned page */
  totalEstimate: number;
}

export interface CatalogSearch {
  search(tenantId: string, query: string, limit: number): Promise<CatalogSearchResult>;
}

interface CatalogEntry extends CatalogItem {
  tags?: string[];
}

const validateCatalog = ajv.compile<CatalogEntry[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'name'],
    additionalProperties: false,
    properties: {
      id: { type: 'string', minLength: 1 },
      name: { type: 'string', minLength: 1 },
      price: { type: 'number' },
      currency: { type: 'string' },
      category: { type: 'string' },
      tags: { type: 'array', items: { type: 'string' } },
      variants: {
        type: 'array',
        items: { type: 'object', additionalProperties: { type: ['string', 'number', 'boolean'] } },
      },
    },
  },
});

const MIN_TOKEN_LENGTH = 3;

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length >= MIN_TOKEN_LENGTH);
}

/**
 * Keyword search over per-tenant catalog files (config/catalog/<tenantId>.json).
 * Score is the share of query tokens found in an item's name, category and tags.
 */
export class InMemoryCatalogSearch implements CatalogSearch {
  private readonly catalogs = new Map<string, CatalogEntry[]>();
  private readonly log = logger.child({ component: 'catalog-search' });

  constructor(private readonly catalogDir: string = CATALOG_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.catalogs.clear();
    if (!fs.existsSync(this.catalogDir)) {
      this.log.warn({ dir: this.catalogDir }, 'Catalog directory not found; catalog search returns nothing');
      return;
    }
    for (const file of fs.readdirSync(this.catalogDir).filter((f) => f.endsWith('.json'))) {
      const tenantId = path.basename(file, '.json');
      const raw: unknown = JSON.parse(fs.readFileSync(path.join(this.catalogDir, file), 'utf-8'));
      if (!validateCatalog(raw)) {
        this.log.error({ file, errors: describeErrors(validateCatalog.errors) }, 'Invalid catalog; skipped');
        continue;
      }
      this.catalogs.set(tenantId, raw);
      this.log.info({ tenantId, items: raw.length }, 'Loaded catalog');
    }
  }

  /** Register or replace a tenant's catalog at runtime */
  set(tenantId: string, items: CatalogEntry[]): void {
    this.catalogs.set(tenantId, items);
  }

  async search(tenantId: string, query: string, limit: number): Promise<CatalogSearchResult> {
    const entries = this.catalogs.get(tenantId) ?? [];
    const terms = [...new Set(tokenize(query))];
    if (terms.length === 0) return { items: [], totalEstimate: 0 };

    const scored = entries
      .map((entry, index) => {
        const haystack = new Set(tokenize([entry.name, entry.category ?? '', ...(entry.tags ?? [])].join(' ')));
        const hits = terms.filter((t) => haystack.has(t)).length;
        return { entry, index, score: hits / terms.length };
      })
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index);

    const items = scored.slice(0, limit).map(({ entry, score }) => {
      const { tags: _tags, ...item } = entry;
      return { ...item, score: Math.round(score * 100) / 100 };
    });
    return { items, totalEstimate: scored.length };
  }
}
