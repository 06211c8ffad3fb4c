import * as fs from 'fs';
import * as path from 'path';
import { TenantPolicy } from './types';
import { LANGUAGES } from '../state/types';
import { ajv, describeErrors } from '../validation/ajv';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const CONFIG_DIR = path.resolve(PROJECT_ROOT, 'config', 'tenants');

const phraseList = { type: 'array', items: { type: 'string', minLength: 1 } };

const validatePolicy = ajv.compile<TenantPolicy>({
  type: 'object',
  required: ['tenantId', 'defaultLanguage', 'allowedLanguages', 'maxChattinessLevel'],
  additionalProperties: false,
  properties: {
    tenantId: { type: 'string', minLength: 1 },
    tenantName: { type: 'string' },
    botName: { type: 'string' },
    defaultLanguage: { enum: [...LANGUAGES] },
    allowedLanguages: { type: 'array', minItems: 1, items: { enum: [...LANGUAGES] } },
    maxChattinessLevel: { enum: [0, 1, 2, 3] },
    catalogLinkBase: { type: 'string' },
    escalationKeywords: {
      type: 'object',
      additionalProperties: false,
      properties: {
        humanRequest: phraseList,
        paymentDispute: phraseList,
        sensitive: phraseList,
        frustration: phraseList,
      },
    },
  },
});

/** Resolves the policy a tenant's conversations run under */
export interface TenantResolver {
  resolve(tenantId: string): Promise<TenantPolicy>;
}

export class ConfigService implements TenantResolver {
  private policies: Map<string, TenantPolicy> = new Map();

  constructor(private readonly configDir: string = CONFIG_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.policies.clear();
    if (!fs.existsSync(this.configDir)) {
      logger.warn({ dir: this.configDir }, 'Tenant config directory not found; using built-in default');
      return;
    }

    const files = fs.readdirSync(this.configDir).filter((f) => f.endsWith('.json'));
    for (const file of files) {
      try {
        const raw: unknown = JSON.parse(fs.readFileSync(path.join(this.configDir, file), 'utf-8'));
        if (!validatePolicy(raw)) {
          logger.error({ file, errors: describeErrors(validatePolicy.errors) }, 'Invalid tenant config; skipped');
          continue;
        }
        this.policies.set(raw.tenantId, raw);
        logger.info({ tenantId: raw.tenantId }, 'Loaded tenant config');
      } catch (err) {
        logger.error({ file, err }, 'Failed to load tenant config');
      }
    }
  }

  get(tenantId: string): TenantPolicy {
    return this.policies.get(tenantId) ?? this.policies.get('default') ?? ConfigService.builtInDefault();
  }

  async resolve(tenantId: string): Promise<TenantPolicy> {
    return this.get(tenantId);
  }

  /** Register or replace a policy at runtime */
  set(policy: TenantPolicy): void {
    if (!validatePolicy(policy)) {
      throw new Error(`Invalid tenant policy: ${describeErrors(validatePolicy.errors)}`);
    }
    this.policies.set(policy.tenantId, policy);
  }

  static builtInDefault(): TenantPolicy {
    return {
      tenantId: 'default',
      defaultLanguage: 'en',
      allowedLanguages: ['en', 'sw', 'sheng'],
      maxChattinessLevel: 2,
    };
  }
}
