import { ChattinessLevel, Lang } from '../state/types';
import { EscalationLexicon } from './lexicon';

/** Per-tenant conversation policy */
export interface TenantPolicy {
  tenantId: string;
  tenantName?: string;
  /** Name the bot uses for itself in replies */
  botName?: string;
  defaultLanguage: Lang;
  allowedLanguages: Lang[];
  maxChattinessLevel: ChattinessLevel;
  /** Web catalog base URL; catalog links are only offered when set */
  catalogLinkBase?: string;
  /** Extra escalation phrases, merged with the global lexicon */
  escalationKeywords?: Partial<EscalationLexicon>;
}
