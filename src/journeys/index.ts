import { CatalogSearch } from '../catalog/catalog-search';
import { HandoffService } from '../handoff/types';
import { JOURNEYS } from '../state/types';
import { JourneyExecutors } from '../orchestrator/types';
import { GovernanceJourney } from './governance-journey';
import { HoldingJourney } from './holding-journey';
import { SalesJourney } from './sales-journey';
import { UnknownJourney } from './unknown-journey';

export interface JourneyOptions {
  handoff: HandoffService;
  catalogSearch?: CatalogSearch;
  /** Replace the default executor for individual journeys */
  overrides?: Partial<JourneyExecutors>;
}

export function createJourneyExecutors(options: JourneyOptions): JourneyExecutors {
  const defaults: JourneyExecutors = {
    sales: new SalesJourney(options.catalogSearch),
    support: new HoldingJourney('support'),
    orders: new HoldingJourney('orders'),
    offers: new HoldingJourney('offers'),
    prefs: new HoldingJourney('prefs'),
    governance: new GovernanceJourney(options.handoff),
    unknown: new UnknownJourney(),
  };
  const overrides = options.overrides ?? {};
  for (const journey of JOURNEYS) {
    const executor = overrides[journey];
    if (executor) defaults[journey] = executor;
  }
  return defaults;
}
