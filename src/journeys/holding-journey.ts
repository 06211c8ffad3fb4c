import { ResponseCatalog, getResponses } from '../config/responses';
import { JourneyExecutor } from '../orchestrator/types';

export type HoldingJourneyName = 'sales' | 'support' | 'orders' | 'offers' | 'prefs';

/**
 * Default executor for journeys whose business logic lives outside this
 * service: acknowledges the request and asks for the first detail needed.
 */
export class HoldingJourney implements JourneyExecutor {
  constructor(
    private readonly journey: HoldingJourneyName,
    private readonly responses: ResponseCatalog = getResponses(),
  ) {}

  async execute(): Promise<string> {
    return this.responses.journeyHolding[this.journey];
  }
}
