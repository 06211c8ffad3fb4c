import { ResponseCatalog, fill, getResponses } from '../config/responses';
import { botName } from '../governance/replies';
import { JourneyExecutor, JourneyInput } from '../orchestrator/types';

/**
 * Handles turns the router could not place. In the medium-confidence band
 * it asks one clarifying question for the classified intent, followed by a
 * hint about the journey it suspects. Otherwise it greets first-time
 * customers and lists what the bot can do.
 */
export class UnknownJourney implements JourneyExecutor {
  constructor(private readonly responses: ResponseCatalog = getResponses()) {}

  async execute({ state, decision }: JourneyInput): Promise<string> {
    if (decision.shouldClarify) {
      const intent = decision.metadata.intent ?? state.intent;
      const question = this.responses.clarification[intent] ?? this.responses.clarification.unknown;
      const suggested = decision.metadata.suggestedJourney;
      const hint = suggested ? this.responses.clarificationHints[suggested] : undefined;
      return hint ? `${question} ${hint}` : question;
    }

    if (state.turnCount <= 1) {
      return fill(this.responses.unknown.welcome, { name: botName(state, this.responses) });
    }
    return this.responses.unknown.capabilities;
  }
}
