import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

// ───── HTTP ─────

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

// ───── Intake ─────

export const messagesReceived = new client.Counter({
  name: 'messages_received_total',
  help: 'Inbound messages by intake outcome',
  labelNames: ['tenant', 'outcome'] as const,
  registers: [registry],
});

export const duplicateMessages = new client.Counter({
  name: 'duplicate_messages_total',
  help: 'Inbound messages rejected as duplicates',
  registers: [registry],
});

export const lockContention = new client.Counter({
  name: 'message_lock_contention_total',
  help: 'Lock acquisitions that found the message already being processed',
  registers: [registry],
});

export const burstBatches = new client.Counter({
  name: 'burst_batches_total',
  help: 'Coalesced message bursts drained as a single turn',
  labelNames: ['trigger'] as const,
  registers: [registry],
});

// ───── Orchestration ─────

export const turnsProcessed = new client.Counter({
  name: 'turns_processed_total',
  help: 'Conversation turns run through the pipeline',
  labelNames: ['tenant', 'journey'] as const,
  registers: [registry],
});

export const stageDuration = new client.Histogram({
  name: 'pipeline_stage_duration_seconds',
  help: 'Duration of each pipeline stage',
  labelNames: ['stage'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const stageFailures = new client.Counter({
  name: 'pipeline_stage_failures_total',
  help: 'Pipeline stages that raised and were converted into an escalation',
  labelNames: ['stage'] as const,
  registers: [registry],
});

export const routeDecisions = new client.Counter({
  name: 'route_decisions_total',
  help: 'Final routing decisions by journey and reason',
  labelNames: ['journey', 'reason'] as const,
  registers: [registry],
});

export const escalationsTotal = new client.Counter({
  name: 'escalations_total',
  help: 'Escalations by trigger',
  labelNames: ['trigger'] as const,
  registers: [registry],
});

export const governanceActions = new client.Counter({
  name: 'governance_actions_total',
  help: 'Governance actions taken',
  labelNames: ['action'] as const,
  registers: [registry],
});

// ───── Classification ─────

export const classifierFallbacks = new client.Counter({
  name: 'classifier_fallbacks_total',
  help: 'Classifier calls answered by the heuristic fallback',
  labelNames: ['classifier', 'reason'] as const,
  registers: [registry],
});

export const llmTokensUsed = new client.Counter({
  name: 'llm_tokens_used_total',
  help: 'Tokens consumed by classifier LLM calls',
  labelNames: ['provider'] as const,
  registers: [registry],
});

// ───── Handoff ─────

export const handoffTickets = new client.Counter({
  name: 'handoff_tickets_total',
  help: 'Handoff ticket operations',
  labelNames: ['status'] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
