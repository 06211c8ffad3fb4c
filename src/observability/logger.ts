import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.logLevel,
  base: { service: 'journey-orchestrator', env: env.nodeEnv },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/** Identifiers every log line of one turn carries */
export interface TurnLogFields {
  requestId: string;
  tenantId: string;
  conversationId: string;
}

export function turnLogger(fields: TurnLogFields): pino.Logger {
  return logger.child({ ...fields, component: 'orchestrator' });
}
