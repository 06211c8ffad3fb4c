import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { MessageIntake } from '../intake/message-intake';
import { env } from '../config/env';
import { logger } from '../observability/logger';

interface WebhookBody {
  tenantId?: string;
  conversationId: string;
  messageId: string;
  text: string;
  phone?: string;
  customerId?: string;
}

const webhookBodySchema = {
  type: 'object',
  required: ['conversationId', 'messageId', 'text'],
  additionalProperties: false,
  properties: {
    tenantId: { type: 'string', minLength: 1 },
    conversationId: { type: 'string', minLength: 1 },
    messageId: { type: 'string', minLength: 1 },
    text: { type: 'string', minLength: 1, maxLength: 4096 },
    phone: { type: 'string' },
    customerId: { type: 'string' },
  },
} as const;

/**
 * Inbound chat webhook. Responds as soon as intake has decided what to do
 * with the message; the turn itself runs in the background.
 *
 * Tenant comes from the body, then the `x-tenant-id` header, then the
 * configured default.
 */
export function registerMessageWebhook(app: FastifyInstance, intake: MessageIntake): void {
  app.post<{ Body: WebhookBody }>(
    '/webhooks/messages',
    { schema: { body: webhookBodySchema } },
    async (req: FastifyRequest<{ Body: WebhookBody }>, reply: FastifyReply) => {
      const body = req.body;
      const header = req.headers['x-tenant-id'];
      const tenantId = body.tenantId ?? (typeof header === 'string' && header ? header : env.defaultTenantId);

      try {
        const result = await intake.receive({
          tenantId,
          conversationId: body.conversationId,
          messageId: body.messageId,
          text: body.text,
          phone: body.phone,
          customerId: body.customerId,
        });
        return reply.status(200).send({ status: result.status, requestId: result.requestId });
      } catch (err) {
        logger.error({ err, tenantId, conversationId: body.conversationId }, 'Webhook intake failed');
        return reply.status(500).send({ error: 'Internal server error' });
      }
    },
  );
}
