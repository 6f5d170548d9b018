import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { parseWhatsAppWebhook } from './whatsapp-adapter';
import { TurnQueue } from './turn-queue';
import { ChannelOutbound, InboundTurn, WhatsAppWebhookPayload } from './types';
import { logger, maskIdentity } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { Orchestrator } from '../orchestrator/orchestrator';

interface VerifyQuery {
  'hub.mode'?: string;
  'hub.verify_token'?: string;
  'hub.challenge'?: string;
}

export interface WhatsAppWebhookDeps {
  orchestrator: Orchestrator;
  outbound: ChannelOutbound;
  verifyToken: string;
  queue?: TurnQueue;
}

/**
 * Process one turn: read receipt, orchestrator, reply. Transport failures
 * are logged here; the orchestrator never throws.
 */
async function processTurn(turn: InboundTurn, deps: WhatsAppWebhookDeps): Promise<void> {
  const trace = createTraceContext({ identity: turn.identity, messageId: turn.messageId });
  const log = logger.child({ requestId: trace.requestId, identity: maskIdentity(turn.identity) });

  await deps.outbound.markRead(turn.messageId).catch((err: unknown) => {
    log.warn({ err }, 'Failed to mark message as read');
  });

  const result = await deps.orchestrator.handleTurn(turn, trace);
  if (result.reply === null) return;

  try {
    await deps.outbound.sendMessage(turn.identity, result.reply);
  } catch (err) {
    log.error({ err }, 'Failed to deliver reply');
  }
}

export function registerWhatsAppWebhook(app: FastifyInstance, deps: WhatsAppWebhookDeps): TurnQueue {
  const queue = deps.queue ?? new TurnQueue();

  app.get('/webhook', async (req: FastifyRequest<{ Querystring: VerifyQuery }>, reply: FastifyReply) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (mode === 'subscribe' && deps.verifyToken && token === deps.verifyToken) {
      logger.info('WhatsApp webhook verified');
      return reply.status(200).type('text/plain').send(challenge ?? '');
    }

    logger.warn({ mode }, 'WhatsApp webhook verification failed');
    return reply.status(403).send({ error: 'Verification failed' });
  });

  app.post('/webhook', async (req: FastifyRequest<{ Body: WhatsAppWebhookPayload }>, reply: FastifyReply) => {
    const parseResult = parseWhatsAppWebhook(req.body);
    if (!parseResult.ok) {
      logger.warn({ reason: parseResult.reason }, 'Failed to parse webhook');
      return reply.status(400).send({ error: parseResult.reason });
    }

    // Respond 200 immediately; turns run in the background, serialized per identity
    for (const turn of parseResult.turns) {
      queue.enqueue(turn.identity, () => processTurn(turn, deps)).catch((err: unknown) => {
        logger.error({ err, identity: maskIdentity(turn.identity) }, 'Turn processing error');
      });
    }

    return reply.status(200).send({ status: 'ok', accepted: parseResult.turns.length });
  });

  return queue;
}
