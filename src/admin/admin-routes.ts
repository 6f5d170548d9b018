import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { PromptManager } from '../agent/prompt-manager';
import { OrderService } from '../restaurant/order-service';
import {
  COMPLAINT_STATUSES,
  ComplaintStatus,
  ORDER_STATUSES,
  OrderStatus,
  RESERVATION_STATUSES,
  ReservationStatus,
  RestaurantRepository,
} from '../restaurant/types';
import { dayKey, identityKey, monthKey } from '../usage/usage-tracker';
import { UsageTracker, UsageWindow } from '../usage/types';
import { logger } from '../observability/logger';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_PATTERN = /^\d{4}-\d{2}$/;
const DEFAULT_CONVERSATION_LIMIT = 10;
const MAX_CONVERSATION_LIMIT = 200;

export interface AdminDeps {
  usage: UsageTracker;
  repo: RestaurantRepository;
  orders: OrderService;
  prompts: PromptManager;
  displayCurrency: string;
  now?: () => number;
}

function oneOf<T extends string>(allowed: readonly T[]) {
  return (value: unknown): value is T => typeof value === 'string' && (allowed as readonly string[]).includes(value);
}

const isOrderStatus = oneOf<OrderStatus>(ORDER_STATUSES);
const isComplaintStatus = oneOf<ComplaintStatus>(COMPLAINT_STATUSES);
const isReservationStatus = oneOf<ReservationStatus>(RESERVATION_STATUSES);

function parseId(raw: string): number | null {
  const id = parseInt(raw, 10);
  return Number.isInteger(id) && id >= 1 ? id : null;
}

function windowView(window: UsageWindow, currency: string) {
  return {
    input_tokens: window.inputTokens,
    output_tokens: window.outputTokens,
    total_tokens: window.inputTokens + window.outputTokens,
    requests: window.requests,
    cost_usd: window.costUsd,
    cost_display: window.costDisplay,
    currency,
  };
}

/**
 * Read-only reporting over usage windows and conversation history, plus
 * order status updates and prompt reload. Unauthenticated.
 */
export function registerAdminRoutes(app: FastifyInstance, deps: AdminDeps): void {
  const now = deps.now ?? Date.now;

  // ───── Usage ─────

  app.get('/admin/usage/daily', async (req: FastifyRequest<{ Querystring: { date?: string } }>, reply: FastifyReply) => {
    const date = req.query.date ?? dayKey(now());
    if (!DAY_PATTERN.test(date)) {
      return reply.status(400).send({ error: 'date must be YYYY-MM-DD' });
    }
    const window = await deps.usage.readWindow('day', date);
    return reply.send({ date, ...windowView(window, deps.displayCurrency) });
  });

  app.get('/admin/usage/monthly', async (req: FastifyRequest<{ Querystring: { month?: string } }>, reply: FastifyReply) => {
    const month = req.query.month ?? monthKey(now());
    if (!MONTH_PATTERN.test(month)) {
      return reply.status(400).send({ error: 'month must be YYYY-MM' });
    }
    const window = await deps.usage.readWindow('month', month);
    return reply.send({
      month,
      ...windowView(window, deps.displayCurrency),
      avg_cost_per_request_display: window.costDisplay / Math.max(window.requests, 1),
    });
  });

  app.get('/admin/usage/identity/:identity', async (
    req: FastifyRequest<{ Params: { identity: string }; Querystring: { date?: string } }>,
    reply: FastifyReply,
  ) => {
    const date = req.query.date ?? dayKey(now());
    if (!DAY_PATTERN.test(date)) {
      return reply.status(400).send({ error: 'date must be YYYY-MM-DD' });
    }
    const window = await deps.usage.readWindow('identity', identityKey(req.params.identity, date));
    return reply.send({ identity: req.params.identity, date, ...windowView(window, deps.displayCurrency) });
  });

  // ───── Conversations & customers ─────

  app.get('/admin/conversations/:phone', async (
    req: FastifyRequest<{ Params: { phone: string }; Querystring: { limit?: string } }>,
    reply: FastifyReply,
  ) => {
    const limit = req.query.limit === undefined ? DEFAULT_CONVERSATION_LIMIT : parseInt(req.query.limit, 10);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_CONVERSATION_LIMIT) {
      return reply.status(400).send({ error: `limit must be between 1 and ${MAX_CONVERSATION_LIMIT}` });
    }

    const customer = await deps.repo.findCustomerByPhone(req.params.phone);
    if (!customer) {
      return reply.status(404).send({ error: 'Customer not found' });
    }

    const entries = await deps.repo.getRecentConversation(customer.id, limit);
    return reply.send({
      customer: { id: customer.id, phone: customer.phoneNumber, name: customer.name ?? null },
      conversations: entries.map((entry) => ({
        id: entry.id,
        role: entry.role,
        message: entry.message,
        prompt_sent: entry.role === 'assistant' ? entry.promptSent ?? null : null,
        tokens_input: entry.tokensInput ?? null,
        tokens_output: entry.tokensOutput ?? null,
        cost_display: entry.costDisplay ?? null,
        created_at: entry.createdAt,
      })),
    });
  });

  app.get('/admin/customers', async (_req, reply) => {
    const customers = await deps.repo.listCustomers();
    return reply.send({
      customers: customers.map((c) => ({
        id: c.id,
        phone: c.phoneNumber,
        name: c.name ?? null,
        created_at: c.createdAt,
      })),
    });
  });

  // ───── Orders ─────

  app.patch('/admin/orders/:id/status', async (
    req: FastifyRequest<{ Params: { id: string }; Body: { status?: unknown } | undefined }>,
    reply: FastifyReply,
  ) => {
    const orderId = parseId(req.params.id);
    const status = req.body?.status;
    if (orderId === null) {
      return reply.status(400).send({ error: 'Invalid order id' });
    }
    if (!isOrderStatus(status)) {
      return reply.status(400).send({ error: `status must be one of: ${ORDER_STATUSES.join(', ')}` });
    }

    const order = await deps.orders.updateStatus(orderId, status);
    if (!order) {
      return reply.status(404).send({ error: 'Order not found' });
    }
    logger.info({ admin: true, orderId, status }, 'Order status changed by admin');
    return reply.send({
      id: order.id,
      status: order.status,
      completed_at: order.completedAt ?? null,
    });
  });

  app.patch('/admin/complaints/:id/status', async (
    req: FastifyRequest<{ Params: { id: string }; Body: { status?: unknown; resolution?: unknown } | undefined }>,
    reply: FastifyReply,
  ) => {
    const complaintId = parseId(req.params.id);
    const status = req.body?.status;
    const rawResolution = req.body?.resolution;
    if (complaintId === null) {
      return reply.status(400).send({ error: 'Invalid complaint id' });
    }
    if (!isComplaintStatus(status)) {
      return reply.status(400).send({ error: `status must be one of: ${COMPLAINT_STATUSES.join(', ')}` });
    }
    if (rawResolution !== undefined && typeof rawResolution !== 'string') {
      return reply.status(400).send({ error: 'resolution must be a string' });
    }
    const resolution = typeof rawResolution === 'string' ? rawResolution : undefined;

    const complaint = await deps.repo.updateComplaint(complaintId, status, resolution);
    if (!complaint) {
      return reply.status(404).send({ error: 'Complaint not found' });
    }
    logger.info({ admin: true, complaintId, status }, 'Complaint status changed by admin');
    return reply.send({
      id: complaint.id,
      status: complaint.status,
      resolution: complaint.resolution ?? null,
      resolved_at: complaint.resolvedAt ?? null,
    });
  });

  app.patch('/admin/reservations/:id/status', async (
    req: FastifyRequest<{ Params: { id: string }; Body: { status?: unknown } | undefined }>,
    reply: FastifyReply,
  ) => {
    const reservationId = parseId(req.params.id);
    const status = req.body?.status;
    if (reservationId === null) {
      return reply.status(400).send({ error: 'Invalid reservation id' });
    }
    if (!isReservationStatus(status)) {
      return reply.status(400).send({ error: `status must be one of: ${RESERVATION_STATUSES.join(', ')}` });
    }

    const reservation = await deps.repo.updateReservationStatus(reservationId, status);
    if (!reservation) {
      return reply.status(404).send({ error: 'Reservation not found' });
    }
    logger.info({ admin: true, reservationId, status }, 'Reservation status changed by admin');
    return reply.send({ id: reservation.id, status: reservation.status });
  });

  // ───── Prompt & restaurant info ─────

  app.post('/admin/reload-prompt', async (_req, reply) => {
    try {
      const bundle = deps.prompts.reload();
      return reply.send({
        status: 'success',
        message: 'System prompt and restaurant info reloaded successfully',
        source: bundle.source,
      });
    } catch (err) {
      logger.error({ err }, 'Prompt reload failed');
      return reply.status(500).send({ status: 'error', message: 'Reload failed' });
    }
  });

  app.get('/admin/restaurant-info', async (_req, reply) => {
    return reply.send(deps.prompts.getRestaurantInfo());
  });
}
