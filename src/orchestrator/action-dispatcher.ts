import Ajv, { SchemaObject } from 'ajv';
import { ActionType, RawAction, isActionType } from '../agent/response-contract';
import { OrderService } from '../restaurant/order-service';
import { Customer, OrderItem, OrderType, ORDER_TYPES, RestaurantRepository } from '../restaurant/types';
import { SessionPatch, SessionRecord } from '../session/types';
import { logger, maskIdentity } from '../observability/logger';
import { actionsDispatched } from '../observability/metrics';
import { Result, fail, ok } from '../shared/result';

const ajv = new Ajv({ allErrors: true, coerceTypes: true });

export const DEFAULT_PARTY_SIZE = 2;

export interface DispatchContext {
  identity: string;
  customer: Customer;
  /** Session as read at the start of the turn */
  session: SessionRecord;
  requestId?: string;
}

export interface DispatchSuccess {
  action: ActionType;
  /** Keys to merge into the session once the turn completes */
  sessionPatch: SessionPatch;
  /** Id of the order, complaint, reservation or customer that was written */
  entityId: number;
}

export type DispatchFailure =
  | { kind: 'unknown_action'; type: string }
  | { kind: 'invalid_command'; action: ActionType; reason: string }
  | { kind: 'domain_failure'; action: ActionType; error: Error };

export type DispatchOutcome = Result<DispatchSuccess, DispatchFailure>;

// ───── Command payloads ─────────────────────────────────────────

interface CreateOrderData {
  order_type: OrderType;
  items: OrderItem[];
  total_price: number;
  address?: string;
  latitude?: number;
  longitude?: number;
}

interface CreateComplaintData {
  description: string;
}

interface CreateReservationData {
  reservation_date: string;
  number_of_people?: number;
  special_requests?: string;
}

interface UpdateCustomerInfoData {
  name?: string;
  address?: string;
}

interface SaveFeedbackData {
  order_id: number;
  feedback: string;
}

const createOrderSchema = {
  type: 'object',
  required: ['order_type', 'items', 'total_price'],
  properties: {
    order_type: { type: 'string', enum: ORDER_TYPES },
    items: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string', minLength: 1 },
          quantity: { type: 'number', minimum: 1 },
          price: { type: 'number', minimum: 0 },
        },
      },
    },
    total_price: { type: 'number', minimum: 0 },
    address: { type: 'string' },
    latitude: { type: 'number', minimum: -90, maximum: 90 },
    longitude: { type: 'number', minimum: -180, maximum: 180 },
  },
};

const createComplaintSchema = {
  type: 'object',
  required: ['description'],
  properties: {
    description: { type: 'string', minLength: 1 },
  },
};

const createReservationSchema = {
  type: 'object',
  required: ['reservation_date'],
  properties: {
    reservation_date: { type: 'string', minLength: 1 },
    number_of_people: { type: 'integer', minimum: 1 },
    special_requests: { type: 'string' },
  },
};

const updateCustomerInfoSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    address: { type: 'string' },
  },
};

const saveFeedbackSchema = {
  type: 'object',
  required: ['order_id', 'feedback'],
  properties: {
    order_id: { type: 'integer', minimum: 1 },
    feedback: { type: 'string', minLength: 1 },
  },
};

type ActionHandler = (data: Record<string, unknown>, ctx: DispatchContext) => Promise<DispatchOutcome>;

/**
 * Fields sent as `null` or an empty string count as absent. Left in, type
 * coercion would turn them into `0` or `""` and hide the fallbacks.
 */
function withoutBlanks(data: Record<string, unknown>): Record<string, unknown> {
  const present: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === null || value === undefined) continue;
    if (typeof value === 'string' && value.trim().length === 0) continue;
    present[key] = value;
  }
  return present;
}

/** Validate the payload against `schema` before `run` sees it. */
function defineHandler<T>(
  action: ActionType,
  schema: SchemaObject,
  run: (data: T, ctx: DispatchContext) => Promise<DispatchOutcome>,
): ActionHandler {
  const validate = ajv.compile<T>(schema);
  return async (raw, ctx) => {
    const data = withoutBlanks(raw);
    if (!validate(data)) {
      const reason = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ') ?? 'invalid payload';
      return fail({ kind: 'invalid_command', action, reason });
    }
    return run(data, ctx);
  };
}

// ───── Dispatcher ───────────────────────────────────────────────

/**
 * Routes one decoded action to its domain operation. At most one action
 * runs per turn. Session changes are returned as a patch, never written
 * here, so the caller can write the session after dispatch completes.
 *
 * Domain failures are caught, logged and returned; they never throw.
 */
export class ActionDispatcher {
  private readonly log = logger.child({ component: 'action-dispatcher' });
  private readonly handlers: Record<ActionType, ActionHandler>;

  constructor(
    private readonly repo: RestaurantRepository,
    private readonly orders: OrderService,
  ) {
    this.handlers = {
      create_order: defineHandler<CreateOrderData>('create_order', createOrderSchema, (d, ctx) => this.createOrder(d, ctx)),
      create_complaint: defineHandler<CreateComplaintData>('create_complaint', createComplaintSchema, (d, ctx) => this.createComplaint(d, ctx)),
      create_reservation: defineHandler<CreateReservationData>('create_reservation', createReservationSchema, (d, ctx) => this.createReservation(d, ctx)),
      update_customer_info: defineHandler<UpdateCustomerInfoData>('update_customer_info', updateCustomerInfoSchema, (d, ctx) => this.updateCustomerInfo(d, ctx)),
      save_feedback: defineHandler<SaveFeedbackData>('save_feedback', saveFeedbackSchema, (d, ctx) => this.saveFeedback(d, ctx)),
    };
  }

  async dispatch(action: RawAction, ctx: DispatchContext): Promise<DispatchOutcome> {
    const log = this.log.child({ requestId: ctx.requestId, identity: maskIdentity(ctx.identity), action: action.type });

    if (!isActionType(action.type)) {
      log.warn('Unknown action type; ignoring');
      actionsDispatched.inc({ action: 'unknown', result: 'unknown_action' });
      return fail({ kind: 'unknown_action', type: action.type });
    }

    const type = action.type;
    let outcome: DispatchOutcome;
    try {
      outcome = await this.handlers[type](action.data, ctx);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      outcome = fail({ kind: 'domain_failure', action: type, error });
    }

    if (outcome.ok) {
      log.info({ entityId: outcome.value.entityId }, 'Action dispatched');
      actionsDispatched.inc({ action: type, result: 'ok' });
    } else if (outcome.error.kind === 'invalid_command') {
      log.warn({ reason: outcome.error.reason }, 'Action payload rejected');
      actionsDispatched.inc({ action: type, result: 'invalid_command' });
    } else if (outcome.error.kind === 'domain_failure') {
      log.error({ err: outcome.error.error }, 'Action failed');
      actionsDispatched.inc({ action: type, result: 'domain_failure' });
    }

    return outcome;
  }

  // ───── Handlers ─────

  private async createOrder(data: CreateOrderData, ctx: DispatchContext): Promise<DispatchOutcome> {
    let delivery: { deliveryAddress?: string; deliveryLatitude?: number; deliveryLongitude?: number } = {};

    if (data.order_type === 'delivery') {
      // command → session → customer profile
      const deliveryAddress = nonEmpty(data.address) ?? nonEmpty(ctx.session.address) ?? nonEmpty(ctx.customer.address);
      const point =
        coordinates(data.latitude, data.longitude) ??
        coordinates(ctx.session.location?.latitude, ctx.session.location?.longitude) ??
        coordinates(ctx.customer.latitude, ctx.customer.longitude);

      if (!deliveryAddress && !point) {
        return fail({ kind: 'invalid_command', action: 'create_order', reason: 'delivery order without address or location' });
      }
      delivery = { deliveryAddress, deliveryLatitude: point?.latitude, deliveryLongitude: point?.longitude };
    }

    const order = await this.orders.placeOrder({
      customerId: ctx.customer.id,
      orderType: data.order_type,
      items: data.items,
      totalPrice: data.total_price,
      ...delivery,
    });

    return ok({
      action: 'create_order',
      entityId: order.id,
      sessionPatch: {
        currentOrder: null,
        lastOrder: {
          id: order.id,
          items: order.items,
          total: order.totalPrice,
          type: order.orderType,
          createdAt: order.createdAt,
        },
      },
    });
  }

  private async createComplaint(data: CreateComplaintData, ctx: DispatchContext): Promise<DispatchOutcome> {
    const complaint = await this.repo.createComplaint(ctx.customer.id, data.description);
    return ok({ action: 'create_complaint', entityId: complaint.id, sessionPatch: {} });
  }

  private async createReservation(data: CreateReservationData, ctx: DispatchContext): Promise<DispatchOutcome> {
    const at = Date.parse(data.reservation_date);
    if (Number.isNaN(at)) {
      return fail({ kind: 'invalid_command', action: 'create_reservation', reason: `unparseable reservation_date "${data.reservation_date}"` });
    }

    const reservation = await this.repo.createReservation({
      customerId: ctx.customer.id,
      reservationDate: new Date(at).toISOString(),
      numberOfPeople: data.number_of_people ?? DEFAULT_PARTY_SIZE,
      specialRequests: data.special_requests,
    });
    return ok({ action: 'create_reservation', entityId: reservation.id, sessionPatch: {} });
  }

  private async updateCustomerInfo(data: UpdateCustomerInfoData, ctx: DispatchContext): Promise<DispatchOutcome> {
    const customer = await this.repo.updateCustomer(ctx.customer.id, { name: data.name, address: data.address });
    return ok({ action: 'update_customer_info', entityId: customer.id, sessionPatch: {} });
  }

  private async saveFeedback(data: SaveFeedbackData, ctx: DispatchContext): Promise<DispatchOutcome> {
    const order = await this.repo.getOrder(data.order_id);
    if (!order || order.customerId !== ctx.customer.id) {
      return fail({
        kind: 'domain_failure',
        action: 'save_feedback',
        error: new Error(`Order ${data.order_id} not found for customer ${ctx.customer.id}`),
      });
    }

    await this.orders.saveFeedback(order.id, data.feedback);
    return ok({ action: 'save_feedback', entityId: order.id, sessionPatch: { shouldRequestFeedback: false } });
  }
}

/** Coordinates are only taken as a pair from a single source. */
function coordinates(latitude: number | undefined, longitude: number | undefined): { latitude: number; longitude: number } | undefined {
  return latitude !== undefined && longitude !== undefined ? { latitude, longitude } : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}
