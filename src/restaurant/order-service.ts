import { NewOrder, Order, OrderItem, OrderStatus, OrderType, PREPARATION_MINUTES, RestaurantRepository } from './types';
import { logger } from '../observability/logger';

export interface PlaceOrderInput {
  customerId: number;
  orderType: OrderType;
  items: OrderItem[];
  totalPrice: number;
  deliveryAddress?: string;
  deliveryLatitude?: number;
  deliveryLongitude?: number;
}

/** Estimated completion for an order placed at `placedAt` */
export function estimateCompletion(orderType: OrderType, placedAt: number): Date {
  return new Date(placedAt + PREPARATION_MINUTES[orderType] * 60_000);
}

/**
 * Order operations on top of the repository: ETA calculation, status
 * transitions and feedback bookkeeping.
 */
export class OrderService {
  private readonly log = logger.child({ component: 'order-service' });

  constructor(
    private readonly repo: RestaurantRepository,
    private readonly now: () => number = Date.now,
  ) {}

  async placeOrder(input: PlaceOrderInput): Promise<Order> {
    const newOrder: NewOrder = {
      ...input,
      estimatedCompletionTime: estimateCompletion(input.orderType, this.now()).toISOString(),
    };
    const order = await this.repo.createOrder(newOrder);
    this.log.info({ orderId: order.id, customerId: input.customerId, orderType: input.orderType }, 'Order created');
    return order;
  }

  async updateStatus(orderId: number, status: OrderStatus): Promise<Order | null> {
    const patch = status === 'completed'
      ? { status, completedAt: new Date(this.now()).toISOString() }
      : { status };
    const order = await this.repo.updateOrder(orderId, patch);
    if (order) this.log.info({ orderId, status }, 'Order status updated');
    return order;
  }

  /** Returns false when the order does not exist */
  async saveFeedback(orderId: number, feedback: string): Promise<boolean> {
    const order = await this.repo.updateOrder(orderId, { feedback });
    return order !== null;
  }
}
