import fs from 'fs';
import path from 'path';
import Redis from 'ioredis';
import {
  Complaint,
  ComplaintStatus,
  ConversationEntry,
  Customer,
  CustomerPatch,
  MenuItem,
  NewConversationEntry,
  NewOrder,
  Order,
  OrderPatch,
  Reservation,
  ReservationStatus,
  RestaurantRepository,
} from './types';
import { env } from '../config/env';
import { logger, maskIdentity } from '../observability/logger';
import { StoreUnavailableError } from '../shared/errors';

const MENU_SEED_PATH = path.join(env.projectRoot, 'data', 'menu.json');

/** How long a turn that lost the phone-number claim waits for the winner's document */
const CLAIM_POLL_ATTEMPTS = 5;
const CLAIM_POLL_DELAY_MS = 20;

/** Read the bundled menu catalog used to seed an empty store. */
export function loadMenuSeed(filePath: string = MENU_SEED_PATH): MenuItem[] {
  if (!fs.existsSync(filePath)) {
    logger.warn({ filePath }, 'Menu seed file not found');
    return [];
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return Array.isArray(parsed) ? (parsed as MenuItem[]) : [];
}

function applyCustomerPatch(customer: Customer, patch: CustomerPatch, nowIso: string): Customer {
  // Empty values never overwrite what the profile already has
  return {
    ...customer,
    ...(patch.name ? { name: patch.name } : {}),
    ...(patch.address ? { address: patch.address } : {}),
    ...(patch.latitude !== undefined ? { latitude: patch.latitude } : {}),
    ...(patch.longitude !== undefined ? { longitude: patch.longitude } : {}),
    updatedAt: nowIso,
  };
}

function applyOrderPatch(order: Order, patch: OrderPatch, nowIso: string): Order {
  const next: Order = { ...order, ...patch, updatedAt: nowIso };
  if (patch.status === 'completed' && !patch.completedAt && !order.completedAt) {
    next.completedAt = nowIso;
  }
  return next;
}

// ───── Redis Implementation ─────────────────────────────────────

/** The commands the Redis repository issues */
export type RestaurantRedis = Pick<
  Redis,
  'get' | 'set' | 'incr' | 'multi' | 'mget' | 'zrange' | 'zrevrange' | 'rpush' | 'lrange'
>;

/**
 * Redis-backed repository.
 * JSON documents per entity, INCR sequences for ids, sorted sets for
 * per-customer indexes and a list for conversation history.
 */
export class RedisRestaurantRepository implements RestaurantRepository {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'restaurant-store-redis' });

  constructor(private readonly redis: RestaurantRedis) {
    this.prefix = `${env.redis.keyPrefix}db:`;
  }

  private key(...parts: Array<string | number>): string {
    return `${this.prefix}${parts.join(':')}`;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.log.error({ err, operation }, 'Restaurant store operation failed');
      throw new StoreUnavailableError('restaurant-store', operation, err);
    }
  }

  private async readJson<T>(key: string): Promise<T | null> {
    const raw = await this.redis.get(key);
    return raw ? (JSON.parse(raw) as T) : null;
  }

  async getOrCreateCustomer(phoneNumber: string): Promise<Customer> {
    return this.run('getOrCreateCustomer', async () => {
      const existing = await this.findByPhone(phoneNumber);
      if (existing) return existing;

      const id = await this.redis.incr(this.key('seq', 'customer'));
      // NX guards against two first messages racing on the same phone number
      const claimed = await this.redis.set(this.key('customer', 'phone', phoneNumber), String(id), 'NX');
      if (claimed !== 'OK') return this.awaitClaimedCustomer(phoneNumber);

      const now = new Date().toISOString();
      const customer: Customer = { id, phoneNumber, createdAt: now, updatedAt: now };
      await this.redis
        .multi()
        .set(this.key('customer', id), JSON.stringify(customer))
        .zadd(this.key('customers'), id, String(id))
        .exec();
      this.log.info({ customerId: id }, 'Created new customer');
      return customer;
    });
  }

  /** The index may land before the winner's document, so poll briefly for it. */
  private async awaitClaimedCustomer(phoneNumber: string): Promise<Customer> {
    for (let attempt = 1; attempt <= CLAIM_POLL_ATTEMPTS; attempt++) {
      const winner = await this.findByPhone(phoneNumber);
      if (winner) return winner;
      if (attempt < CLAIM_POLL_ATTEMPTS) {
        await new Promise((resolve) => setTimeout(resolve, CLAIM_POLL_DELAY_MS));
      }
    }
    throw new Error(`Customer ${maskIdentity(phoneNumber)} was claimed but never written`);
  }

  private async findByPhone(phoneNumber: string): Promise<Customer | null> {
    const id = await this.redis.get(this.key('customer', 'phone', phoneNumber));
    if (!id) return null;
    return this.readJson<Customer>(this.key('customer', id));
  }

  async findCustomerByPhone(phoneNumber: string): Promise<Customer | null> {
    return this.run('findCustomerByPhone', () => this.findByPhone(phoneNumber));
  }

  async getCustomer(customerId: number): Promise<Customer | null> {
    return this.run('getCustomer', () => this.readJson<Customer>(this.key('customer', customerId)));
  }

  async updateCustomer(customerId: number, patch: CustomerPatch): Promise<Customer> {
    const current = await this.getCustomer(customerId);
    if (!current) throw new Error(`Customer ${customerId} not found`);
    const next = applyCustomerPatch(current, patch, new Date().toISOString());
    await this.run('updateCustomer', () => this.redis.set(this.key('customer', customerId), JSON.stringify(next)));
    return next;
  }

  async listCustomers(): Promise<Customer[]> {
    return this.run('listCustomers', async () => {
      const ids = await this.redis.zrange(this.key('customers'), 0, -1);
      if (ids.length === 0) return [];
      const raws = await this.redis.mget(...ids.map((id) => this.key('customer', id)));
      return raws.filter((raw): raw is string => raw !== null).map((raw) => JSON.parse(raw) as Customer);
    });
  }

  async createOrder(input: NewOrder): Promise<Order> {
    return this.run('createOrder', async () => {
      const id = await this.redis.incr(this.key('seq', 'order'));
      const now = new Date().toISOString();
      const order: Order = { ...input, id, status: 'pending', feedbackRequested: false, createdAt: now, updatedAt: now };
      await this.redis
        .multi()
        .set(this.key('order', id), JSON.stringify(order))
        .zadd(this.key('customer', input.customerId, 'orders'), id, String(id))
        .exec();
      return order;
    });
  }

  async getOrder(orderId: number): Promise<Order | null> {
    return this.run('getOrder', () => this.readJson<Order>(this.key('order', orderId)));
  }

  async getLastOrder(customerId: number): Promise<Order | null> {
    return this.run('getLastOrder', async () => {
      const [lastId] = await this.redis.zrevrange(this.key('customer', customerId, 'orders'), 0, 0);
      if (!lastId) return null;
      return this.readJson<Order>(this.key('order', lastId));
    });
  }

  async updateOrder(orderId: number, patch: OrderPatch): Promise<Order | null> {
    const current = await this.getOrder(orderId);
    if (!current) return null;
    const next = applyOrderPatch(current, patch, new Date().toISOString());
    await this.run('updateOrder', () => this.redis.set(this.key('order', orderId), JSON.stringify(next)));
    return next;
  }

  async createComplaint(customerId: number, description: string): Promise<Complaint> {
    return this.run('createComplaint', async () => {
      const id = await this.redis.incr(this.key('seq', 'complaint'));
      const complaint: Complaint = { id, customerId, description, status: 'open', createdAt: new Date().toISOString() };
      await this.redis.set(this.key('complaint', id), JSON.stringify(complaint));
      return complaint;
    });
  }

  async updateComplaint(complaintId: number, status: ComplaintStatus, resolution?: string): Promise<Complaint | null> {
    return this.run('updateComplaint', async () => {
      const current = await this.readJson<Complaint>(this.key('complaint', complaintId));
      if (!current) return null;
      const next: Complaint = {
        ...current,
        status,
        ...(resolution ? { resolution } : {}),
        ...(status === 'resolved' ? { resolvedAt: new Date().toISOString() } : {}),
      };
      await this.redis.set(this.key('complaint', complaintId), JSON.stringify(next));
      return next;
    });
  }

  async createReservation(input: Omit<Reservation, 'id' | 'status' | 'createdAt'>): Promise<Reservation> {
    return this.run('createReservation', async () => {
      const id = await this.redis.incr(this.key('seq', 'reservation'));
      const reservation: Reservation = { ...input, id, status: 'pending', createdAt: new Date().toISOString() };
      await this.redis.set(this.key('reservation', id), JSON.stringify(reservation));
      return reservation;
    });
  }

  async updateReservationStatus(reservationId: number, status: ReservationStatus): Promise<Reservation | null> {
    return this.run('updateReservationStatus', async () => {
      const current = await this.readJson<Reservation>(this.key('reservation', reservationId));
      if (!current) return null;
      const next: Reservation = { ...current, status };
      await this.redis.set(this.key('reservation', reservationId), JSON.stringify(next));
      return next;
    });
  }

  async appendConversation(entry: NewConversationEntry): Promise<ConversationEntry> {
    return this.run('appendConversation', async () => {
      const id = await this.redis.incr(this.key('seq', 'conversation'));
      const stored: ConversationEntry = { ...entry, id, createdAt: new Date().toISOString() };
      await this.redis.rpush(this.key('customer', entry.customerId, 'history'), JSON.stringify(stored));
      return stored;
    });
  }

  async getRecentConversation(customerId: number, limit: number): Promise<ConversationEntry[]> {
    if (limit <= 0) return [];
    return this.run('getRecentConversation', async () => {
      const raws = await this.redis.lrange(this.key('customer', customerId, 'history'), -limit, -1);
      return raws.map((raw) => JSON.parse(raw) as ConversationEntry);
    });
  }

  async listMenuItems(): Promise<MenuItem[]> {
    return this.run('listMenuItems', async () => (await this.readJson<MenuItem[]>(this.key('menu'))) ?? []);
  }

  /** Write the catalog only when none is stored yet. */
  async seedMenu(items: MenuItem[]): Promise<boolean> {
    return this.run('seedMenu', async () => {
      const result = await this.redis.set(this.key('menu'), JSON.stringify(items), 'NX');
      return result === 'OK';
    });
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

/**
 * In-memory repository (dev/test fallback).
 */
export class InMemoryRestaurantRepository implements RestaurantRepository {
  private customers = new Map<number, Customer>();
  private orders = new Map<number, Order>();
  private complaints = new Map<number, Complaint>();
  private reservations = new Map<number, Reservation>();
  private conversations: ConversationEntry[] = [];
  private menu: MenuItem[];
  private sequences = { customer: 0, order: 0, complaint: 0, reservation: 0, conversation: 0 };

  constructor(menu: MenuItem[] = [], private readonly now: () => number = Date.now) {
    this.menu = menu;
  }

  private nowIso(): string {
    return new Date(this.now()).toISOString();
  }

  async getOrCreateCustomer(phoneNumber: string): Promise<Customer> {
    const existing = await this.findCustomerByPhone(phoneNumber);
    if (existing) return existing;
    const id = ++this.sequences.customer;
    const customer: Customer = { id, phoneNumber, createdAt: this.nowIso(), updatedAt: this.nowIso() };
    this.customers.set(id, customer);
    return { ...customer };
  }

  async findCustomerByPhone(phoneNumber: string): Promise<Customer | null> {
    for (const customer of this.customers.values()) {
      if (customer.phoneNumber === phoneNumber) return { ...customer };
    }
    return null;
  }

  async getCustomer(customerId: number): Promise<Customer | null> {
    const customer = this.customers.get(customerId);
    return customer ? { ...customer } : null;
  }

  async updateCustomer(customerId: number, patch: CustomerPatch): Promise<Customer> {
    const current = this.customers.get(customerId);
    if (!current) throw new Error(`Customer ${customerId} not found`);
    const next = applyCustomerPatch(current, patch, this.nowIso());
    this.customers.set(customerId, next);
    return { ...next };
  }

  async listCustomers(): Promise<Customer[]> {
    return Array.from(this.customers.values()).map((c) => ({ ...c }));
  }

  async createOrder(input: NewOrder): Promise<Order> {
    const id = ++this.sequences.order;
    const order: Order = {
      ...input,
      id,
      status: 'pending',
      feedbackRequested: false,
      createdAt: this.nowIso(),
      updatedAt: this.nowIso(),
    };
    this.orders.set(id, order);
    return structuredClone(order);
  }

  async getOrder(orderId: number): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  async getLastOrder(customerId: number): Promise<Order | null> {
    let last: Order | null = null;
    for (const order of this.orders.values()) {
      if (order.customerId === customerId && (!last || order.id > last.id)) last = order;
    }
    return last ? structuredClone(last) : null;
  }

  async updateOrder(orderId: number, patch: OrderPatch): Promise<Order | null> {
    const current = this.orders.get(orderId);
    if (!current) return null;
    const next = applyOrderPatch(current, patch, this.nowIso());
    this.orders.set(orderId, next);
    return structuredClone(next);
  }

  async createComplaint(customerId: number, description: string): Promise<Complaint> {
    const id = ++this.sequences.complaint;
    const complaint: Complaint = { id, customerId, description, status: 'open', createdAt: this.nowIso() };
    this.complaints.set(id, complaint);
    return { ...complaint };
  }

  async updateComplaint(complaintId: number, status: ComplaintStatus, resolution?: string): Promise<Complaint | null> {
    const current = this.complaints.get(complaintId);
    if (!current) return null;
    const next: Complaint = {
      ...current,
      status,
      ...(resolution ? { resolution } : {}),
      ...(status === 'resolved' ? { resolvedAt: this.nowIso() } : {}),
    };
    this.complaints.set(complaintId, next);
    return { ...next };
  }

  async createReservation(input: Omit<Reservation, 'id' | 'status' | 'createdAt'>): Promise<Reservation> {
    const id = ++this.sequences.reservation;
    const reservation: Reservation = { ...input, id, status: 'pending', createdAt: this.nowIso() };
    this.reservations.set(id, reservation);
    return { ...reservation };
  }

  async updateReservationStatus(reservationId: number, status: ReservationStatus): Promise<Reservation | null> {
    const current = this.reservations.get(reservationId);
    if (!current) return null;
    const next: Reservation = { ...current, status };
    this.reservations.set(reservationId, next);
    return { ...next };
  }

  async appendConversation(entry: NewConversationEntry): Promise<ConversationEntry> {
    const stored: ConversationEntry = { ...entry, id: ++this.sequences.conversation, createdAt: this.nowIso() };
    this.conversations.push(stored);
    return { ...stored };
  }

  async getRecentConversation(customerId: number, limit: number): Promise<ConversationEntry[]> {
    if (limit <= 0) return [];
    return this.conversations
      .filter((e) => e.customerId === customerId)
      .slice(-limit)
      .map((e) => ({ ...e }));
  }

  async listMenuItems(): Promise<MenuItem[]> {
    return this.menu.map((m) => ({ ...m }));
  }

  // ───── Test / admin helpers ─────

  getAllComplaints(): Complaint[] {
    return Array.from(this.complaints.values());
  }

  getAllReservations(): Reservation[] {
    return Array.from(this.reservations.values());
  }

  getAllOrders(): Order[] {
    return Array.from(this.orders.values());
  }
}

/**
 * Factory: Redis when available, in-memory otherwise. The menu catalog is
 * seeded from data/menu.json when the store has none.
 */
export async function createRestaurantRepository(redis?: Redis): Promise<RestaurantRepository> {
  const seed = loadMenuSeed();
  if (redis) {
    const repo = new RedisRestaurantRepository(redis);
    if (await repo.seedMenu(seed)) {
      logger.info({ items: seed.length }, 'Menu catalog seeded');
    }
    return repo;
  }
  logger.warn('Using in-memory restaurant store (no Redis)');
  return new InMemoryRestaurantRepository(seed);
}
