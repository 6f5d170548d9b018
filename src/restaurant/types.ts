export type OrderType = 'dine_in' | 'takeaway' | 'delivery';

export type OrderStatus = 'pending' | 'preparing' | 'ready' | 'completed' | 'cancelled';

export type ComplaintStatus = 'open' | 'in_progress' | 'resolved';

export type ReservationStatus = 'pending' | 'confirmed' | 'cancelled';

export const ORDER_TYPES: readonly OrderType[] = ['dine_in', 'takeaway', 'delivery'];

export const ORDER_STATUSES: readonly OrderStatus[] = ['pending', 'preparing', 'ready', 'completed', 'cancelled'];

export const COMPLAINT_STATUSES: readonly ComplaintStatus[] = ['open', 'in_progress', 'resolved'];

export const RESERVATION_STATUSES: readonly ReservationStatus[] = ['pending', 'confirmed', 'cancelled'];

/** Minutes from order creation to estimated completion */
export const PREPARATION_MINUTES: Record<OrderType, number> = {
  dine_in: 20,
  takeaway: 15,
  delivery: 45,
};

export interface Customer {
  id: number;
  phoneNumber: string;
  name?: string;
  address?: string;
  latitude?: number;
  longitude?: number;
  createdAt: string;
  updatedAt: string;
}

export interface CustomerPatch {
  name?: string;
  address?: string;
  latitude?: number;
  longitude?: number;
}

/** One line of an order as the model reports it; extra keys are kept verbatim */
export interface OrderItem {
  name: string;
  quantity?: number;
  price?: number;
  [key: string]: unknown;
}

export interface Order {
  id: number;
  customerId: number;
  orderType: OrderType;
  status: OrderStatus;
  items: OrderItem[];
  totalPrice: number;
  deliveryAddress?: string;
  deliveryLatitude?: number;
  deliveryLongitude?: number;
  estimatedCompletionTime: string;
  completedAt?: string;
  feedbackRequested: boolean;
  feedback?: string;
  createdAt: string;
  updatedAt: string;
}

export interface NewOrder {
  customerId: number;
  orderType: OrderType;
  items: OrderItem[];
  totalPrice: number;
  deliveryAddress?: string;
  deliveryLatitude?: number;
  deliveryLongitude?: number;
  estimatedCompletionTime: string;
}

export interface OrderPatch {
  status?: OrderStatus;
  completedAt?: string;
  feedbackRequested?: boolean;
  feedback?: string;
}

export interface Complaint {
  id: number;
  customerId: number;
  description: string;
  status: ComplaintStatus;
  resolution?: string;
  createdAt: string;
  resolvedAt?: string;
}

export interface Reservation {
  id: number;
  customerId: number;
  reservationDate: string;
  numberOfPeople: number;
  specialRequests?: string;
  status: ReservationStatus;
  createdAt: string;
}

export type ConversationRole = 'user' | 'assistant';

/** Persisted turn. Immutable once appended. */
export interface ConversationEntry {
  id: number;
  customerId: number;
  role: ConversationRole;
  message: string;
  promptSent?: string;
  tokensInput?: number;
  tokensOutput?: number;
  costDisplay?: number;
  createdAt: string;
}

export type NewConversationEntry = Omit<ConversationEntry, 'id' | 'createdAt'>;

export interface MenuItem {
  id: number;
  category: string;
  itemName: string;
  price: number;
  priceWithTax: number;
  description?: string;
  options?: string;
  synonyms?: string;
  serving: number;
}

/**
 * Persistent store port. The engine never issues raw queries; everything
 * it persists or reads back goes through these operations.
 */
export interface RestaurantRepository {
  getOrCreateCustomer(phoneNumber: string): Promise<Customer>;
  findCustomerByPhone(phoneNumber: string): Promise<Customer | null>;
  getCustomer(customerId: number): Promise<Customer | null>;
  updateCustomer(customerId: number, patch: CustomerPatch): Promise<Customer>;
  listCustomers(): Promise<Customer[]>;

  createOrder(input: NewOrder): Promise<Order>;
  getOrder(orderId: number): Promise<Order | null>;
  getLastOrder(customerId: number): Promise<Order | null>;
  updateOrder(orderId: number, patch: OrderPatch): Promise<Order | null>;

  createComplaint(customerId: number, description: string): Promise<Complaint>;
  updateComplaint(complaintId: number, status: ComplaintStatus, resolution?: string): Promise<Complaint | null>;

  createReservation(input: Omit<Reservation, 'id' | 'status' | 'createdAt'>): Promise<Reservation>;
  updateReservationStatus(reservationId: number, status: ReservationStatus): Promise<Reservation | null>;

  appendConversation(entry: NewConversationEntry): Promise<ConversationEntry>;
  /** Most recent `limit` entries, oldest first */
  getRecentConversation(customerId: number, limit: number): Promise<ConversationEntry[]>;

  listMenuItems(): Promise<MenuItem[]>;
}
