// ============================================
// Customer Types: record store contracts
// ============================================

/**
 * A customer row. Email is unique across customers.
 */
export interface CustomerRecord {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  address: string | null;
  signupDate: string | null;
  accountStatus: string | null;
  accountType: string | null;
  totalOrders: number;
  lifetimeValue: number;
}

export interface Order {
  id: number;
  customerId: number;
  orderDate: string | null;
  amount: number;
  status: string | null;
  items: string[];
}

export type TicketStatus = "open" | "closed" | (string & {});

export interface SupportTicket {
  id: number;
  customerId: number;
  title: string;
  description: string | null;
  status: TicketStatus;
  createdDate: string | null;
  resolvedDate: string | null;
  category: string | null;
  priority: string | null;
}

/** A customer together with the orders it owns, most recent first. */
export interface CustomerProfile extends CustomerRecord {
  orders: Order[];
}

/**
 * Read-only view of the relational store.
 *
 * Name lookups are case-insensitive partial matches. When several customers
 * match, the store's own ordering (by id) decides which one is returned.
 */
export interface CustomerStore {
  /** First customer whose name contains the substring, or null. */
  findCustomer(nameSubstring: string): Promise<CustomerRecord | null>;

  getCustomer(id: number): Promise<CustomerRecord | null>;

  /** Orders for a customer, most recent first. */
  findOrders(customerId: number): Promise<Order[]>;

  /** Tickets for a customer, most recent first. */
  findTickets(customerId: number): Promise<SupportTicket[]>;

  /** Customers whose name, email or phone contains the substring. Empty returns all. */
  searchCustomers(substring: string): Promise<CustomerRecord[]>;
}
