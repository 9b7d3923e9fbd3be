/**
 * In-memory CustomerStore. Matches the Supabase store's ordering:
 * customers by id, tickets and orders most recent first.
 */

import type {
  CustomerRecord,
  CustomerStore,
  Order,
  SupportTicket,
} from "../../src/customers/types.js";

export type StoreMethod = keyof CustomerStore;

export class FakeCustomerStore implements CustomerStore {
  readonly calls: Array<{ method: StoreMethod; arg: string | number }> = [];
  private readonly failing = new Set<StoreMethod>();

  constructor(
    private readonly customers: CustomerRecord[] = [],
    private readonly tickets: SupportTicket[] = [],
    private readonly orders: Order[] = []
  ) {}

  /** Make every later call to `method` reject. */
  failOn(method: StoreMethod): this {
    this.failing.add(method);
    return this;
  }

  callsTo(method: StoreMethod): Array<string | number> {
    return this.calls.filter((c) => c.method === method).map((c) => c.arg);
  }

  async findCustomer(nameSubstring: string): Promise<CustomerRecord | null> {
    this.record("findCustomer", nameSubstring);
    const needle = nameSubstring.toLowerCase();
    return this.byId().find((c) => c.name.toLowerCase().includes(needle)) ?? null;
  }

  async getCustomer(id: number): Promise<CustomerRecord | null> {
    this.record("getCustomer", id);
    return this.customers.find((c) => c.id === id) ?? null;
  }

  async findOrders(customerId: number): Promise<Order[]> {
    this.record("findOrders", customerId);
    return this.orders
      .filter((o) => o.customerId === customerId)
      .sort((a, b) => (b.orderDate ?? "").localeCompare(a.orderDate ?? ""));
  }

  async findTickets(customerId: number): Promise<SupportTicket[]> {
    this.record("findTickets", customerId);
    return this.tickets
      .filter((t) => t.customerId === customerId)
      .sort((a, b) => (b.createdDate ?? "").localeCompare(a.createdDate ?? ""));
  }

  async searchCustomers(substring: string): Promise<CustomerRecord[]> {
    this.record("searchCustomers", substring);
    const needle = substring.toLowerCase();
    return this.byId().filter((c) =>
      [c.name, c.email, c.phone ?? ""].some((field) => field.toLowerCase().includes(needle))
    );
  }

  private byId(): CustomerRecord[] {
    return [...this.customers].sort((a, b) => a.id - b.id);
  }

  private record(method: StoreMethod, arg: string | number): void {
    this.calls.push({ method, arg });
    if (this.failing.has(method)) {
      throw new Error(`${method} unavailable`);
    }
  }
}
