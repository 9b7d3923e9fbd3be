/**
 * Small customer dataset shared by the agent and pipeline tests.
 */

import type { CustomerRecord, Order, SupportTicket } from "../../src/customers/types.js";
import { FakeCustomerStore } from "./FakeCustomerStore.js";

export function customer(overrides: Partial<CustomerRecord> & Pick<CustomerRecord, "id" | "name">): CustomerRecord {
  return {
    email: `${overrides.name.toLowerCase().replace(/\s+/g, ".")}@example.com`,
    phone: null,
    address: null,
    signupDate: "2023-01-01",
    accountStatus: "active",
    accountType: "standard",
    totalOrders: 0,
    lifetimeValue: 0,
    ...overrides,
  };
}

export function ticket(overrides: Partial<SupportTicket> & Pick<SupportTicket, "id" | "customerId" | "title">): SupportTicket {
  return {
    description: null,
    status: "open",
    createdDate: "2024-01-01",
    resolvedDate: null,
    category: null,
    priority: "medium",
    ...overrides,
  };
}

export const EMA = customer({
  id: 1,
  name: "Ema Johnson",
  email: "ema@example.com",
  phone: "+1-555-0101",
  accountType: "premium",
  totalOrders: 12,
  lifetimeValue: 4500,
});

export const JOHN = customer({ id: 2, name: "John Smith", email: "john@example.com", phone: "+1-555-0102" });

export const SARAH = customer({
  id: 3,
  name: "Sarah Chen",
  email: "sarah@example.com",
  phone: "+1-555-0103",
  address: "48 Harbor Road",
  accountType: "premium",
  totalOrders: 25,
  lifetimeValue: 8900.5,
});

export const EMA_TICKETS: SupportTicket[] = [
  ticket({ id: 1, customerId: 1, title: "Refund request", status: "closed", createdDate: "2024-01-11", priority: "high" }),
  ticket({ id: 2, customerId: 1, title: "Login issues", status: "closed", createdDate: "2024-01-05", priority: "critical" }),
  ticket({ id: 3, customerId: 1, title: "Shipping delay", status: "closed", createdDate: "2024-01-16", priority: "medium" }),
  ticket({ id: 4, customerId: 1, title: "Plan upgrade", status: "open", createdDate: "2024-02-02", priority: "low" }),
];

export const SARAH_ORDERS: Order[] = [
  { id: 10, customerId: 3, orderDate: "2024-01-20", amount: 1299, status: "shipped", items: ["Monitor"] },
  { id: 11, customerId: 3, orderDate: "2024-02-03", amount: 49.5, status: "delivered", items: ["Cable"] },
];

export function sampleStore(): FakeCustomerStore {
  return new FakeCustomerStore([EMA, JOHN, SARAH], EMA_TICKETS, SARAH_ORDERS);
}
