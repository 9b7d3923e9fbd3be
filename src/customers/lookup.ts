// ============================================
// Customer Lookups: profile and ticket facets by partial name
// ============================================

import type { CustomerProfile, CustomerStore, SupportTicket } from "./types.js";

export type ProfileLookup =
  | { found: true; profile: CustomerProfile }
  | { found: false; error: string };

export type TicketLookup =
  | {
      found: true;
      customerName: string;
      customerId: number;
      totalTickets: number;
      tickets: SupportTicket[];
    }
  | { found: false; error: string };

export function notFoundMessage(customerName: string): string {
  return `Customer '${customerName}' not found`;
}

/**
 * Profile plus orders for the first customer whose name contains
 * `customerName`. A miss is a value, not an exception.
 */
export async function getCustomerProfile(
  store: CustomerStore,
  customerName: string
): Promise<ProfileLookup> {
  const customer = await store.findCustomer(customerName);
  if (!customer) {
    return { found: false, error: notFoundMessage(customerName) };
  }

  const orders = await store.findOrders(customer.id);
  return { found: true, profile: { ...customer, orders } };
}

/**
 * Ticket history for the first customer whose name contains `customerName`.
 */
export async function getCustomerTickets(
  store: CustomerStore,
  customerName: string
): Promise<TicketLookup> {
  const customer = await store.findCustomer(customerName);
  if (!customer) {
    return { found: false, error: notFoundMessage(customerName) };
  }

  const tickets = await store.findTickets(customer.id);
  return {
    found: true,
    customerName,
    customerId: customer.id,
    totalTickets: tickets.length,
    tickets,
  };
}
