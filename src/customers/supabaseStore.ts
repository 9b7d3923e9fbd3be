// ============================================
// Supabase Customer Store: customers, orders, support_tickets
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import { recordStoreError } from "../lib/errors.js";
import type {
  CustomerRecord,
  CustomerStore,
  Order,
  SupportTicket,
} from "./types.js";

// ============================================
// Row schemas
// ============================================

const customerRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  email: z.string(),
  phone: z.string().nullable(),
  address: z.string().nullable().optional(),
  signup_date: z.string().nullable(),
  account_status: z.string().nullable(),
  account_type: z.string().nullable(),
  total_orders: z.number().nullable(),
  lifetime_value: z.coerce.number().nullable(),
});

const orderRowSchema = z.object({
  id: z.number(),
  customer_id: z.number(),
  order_date: z.string().nullable(),
  amount: z.coerce.number().nullable(),
  status: z.string().nullable(),
  items: z.array(z.string()).nullable(),
});

const ticketRowSchema = z.object({
  id: z.number(),
  customer_id: z.number(),
  title: z.string(),
  description: z.string().nullable(),
  status: z.string(),
  created_date: z.string().nullable(),
  resolved_date: z.string().nullable(),
  category: z.string().nullable(),
  priority: z.string().nullable(),
});

export type CustomerRow = z.infer<typeof customerRowSchema>;
export type OrderRow = z.infer<typeof orderRowSchema>;
export type TicketRow = z.infer<typeof ticketRowSchema>;

export function toCustomerRecord(row: CustomerRow): CustomerRecord {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    address: row.address ?? null,
    signupDate: row.signup_date,
    accountStatus: row.account_status,
    accountType: row.account_type,
    totalOrders: row.total_orders ?? 0,
    lifetimeValue: row.lifetime_value ?? 0,
  };
}

export function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    customerId: row.customer_id,
    orderDate: row.order_date,
    amount: row.amount ?? 0,
    status: row.status,
    items: row.items ?? [],
  };
}

export function toSupportTicket(row: TicketRow): SupportTicket {
  return {
    id: row.id,
    customerId: row.customer_id,
    title: row.title,
    description: row.description,
    status: row.status,
    createdDate: row.created_date,
    resolvedDate: row.resolved_date,
    category: row.category,
    priority: row.priority,
  };
}

// ============================================
// Pattern helpers
// ============================================

/**
 * Pattern for a single `.ilike()` filter. LIKE wildcards in the input
 * are escaped so they match literally.
 */
export function containsPattern(substring: string): string {
  return `%${substring.replace(/[\\%_]/g, "\\$&")}%`;
}

/**
 * Pattern embedded in an `.or()` filter string. Characters PostgREST
 * reserves there become single-character wildcards.
 */
export function orFilterPattern(substring: string): string {
  return `%${substring.replace(/[%_,()"\\*]/g, "_")}%`;
}

// ============================================
// Store
// ============================================

export class SupabaseCustomerStore implements CustomerStore {
  constructor(private readonly client: SupabaseClient) {}

  async findCustomer(nameSubstring: string): Promise<CustomerRecord | null> {
    const { data, error } = await this.client
      .from("customers")
      .select("*")
      .ilike("name", containsPattern(nameSubstring))
      .order("id", { ascending: true })
      .limit(1);

    if (error) {
      throw this.fail("Error finding customer by name", error.message);
    }

    const [row] = z.array(customerRowSchema).parse(data ?? []);
    return row ? toCustomerRecord(row) : null;
  }

  async getCustomer(id: number): Promise<CustomerRecord | null> {
    const { data, error } = await this.client
      .from("customers")
      .select("*")
      .eq("id", id)
      .limit(1);

    if (error) {
      throw this.fail("Error fetching customer by ID", error.message);
    }

    const [row] = z.array(customerRowSchema).parse(data ?? []);
    return row ? toCustomerRecord(row) : null;
  }

  async findOrders(customerId: number): Promise<Order[]> {
    const { data, error } = await this.client
      .from("orders")
      .select("*")
      .eq("customer_id", customerId)
      .order("order_date", { ascending: false });

    if (error) {
      throw this.fail("Error fetching orders", error.message);
    }

    return z.array(orderRowSchema).parse(data ?? []).map(toOrder);
  }

  async findTickets(customerId: number): Promise<SupportTicket[]> {
    const { data, error } = await this.client
      .from("support_tickets")
      .select("*")
      .eq("customer_id", customerId)
      .order("created_date", { ascending: false });

    if (error) {
      throw this.fail("Error fetching support tickets", error.message);
    }

    return z.array(ticketRowSchema).parse(data ?? []).map(toSupportTicket);
  }

  async searchCustomers(substring: string): Promise<CustomerRecord[]> {
    let query = this.client.from("customers").select("*");

    if (substring.length > 0) {
      const pattern = orFilterPattern(substring);
      query = query.or(`name.ilike.${pattern},email.ilike.${pattern},phone.ilike.${pattern}`);
    }

    const { data, error } = await query.order("id", { ascending: true });

    if (error) {
      throw this.fail("Error searching customers", error.message);
    }

    return z.array(customerRowSchema).parse(data ?? []).map(toCustomerRecord);
  }

  private fail(message: string, detail: string) {
    logger.error(message, { stage: "db", error: detail });
    return recordStoreError(`${message}: ${detail}`);
  }
}
