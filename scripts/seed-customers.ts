#!/usr/bin/env npx tsx
// ============================================
// Seed Script: sample customers, tickets and orders
// ============================================
// Usage: npm run seed:customers -- [--file data/sample-customers.json]
//
// Upserts by id, so running it twice leaves the same rows.

import "dotenv/config";
import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { supabase } from "../src/db/supabase.js";

const seedSchema = z.object({
  customers: z.array(
    z.object({
      id: z.number(),
      name: z.string(),
      email: z.string().email(),
      phone: z.string().nullable(),
      address: z.string().nullable(),
      signup_date: z.string(),
      account_status: z.string(),
      account_type: z.string(),
      total_orders: z.number(),
      lifetime_value: z.number(),
    })
  ),
  support_tickets: z.array(
    z.object({
      id: z.number(),
      customer_id: z.number(),
      title: z.string(),
      description: z.string().nullable(),
      status: z.string(),
      created_date: z.string(),
      resolved_date: z.string().nullable(),
      category: z.string().nullable(),
      priority: z.string().nullable(),
    })
  ),
  orders: z.array(
    z.object({
      id: z.number(),
      customer_id: z.number(),
      order_date: z.string(),
      amount: z.number(),
      status: z.string(),
      items: z.array(z.string()),
    })
  ),
});

function log(emoji: string, message: string) {
  console.log(`${emoji} ${message}`);
}

async function upsert(table: string, rows: object[]): Promise<void> {
  const { error } = await supabase.from(table).upsert(rows);
  if (error) {
    throw new Error(`Failed to seed ${table}: ${error.message}`);
  }
  log("✅", `${table}: ${rows.length} rows`);
}

async function main() {
  const args = process.argv.slice(2);
  const i = args.indexOf("--file");
  const file = path.resolve((i >= 0 ? args[i + 1] : undefined) ?? "data/sample-customers.json");

  log("📄", `Reading ${file}`);
  const seed = seedSchema.parse(JSON.parse(await fs.readFile(file, "utf-8")));

  // Customers first: orders and tickets reference them
  await upsert("customers", seed.customers);
  await upsert("support_tickets", seed.support_tickets);
  await upsert("orders", seed.orders);

  console.log("\n✅ Seeding complete");
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
