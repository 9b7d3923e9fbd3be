// ============================================
// Render: agent results as markdown prose
// ============================================

import type { AgentResult, CustomerDataResult } from "../agents/types.js";

const MAX_RENDERED_TICKETS = 5;

/**
 * Format any agent result for display. Exhaustive over `kind`.
 */
export function formatAgentResult(result: AgentResult): string {
  switch (result.kind) {
    case "policy_summary":
      return `**${result.title}**\n\n${result.content}`;
    case "policy_answer":
      return result.answer;
    case "customer_data":
      return formatCustomerData(result);
    case "error":
      return result.message;
    default: {
      const unreachable: never = result;
      return unreachable;
    }
  }
}

function formatCustomerData(result: CustomerDataResult): string {
  const { profile, tickets } = result.data;
  let text = `**Customer: ${result.customerName}**\n\n`;

  if (profile?.found) {
    const p = profile.profile;
    text += "**Profile:**\n";
    text += `- Email: ${p.email}\n`;
    text += `- Phone: ${p.phone ?? "N/A"}\n`;
    text += `- Account Status: ${p.accountStatus ?? "N/A"}\n`;
    text += `- Account Type: ${p.accountType ?? "N/A"}\n`;
    text += `- Total Orders: ${p.totalOrders}\n`;
    text += `- Lifetime Value: $${p.lifetimeValue.toFixed(2)}\n\n`;
  }

  if (tickets?.found && tickets.tickets.length > 0) {
    text += `**Support Tickets (${tickets.totalTickets}):**\n`;
    for (const ticket of tickets.tickets.slice(0, MAX_RENDERED_TICKETS)) {
      text += `- [${ticket.status.toUpperCase()}] ${ticket.title} (Priority: ${ticket.priority ?? "N/A"})\n`;
    }
  }

  // Nothing fetched matched: say so once
  const misses = [profile, tickets].filter((lookup) => lookup !== undefined && !lookup.found);
  const fetched = [profile, tickets].filter((lookup) => lookup !== undefined);
  const firstMiss = misses[0];
  if (firstMiss && !firstMiss.found && misses.length === fetched.length) {
    text += `${firstMiss.error}\n`;
  }

  return text;
}
