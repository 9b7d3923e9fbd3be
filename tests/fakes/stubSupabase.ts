/**
 * A real Supabase client whose HTTP layer is answered in process.
 * Each request is recorded with its decoded URL and JSON body.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export type RecordedRequest = {
  method: string;
  url: URL;
  body: unknown;
};

export type StubReply = {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
};

export function createStubSupabase(respond: (request: RecordedRequest) => StubReply = () => ({ body: [] })): {
  client: SupabaseClient;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const stubFetch: typeof fetch = async (input, init) => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const rawBody = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url: new URL(href),
      body: typeof rawBody === "string" && rawBody.length > 0 ? JSON.parse(rawBody) : undefined,
    };
    requests.push(request);

    const reply = respond(request);
    return new Response(reply.body === undefined ? "" : JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { "Content-Type": "application/json", ...reply.headers },
    });
  };

  const client = createClient("https://test.supabase.co", "test-secret", {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: stubFetch },
  });

  return { client, requests };
}
