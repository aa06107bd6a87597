/**
 * Minimal fetch surface shared by the HTTP catalog and engine clients.
 * Tests pass an in-process stand-in; production uses the global fetch.
 */

export type FetchLike = (
  url: string,
  init?: { method?: string; headers?: Record<string, string> },
) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface HttpServiceConfig {
  host: string;
  token: string;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}
