// Shared request validation — single source of truth for routes.ts and websocket.ts

export interface ClientMessage {
  type: string;
  [key: string]: unknown;
}

export type ParsedMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; error: string };

/** Strips prototype-polluting keys from parsed JSON objects (recursive). */
export function sanitizeJson(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map(sanitizeJson);
  const clean: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') continue;
    clean[key] = sanitizeJson(val);
  }
  return clean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function parseClientMessage(raw: string): ParsedMessage {
  let parsed: unknown;
  try {
    parsed = sanitizeJson(JSON.parse(raw));
  } catch {
    return { ok: false, error: 'Malformed JSON' };
  }
  if (!isRecord(parsed)) {
    return { ok: false, error: 'Message must be a JSON object' };
  }
  const type = parsed['type'];
  if (typeof type !== 'string' || type === '') {
    return { ok: false, error: 'Missing "type" field' };
  }
  return { ok: true, message: { ...parsed, type } };
}

/** Query parameters as raw widget values; the last occurrence of a key wins. */
export function queryInputs(params: URLSearchParams): Record<string, string> {
  const inputs: Record<string, string> = {};
  for (const [key, value] of params) {
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') continue;
    inputs[key] = value;
  }
  return inputs;
}

/**
 * Origin policy shared by CORS and the WebSocket upgrade: '*', the configured
 * origin, or the page's own origin (an Origin whose host is the request's Host).
 */
export function isAllowedOrigin(origin: string, allowed: string, hostHeader?: string): boolean {
  if (allowed === '*') return true;
  if (origin.toLowerCase() === allowed.toLowerCase()) return true;
  if (!hostHeader) return false;
  try {
    return new URL(origin).host === hostHeader.toLowerCase();
  } catch {
    return false; // not a URL, e.g. "null"
  }
}

/** decodeURIComponent that returns null on a malformed escape instead of throwing */
export function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
