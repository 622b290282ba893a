import type { ManagementResponse } from '../src/client/ManagementClient';

export const SUB = '00000000-0000-0000-0000-000000000000';

export function jsonResponse(status: number, body?: unknown, headers: Record<string, string> = {}): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), { status, headers });
}

export function managementResponse(status: number, body?: unknown, headers: Record<string, string> = {}): ManagementResponse {
  return { status, headers: new Headers(headers), body };
}
