import type { FastifyRequest, FastifyReply } from 'fastify';
import { timingSafeStringEqual } from './middleware.js';

function headerValue(req: FastifyRequest, headerName: string): string {
  const raw = req.headers[headerName];
  return Array.isArray(raw) ? String(raw[0] || '') : String(raw || '');
}

/**
 * Check a shared secret from the `secret` query param or a header.
 * Returns true if the caller is authorized (or no secret is configured).
 */
export function checkSecret(
  req: FastifyRequest,
  querySecret: string | undefined,
  configuredSecret: string | undefined,
  headerName = 'x-update-secret',
): boolean {
  const trimmed = String(configuredSecret || '').trim();
  if (!trimmed) return true; // no secret configured → open
  const provided = String(querySecret || headerValue(req, headerName) || '').trim();
  return timingSafeStringEqual(provided, trimmed);
}

/**
 * Guard helper: sends 401 and returns true if unauthorized.
 * Usage:  if (rejectUnauthorized(req, res, req.query.secret, secret)) return;
 */
export function rejectUnauthorized(
  req: FastifyRequest,
  res: FastifyReply,
  querySecret: string | undefined,
  configuredSecret: string | undefined,
): boolean {
  if (checkSecret(req, querySecret, configuredSecret)) return false;
  res.code(401).send({ error: 'Unauthorized' });
  return true;
}
