import crypto from 'crypto';

export function createRequestId() {
  return crypto.randomUUID();
}

export function shouldLogRequestPath(pathname: string) {
  const path = String(pathname || '');
  if (path.startsWith('/api/')) return true;
  return path === '/readyz';
}

export function timingSafeStringEqual(left: string, right: string) {
  const leftBuffer = Buffer.from(String(left));
  const rightBuffer = Buffer.from(String(right));
  if (leftBuffer.length !== rightBuffer.length) return false;
  return crypto.timingSafeEqual(leftBuffer, rightBuffer);
}
