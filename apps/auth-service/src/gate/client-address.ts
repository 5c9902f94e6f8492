/**
 * Client address resolution
 * X-Forwarded-For (first hop), then X-Real-IP, then the socket address
 */

export interface AddressableRequest {
  headers: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function resolveClientAddress(request: AddressableRequest): string {
  const forwarded = firstHeader(request.headers['x-forwarded-for']);
  if (forwarded) {
    const first = forwarded.split(',')[0].trim();
    if (first) {
      return first;
    }
  }

  const realIp = firstHeader(request.headers['x-real-ip'])?.trim();
  if (realIp) {
    return realIp;
  }

  return request.socket?.remoteAddress || 'unknown';
}
