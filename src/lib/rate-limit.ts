// In-memory rate limiter (per client IP, per route)
const rateLimitMap = new Map<string, { count: number; windowStart: number }>();
const WINDOW = 60 * 1000; // 1 minute
const MAX = 30; // submissions per window

export type RateLimitOptions = {
  max?: number;
  windowMs?: number;
  now?: number;
};

function clientIp(req: Request): string {
  const forwarded = req.headers.get('x-forwarded-for');
  return forwarded?.split(',')[0]?.trim() || req.headers.get('x-real-ip') || 'unknown';
}

export function rateLimit(req: Request, key: string, opts: RateLimitOptions = {}): boolean {
  const max = opts.max ?? MAX;
  const windowMs = opts.windowMs ?? WINDOW;
  const now = opts.now ?? Date.now();
  const mapKey = `${key}:${clientIp(req)}`;

  const entry = rateLimitMap.get(mapKey);
  if (!entry || now - entry.windowStart >= windowMs) {
    rateLimitMap.set(mapKey, { count: 1, windowStart: now });
    return true;
  }
  if (entry.count >= max) return false;
  entry.count++;
  return true;
}

export function resetRateLimits() {
  rateLimitMap.clear();
}
