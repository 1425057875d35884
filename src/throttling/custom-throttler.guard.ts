import { ExecutionContext, Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

interface TrackedRequest {
  ip?: string;
  headers?: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string };
}

/** Keys the request budget by client IP (first X-Forwarded-For hop as fallback). */
export function clientKey(req: TrackedRequest): string {
  const header = req.headers?.['x-forwarded-for'];
  const forwarded = String(Array.isArray(header) ? header[0] : header ?? '')
    .split(',')[0]
    .trim();

  const ip =
    String(req.ip ?? '').trim() ||
    forwarded ||
    String(req.socket?.remoteAddress ?? '').trim() ||
    'unknown-ip';

  return `ip:${ip}`;
}

@Injectable()
export class CustomThrottlerGuard extends ThrottlerGuard {
  // Socket events carry no HTTP request/response pair to track or annotate.
  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') return true;
    return super.canActivate(context);
  }

  protected async getTracker(req: Record<string, any>): Promise<string> {
    return clientKey(req);
  }
}
