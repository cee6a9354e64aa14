import { IncomingMessage, ServerResponse } from 'http';
import { Request, Response, NextFunction } from 'express';
import { recordHttpRequest, recordHttpDuration } from './metrics';
import logger from './logger';

// Raw request bodies keyed by request, kept for webhook HMAC verification
const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/**
 * `verify` hook for express.json(): remembers the exact bytes that were parsed
 */
export function captureRawBody(req: IncomingMessage, _res: ServerResponse, buf: Buffer): void {
  rawBodies.set(req, buf);
}

/**
 * Raw body captured for the request, if the JSON parser saw one
 */
export function getRawBody(req: IncomingMessage): Buffer | undefined {
  return rawBodies.get(req);
}

/**
 * Extract client IP from request
 */
export function getClientIP(req: Request): string {
  // Check X-Forwarded-For header (for reverse proxies)
  const xff = req.headers['x-forwarded-for'];
  if (xff) {
    const ip = (Array.isArray(xff) ? xff[0] : xff).split(',')[0].trim();
    if (ip) return ip;
  }

  // Check X-Real-IP header
  const xri = req.headers['x-real-ip'];
  if (xri) {
    return Array.isArray(xri) ? xri[0].trim() : xri.trim();
  }

  // Fall back to RemoteAddr
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Determine endpoint name from request path for metrics
 */
export function getEndpointName(path: string): string {
  if (path.startsWith('/webhook')) return 'webhook';
  if (path.startsWith('/health')) return 'health';
  if (path.startsWith('/metrics')) return 'metrics';
  return 'other';
}

/**
 * Metrics middleware that records request duration and status
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();
  const method = req.method;
  const endpoint = getEndpointName(req.path);

  // Skip metrics endpoint so scrapes don't count themselves
  if (endpoint === 'metrics') {
    next();
    return;
  }

  res.on('finish', () => {
    const durationSecs = Number(process.hrtime.bigint() - start) / 1e9;
    recordHttpRequest(endpoint, method, res.statusCode);
    recordHttpDuration(endpoint, method, durationSecs);
  });

  next();
}

/**
 * Request logging middleware
 */
export function requestLogMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const clientIp = getClientIP(req);

  res.on('finish', () => {
    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${Date.now() - start}ms`,
      clientIp,
    });
  });

  next();
}

/**
 * Error recovery middleware. Bodies the JSON parser rejects are answered
 * with `{ status: 'invalid' }` and a 200.
 */
export function errorRecoveryMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if ('type' in err && err.type === 'entity.parse.failed') {
    logger.warn('Malformed JSON body', { path: req.path, error: err.message });
    res.json({ status: 'invalid' });
    return;
  }

  logger.error('Unhandled error', { error: err.message, stack: err.stack });

  // Don't expose internal error details
  res.status(500).json({ error: 'internal server error' });
}
