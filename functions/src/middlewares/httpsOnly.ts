import { Request, Response, NextFunction } from 'express';

/**
 * Reject plain HTTP in production. With `trust proxy` enabled, `req.secure`
 * follows the x-forwarded-proto header set by the hosting load balancer.
 */
export function requireHttps(req: Request, res: Response, next: NextFunction) {
  if (!req.secure && process.env.NODE_ENV === 'production') {
    res.status(403).json({
      code: 'https_required',
      message: 'HTTPS is required',
    });
    return;
  }
  next();
}
