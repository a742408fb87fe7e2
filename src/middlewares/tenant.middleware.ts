import { Request, Response, NextFunction } from 'express';
import { ValidationError } from './errorHandler.middleware';
import { TENANT_HEADER } from '../utils/constants';

export interface TenantRequest extends Request {
  tenantId?: string;
}

/**
 * 🏷️ Tenant Middleware
 * Requires `X-Tenant-ID` and attaches it to `req.tenantId`.
 */
export const tenantMiddleware = (req: TenantRequest, _res: Response, next: NextFunction): void => {
  const tenantId = req.header(TENANT_HEADER)?.trim();
  if (!tenantId) {
    next(new ValidationError('Missing X-Tenant-ID header'));
    return;
  }
  req.tenantId = tenantId;
  next();
};

/**
 * Tenant of a request that went through `tenantMiddleware`.
 */
export const requireTenantId = (req: TenantRequest): string => {
  if (!req.tenantId) throw new ValidationError('Missing X-Tenant-ID header');
  return req.tenantId;
};
