import { NextFunction, Response } from 'express';
import { z } from 'zod';
import { TenantRequest } from '../types/request.types';
import { ValidationError } from '../utils/errors';
import { ResponseHandler } from '../utils/response';

export const TENANT_HEADER = 'x-tenant-id';

const tenantIdSchema = z.string().uuid();

/**
 * Reads the tenant from the X-Tenant-ID header; every /api route is tenant scoped.
 */
export const requireTenant = (req: TenantRequest, res: Response, next: NextFunction) => {
  const header = req.get(TENANT_HEADER);
  if (!header) {
    return ResponseHandler.badRequest(res, 'X-Tenant-ID header is required');
  }

  const parsed = tenantIdSchema.safeParse(header.trim());
  if (!parsed.success) {
    return ResponseHandler.badRequest(res, 'X-Tenant-ID must be a valid UUID');
  }

  req.tenantId = parsed.data;
  next();
};

export const getTenantId = (req: TenantRequest): string => {
  if (!req.tenantId) {
    throw new ValidationError('Request is not scoped to a tenant');
  }
  return req.tenantId;
};
