import { Request } from 'express';

/**
 * Request scoped to a tenant by the tenant middleware
 */
export interface TenantRequest extends Request {
  tenantId?: string;
}

