import { Request, Response, NextFunction } from 'express';
import { AuthenticationError, AuthorizationError } from '../shared/errors';
import { logAuthzFailure } from '../shared/logger';
import { fetchUserCompany } from '../modules/stacker/stacker.repository';
import type { CompanyRole } from '../shared/types';

export type { CompanyRole };

export const ROLE_HIERARCHY: Record<CompanyRole, number> = {
  junior_staff: 0,
  staff: 1,
  admin: 2,
  master_admin: 3,
};

/**
 * Resolves the caller's company from their profile and requires at least
 * `minimumRole` within it. Sets `req.user.companyId` and `req.user.role`.
 */
export function requireRole(minimumRole: CompanyRole) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.user) {
        throw new AuthenticationError('Authentication required');
      }

      const profile = await fetchUserCompany(req.user.userId);
      if (!profile) {
        throw new AuthorizationError('User does not belong to a company');
      }

      if (ROLE_HIERARCHY[profile.role] < ROLE_HIERARCHY[minimumRole]) {
        logAuthzFailure({
          userId: req.user.userId,
          resource: req.originalUrl,
          requiredRole: minimumRole,
          actualRole: profile.role,
        });
        throw new AuthorizationError('Insufficient permissions');
      }

      req.user.companyId = profile.companyId;
      req.user.role = profile.role;
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** Company id set by `requireRole`; routes without it are a wiring error. */
export function companyIdOf(req: Request): number {
  const companyId = req.user?.companyId;
  if (companyId === undefined) {
    throw new AuthorizationError('Company context required');
  }
  return companyId;
}
