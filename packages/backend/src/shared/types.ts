import 'express';

/** Company roles from sherpa_userprofile, lowest privilege first. */
export const COMPANY_ROLES = ['junior_staff', 'staff', 'admin', 'master_admin'] as const;

export type CompanyRole = (typeof COMPANY_ROLES)[number];

export function isCompanyRole(value: unknown): value is CompanyRole {
  return typeof value === 'string' && COMPANY_ROLES.some((role) => role === value);
}

declare module 'express-serve-static-core' {
  interface Request {
    id: string;
    user?: { userId: number; companyId?: number; role?: CompanyRole };
  }
}
