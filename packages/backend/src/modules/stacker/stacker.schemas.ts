import { z } from 'zod';

import { PROSPECT_STATUSES, SORT_FIELDS } from './stacker.query-builder';

// --- Shared pieces ---

const US_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

/** Accepts `MM/DD/YYYY` or an ISO date/datetime; returns `YYYY-MM-DD` or null. */
export function normalizeDate(value: string): string | null {
  const us = US_DATE.exec(value);
  const iso = us ? null : ISO_DATE.exec(value);
  let parts: [string, string, string];
  if (us) {
    parts = [us[3], us[1], us[2]];
  } else if (iso) {
    parts = [iso[1], iso[2], iso[3]];
  } else {
    return null;
  }

  const [year, month, day] = parts.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return parts.join('-');
}

const dateSchema = z.string().transform((value, ctx) => {
  const normalized = normalizeDate(value);
  if (normalized === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date must be MM/DD/YYYY or YYYY-MM-DD' });
    return z.NEVER;
  }
  return normalized;
});

const optionalDate = dateSchema.nullable().optional();

const dateRangeSchema = z.object({
  gte: optionalDate,
  lte: optionalDate,
});

const nonNegativeInt = z.number().int().min(0);
const positiveInt = z.number().int().min(1);

const criteriaSchema = z.object({
  option: z.enum(['any', 'all']).default('any'),
  criteria: z.enum(['tagBefore', 'tagBetween', 'tagAfter']).or(z.literal('')).optional(),
  date_from: optionalDate,
  date_to: optionalDate,
});

const propertyTagsFilterSchema = criteriaSchema.extend({
  include: z.array(nonNegativeInt).optional(),
  exclude: z.array(nonNegativeInt).optional(),
});

const prospectStatusFilterSchema = criteriaSchema.extend({
  include: z.array(z.enum(PROSPECT_STATUSES)).optional(),
  exclude: z.array(z.enum(PROSPECT_STATUSES)).optional(),
});

const searchAfterValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// --- Search ---

export const stackerQuerySchema = z.object({
  name: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
  phone: z.string().optional(),
});

export const stackerFiltersSchema = z
  .object({
    prospect_id: z.array(nonNegativeInt).optional(),
    property_id: z.array(nonNegativeInt).optional(),
    address_id: z.array(nonNegativeInt).optional(),
    state: z.array(z.string().max(2)).optional(),
    zip_code: z.string().max(5).optional(),
    last_sold_date: dateRangeSchema.optional(),
    skiptrace_date: dateRangeSchema.optional(),
    distress_indicators: z.array(nonNegativeInt).min(1).max(25).optional(),
    lead_stage_id: z.array(z.number().int()).min(1).optional(),
    is_blocked: z.boolean().optional(),
    do_not_call: z.boolean().optional(),
    is_priority: z.boolean().optional(),
    is_qualified_lead: z.boolean().optional(),
    wrong_number: z.boolean().optional(),
    opted_out: z.boolean().optional(),
    owner_verified_status: z.array(z.enum(['open', 'verified', 'unverified'])).optional(),
    is_archived: z.boolean().default(false),
    is_reminder: z.boolean().optional(),
    recently_vacant: z.boolean().optional(),
    skip_traced: z.boolean().nullable().optional(),
    in_campaign: z.boolean().optional(),
    in_dm_campaign: z.boolean().optional(),
    inbound_date: dateRangeSchema.optional(),
    outbound_date: dateRangeSchema.optional(),
    prospect_status: prospectStatusFilterSchema.optional(),
    property_tags: propertyTagsFilterSchema.optional(),
    first_import_date: dateRangeSchema.optional(),
    last_import_date: dateRangeSchema.optional(),
  })
  // Prospect documents store the owner status as `owner_status`.
  .transform(({ owner_verified_status: ownerStatus, ...filters }) => ({
    ...filters,
    ...(ownerStatus !== undefined ? { owner_status: [...new Set(ownerStatus)] } : {}),
  }));

export const stackerSortSchema = z.object({
  field: z.enum(SORT_FIELDS),
  order: z.enum(['asc', 'desc']).default('desc'),
});

export const stackerSearchSchema = z.object({
  size: z.number().int().min(10).max(100).default(100),
  query: stackerQuerySchema.optional(),
  filters: stackerFiltersSchema.optional(),
  sort: stackerSortSchema,
  search_after: z
    .object({
      properties: z.array(searchAfterValue).nullable().optional(),
      prospects: z.array(searchAfterValue).nullable().optional(),
    })
    .optional(),
});

// --- Bulk actions ---

const documentTypeSchema = z.enum(['property', 'prospect']);

export const stackerActionSchema = z.object({
  type: documentTypeSchema,
});

export const stackerBulkActionSchema = stackerActionSchema.extend({
  search: stackerSearchSchema.optional(),
  group: z.tuple([positiveInt, positiveInt]).optional(),
  id_list: z.array(positiveInt).optional(),
  exclude: z.array(positiveInt).nullable().optional(),
});

export const bulkArchiveSchema = stackerBulkActionSchema.extend({
  archive: z.boolean(),
});

export const singleArchiveSchema = stackerActionSchema.extend({
  archive: z.boolean(),
});

export const singlePropertyTagSchema = z.object({
  tags: z.array(nonNegativeInt).min(1),
});

export const bulkPropertyTagSchema = singlePropertyTagSchema.extend({
  search: stackerSearchSchema.optional(),
  id_list: z.array(positiveInt).optional(),
});

export const singleProspectTagSchema = z.object({
  is_blocked: z.boolean().nullable().optional(),
  do_not_call: z.boolean().nullable().optional(),
  is_priority: z.boolean().nullable().optional(),
  is_qualified_lead: z.boolean().nullable().optional(),
  wrong_number: z.boolean().nullable().optional(),
  opted_out: z.boolean().nullable().optional(),
  tags: z.array(positiveInt).optional(),
});

export const bulkProspectTagSchema = singleProspectTagSchema.extend({
  search: stackerSearchSchema.optional(),
  id_list: z.array(positiveInt).optional(),
});

export const pushToCampaignSchema = stackerBulkActionSchema.extend({
  campaign_id: nonNegativeInt.optional(),
  market_id: nonNegativeInt.optional(),
  // Absent: preview the new/existing split instead of pushing.
  import_type: z.enum(['all', 'new']).optional(),
  campaign_name: z.string().max(64).optional(),
  tags: z.array(nonNegativeInt).default([]),
});

export const pushToDirectMailSchema = stackerBulkActionSchema.extend({
  campaign_name: z.string().max(64),
  budget_per_order: z.number().nonnegative().optional(),
  drop_date: dateSchema,
  note_for_processor: z.string().optional(),
  template: z.string(),
  creative_type: z.string().default('postcard'),
  from_id: z.number().int(),
  return_address: z.string().max(100),
  return_city: z.string().max(64),
  return_state: z.string().max(32),
  return_zip: z.string().max(16),
  return_phone: z.string(),
  owner: z.number().int().optional(),
  access: z.array(z.number().int()).optional(),
  podio_email: z.string().email().optional(),
  zapier_webhook: z.string().url().optional(),
  tags: z.array(nonNegativeInt).default([]),
});

// --- Params / admin ---

export const stackerIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const populateSchema = z.object({
  company_ids: z.array(positiveInt).min(1),
});

// --- Inferred Types ---

export type StackerSearchBody = z.infer<typeof stackerSearchSchema>;
export type StackerFiltersInput = z.infer<typeof stackerFiltersSchema>;
export type StackerBulkActionBody = z.infer<typeof stackerBulkActionSchema>;
export type BulkArchiveBody = z.infer<typeof bulkArchiveSchema>;
export type SingleArchiveBody = z.infer<typeof singleArchiveSchema>;
export type BulkPropertyTagBody = z.infer<typeof bulkPropertyTagSchema>;
export type BulkProspectTagBody = z.infer<typeof bulkProspectTagSchema>;
export type PushToCampaignBody = z.infer<typeof pushToCampaignSchema>;
export type PushToDirectMailBody = z.infer<typeof pushToDirectMailSchema>;
export type StackerIdParams = z.infer<typeof stackerIdParamsSchema>;
export type PopulateBody = z.infer<typeof populateSchema>;
