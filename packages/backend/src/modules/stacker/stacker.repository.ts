import { type Client } from 'pg';

import { query, queryArrays, withTransaction } from '../../shared/db';
import { isCompanyRole, type CompanyRole } from '../../shared/types';
import type { DocumentType } from './stacker.document-kind';
import {
  PROPERTY_BY_COMPANY_SQL,
  PROPERTY_BY_IDS_SQL,
  PROSPECT_BY_COMPANY_SQL,
  PROSPECT_BY_IDS_SQL,
} from './stacker.queries';

// ---------------------------------------------------------------------------
// Exported domain interfaces (camelCase)
// ---------------------------------------------------------------------------

export interface PropertyTagSummary {
  propertyId: number;
  tagIds: number[];
  distressCount: number;
}

export interface UserCompany {
  companyId: number;
  role: CompanyRole;
}

export const PROSPECT_FLAGS = [
  'is_blocked',
  'do_not_call',
  'is_priority',
  'is_qualified_lead',
  'wrong_number',
  'opted_out',
] as const;

export type ProspectFlag = (typeof PROSPECT_FLAGS)[number];
export type ProspectToggles = Partial<Record<ProspectFlag, boolean>>;

export interface AddressParts {
  address: string;
  city: string;
  state: string;
  zipCode: string | null;
  zipPlus4: string | null;
}

export interface AssessorFacts {
  legalDescription: string | null;
  yearBuilt: number | null;
  saleDate: string | null;
  salePrice: string | null;
  bathCount: number | null;
  bathPartialCount: number | null;
  bedroomsCount: number | null;
  buildingSqft: number | null;
  lotSqft: string | null;
  propertyUse: string | null;
}

export interface Relative {
  firstName: string;
  lastName: string | null;
  phones: string[];
}

export interface PropertyDetail {
  propertyId: number;
  address: AddressParts;
  mailingAddress: AddressParts | null;
  tagsTotal: number;
  distressTotal: number;
  assessor: AssessorFacts | null;
  skipTrace: { relatives: Relative[]; vacant: string | null } | null;
}

export interface PropertyProspect {
  id: number;
  firstName: string | null;
  lastName: string | null;
  phoneRaw: string | null;
  doNotCall: boolean | null;
  isPriority: boolean | null;
  isBlocked: boolean | null;
  isQualifiedLead: boolean | null;
  wrongNumber: boolean | null;
  optedOut: boolean | null;
  ownerVerifiedStatus: string | null;
  totalCampaigns: number;
  leadStage: number | null;
  campaignIds: number[];
  lastContact: Date | null;
}

export type BulkJobAction = 'export' | 'skiptrace' | 'push_to_campaign';

export interface BulkJob {
  id: string;
  companyId: number;
  userId: number;
  action: BulkJobAction;
  documentType: DocumentType;
  attributes: Record<string, unknown>;
  status: string;
  createdAt: Date;
}

export type IndexTaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface IndexTaskRecord {
  id: string;
  task: string;
  payload: unknown;
  status: IndexTaskStatus;
  errorReason: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

// ---------------------------------------------------------------------------
// Private row interfaces (snake_case: match DB columns)
// ---------------------------------------------------------------------------

interface TagSummaryRow {
  property_id: number;
  tag_ids: number[];
  distress_count: number;
}

interface BulkJobRow {
  id: string;
  company_id: number;
  user_id: number;
  action: BulkJobAction;
  document_type: DocumentType;
  attributes: Record<string, unknown>;
  status: string;
  created_at: Date;
}

interface PropertyDetailRow {
  property_id: number;
  address: string;
  city: string;
  state: string;
  zip_code: string | null;
  zip_plus4: string | null;
  mailing_address: string | null;
  mailing_city: string | null;
  mailing_state: string | null;
  mailing_zip_code: string | null;
  mailing_zip_plus4: string | null;
  tags_total: number;
  distress_total: number;
  attom_id: number | null;
  legal_description: string | null;
  year_built: number | null;
  sale_date: string | null;
  sale_price: string | null;
  bath_count: number | null;
  bath_partial_count: number | null;
  bedrooms_count: number | null;
  building_sqft: number | null;
  lot_sqft: string | null;
  property_use: string | null;
  skip_trace_id: number | null;
  relative_1_first_name: string | null;
  relative_1_last_name: string | null;
  relative_1_phones: (string | null)[] | null;
  relative_2_first_name: string | null;
  relative_2_last_name: string | null;
  relative_2_phones: (string | null)[] | null;
  validated_property_vacant: string | null;
}

interface PropertyProspectRow {
  id: number;
  first_name: string | null;
  last_name: string | null;
  phone_raw: string | null;
  do_not_call: boolean | null;
  is_priority: boolean | null;
  is_blocked: boolean | null;
  is_qualified_lead: boolean | null;
  wrong_number: boolean | null;
  opted_out: boolean | null;
  owner_verified_status: string | null;
  total_campaigns: number;
  lead_stage_id: number | null;
  campaign_ids: number[];
  last_sms_sent_utc: Date | null;
}

interface IndexTaskRow {
  id: string;
  task: string;
  payload: unknown;
  status: IndexTaskStatus;
  error_reason: string | null;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

// ---------------------------------------------------------------------------
// Row → domain mappers
// ---------------------------------------------------------------------------

function toBulkJob(row: BulkJobRow): BulkJob {
  return {
    id: row.id,
    companyId: row.company_id,
    userId: row.user_id,
    action: row.action,
    documentType: row.document_type,
    attributes: row.attributes,
    status: row.status,
    createdAt: row.created_at,
  };
}

function toRelative(
  firstName: string | null,
  lastName: string | null,
  phones: (string | null)[] | null,
): Relative | null {
  if (!firstName) return null;
  return {
    firstName,
    lastName,
    phones: (phones ?? []).filter((phone): phone is string => Boolean(phone)),
  };
}

function toPropertyDetail(row: PropertyDetailRow): PropertyDetail {
  const mailingAddress =
    row.mailing_address !== null && row.mailing_city !== null && row.mailing_state !== null
      ? {
          address: row.mailing_address,
          city: row.mailing_city,
          state: row.mailing_state,
          zipCode: row.mailing_zip_code,
          zipPlus4: row.mailing_zip_plus4,
        }
      : null;

  const assessor =
    row.attom_id === null
      ? null
      : {
          legalDescription: row.legal_description,
          yearBuilt: row.year_built,
          saleDate: row.sale_date,
          salePrice: row.sale_price,
          bathCount: row.bath_count,
          bathPartialCount: row.bath_partial_count,
          bedroomsCount: row.bedrooms_count,
          buildingSqft: row.building_sqft,
          lotSqft: row.lot_sqft,
          propertyUse: row.property_use,
        };

  const relatives = [
    toRelative(row.relative_1_first_name, row.relative_1_last_name, row.relative_1_phones),
    toRelative(row.relative_2_first_name, row.relative_2_last_name, row.relative_2_phones),
  ].filter((relative): relative is Relative => relative !== null);

  return {
    propertyId: row.property_id,
    address: {
      address: row.address,
      city: row.city,
      state: row.state,
      zipCode: row.zip_code,
      zipPlus4: row.zip_plus4,
    },
    mailingAddress,
    tagsTotal: row.tags_total,
    distressTotal: row.distress_total,
    assessor,
    skipTrace: row.skip_trace_id === null ? null : { relatives, vacant: row.validated_property_vacant },
  };
}

function toPropertyProspect(row: PropertyProspectRow): PropertyProspect {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    phoneRaw: row.phone_raw,
    doNotCall: row.do_not_call,
    isPriority: row.is_priority,
    isBlocked: row.is_blocked,
    isQualifiedLead: row.is_qualified_lead,
    wrongNumber: row.wrong_number,
    optedOut: row.opted_out,
    ownerVerifiedStatus: row.owner_verified_status,
    totalCampaigns: row.total_campaigns,
    leadStage: row.lead_stage_id,
    campaignIds: row.campaign_ids,
    lastContact: row.last_sms_sent_utc,
  };
}

function toIndexTask(row: IndexTaskRow): IndexTaskRecord {
  return {
    id: row.id,
    task: row.task,
    payload: row.payload,
    status: row.status,
    errorReason: row.error_reason,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

// ---------------------------------------------------------------------------
// Column lists
// ---------------------------------------------------------------------------

const BULK_JOB_COLUMNS = 'id, company_id, user_id, action, document_type, attributes, status, created_at';

const INDEX_TASK_COLUMNS = 'id, task, payload, status, error_reason, created_at, started_at, completed_at';

const DEMO_SKIP_TRACE_LIMIT = 2;

const ENTITY_TABLES: Record<DocumentType, string> = {
  property: 'properties_property',
  prospect: 'sherpa_prospect',
};

// Activity titles written when a flag is toggled; prospect_status is built from these.
const FLAG_ACTIVITY_TITLES: Partial<Record<ProspectFlag, { on: string; off: string }>> = {
  do_not_call: { on: 'Added to DNC', off: 'Removed from DNC' },
  is_priority: { on: 'Added as Priority', off: 'Removed as Priority' },
  is_qualified_lead: { on: 'Qualified Lead Added', off: 'Qualified Lead Removed' },
  wrong_number: { on: 'Added Wrong Number', off: 'Removed Wrong Number' },
};

// ---------------------------------------------------------------------------
// Projector rows
// ---------------------------------------------------------------------------

/** One keyset page of property rows for the given companies. */
export function fetchPropertyRowsByCompany(
  companyIds: number[],
  afterId: number,
  limit: number,
): Promise<unknown[][]> {
  return queryArrays(PROPERTY_BY_COMPANY_SQL, [companyIds, afterId, limit]);
}

/** One keyset page of prospect rows for the given companies. */
export function fetchProspectRowsByCompany(
  companyIds: number[],
  afterId: number,
  limit: number,
): Promise<unknown[][]> {
  return queryArrays(PROSPECT_BY_COMPANY_SQL, [companyIds, afterId, limit]);
}

export function fetchPropertyRowsByIds(propertyIds: number[]): Promise<unknown[][]> {
  return queryArrays(PROPERTY_BY_IDS_SQL, [propertyIds]);
}

export function fetchProspectRowsByIds(prospectIds: number[]): Promise<unknown[][]> {
  return queryArrays(PROSPECT_BY_IDS_SQL, [prospectIds]);
}

// ---------------------------------------------------------------------------
// Company / user lookups
// ---------------------------------------------------------------------------

export async function fetchActiveCompanyIds(): Promise<number[]> {
  const result = await query<{ id: number }>(
    `SELECT id FROM sherpa_company WHERE subscription_status = 'active' ORDER BY id`,
  );
  return result.rows.map((row) => row.id);
}

export async function fetchUserCompany(userId: number): Promise<UserCompany | null> {
  const result = await query<{ company_id: number | null; role: string }>(
    `SELECT company_id, role FROM sherpa_userprofile WHERE user_id = $1`,
    [userId],
  );
  const row = result.rows[0];
  if (!row || row.company_id === null || !isCompanyRole(row.role)) return null;
  return { companyId: row.company_id, role: row.role };
}

/**
 * Demo companies may start two skip traces per user; everyone else is
 * unlimited. Uploads still in setup don't count.
 */
export async function canSkipTrace(companyId: number, userId: number): Promise<boolean> {
  const result = await query<{ allowed: boolean }>(
    `SELECT NOT c.is_demo
         OR (SELECT COUNT(*) FROM sherpa_uploadskiptrace u
              WHERE u.created_by_id = $2 AND u.status <> 'setup')
          + (SELECT COUNT(*) FROM stacker_bulk_jobs j
              WHERE j.user_id = $2 AND j.action = 'skiptrace') < $3 AS allowed
     FROM sherpa_company c
     WHERE c.id = $1`,
    [companyId, userId, DEMO_SKIP_TRACE_LIMIT],
  );
  return result.rows[0]?.allowed === true;
}

export async function propertyExists(companyId: number, propertyId: number): Promise<boolean> {
  const result = await query<{ exists: boolean }>(
    `SELECT EXISTS(SELECT 1 FROM properties_property WHERE company_id = $1 AND id = $2) AS exists`,
    [companyId, propertyId],
  );
  return result.rows[0]?.exists === true;
}

// ---------------------------------------------------------------------------
// Property detail
// ---------------------------------------------------------------------------

export async function fetchPropertyDetail(companyId: number, propertyId: number): Promise<PropertyDetail | null> {
  const result = await query<PropertyDetailRow>(
    `SELECT prop.id AS property_id,
            addr.address, addr.city, addr.state, addr.zip_code, addr.zip_plus4,
            mail.address AS mailing_address, mail.city AS mailing_city, mail.state AS mailing_state,
            mail.zip_code AS mailing_zip_code, mail.zip_plus4 AS mailing_zip_plus4,
            COALESCE(tc.total, 0) AS tags_total,
            COALESCE(tc.distress, 0) AS distress_total,
            at.attom_id, at.legal_description, at.year_built,
            at.deed_last_sale_date::date AS sale_date, at.deed_last_sale_price AS sale_price,
            at.bath_count, at.bath_partial_count, at.bedrooms_count,
            at.area_gross AS building_sqft, at.area_lot_sf AS lot_sqft,
            at.property_use_standardized AS property_use,
            sk.id AS skip_trace_id,
            sk.relative_1_first_name, sk.relative_1_last_name,
            ARRAY[sk.relative_1_phone1, sk.relative_1_phone2, sk.relative_1_phone3] AS relative_1_phones,
            sk.relative_2_first_name, sk.relative_2_last_name,
            ARRAY[sk.relative_2_phone1, sk.relative_2_phone2, sk.relative_2_phone3] AS relative_2_phones,
            sk.validated_property_vacant
     FROM properties_property prop
     INNER JOIN properties_address addr ON addr.id = prop.address_id
     LEFT JOIN properties_address mail ON mail.id = prop.mailing_address_id
     LEFT JOIN properties_attomassessor at ON at.attom_id = addr.attom_id
     LEFT JOIN LATERAL (
       SELECT COUNT(*)::int AS total,
              (COUNT(*) FILTER (WHERE pt.distress_indicator = true))::int AS distress
       FROM properties_propertytagassignment pta
       INNER JOIN properties_propertytag pt ON pt.id = pta.tag_id
       WHERE pta.prop_id = prop.id
     ) tc ON true
     LEFT JOIN LATERAL (
       SELECT * FROM sherpa_skiptraceproperty s WHERE s.prop_id = prop.id ORDER BY s.id LIMIT 1
     ) sk ON true
     WHERE prop.company_id = $1 AND prop.id = $2`,
    [companyId, propertyId],
  );
  const row = result.rows[0];
  return row ? toPropertyDetail(row) : null;
}

export async function fetchPropertyProspects(companyId: number, propertyId: number): Promise<PropertyProspect[]> {
  const result = await query<PropertyProspectRow>(
    `SELECT pros.id, pros.first_name, pros.last_name, pros.phone_raw,
            pros.do_not_call, pros.is_priority, pros.is_blocked, pros.is_qualified_lead,
            pros.wrong_number, pros.opted_out, pros.owner_verified_status,
            COUNT(cp.id)::int AS total_campaigns,
            pros.lead_stage_id,
            ARRAY_REMOVE(ARRAY_AGG(cp.campaign_id ORDER BY cp.campaign_id), NULL) AS campaign_ids,
            pros.last_sms_sent_utc
     FROM sherpa_prospect pros
     LEFT JOIN sherpa_campaignprospect cp ON cp.prospect_id = pros.id
     WHERE pros.company_id = $1 AND pros.prop_id = $2
     GROUP BY pros.id
     ORDER BY pros.id`,
    [companyId, propertyId],
  );
  return result.rows.map(toPropertyProspect);
}

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------

/**
 * Tag ids and distress count per property, computed from the relational
 * source. Properties without tags are returned with an empty list.
 */
export async function fetchPropertyTagSummaries(propertyIds: number[]): Promise<PropertyTagSummary[]> {
  if (propertyIds.length === 0) return [];

  const result = await query<TagSummaryRow>(
    `SELECT prop.id AS property_id,
            COALESCE(ARRAY_AGG(pta.tag_id ORDER BY pta.tag_id) FILTER (WHERE pta.tag_id IS NOT NULL), '{}') AS tag_ids,
            (COUNT(pta.tag_id) FILTER (WHERE pt.distress_indicator = true))::int AS distress_count
     FROM properties_property prop
     LEFT JOIN properties_propertytagassignment pta ON pta.prop_id = prop.id
     LEFT JOIN properties_propertytag pt ON pt.id = pta.tag_id
     WHERE prop.id = ANY($1::int[])
     GROUP BY prop.id
     ORDER BY prop.id`,
    [propertyIds],
  );
  return result.rows.map((row) => ({
    propertyId: row.property_id,
    tagIds: row.tag_ids,
    distressCount: row.distress_count,
  }));
}

/** Assigns every tag to every property of the company; existing pairs are kept. */
export async function addPropertyTags(companyId: number, propertyIds: number[], tagIds: number[]): Promise<void> {
  if (propertyIds.length === 0 || tagIds.length === 0) return;

  await query(
    `INSERT INTO properties_propertytagassignment (prop_id, tag_id, assigned_at)
     SELECT prop.id, tag_id, NOW()
     FROM properties_property prop
     CROSS JOIN UNNEST($3::int[]) AS tag_id
     WHERE prop.company_id = $1 AND prop.id = ANY($2::int[])
     ON CONFLICT (prop_id, tag_id) DO NOTHING`,
    [companyId, propertyIds, tagIds],
  );
}

export async function removePropertyTags(companyId: number, propertyIds: number[], tagIds: number[]): Promise<void> {
  if (propertyIds.length === 0 || tagIds.length === 0) return;

  await query(
    `DELETE FROM properties_propertytagassignment pta
     USING properties_property prop
     WHERE pta.prop_id = prop.id
       AND prop.company_id = $1
       AND pta.prop_id = ANY($2::int[])
       AND pta.tag_id = ANY($3::int[])`,
    [companyId, propertyIds, tagIds],
  );
}

// ---------------------------------------------------------------------------
// Prospects
// ---------------------------------------------------------------------------

export async function fetchPropertyIdsForProspects(companyId: number, prospectIds: number[]): Promise<number[]> {
  if (prospectIds.length === 0) return [];

  const result = await query<{ prop_id: number }>(
    `SELECT DISTINCT prop_id
     FROM sherpa_prospect
     WHERE company_id = $1 AND id = ANY($2::int[]) AND prop_id IS NOT NULL
     ORDER BY prop_id`,
    [companyId, prospectIds],
  );
  return result.rows.map((row) => row.prop_id);
}

/**
 * Keeps the lowest prospect id per property. Prospects without a property
 * are kept as they are.
 */
export async function dedupeProspectsByProperty(companyId: number, prospectIds: number[]): Promise<number[]> {
  if (prospectIds.length === 0) return [];

  const result = await query<{ id: number }>(
    `SELECT id FROM (
       SELECT DISTINCT ON (COALESCE(prop_id, -id)) id
       FROM sherpa_prospect
       WHERE company_id = $1 AND id = ANY($2::int[])
       ORDER BY COALESCE(prop_id, -id), id
     ) deduped
     ORDER BY id`,
    [companyId, prospectIds],
  );
  return result.rows.map((row) => row.id);
}

/**
 * Applies flag toggles to the company's prospects and logs one activity per
 * prospect for each flag that feeds `prospect_status`.
 */
export async function updateProspectFlags(
  companyId: number,
  prospectIds: number[],
  toggles: ProspectToggles,
): Promise<number[]> {
  const entries = PROSPECT_FLAGS.flatMap((flag) => {
    const value = toggles[flag];
    return value === undefined ? [] : [{ flag, value }];
  });
  if (prospectIds.length === 0 || entries.length === 0) return [];

  return withTransaction(async (client: Client) => {
    const params: unknown[] = [companyId, prospectIds];
    const setClauses = entries.map(({ flag, value }) => {
      params.push(value);
      return `${flag} = $${params.length}`;
    });

    const updated = await client.query<{ id: number }>(
      `UPDATE sherpa_prospect SET ${setClauses.join(', ')}, last_modified = NOW()
       WHERE company_id = $1 AND id = ANY($2::int[])
       RETURNING id`,
      params,
    );
    const ids = updated.rows.map((row) => row.id);

    for (const { flag, value } of entries) {
      const titles = FLAG_ACTIVITY_TITLES[flag];
      if (!titles || ids.length === 0) continue;
      await client.query(
        `INSERT INTO sherpa_activity (prospect_id, title, date_utc)
         SELECT prospect_id, $2, NOW() FROM UNNEST($1::int[]) AS prospect_id`,
        [ids, value ? titles.on : titles.off],
      );
    }

    return ids;
  });
}

// ---------------------------------------------------------------------------
// Archive
// ---------------------------------------------------------------------------

/** Sets `is_archived` on the company's properties or prospects; returns the ids changed. */
export async function setArchived(
  type: DocumentType,
  companyId: number,
  ids: number[],
  isArchived: boolean,
): Promise<number[]> {
  if (ids.length === 0) return [];

  const result = await query<{ id: number }>(
    `UPDATE ${ENTITY_TABLES[type]} SET is_archived = $3
     WHERE company_id = $1 AND id = ANY($2::int[])
     RETURNING id`,
    [companyId, ids, isArchived],
  );
  return result.rows.map((row) => row.id);
}

// ---------------------------------------------------------------------------
// Bulk jobs
// ---------------------------------------------------------------------------

export async function createBulkJob(data: {
  companyId: number;
  userId: number;
  action: BulkJobAction;
  documentType: DocumentType;
  attributes: Record<string, unknown>;
}): Promise<BulkJob> {
  const result = await query<BulkJobRow>(
    `INSERT INTO stacker_bulk_jobs (company_id, user_id, action, document_type, attributes)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${BULK_JOB_COLUMNS}`,
    [data.companyId, data.userId, data.action, data.documentType, JSON.stringify(data.attributes)],
  );
  return toBulkJob(result.rows[0]);
}

// ---------------------------------------------------------------------------
// Index tasks
// ---------------------------------------------------------------------------

export async function insertIndexTask(task: string, payload: unknown): Promise<IndexTaskRecord> {
  const result = await query<IndexTaskRow>(
    `INSERT INTO stacker_index_tasks (task, payload)
     VALUES ($1, $2)
     RETURNING ${INDEX_TASK_COLUMNS}`,
    [task, JSON.stringify(payload)],
  );
  return toIndexTask(result.rows[0]);
}

export async function notifyIndexTask(channel: string, taskId: string): Promise<void> {
  await query('SELECT pg_notify($1, $2)', [channel, taskId]);
}

/**
 * Marks one pending task as running and returns it. With `taskId` only that
 * task is claimed; otherwise the oldest pending one. Rows locked by another
 * worker are skipped.
 */
export async function claimIndexTask(taskId?: string): Promise<IndexTaskRecord | null> {
  const params: unknown[] = [];
  let idFilter = '';
  if (taskId !== undefined) {
    params.push(taskId);
    idFilter = 'AND id = $1';
  }

  const result = await query<IndexTaskRow>(
    `UPDATE stacker_index_tasks SET status = 'running', started_at = NOW()
     WHERE id = (
       SELECT id FROM stacker_index_tasks
       WHERE status = 'pending' ${idFilter}
       ORDER BY created_at
       FOR UPDATE SKIP LOCKED
       LIMIT 1
     )
     RETURNING ${INDEX_TASK_COLUMNS}`,
    params,
  );
  return result.rows[0] ? toIndexTask(result.rows[0]) : null;
}

export async function completeIndexTask(taskId: string): Promise<void> {
  await query(
    `UPDATE stacker_index_tasks SET status = 'completed', completed_at = NOW(), error_reason = NULL WHERE id = $1`,
    [taskId],
  );
}

export async function failIndexTask(taskId: string, reason: string): Promise<void> {
  await query(
    `UPDATE stacker_index_tasks SET status = 'failed', completed_at = NOW(), error_reason = $2 WHERE id = $1`,
    [taskId, reason],
  );
}
