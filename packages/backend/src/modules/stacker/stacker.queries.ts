import { fields, type StackerField } from './mappings/stacker-index.v1';

/**
 * Projector SQL for the two stacker indexes.
 *
 * Each axis declares one SQL expression per index field. The SELECT list is
 * rendered by walking `fields()`, so column order always equals the mapping
 * order and rows can be zipped positionally.
 */

type ColumnSet = Record<StackerField, string>;

const PROSPECT_STATUS_TITLES = [
  'Added to DNC',
  'Added Wrong Number',
  'Added as Priority',
  'Qualified Lead Added',
];

const prospectStatusTitles = PROSPECT_STATUS_TITLES.map((t) => `'${t}'`).join(', ');

// Columns computed the same way on both axes.
const SHARED_COLUMNS = {
  address: 'addr.address',
  city: 'addr.city',
  state: 'addr.state',
  zip_code: 'addr.zip_code',
  last_sold_date: 'at.deed_last_sale_date::date',
  tags: 'ARRAY_REMOVE(ARRAY_AGG(DISTINCT pta.tag_id ORDER BY pta.tag_id), NULL)',
  tags_length: 'COUNT(DISTINCT pt.id)',
  distress_indicators: 'COUNT(DISTINCT pt.id) FILTER (WHERE pt.distress_indicator = true)',
  last_contact: 'MAX(GREATEST(cp.last_outbound_call::date, pros.last_sms_sent_utc::date))',
  last_contact_inbound: 'MAX(GREATEST(cp.last_inbound_call::date, pros.last_sms_received_utc::date))',
  // Non direct mail memberships count even after removal; direct mail only while active.
  campaigns:
    'COUNT(DISTINCT c.id) FILTER (WHERE c.is_direct_mail = false OR cp.removed_datetime::date IS NOT NULL)',
  dm_campaigns:
    'COUNT(DISTINCT c.id) FILTER (WHERE c.is_direct_mail = true AND cp.removed_datetime::date IS NULL)',
  recently_vacant:
    "COALESCE(BOOL_OR(pt.name = 'Vacant' AND pta.assigned_at >= now()::date - 30), false)",
  bankruptcy_date: "NULLIF(sk.bankruptcy, '')::date",
  judgment_date: 'sk.returned_judgment_date::date',
  foreclosure_date: 'sk.returned_foreclosure_date::date',
  lien_date: 'sk.returned_lien_date::date',
  skiptrace_date: 'sk.created::date',
  campaign_id: 'ARRAY_REMOVE(ARRAY_AGG(DISTINCT cp.campaign_id ORDER BY cp.campaign_id), NULL)',
  prospect_status:
    "JSONB_AGG(DISTINCT JSONB_BUILD_OBJECT('title', act.title, 'date_utc', act.date_utc)) " +
    `FILTER (WHERE act.title IN (${prospectStatusTitles}))`,
  property_status:
    "JSONB_AGG(DISTINCT JSONB_BUILD_OBJECT('title', pt.name, 'date_utc', pta.assigned_at)) " +
    'FILTER (WHERE pt.name IS NOT NULL)',
  first_import_date: 'MAX(GREATEST(pros.created_date::date, prop.created::date))',
  last_import_date:
    'MAX(GREATEST(pros.created_date::date, prop.created::date, uskt.created::date, upros.created::date))',
} satisfies Partial<ColumnSet>;

/** One document per property; prospect facts aggregate into de-duplicated arrays. */
export const PROPERTY_COLUMNS: ColumnSet = {
  ...SHARED_COLUMNS,
  company_id: 'prop.company_id',
  prospect_id: 'ARRAY_REMOVE(ARRAY_AGG(DISTINCT pros.id), NULL)',
  property_id: 'prop.id',
  address_id: 'prop.address_id',
  name: "ARRAY_REMOVE(ARRAY_AGG(DISTINCT pros.first_name || ' ' || pros.last_name), NULL)",
  phone_raw: "ARRAY_REMOVE(ARRAY_AGG(DISTINCT NULLIF(pros.phone_raw, '')), NULL)",
  lead_stage_id: 'ARRAY_REMOVE(ARRAY_AGG(DISTINCT pros.lead_stage_id), NULL)',
  is_blocked: 'COALESCE(BOOL_OR(pros.is_blocked), false)',
  do_not_call: 'COALESCE(BOOL_OR(pros.do_not_call), false)',
  is_priority: 'COALESCE(BOOL_OR(pros.is_priority), false)',
  is_qualified_lead: 'COALESCE(BOOL_OR(pros.is_qualified_lead), false)',
  wrong_number: 'COALESCE(BOOL_OR(pros.wrong_number), false)',
  opted_out: 'COALESCE(BOOL_OR(pros.opted_out), false)',
  owner_status: 'ARRAY_REMOVE(ARRAY_AGG(DISTINCT pros.owner_verified_status), NULL)',
  is_archived: 'COALESCE(prop.is_archived, false)',
  created_date: 'prop.created::date',
  last_modified: 'COALESCE(prop.last_modified::date, prop.created::date)',
  has_reminder: 'COALESCE(BOOL_OR(pros.has_reminder), false)',
};

/** One document per prospect; property facts are joined in as scalars. */
export const PROSPECT_COLUMNS: ColumnSet = {
  ...SHARED_COLUMNS,
  company_id: 'pros.company_id',
  prospect_id: 'pros.id',
  property_id: 'prop.id',
  address_id: 'prop.address_id',
  name: "pros.first_name || ' ' || pros.last_name",
  phone_raw: "NULLIF(pros.phone_raw, '')",
  lead_stage_id: 'pros.lead_stage_id',
  is_blocked: 'COALESCE(pros.is_blocked, false)',
  do_not_call: 'COALESCE(pros.do_not_call, false)',
  is_priority: 'COALESCE(pros.is_priority, false)',
  is_qualified_lead: 'COALESCE(pros.is_qualified_lead, false)',
  wrong_number: 'COALESCE(pros.wrong_number, false)',
  opted_out: 'COALESCE(pros.opted_out, false)',
  owner_status: 'pros.owner_verified_status',
  is_archived: 'COALESCE(pros.is_archived, false)',
  created_date: 'pros.created_date::date',
  last_modified: 'COALESCE(pros.last_modified::date, pros.created_date::date)',
  has_reminder: 'COALESCE(pros.has_reminder, false)',
};

const PROPERTY_FROM = `
FROM properties_property prop
INNER JOIN properties_address addr ON addr.id = prop.address_id
LEFT JOIN properties_attomassessor at ON at.attom_id = addr.attom_id
LEFT JOIN properties_propertytagassignment pta ON pta.prop_id = prop.id
LEFT JOIN properties_propertytag pt ON pta.tag_id = pt.id
LEFT JOIN sherpa_prospect pros ON pros.prop_id = prop.id
LEFT JOIN sherpa_activity act ON act.prospect_id = pros.id
LEFT JOIN sherpa_campaignprospect cp ON cp.prospect_id = pros.id
LEFT JOIN sherpa_campaign c ON c.id = cp.campaign_id
LEFT JOIN sherpa_skiptraceproperty sk ON sk.prop_id = prop.id
LEFT JOIN sherpa_uploadskiptrace uskt ON uskt.id = prop.upload_skip_trace_id
LEFT JOIN sherpa_uploadprospects upros ON upros.id = prop.upload_prospects_id`;

const PROSPECT_FROM = `
FROM sherpa_prospect pros
LEFT JOIN sherpa_activity act ON act.prospect_id = pros.id
LEFT JOIN sherpa_campaignprospect cp ON cp.prospect_id = pros.id
LEFT JOIN sherpa_campaign c ON c.id = cp.campaign_id
LEFT JOIN properties_property prop ON prop.id = pros.prop_id
LEFT JOIN properties_address addr ON addr.id = prop.address_id
LEFT JOIN properties_attomassessor at ON at.attom_id = addr.attom_id
LEFT JOIN properties_propertytagassignment pta ON pta.prop_id = prop.id
LEFT JOIN properties_propertytag pt ON pta.tag_id = pt.id
LEFT JOIN sherpa_skiptraceproperty sk ON sk.prop_id = prop.id
LEFT JOIN sherpa_uploadskiptrace uskt ON uskt.id = prop.upload_skip_trace_id
LEFT JOIN sherpa_uploadprospects upros ON upros.id = prop.upload_prospects_id`;

// prop.id / pros.id are primary keys, so their own columns need no grouping.
const SKIPTRACE_GROUPING = [
  'at.deed_last_sale_date::date',
  "NULLIF(sk.bankruptcy, '')::date",
  'sk.returned_judgment_date::date',
  'sk.returned_foreclosure_date::date',
  'sk.returned_lien_date::date',
  'sk.created::date',
];

const PROPERTY_GROUP_BY = [
  'prop.id',
  'addr.address',
  'addr.city',
  'addr.state',
  'addr.zip_code',
  ...SKIPTRACE_GROUPING,
];

const PROSPECT_GROUP_BY = [
  'pros.id',
  'prop.id',
  'addr.address',
  'addr.city',
  'addr.state',
  'addr.zip_code',
  ...SKIPTRACE_GROUPING,
];

export function renderSelectList(columns: ColumnSet): string {
  return fields()
    .map((field) => `  ${columns[field]} AS ${field}`)
    .join(',\n');
}

interface Projection {
  columns: ColumnSet;
  from: string;
  groupBy: string[];
  key: string;
  companyColumn: string;
}

const PROPERTY_PROJECTION: Projection = {
  columns: PROPERTY_COLUMNS,
  from: PROPERTY_FROM,
  groupBy: PROPERTY_GROUP_BY,
  key: 'prop.id',
  companyColumn: 'prop.company_id',
};

const PROSPECT_PROJECTION: Projection = {
  columns: PROSPECT_COLUMNS,
  from: PROSPECT_FROM,
  groupBy: PROSPECT_GROUP_BY,
  key: 'pros.id',
  companyColumn: 'pros.company_id',
};

function render(projection: Projection, where: string, tail = ''): string {
  return [
    `SELECT\n${renderSelectList(projection.columns)}`,
    projection.from.trim(),
    `WHERE ${where}`,
    `GROUP BY ${projection.groupBy.join(', ')}`,
    tail,
  ]
    .filter(Boolean)
    .join('\n');
}

/**
 * Company population: $1 company ids, $2 last key seen, $3 page size.
 * Keyset paging on the grouping key bounds each fetch to one chunk.
 */
function companyQuery(projection: Projection): string {
  return render(
    projection,
    `${projection.companyColumn} = ANY($1::int[]) AND ${projection.key} > $2`,
    `ORDER BY ${projection.key}\nLIMIT $3`,
  );
}

/** Targeted refresh: $1 entity ids. */
function idsQuery(projection: Projection): string {
  return render(projection, `${projection.key} = ANY($1::int[])`);
}

export const PROPERTY_BY_COMPANY_SQL = companyQuery(PROPERTY_PROJECTION);
export const PROSPECT_BY_COMPANY_SQL = companyQuery(PROSPECT_PROJECTION);
export const PROPERTY_BY_IDS_SQL = idsQuery(PROPERTY_PROJECTION);
export const PROSPECT_BY_IDS_SQL = idsQuery(PROSPECT_PROJECTION);

/** Position of the grouping key within a projected row. */
export const PROPERTY_KEY_POSITION = fields().indexOf('property_id');
export const PROSPECT_KEY_POSITION = fields().indexOf('prospect_id');
