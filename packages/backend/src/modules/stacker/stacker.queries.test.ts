import { describe, it, expect } from 'vitest';
import {
  PROPERTY_BY_COMPANY_SQL,
  PROSPECT_BY_COMPANY_SQL,
  PROPERTY_BY_IDS_SQL,
  PROSPECT_BY_IDS_SQL,
  PROPERTY_COLUMNS,
  PROSPECT_COLUMNS,
  PROPERTY_KEY_POSITION,
  PROSPECT_KEY_POSITION,
  renderSelectList,
} from './stacker.queries';
import { fields } from './mappings/stacker-index.v1';

function selectAliases(sql: string): string[] {
  const selectList = sql.slice(0, sql.indexOf('\nFROM '));
  return [...selectList.matchAll(/ AS ([a-z_]+)(?=,|$)/gm)].map((m) => m[1]);
}

const ALL_QUERIES = {
  PROPERTY_BY_COMPANY_SQL,
  PROSPECT_BY_COMPANY_SQL,
  PROPERTY_BY_IDS_SQL,
  PROSPECT_BY_IDS_SQL,
};

describe('stacker.queries', () => {
  it.each(Object.entries(ALL_QUERIES))('%s selects exactly fields() in order', (_name, sql) => {
    expect(selectAliases(sql)).toEqual([...fields()]);
  });

  it('renders one column per field', () => {
    expect(renderSelectList(PROPERTY_COLUMNS).split(',\n')).toHaveLength(fields().length);
  });

  it('filters company queries by company ids with keyset paging', () => {
    expect(PROPERTY_BY_COMPANY_SQL).toContain('WHERE prop.company_id = ANY($1::int[]) AND prop.id > $2');
    expect(PROPERTY_BY_COMPANY_SQL).toMatch(/ORDER BY prop\.id\nLIMIT \$3$/);
    expect(PROSPECT_BY_COMPANY_SQL).toContain('WHERE pros.company_id = ANY($1::int[]) AND pros.id > $2');
    expect(PROSPECT_BY_COMPANY_SQL).toMatch(/ORDER BY pros\.id\nLIMIT \$3$/);
  });

  it('filters id queries by entity ids', () => {
    expect(PROPERTY_BY_IDS_SQL).toContain('WHERE prop.id = ANY($1::int[])');
    expect(PROSPECT_BY_IDS_SQL).toContain('WHERE pros.id = ANY($1::int[])');
    expect(PROPERTY_BY_IDS_SQL).not.toContain('LIMIT');
  });

  it('groups property rows by property and prospect rows by prospect', () => {
    expect(PROPERTY_BY_IDS_SQL).toContain('GROUP BY prop.id,');
    expect(PROSPECT_BY_IDS_SQL).toContain('GROUP BY pros.id, prop.id,');
  });

  it('starts each axis from its own table', () => {
    expect(PROPERTY_BY_IDS_SQL).toContain('FROM properties_property prop');
    expect(PROSPECT_BY_IDS_SQL).toContain('FROM sherpa_prospect pros');
  });

  it('aggregates prospect facts into arrays on the property axis only', () => {
    expect(PROPERTY_COLUMNS.prospect_id).toBe('ARRAY_REMOVE(ARRAY_AGG(DISTINCT pros.id), NULL)');
    expect(PROSPECT_COLUMNS.prospect_id).toBe('pros.id');
    expect(PROPERTY_COLUMNS.is_blocked).toBe('COALESCE(BOOL_OR(pros.is_blocked), false)');
    expect(PROSPECT_COLUMNS.is_blocked).toBe('COALESCE(pros.is_blocked, false)');
  });

  it('counts campaigns asymmetrically between mail types', () => {
    expect(PROPERTY_COLUMNS.campaigns).toBe(
      'COUNT(DISTINCT c.id) FILTER (WHERE c.is_direct_mail = false OR cp.removed_datetime::date IS NOT NULL)',
    );
    expect(PROPERTY_COLUMNS.dm_campaigns).toBe(
      'COUNT(DISTINCT c.id) FILTER (WHERE c.is_direct_mail = true AND cp.removed_datetime::date IS NULL)',
    );
  });

  it('keeps only allow-listed activity titles in prospect_status', () => {
    expect(PROSPECT_COLUMNS.prospect_status).toContain(
      "FILTER (WHERE act.title IN ('Added to DNC', 'Added Wrong Number', 'Added as Priority', 'Qualified Lead Added'))",
    );
    expect(PROSPECT_COLUMNS.property_status).toContain('FILTER (WHERE pt.name IS NOT NULL)');
  });

  it('derives contact dates from calls and sms', () => {
    expect(PROSPECT_COLUMNS.last_contact).toBe(
      'MAX(GREATEST(cp.last_outbound_call::date, pros.last_sms_sent_utc::date))',
    );
    expect(PROSPECT_COLUMNS.last_contact_inbound).toBe(
      'MAX(GREATEST(cp.last_inbound_call::date, pros.last_sms_received_utc::date))',
    );
  });

  it('exposes the grouping key positions', () => {
    expect(PROPERTY_KEY_POSITION).toBe(2);
    expect(PROSPECT_KEY_POSITION).toBe(1);
  });
});
