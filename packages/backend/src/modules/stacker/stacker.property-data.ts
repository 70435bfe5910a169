import { createHmac } from 'crypto';

import { NotFoundError } from '../../shared/errors';
import * as stackerRepo from './stacker.repository';
import type { AddressParts, PropertyDetail, PropertyProspect } from './stacker.repository';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StreetViewConfig {
  apiKey?: string;
  /** URL-safe base64 signing secret. */
  secret?: string;
}

export interface PropertyRelative {
  name: string;
  numbers: string[];
}

export interface PropertyInfo {
  zillow_link: string;
  street_view_url: string | null;
  tags: { total: number; distress_indicators: number };
  relatives: PropertyRelative[];
  is_vacant?: boolean;
  legal_description?: string | null;
  year_built?: number | null;
  sale_date?: string | null;
  sale_price?: string | null;
  bath_count?: number | null;
  bath_partial_count?: number | null;
  bedrooms_count?: number | null;
  building_sqft?: number | null;
  lot_sqft?: string | null;
  type?: string | null;
  loan?: Record<string, never>;
}

export interface ProspectInfo {
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
  lead_stage: number | null;
  campaign_id: number[];
  last_contact: Date | null;
}

export interface PropertyData {
  address: { property_address: string; mailing_address: string };
  property_data: PropertyInfo;
  prospects: ProspectInfo[];
}

export interface PropertyDataReader {
  getPropertyData(companyId: number, propertyId: number): Promise<PropertyData>;
}

// ---------------------------------------------------------------------------
// Address helpers
// ---------------------------------------------------------------------------

const STREET_VIEW_HOST = 'https://maps.googleapis.com';

export function addressDisplay(parts: AddressParts): string {
  const display = `${parts.address}, ${parts.city}, ${parts.state}`;
  if (!parts.zipCode) return display;
  return parts.zipPlus4 ? `${display} ${parts.zipCode}-${parts.zipPlus4}` : `${display} ${parts.zipCode}`;
}

function plus(value: string): string {
  return value.replace(/ /g, '+');
}

export function zillowLink(parts: AddressParts): string {
  const zip = parts.zipCode ? plus(parts.zipCode) : '';
  return `https://www.zillow.com/homes/${plus(parts.address)}-${plus(parts.city)}-${plus(parts.state)}-${zip}_rb/`;
}

/** HMAC-SHA1 signature over the path and query, URL-safe base64 with padding. */
export function signStreetViewUrl(unsignedUrl: string, secret: string): string {
  const signature = createHmac('sha1', Buffer.from(secret, 'base64'))
    .update(unsignedUrl)
    .digest('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
  return `${STREET_VIEW_HOST}${unsignedUrl}&signature=${signature}`;
}

/** Signed street view image URL, or null when signing isn't configured. */
export function streetViewUrl(display: string, config: StreetViewConfig): string | null {
  if (!config.apiKey || !config.secret || !display) return null;
  const unsigned = `/maps/api/streetview?location=${display}&size=500x500&key=${config.apiKey}`.replace(/ /g, '%20');
  return signStreetViewUrl(unsigned, config.secret);
}

// ---------------------------------------------------------------------------
// Response shaping
// ---------------------------------------------------------------------------

function toProspectInfo(prospect: PropertyProspect): ProspectInfo {
  return {
    id: prospect.id,
    first_name: prospect.firstName,
    last_name: prospect.lastName,
    phone_raw: prospect.phoneRaw,
    do_not_call: prospect.doNotCall,
    is_priority: prospect.isPriority,
    is_blocked: prospect.isBlocked,
    is_qualified_lead: prospect.isQualifiedLead,
    wrong_number: prospect.wrongNumber,
    opted_out: prospect.optedOut,
    owner_verified_status: prospect.ownerVerifiedStatus,
    total_campaigns: prospect.totalCampaigns,
    lead_stage: prospect.leadStage,
    campaign_id: prospect.campaignIds,
    last_contact: prospect.lastContact,
  };
}

export function toPropertyInfo(detail: PropertyDetail, config: StreetViewConfig): PropertyInfo {
  const info: PropertyInfo = {
    zillow_link: zillowLink(detail.address),
    street_view_url: streetViewUrl(addressDisplay(detail.address), config),
    tags: { total: detail.tagsTotal, distress_indicators: detail.distressTotal },
    relatives: [],
  };

  if (detail.skipTrace) {
    info.relatives = detail.skipTrace.relatives.map((relative) => ({
      name: `${relative.firstName} ${relative.lastName ?? ''}`.trim(),
      numbers: relative.phones,
    }));
    info.is_vacant = detail.skipTrace.vacant === 'Y';
  }

  const assessor = detail.assessor;
  if (assessor) {
    Object.assign(info, {
      legal_description: assessor.legalDescription,
      year_built: assessor.yearBuilt,
      sale_date: assessor.saleDate,
      sale_price: assessor.salePrice,
      bath_count: assessor.bathCount,
      bath_partial_count: assessor.bathPartialCount,
      bedrooms_count: assessor.bedroomsCount,
      building_sqft: assessor.buildingSqft,
      lot_sqft: assessor.lotSqft,
      type: assessor.propertyUse,
      loan: {},
    });
  }
  return info;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Collects everything the property detail panel shows in one read: the
 * address, assessor facts, skip trace relatives and the property's prospects.
 */
export function createPropertyDataReader(config: StreetViewConfig = {}): PropertyDataReader {
  return {
    async getPropertyData(companyId, propertyId) {
      const detail = await stackerRepo.fetchPropertyDetail(companyId, propertyId);
      if (!detail) {
        throw new NotFoundError('Property not found');
      }
      const prospects = await stackerRepo.fetchPropertyProspects(companyId, propertyId);

      return {
        address: {
          property_address: addressDisplay(detail.address),
          mailing_address: detail.mailingAddress ? addressDisplay(detail.mailingAddress) : '',
        },
        property_data: toPropertyInfo(detail, config),
        prospects: prospects.map(toProspectInfo),
      };
    },
  };
}
