import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockFetchPropertyDetail = vi.fn();
const mockFetchPropertyProspects = vi.fn();

vi.mock('./stacker.repository', () => ({
  fetchPropertyDetail: (...args: unknown[]) => mockFetchPropertyDetail(...args),
  fetchPropertyProspects: (...args: unknown[]) => mockFetchPropertyProspects(...args),
}));

import {
  addressDisplay,
  createPropertyDataReader,
  streetViewUrl,
  zillowLink,
} from './stacker.property-data';
import { NotFoundError } from '../../shared/errors';
import type { PropertyDetail } from './stacker.repository';

const address = { address: '12 Oak St', city: 'Austin', state: 'TX', zipCode: '78701', zipPlus4: null };

const streetView = { apiKey: 'test-key', secret: 'dGVzdC1zZWNyZXQ=' };

function detail(overrides: Partial<PropertyDetail> = {}): PropertyDetail {
  return {
    propertyId: 41,
    address,
    mailingAddress: null,
    tagsTotal: 0,
    distressTotal: 0,
    assessor: null,
    skipTrace: null,
    ...overrides,
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  mockFetchPropertyProspects.mockResolvedValue([]);
});

describe('address helpers', () => {
  it('renders the display address with an optional zip', () => {
    expect(addressDisplay(address)).toBe('12 Oak St, Austin, TX 78701');
    expect(addressDisplay({ ...address, zipPlus4: '1234' })).toBe('12 Oak St, Austin, TX 78701-1234');
    expect(addressDisplay({ ...address, zipCode: null })).toBe('12 Oak St, Austin, TX');
  });

  it('builds the zillow search link', () => {
    expect(zillowLink({ ...address, city: 'Round Rock' })).toBe(
      'https://www.zillow.com/homes/12+Oak+St-Round+Rock-TX-78701_rb/',
    );
    expect(zillowLink({ ...address, zipCode: null })).toBe('https://www.zillow.com/homes/12+Oak+St-Austin-TX-_rb/');
  });

  it('signs the street view url', () => {
    expect(streetViewUrl('12 Oak St, Austin, TX 78701', streetView)).toBe(
      'https://maps.googleapis.com/maps/api/streetview?location=12%20Oak%20St,%20Austin,%20TX%2078701' +
        '&size=500x500&key=test-key&signature=E8MKLrVnrARySo98lyo59-KV75I=',
    );
  });

  it('has no street view url without signing credentials', () => {
    expect(streetViewUrl('12 Oak St, Austin, TX 78701', {})).toBeNull();
    expect(streetViewUrl('12 Oak St, Austin, TX 78701', { apiKey: 'test-key' })).toBeNull();
  });
});

describe('getPropertyData', () => {
  it('throws NotFoundError for an unknown property', async () => {
    mockFetchPropertyDetail.mockResolvedValue(null);

    await expect(createPropertyDataReader().getPropertyData(3, 41)).rejects.toThrow(NotFoundError);
    expect(mockFetchPropertyProspects).not.toHaveBeenCalled();
  });

  it('returns addresses, tag totals and prospects', async () => {
    mockFetchPropertyDetail.mockResolvedValue(
      detail({
        mailingAddress: { address: '9 Elm Rd', city: 'Dallas', state: 'TX', zipCode: null, zipPlus4: null },
        tagsTotal: 4,
        distressTotal: 2,
      }),
    );
    mockFetchPropertyProspects.mockResolvedValue([
      {
        id: 20,
        firstName: 'Joe',
        lastName: 'Diaz',
        phoneRaw: '5125550100',
        doNotCall: false,
        isPriority: true,
        isBlocked: false,
        isQualifiedLead: null,
        wrongNumber: false,
        optedOut: false,
        ownerVerifiedStatus: 'verified',
        totalCampaigns: 2,
        leadStage: 5,
        campaignIds: [1, 4],
        lastContact: null,
      },
    ]);

    const data = await createPropertyDataReader().getPropertyData(3, 41);

    expect(mockFetchPropertyDetail).toHaveBeenCalledWith(3, 41);
    expect(data.address).toEqual({
      property_address: '12 Oak St, Austin, TX 78701',
      mailing_address: '9 Elm Rd, Dallas, TX',
    });
    expect(data.property_data).toEqual({
      zillow_link: 'https://www.zillow.com/homes/12+Oak+St-Austin-TX-78701_rb/',
      street_view_url: null,
      tags: { total: 4, distress_indicators: 2 },
      relatives: [],
    });
    expect(data.prospects).toEqual([
      {
        id: 20,
        first_name: 'Joe',
        last_name: 'Diaz',
        phone_raw: '5125550100',
        do_not_call: false,
        is_priority: true,
        is_blocked: false,
        is_qualified_lead: null,
        wrong_number: false,
        opted_out: false,
        owner_verified_status: 'verified',
        total_campaigns: 2,
        lead_stage: 5,
        campaign_id: [1, 4],
        last_contact: null,
      },
    ]);
  });

  it('adds skip trace relatives, vacancy and assessor facts when present', async () => {
    mockFetchPropertyDetail.mockResolvedValue(
      detail({
        skipTrace: {
          relatives: [
            { firstName: 'Ann', lastName: 'Lee', phones: ['5125550101', '5125550102'] },
            { firstName: 'Bo', lastName: null, phones: [] },
          ],
          vacant: 'Y',
        },
        assessor: {
          legalDescription: 'LOT 4 BLK 2',
          yearBuilt: 1984,
          saleDate: '2019-05-02',
          salePrice: '250000.0000',
          bathCount: 2,
          bathPartialCount: 1,
          bedroomsCount: 3,
          buildingSqft: 1800,
          lotSqft: '6500.0000',
          propertyUse: '385',
        },
      }),
    );

    const { property_data: info } = await createPropertyDataReader(streetView).getPropertyData(3, 41);

    expect(info.relatives).toEqual([
      { name: 'Ann Lee', numbers: ['5125550101', '5125550102'] },
      { name: 'Bo', numbers: [] },
    ]);
    expect(info.is_vacant).toBe(true);
    expect(info.year_built).toBe(1984);
    expect(info.sale_date).toBe('2019-05-02');
    expect(info.type).toBe('385');
    expect(info.loan).toEqual({});
    expect(info.street_view_url).toContain('&signature=E8MKLrVnrARySo98lyo59-KV75I=');
  });
});
