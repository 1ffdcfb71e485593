import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { MockAgent } from 'undici';
import { CollaboratorError } from '@valuation/domain';
import { HttpRcLookupAdapter, parseRcRecord, toRawAttributes } from '../http/rc-lookup.adapter.js';

const ORIGIN = 'https://rc.example.test';
const PATH = '/api/v1/rc/rc-v2';

const ACTIVA = {
  rc_number: 'DL08AB1234',
  maker_description: 'HONDA MOTORCYCLE & SCOOTER INDIA PVT LTD',
  maker_model: 'ACTIVA 5G',
  manufacturing_date_formatted: '2017-12',
  registration_date: '2018-01-20',
  fuel_type: 'PETROL',
  registered_at: 'DELHI, Delhi',
  color: 'GREY',
  owner_number: '2',
  vehicle_category_description: 'M-Cycle/Scooter(2WN)',
  cubic_capacity: '109.19',
  norms_type: 'BHARAT STAGE IV',
  insurance_upto: '2025-01-19',
};

describe('HttpRcLookupAdapter', () => {
  let agent: MockAgent;
  let adapter: HttpRcLookupAdapter;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    adapter = new HttpRcLookupAdapter({
      url: `${ORIGIN}${PATH}`,
      token: 'test-token',
      timeoutMs: 1_000,
      dispatcher: agent,
    });
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await agent.close();
  });

  it('posts the cleaned registration number and maps the record', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: PATH,
        method: 'POST',
        body: JSON.stringify({ id_number: 'DL08AB1234', enrich: true }),
      })
      .reply(200, { success: true, data: ACTIVA });

    const result = await adapter.fetchByRegistration('dl08ab 1234');

    expect(result.rcNumber).toBe('DL08AB1234');
    expect(result.attributes).toEqual({
      rcNumber: 'DL08AB1234',
      make: 'HONDA MOTORCYCLE & SCOOTER INDIA PVT LTD',
      model: 'ACTIVA 5G',
      manufacturingDate: '2017-12',
      registrationDate: '2018-01-20',
      fuelType: 'PETROL',
      registeredAt: 'DELHI, Delhi',
      color: 'GREY',
      vehicleCategory: 'M-Cycle/Scooter(2WN)',
      normsType: 'BHARAT STAGE IV',
      ownerCount: '2',
      cubicCapacity: '109.19',
    });
    expect(result.raw['insurance_upto']).toBe('2025-01-19');
  });

  it('maps a non-200 status to a collaborator error', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(500, 'upstream exploded');

    const error = await adapter.fetchByRegistration('DL08AB1234').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({
      status: 502,
      collaborator: 'rc-lookup',
      message: 'Vehicle registration lookup failed (HTTP 500)',
    });
  });

  it('treats success: false as no data', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .reply(200, { success: false, message: 'Invalid registration' });

    await expect(adapter.fetchByRegistration('XX00')).rejects.toThrow(
      'Vehicle registration lookup returned no data',
    );
  });

  it('does not leak transport errors to the caller', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .replyWithError(new Error('connect ECONNREFUSED 10.0.0.1:443'));

    const error = await adapter.fetchByRegistration('DL08AB1234').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({ message: 'Vehicle registration lookup failed' });
  });
});

describe('toRawAttributes', () => {
  it('falls back to the requested number and skips blank fields', () => {
    expect(toRawAttributes('KA01AB0001', { maker_model: 'CRETA SX', color: '  ', owner_number: null })).toEqual({
      rcNumber: 'KA01AB0001',
      model: 'CRETA SX',
    });
  });

  it('prefers the present address over the permanent one', () => {
    const attrs = toRawAttributes('KA01AB0001', {
      present_address: 'BANGALORE, KA',
      permanent_address: 'MYSORE, KA',
    });
    expect(attrs.address).toBe('BANGALORE, KA');
  });
});

describe('parseRcRecord', () => {
  it('maps a caller-supplied record', () => {
    expect(parseRcRecord({ maker_description: 'TATA MOTORS LTD', maker_model: 'NEXON XZ', owner_number: 1 })).toEqual({
      make: 'TATA MOTORS LTD',
      model: 'NEXON XZ',
      ownerCount: 1,
    });
  });

  it('rejects a record with wrongly typed fields', () => {
    expect(() => parseRcRecord({ maker_model: 42 })).toThrow();
  });
});
