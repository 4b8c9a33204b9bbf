import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { AxiosFHIRTransport, describeOutcome, idFromLocation } from '../../../src/services/fhirTransport';
import { FHIRServerError } from '../../../src/middleware/errorHandler';
import { FakeFHIRServer } from '../../support/fakeFhirServer';

describe('describeOutcome', () => {
  it('joins the diagnostics of every issue', () => {
    expect(
      describeOutcome({
        resourceType: 'OperationOutcome',
        issue: [
          { severity: 'error', code: 'invalid', diagnostics: 'First problem' },
          { severity: 'error', code: 'invalid', details: { text: 'Second problem' } },
        ],
      })
    ).toBe('First problem; Second problem');
  });

  it('returns undefined for anything else', () => {
    expect(describeOutcome('<html>Bad Gateway</html>')).toBeUndefined();
    expect(describeOutcome({ resourceType: 'OperationOutcome', issue: [] })).toBeUndefined();
  });
});

describe('idFromLocation', () => {
  it('extracts the logical id from absolute and relative locations', () => {
    expect(idFromLocation('http://server/baseR4/Patient/123/_history/1')).toBe('123');
    expect(idFromLocation('Patient/abc')).toBe('abc');
  });

  it('returns undefined when there is no Patient segment', () => {
    expect(idFromLocation('http://server/baseR4/Observation/1')).toBeUndefined();
    expect(idFromLocation(undefined)).toBeUndefined();
  });
});

describe('AxiosFHIRTransport', () => {
  const fake = new FakeFHIRServer();
  let transport: AxiosFHIRTransport;

  beforeAll(async () => {
    const baseUrl = await fake.start();
    transport = new AxiosFHIRTransport({ baseUrl: `${baseUrl}/`, connectTimeoutMs: 2000, responseTimeoutMs: 2000 });
  });

  afterAll(async () => {
    await fake.stop();
  });

  beforeEach(() => {
    fake.reset();
  });

  it('creates a patient and reads back the server id', async () => {
    const outcome = await transport.create({
      resourceType: 'Patient',
      name: [{ family: 'Smith', given: ['Jane'] }],
    });

    expect(outcome.id).toBe('1000');
    expect(outcome.resource?.name).toEqual([{ family: 'Smith', given: ['Jane'] }]);
    expect(fake.callsTo('POST')).toEqual([{ method: 'POST', path: '/fhir/Patient', query: {} }]);
  });

  it('takes the id from the Location header when the server returns no body', async () => {
    fake.returnMinimal = true;

    const outcome = await transport.create({ resourceType: 'Patient' });

    expect(outcome).toEqual({ id: '1000', resource: undefined });
  });

  it('reads a patient by id', async () => {
    const seeded = fake.seed({ name: [{ family: 'Doe', given: ['John'] }] });

    await expect(transport.read(seeded.id ?? '')).resolves.toEqual(seeded);
  });

  it('turns a 404 into a not-found fault carrying the diagnostics', async () => {
    const error = await transport.read('404404').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FHIRServerError);
    if (error instanceof FHIRServerError) {
      expect(error.isNotFound).toBe(true);
      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Resource Patient/404404 is not known');
    }
  });

  it('treats a deleted patient as not found', async () => {
    const seeded = fake.seed({ name: [{ family: 'Doe' }] });
    const id = seeded.id ?? '';
    await transport.delete(id);

    await expect(transport.read(id)).rejects.toMatchObject({ remoteStatus: 410, statusCode: 410 });
  });

  it('passes through other remote statuses', async () => {
    fake.failNextWith(500, 'Database unavailable');

    await expect(transport.search({ name: 'Smith' })).rejects.toMatchObject({
      statusCode: 500,
      message: 'Database unavailable',
    });
  });

  it('updates a patient with the id in the body', async () => {
    const seeded = fake.seed({ name: [{ family: 'Doe', given: ['John'] }] });
    const id = seeded.id ?? '';

    const updated = await transport.update(id, {
      resourceType: 'Patient',
      id,
      name: [{ family: 'Doe', given: ['Johnny'] }],
    });

    expect(updated?.name).toEqual([{ family: 'Doe', given: ['Johnny'] }]);
    expect(fake.patients.get(id)?.name).toEqual([{ family: 'Doe', given: ['Johnny'] }]);
  });

  it('sends search parameters and returns the bundle', async () => {
    fake.seed({ name: [{ family: 'Smith', given: ['Jane'] }] });
    fake.seed({ name: [{ family: 'Jones', given: ['Bob'] }] });

    const bundle = await transport.search({ family: 'smi', _count: 10 });

    expect(fake.callsTo('GET')[0]?.query).toEqual({ family: 'smi', _count: '10' });
    expect(bundle.entry?.map((entry) => entry.resource?.id)).toEqual(['1000']);
  });

  it('reads the capability statement', async () => {
    await expect(transport.capabilities()).resolves.toMatchObject({
      resourceType: 'CapabilityStatement',
      fhirVersion: '4.0.1',
    });
  });

  it('gives up when the server does not answer in time', async () => {
    const impatient = new AxiosFHIRTransport({ baseUrl: fake.baseUrl, connectTimeoutMs: 50, responseTimeoutMs: 50 });
    fake.delayMs = 1000;

    await expect(impatient.read('1000')).rejects.toMatchObject({
      statusCode: 502,
      message: 'FHIR server did not respond within 100ms',
    });
  });

  it('reports an unreachable server as a 502 fault', async () => {
    const offline = new AxiosFHIRTransport({
      baseUrl: 'http://127.0.0.1:1/fhir',
      connectTimeoutMs: 1000,
      responseTimeoutMs: 1000,
    });

    const error = await offline.capabilities().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FHIRServerError);
    if (error instanceof FHIRServerError) {
      expect(error.statusCode).toBe(502);
      expect(error.remoteStatus).toBeUndefined();
      expect(error.message.startsWith('FHIR server is unreachable:')).toBe(true);
    }
  });
});
