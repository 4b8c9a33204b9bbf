import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PatientGateway } from '../../../src/services/patientGateway';
import type { CreateOutcome, FHIRTransport } from '../../../src/services/fhirTransport';
import { FHIRServerError, NotFoundError, ValidationError } from '../../../src/middleware/errorHandler';
import type {
  Bundle,
  CapabilityStatement,
  FHIRPatient,
  PatientSearchParams,
} from '../../../src/types';

const janeResource: FHIRPatient = {
  resourceType: 'Patient',
  id: '123',
  name: [{ family: 'Smith', given: ['Jane'] }],
  gender: 'female',
  birthDate: '1990-05-15',
};

function bundleOf(...patients: FHIRPatient[]): Bundle {
  return {
    resourceType: 'Bundle',
    type: 'searchset',
    total: patients.length,
    entry: patients.map((resource) => ({ resource })),
  };
}

function notFound(id: string): FHIRServerError {
  return new FHIRServerError('read', `Resource Patient/${id} is not known`, 404);
}

function createTransportStub() {
  return {
    create: vi.fn(async (_resource: FHIRPatient): Promise<CreateOutcome> => ({ id: '123' })),
    read: vi.fn(async (_id: string): Promise<FHIRPatient> => janeResource),
    update: vi.fn(async (_id: string, resource: FHIRPatient): Promise<FHIRPatient | undefined> => resource),
    delete: vi.fn(async (_id: string): Promise<void> => undefined),
    search: vi.fn(async (_params: PatientSearchParams): Promise<Bundle> => bundleOf()),
    capabilities: vi.fn(async (): Promise<CapabilityStatement> => ({ resourceType: 'CapabilityStatement' })),
  } satisfies FHIRTransport;
}

describe('PatientGateway', () => {
  let transport: ReturnType<typeof createTransportStub>;
  let gateway: PatientGateway;

  beforeEach(() => {
    transport = createTransportStub();
    gateway = new PatientGateway(transport);
  });

  describe('create', () => {
    it('sends the mapped resource and returns the record with the server id', async () => {
      const created = await gateway.create({
        givenName: 'Jane',
        familyName: 'Smith',
        gender: 'female',
        birthDate: '1990-05-15',
      });

      expect(created).toEqual({
        id: '123',
        givenName: 'Jane',
        familyName: 'Smith',
        gender: 'female',
        birthDate: '1990-05-15',
      });
      expect(transport.create).toHaveBeenCalledWith({
        resourceType: 'Patient',
        name: [{ family: 'Smith', given: ['Jane'] }],
        gender: 'female',
        birthDate: '1990-05-15',
      });
    });

    it('echoes only what it sent when an identifier system has no identifier', async () => {
      const created = await gateway.create({ givenName: 'Jane', familyName: 'Smith', identifierSystem: 'urn:mrn' });

      expect(created).toEqual({ id: '123', givenName: 'Jane', familyName: 'Smith' });
      expect(transport.create).toHaveBeenCalledWith({
        resourceType: 'Patient',
        name: [{ family: 'Smith', given: ['Jane'] }],
      });
    });

    it('never forwards an id supplied in the body', async () => {
      await gateway.create({ id: 'mine', givenName: 'Jane', familyName: 'Smith' });
      expect(transport.create.mock.calls[0]?.[0]).not.toHaveProperty('id');
    });

    it('rejects an invalid record without calling the server', async () => {
      await expect(gateway.create({ givenName: 'Jane' })).rejects.toBeInstanceOf(ValidationError);
      expect(transport.create).not.toHaveBeenCalled();
    });

    it('propagates server faults', async () => {
      transport.create.mockRejectedValueOnce(new FHIRServerError('create', 'Unprocessable', 422));
      await expect(gateway.create({ givenName: 'Jane', familyName: 'Smith' })).rejects.toMatchObject({
        statusCode: 422,
        message: 'Unprocessable',
      });
    });
  });

  describe('getById', () => {
    it('returns the mapped patient when found', async () => {
      await expect(gateway.getById('123')).resolves.toEqual({
        found: true,
        patient: {
          id: '123',
          givenName: 'Jane',
          familyName: 'Smith',
          gender: 'female',
          birthDate: '1990-05-15',
        },
      });
      expect(transport.read).toHaveBeenCalledWith('123');
    });

    it('reports a 404 from the server as not found', async () => {
      transport.read.mockRejectedValueOnce(notFound('999'));
      await expect(gateway.getById('999')).resolves.toEqual({ found: false, id: '999' });
    });

    it('reports a 410 from the server as not found', async () => {
      transport.read.mockRejectedValueOnce(new FHIRServerError('read', 'Gone', 410));
      await expect(gateway.getById('999')).resolves.toEqual({ found: false, id: '999' });
    });

    it('propagates other server faults', async () => {
      const fault = new FHIRServerError('read', 'FHIR server is unreachable: connect ECONNREFUSED');
      transport.read.mockRejectedValueOnce(fault);
      await expect(gateway.getById('123')).rejects.toBe(fault);
    });

    it('rejects a blank id', async () => {
      await expect(gateway.getById('  ')).rejects.toMatchObject({
        details: { id: 'Patient id is required' },
      });
      expect(transport.read).not.toHaveBeenCalled();
    });
  });

  describe('list', () => {
    it('uses the default count when none is given', async () => {
      await gateway.list();
      expect(transport.search).toHaveBeenCalledWith({ _count: 20 });
    });

    it('honours a configured default count', async () => {
      gateway = new PatientGateway(transport, { defaultListCount: 5 });
      await gateway.list();
      expect(transport.search).toHaveBeenCalledWith({ _count: 5 });
    });

    it('passes an explicit count through, zero included', async () => {
      await gateway.list(0);
      expect(transport.search).toHaveBeenCalledWith({ _count: 0 });
    });

    it('rejects a negative count', async () => {
      await expect(gateway.list(-1)).rejects.toMatchObject({
        details: { count: 'Count must be a non-negative integer' },
      });
      expect(transport.search).not.toHaveBeenCalled();
    });

    it('maps every Patient entry in order', async () => {
      transport.search.mockResolvedValueOnce(
        bundleOf(janeResource, { resourceType: 'Patient', id: '124', name: [{ family: 'Doe', given: ['John'] }] })
      );

      const patients = await gateway.list(2);
      expect(patients.map((patient) => patient.id)).toEqual(['123', '124']);
    });
  });

  describe('searches', () => {
    it('searches by any name part', async () => {
      transport.search.mockResolvedValueOnce(bundleOf(janeResource));

      const patients = await gateway.searchByName('Smith');

      expect(transport.search).toHaveBeenCalledWith({ name: 'Smith' });
      expect(patients).toHaveLength(1);
    });

    it('searches by family name', async () => {
      await gateway.searchByFamilyName('Smith');
      expect(transport.search).toHaveBeenCalledWith({ family: 'Smith' });
    });

    it('searches by system and value token', async () => {
      await gateway.searchByIdentifier('http://hospital.example.org', 'MRN12345');
      expect(transport.search).toHaveBeenCalledWith({ identifier: 'http://hospital.example.org|MRN12345' });
    });

    it('returns an empty list when nothing matches', async () => {
      await expect(gateway.searchByName('Nobody')).resolves.toEqual([]);
    });

    it('rejects a blank search term', async () => {
      await expect(gateway.searchByName('')).rejects.toBeInstanceOf(ValidationError);
      await expect(gateway.searchByIdentifier('', 'MRN1')).rejects.toMatchObject({
        details: { system: 'Identifier system is required' },
      });
      expect(transport.search).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('probes for the patient and then replaces it under the path id', async () => {
      const updated = await gateway.update('123', { id: 'other', givenName: 'Janet', familyName: 'Smith' });

      expect(updated).toEqual({ id: '123', givenName: 'Janet', familyName: 'Smith' });
      expect(transport.read).toHaveBeenCalledWith('123');
      expect(transport.update).toHaveBeenCalledWith('123', {
        resourceType: 'Patient',
        name: [{ family: 'Smith', given: ['Janet'] }],
        id: '123',
      });
    });

    it('answers NotFoundError without writing when the patient is absent', async () => {
      transport.read.mockRejectedValueOnce(notFound('999'));

      await expect(gateway.update('999', { givenName: 'Jane', familyName: 'Smith' })).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(transport.update).not.toHaveBeenCalled();
    });

    it('validates before probing', async () => {
      await expect(gateway.update('123', { givenName: 'Jane', gender: 'x' })).rejects.toMatchObject({
        details: {
          familyName: 'Family name is required',
          gender: 'Gender must be: male, female, other, or unknown',
        },
      });
      expect(transport.read).not.toHaveBeenCalled();
    });
  });

  describe('delete', () => {
    it('probes and then deletes', async () => {
      await gateway.delete('123');

      expect(transport.read).toHaveBeenCalledWith('123');
      expect(transport.delete).toHaveBeenCalledWith('123');
    });

    it('answers NotFoundError without deleting when the patient is absent', async () => {
      transport.read.mockRejectedValueOnce(notFound('999'));

      await expect(gateway.delete('999')).rejects.toMatchObject({
        statusCode: 404,
        message: 'Patient not found',
      });
      expect(transport.delete).not.toHaveBeenCalled();
    });

    it('does not delete when the probe itself fails', async () => {
      transport.read.mockRejectedValueOnce(new FHIRServerError('read', 'Internal error', 500));

      await expect(gateway.delete('123')).rejects.toBeInstanceOf(FHIRServerError);
      expect(transport.delete).not.toHaveBeenCalled();
    });
  });
});
