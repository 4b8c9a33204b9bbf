/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - PATIENT ROUTES
 * ============================================================================
 *
 * RESTful API routes for patients. Each handler delegates to the gateway,
 * which talks to the FHIR server; errors flow to the error middleware.
 */

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { handleValidationErrors, patientValidations } from '../middleware/validation';
import type { PatientGateway } from '../services/patientGateway';

function queryText(req: Request, key: string): string {
  const value = req.query[key];
  return typeof value === 'string' ? value : '';
}

export function createPatientRouter(gateway: PatientGateway): Router {
  const router = Router();

  /**
   * @route   POST /api/patients
   * @desc    Create a patient on the FHIR server
   */
  router.post('/',
    asyncHandler(async (req: Request, res: Response) => {
      const created = await gateway.create(req.body);
      res.status(201).json(created);
    })
  );

  /**
   * @route   GET /api/patients?count=N
   * @desc    List up to N patients (first page only)
   */
  router.get('/',
    patientValidations.list,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      const count = req.query.count === undefined ? undefined : Number(queryText(req, 'count'));
      const patients = await gateway.list(count);
      res.json(patients);
    })
  );

  /**
   * @route   GET /api/patients/search?name=X
   * @desc    Search across all name parts
   */
  router.get('/search',
    patientValidations.searchByName,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await gateway.searchByName(queryText(req, 'name')));
    })
  );

  /**
   * @route   GET /api/patients/search/family?name=X
   */
  router.get('/search/family',
    patientValidations.searchByName,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await gateway.searchByFamilyName(queryText(req, 'name')));
    })
  );

  /**
   * @route   GET /api/patients/search/identifier?system=S&value=V
   */
  router.get('/search/identifier',
    patientValidations.searchByIdentifier,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await gateway.searchByIdentifier(queryText(req, 'system'), queryText(req, 'value')));
    })
  );

  /**
   * @route   GET /api/patients/:id
   * @desc    Read one patient; 404 with an empty body when absent
   */
  router.get('/:id',
    patientValidations.id,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      const lookup = await gateway.getById(req.params.id);

      if (!lookup.found) {
        res.status(404).end();
        return;
      }
      res.json(lookup.patient);
    })
  );

  /**
   * @route   PUT /api/patients/:id
   * @desc    Replace a patient; structured 404 when absent
   */
  router.put('/:id',
    patientValidations.id,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      const updated = await gateway.update(req.params.id, req.body);
      res.json(updated);
    })
  );

  /**
   * @route   DELETE /api/patients/:id
   * @desc    Delete a patient; structured 404 when absent
   */
  router.delete('/:id',
    patientValidations.id,
    handleValidationErrors(),
    asyncHandler(async (req: Request, res: Response) => {
      await gateway.delete(req.params.id);
      res.status(204).end();
    })
  );

  return router;
}

export default createPatientRouter;
