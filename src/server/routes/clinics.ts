/**
 * Clinic Routes - /api/clinics
 */

import { ApiErrorSchema } from "../schemas/common.js";
import {
  ClinicIdParamSchema,
  ClinicListResponseSchema,
  ClinicResponseSchema,
  ListClinicsQuerySchema,
  type ClinicIdParam,
  type ListClinicsQuery,
} from "../schemas/clinics.js";
import { getClinic, listClinics } from "../services/clinic.service.js";

import type { RouteDependencies } from "./index.js";
import type { FastifyInstance } from "fastify";

export function registerClinicRoutes(
  app: FastifyInstance,
  deps: RouteDependencies
): void {
  /**
   * GET /api/clinics
   * Every id-map entry, optionally filtered by status
   */
  app.get<{ Querystring: ListClinicsQuery }>(
    "/clinics",
    {
      schema: {
        querystring: ListClinicsQuerySchema,
        response: {
          200: ClinicListResponseSchema,
        },
      },
    },
    async (request) =>
      listClinics(deps.store, deps.config, { status: request.query.status })
  );

  /**
   * GET /api/clinics/:clinicId
   */
  app.get<{ Params: ClinicIdParam }>(
    "/clinics/:clinicId",
    {
      schema: {
        params: ClinicIdParamSchema,
        response: {
          200: ClinicResponseSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) =>
      getClinic(deps.store, deps.config, request.params.clinicId)
  );
}
