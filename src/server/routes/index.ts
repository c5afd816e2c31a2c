/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerClinicRoutes } from "./clinics.js";

import type { AppConfig } from "../../config/index.js";
import type { IdMapStore } from "../../services/registry/stores/index.js";
import type { FastifyInstance } from "fastify";

export interface RouteDependencies {
  store: IdMapStore;
  config: Pick<AppConfig, "pathPrefix">;
}

const HealthResponseSchema = Type.Object({
  status: Type.Literal("ok"),
});

/**
 * Register the preview API under /api
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: RouteDependencies
): Promise<void> {
  app.get(
    "/api/health",
    {
      schema: {
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  await app.register(
    async (api) => {
      registerClinicRoutes(api, deps);
    },
    { prefix: "/api" }
  );
}
