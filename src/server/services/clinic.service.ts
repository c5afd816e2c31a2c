import { homepageHref } from "../../services/render/html.js";
import { NotFoundError } from "../plugins/error-handler.js";

import type { AppConfig } from "../../config/index.js";
import type { IdMapStore } from "../../services/registry/stores/index.js";
import type { ApiResponse, ClinicDto } from "../../types/api.js";
import type { ClinicStatus, IdMapEntry } from "../../types/index.js";

export type ClinicServiceConfig = Pick<AppConfig, "pathPrefix">;

export function toClinicDto(
  entry: IdMapEntry,
  config: ClinicServiceConfig
): ClinicDto {
  const prefix = config.pathPrefix.replace(/^\/+|\/+$/g, "");
  return {
    ...entry,
    homepageUrl: homepageHref(entry.homepage),
    pagePath: prefix === "" ? `/${entry.clinicId}/` : `/${prefix}/${entry.clinicId}/`,
  };
}

export async function listClinics(
  store: IdMapStore,
  config: ClinicServiceConfig,
  filter: { status?: ClinicStatus } = {}
): Promise<ApiResponse<ClinicDto[]>> {
  const table = await store.load();
  const data = table.entries
    .filter((entry) => filter.status === undefined || entry.status === filter.status)
    .map((entry) => toClinicDto(entry, config));

  return {
    data,
    meta: { total: data.length, revision: table.revision },
  };
}

export async function getClinic(
  store: IdMapStore,
  config: ClinicServiceConfig,
  clinicId: string
): Promise<ApiResponse<ClinicDto>> {
  const table = await store.load();
  const entry = table.entries.find((candidate) => candidate.clinicId === clinicId);
  if (entry === undefined) {
    throw new NotFoundError(`Clinic ${clinicId} not found`);
  }
  return { data: toClinicDto(entry, config), meta: { revision: table.revision } };
}
