/**
 * Preview API Request/Response Types
 */

import type { ClinicStatus } from "./index.js";

export interface ApiResponse<T> {
  data: T;
  meta?: {
    total?: number;
    revision?: string;
  };
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

export interface ClinicDto {
  clinicId: string;
  clinicName: string;
  status: ClinicStatus;
  firstSeenAt: string;
  statusChangedAt: string;
  address: string;
  phone: string;
  director: string;
  homepage: string;
  homepageUrl: string | null;
  pagePath: string;
}
