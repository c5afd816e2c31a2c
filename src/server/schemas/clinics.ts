import { Type, type Static } from "@sinclair/typebox";

import {
  ClinicStatusSchema,
  createListResponseSchema,
  createResponseSchema,
} from "./common.js";

export const ClinicSchema = Type.Object({
  clinicId: Type.String({ description: "Permanent clinic id (e.g. SJ26-0001)" }),
  clinicName: Type.String(),
  status: ClinicStatusSchema,
  firstSeenAt: Type.String(),
  statusChangedAt: Type.String(),
  address: Type.String(),
  phone: Type.String(),
  director: Type.String(),
  homepage: Type.String({ description: "Homepage as entered in the spreadsheet" }),
  homepageUrl: Type.Union([Type.String(), Type.Null()], {
    description: "Link target, or null when the homepage is not linkable",
  }),
  pagePath: Type.String({ description: "Site path of the clinic landing page" }),
});

export const ClinicListResponseSchema = createListResponseSchema(ClinicSchema);
export const ClinicResponseSchema = createResponseSchema(ClinicSchema);

export const ClinicIdParamSchema = Type.Object({
  clinicId: Type.String(),
});

export type ClinicIdParam = Static<typeof ClinicIdParamSchema>;

export const ListClinicsQuerySchema = Type.Object({
  status: Type.Optional(ClinicStatusSchema),
});

export type ListClinicsQuery = Static<typeof ListClinicsQuerySchema>;
