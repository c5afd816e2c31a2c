/**
 * TypeBox schema for the build configuration file
 */

import { Type, type Static } from "@sinclair/typebox";

export const DEFAULT_MESSAGE_ACTIVE =
  "해당 치과는 치과의사회 정회원 치과입니다";
export const DEFAULT_MESSAGE_INACTIVE =
  "현재 가입 치과 목록에 없습니다. 협회에 문의하세요.";
export const DEFAULT_ASSOCIATION_NAME = "세종특별자치시 치과의사회";

const NonEmptyString = (defaultValue?: string) =>
  defaultValue === undefined
    ? Type.String({ minLength: 1 })
    : Type.String({ minLength: 1, default: defaultValue });

export const ColumnNamesSchema = Type.Object(
  {
    name: NonEmptyString("치과명"),
    address: NonEmptyString("주소"),
    phone: NonEmptyString("전화"),
    director: NonEmptyString("대표원장"),
    homepage: NonEmptyString("홈페이지"),
  },
  { default: {} }
);

export const AppConfigSchema = Type.Object({
  year: Type.Integer({ minimum: 1 }),
  baseUrl: Type.String({ default: "" }),

  // Input
  clinicsSource: Type.Union([Type.Literal("local"), Type.Literal("url")], {
    default: "local",
  }),
  inputPath: NonEmptyString("data/clinics.xlsx"),
  clinicsUrl: Type.String({ default: "" }),
  hashPath: NonEmptyString("data/clinics.sha256"),
  sheetIndex: Type.Integer({ minimum: 0, default: 0 }),
  columns: ColumnNamesSchema,

  // Registry
  idPrefix: Type.String({ pattern: "^[A-Z0-9]*$", default: "SJ" }),
  idMapStore: Type.Union([Type.Literal("csv"), Type.Literal("sqlite")], {
    default: "csv",
  }),
  idMapPath: NonEmptyString("data/id_map.csv"),

  // Site
  siteRoot: NonEmptyString("docs"),
  pathPrefix: NonEmptyString("c"),
  outputRoot: NonEmptyString("output"),
  associationName: NonEmptyString(DEFAULT_ASSOCIATION_NAME),
  messageActive: NonEmptyString(DEFAULT_MESSAGE_ACTIVE),
  messageInactive: NonEmptyString(DEFAULT_MESSAGE_INACTIVE),
  noindex: Type.Boolean({ default: true }),
  analyticsProvider: Type.Union([Type.Literal("none"), Type.Literal("ga4")], {
    default: "none",
  }),
  ga4MeasurementId: Type.String({ default: "" }),

  // QR
  qrErrorCorrection: Type.Union(
    [Type.Literal("L"), Type.Literal("M"), Type.Literal("Q"), Type.Literal("H")],
    { default: "H" }
  ),
  qrBoxSize: Type.Integer({ minimum: 1, default: 10 }),
  qrBorder: Type.Integer({ minimum: 0, default: 4 }),
  generateQrNamed: Type.Boolean({ default: true }),
  captionFontSize: Type.Integer({ minimum: 1, default: 28 }),

  // Delivery
  generateDelivery: Type.Boolean({ default: true }),
  generateOutbox: Type.Boolean({ default: true }),
  outboxRoot: NonEmptyString("output/outbox"),
});

export type AppConfig = Static<typeof AppConfigSchema>;
