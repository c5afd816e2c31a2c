import { copyFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { buildLogger } from "../../logger.js";
import { slugifyName } from "../../utils/slug.js";
import { displayOrDash } from "../render/html.js";

import type { AppConfig } from "../../config/index.js";
import type { MappingRecord } from "../../types/index.js";

export const DELIVERY_FILES = {
  qr: "qr.png",
  qrNamed: "qr_named.svg",
  info: "info.txt",
} as const;

export interface DeliveryOptions {
  deliveryRoot: string;
  createdAt: string;
  /** Where a path from the mapping report can be read right now */
  locate?: (path: string) => string;
}

export interface DeliveryResult {
  clinicId: string;
  clinicName: string;
  outputDir: string;
}

export function deliveryDirName(clinicId: string, clinicName: string): string {
  return `${clinicId}_${slugifyName(clinicName)}`;
}

export function renderDeliveryInfo(
  record: MappingRecord,
  messageActive: string,
  createdAt: string
): string {
  return [
    `치과명: ${record.clinicName}`,
    `식별코드: ${record.clinicId}`,
    `URL: ${record.url}`,
    `주소: ${displayOrDash(record.address)}`,
    `전화: ${displayOrDash(record.phone)}`,
    `대표원장: ${displayOrDash(record.director)}`,
    `홈페이지: ${displayOrDash(record.homepage)}`,
    `안내: ${messageActive}`,
    `생성일: ${createdAt}`,
    "",
  ].join("\n");
}

/**
 * One folder per ACTIVE clinic with its QR images and an info sheet,
 * ready to hand over to the clinic.
 */
export function buildDeliveryPackages(
  records: readonly MappingRecord[],
  config: Pick<AppConfig, "messageActive">,
  options: DeliveryOptions
): DeliveryResult[] {
  const locate = options.locate ?? ((path: string) => path);
  const results: DeliveryResult[] = [];

  for (const record of records) {
    if (record.status !== "ACTIVE") continue;
    if (record.qrPath === "") {
      throw new Error(`Missing qr_path for ACTIVE clinic ${record.clinicId}`);
    }

    const outputDir = join(
      options.deliveryRoot,
      deliveryDirName(record.clinicId, record.clinicName)
    );
    mkdirSync(outputDir, { recursive: true });

    copyFileSync(locate(record.qrPath), join(outputDir, DELIVERY_FILES.qr));

    if (record.qrNamedPath !== "") {
      const namedSource = locate(record.qrNamedPath);
      if (existsSync(namedSource)) {
        copyFileSync(namedSource, join(outputDir, DELIVERY_FILES.qrNamed));
      } else {
        buildLogger.warn(
          { clinicId: record.clinicId, path: record.qrNamedPath },
          "Named QR not available for delivery"
        );
      }
    }

    writeFileSync(
      join(outputDir, DELIVERY_FILES.info),
      renderDeliveryInfo(record, config.messageActive, options.createdAt),
      "utf8"
    );

    results.push({
      clinicId: record.clinicId,
      clinicName: record.clinicName,
      outputDir,
    });
  }

  buildLogger.debug({ packages: results.length }, "Delivery packages written");
  return results;
}
