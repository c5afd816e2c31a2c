import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";

import JSZip from "jszip";

import { buildLogger } from "../../logger.js";
import { formatCsv } from "../../utils/csv.js";
import { renderOutboxIndex, type LayoutConfig } from "../render/index.js";
import { DELIVERY_FILES, deliveryDirName } from "./packages.js";

import type { ChangeRecord, MappingRecord } from "../../types/index.js";

export const SENDLIST_COLUMNS = [
  "clinic_id",
  "clinic_name",
  "change_type",
  "url",
  "zip_path",
] as const;

const OUTBOX_CHANGES = new Set(["NEW", "REACTIVATED"]);

export interface OutboxOptions {
  outboxRoot: string;
  /** Delivery folders the archives are packed from */
  deliveryRoot: string;
  updatedAt: string;
}

export interface OutboxResult {
  targets: number;
  zipsCreated: number;
  sendlistPath: string;
}

async function writeZip(zipPath: string, files: readonly string[]): Promise<void> {
  const zip = new JSZip();
  for (const file of files) {
    zip.file(basename(file), readFileSync(file));
  }
  const data = await zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
  });
  writeFileSync(zipPath, data);
}

/**
 * Rebuild the outbox from scratch: one ZIP per clinic that became ACTIVE
 * in this run (NEW or REACTIVATED), a send list and a download page.
 * Clinics whose delivery folder is incomplete are skipped with a warning.
 */
export async function buildOutbox(
  records: readonly MappingRecord[],
  changes: readonly ChangeRecord[],
  config: LayoutConfig,
  options: OutboxOptions
): Promise<OutboxResult> {
  rmSync(options.outboxRoot, { recursive: true, force: true });
  const zipsRoot = join(options.outboxRoot, "zips");
  mkdirSync(zipsRoot, { recursive: true });

  const recordById = new Map(records.map((record) => [record.clinicId, record]));
  const targets = changes.filter((change) => OUTBOX_CHANGES.has(change.changeType));

  const sendlist: string[][] = [];
  const zipNames: string[] = [];

  for (const change of targets) {
    const record = recordById.get(change.clinicId);
    if (record === undefined) {
      buildLogger.warn({ clinicId: change.clinicId }, "Outbox skip: no mapping record");
      continue;
    }
    if (record.status !== "ACTIVE") {
      buildLogger.warn({ clinicId: change.clinicId }, "Outbox skip: clinic inactive");
      continue;
    }

    const dirName = deliveryDirName(record.clinicId, record.clinicName);
    const deliveryDir = join(options.deliveryRoot, dirName);
    const required = [DELIVERY_FILES.qr, DELIVERY_FILES.info].map((file) =>
      join(deliveryDir, file)
    );
    const missing = required.filter((file) => !existsSync(file));
    if (missing.length > 0) {
      buildLogger.warn(
        { clinicId: record.clinicId, missing },
        "Outbox skip: delivery files missing"
      );
      continue;
    }

    // The named QR is optional (generateQrNamed)
    const named = join(deliveryDir, DELIVERY_FILES.qrNamed);
    const files = existsSync(named) ? [...required, named] : required;

    const zipName = `${dirName}.zip`;
    await writeZip(join(zipsRoot, zipName), files);
    zipNames.push(zipName);
    sendlist.push([
      record.clinicId,
      record.clinicName,
      change.changeType,
      record.url,
      `zips/${zipName}`,
    ]);
  }

  const sendlistPath = join(options.outboxRoot, "sendlist.csv");
  writeFileSync(sendlistPath, formatCsv(SENDLIST_COLUMNS, sendlist), "utf8");
  writeFileSync(
    join(options.outboxRoot, "index.html"),
    renderOutboxIndex(config, options.updatedAt, zipNames),
    "utf8"
  );

  buildLogger.debug(
    { targets: targets.length, zips: zipNames.length },
    "Outbox written"
  );
  return {
    targets: targets.length,
    zipsCreated: zipNames.length,
    sendlistPath,
  };
}
