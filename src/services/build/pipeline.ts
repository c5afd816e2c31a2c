/**
 * Build pipeline
 *
 * source → records → reconcile → render into staging → commit.
 * Nothing outside the staging directory is touched until every artifact
 * has been produced and the id map store has accepted the new table. The
 * id map is saved after the outputs are moved into place; if that save
 * fails the move is rolled back. The source hash is written last.
 */

import { join } from "node:path";

import { BatchValidationError } from "../../errors.js";
import { buildLogger } from "../../logger.js";
import { isoNow } from "../../utils/time.js";
import { writeFileAtomic } from "../../utils/fs.js";
import { buildDeliveryPackages, buildOutbox } from "../delivery/index.js";
import {
  clinicUrl,
  qrOptionsFrom,
  renderNamedQrSvg,
  renderQrPng,
} from "../qr/index.js";
import { countChanges } from "../registry/changes.js";
import { assertAppendOnly } from "../registry/id-map.js";
import { reconcile } from "../registry/reconcile.js";
import {
  renderClinicPage,
  renderNotFound,
  renderRootIndex,
} from "../render/index.js";
import {
  changeNotes,
  formatChangesCsv,
  formatMappingCsv,
} from "../reports/index.js";
import {
  extractClinicRecords,
  formatStoredHash,
  loadClinicSource,
  readStoredHash,
  readWorkbookRows,
} from "../source/index.js";
import { Staging } from "./staging.js";

import type { AppConfig } from "../../config/index.js";
import type {
  ChangeType,
  ClinicRecord,
  ClinicView,
  MappingRecord,
  Reconciliation,
} from "../../types/index.js";
import type { OutboxResult } from "../delivery/index.js";
import type { IdMapStore } from "../registry/stores/index.js";

// ============================================================================
// Types
// ============================================================================

export interface BuildOptions {
  /** No QR images, delivery folders or outbox; baseUrl may be empty */
  skipQr?: boolean;
  /** Stop early when the source bytes match the last successful build */
  ifChanged?: boolean;
  /** Reconcile and report, but write nothing */
  dryRun?: boolean;
  now?: Date;
}

export interface BuildProgress {
  phase: string;
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: BuildProgress) => void;

export interface BuildSummary {
  status: "built" | "unchanged" | "dry-run";
  origin: string;
  sourceHash: string;
  records: number;
  total: number;
  active: number;
  inactive: number;
  changes: Record<ChangeType, number>;
  newIds: string[];
  outbox?: OutboxResult;
}

export function outputPaths(config: Pick<AppConfig, "outputRoot">): {
  qrRoot: string;
  deliveryRoot: string;
  mappingPath: string;
  changesPath: string;
} {
  return {
    qrRoot: join(config.outputRoot, "qr"),
    deliveryRoot: join(config.outputRoot, "delivery"),
    mappingPath: join(config.outputRoot, "mapping.csv"),
    changesPath: join(config.outputRoot, "changes.csv"),
  };
}

export function clinicPagePath(
  config: Pick<AppConfig, "siteRoot" | "pathPrefix">,
  clinicId: string
): string {
  return join(config.siteRoot, config.pathPrefix, clinicId, "index.html");
}

// ============================================================================
// Pipeline
// ============================================================================

export class BuildPipeline {
  private onProgress?: ProgressCallback;

  constructor(
    private readonly config: AppConfig,
    private readonly store: IdMapStore
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  private progress(
    phase: string,
    current = 0,
    total = 0,
    currentItem?: string
  ): void {
    this.onProgress?.({ phase, current, total, currentItem });
  }

  async run(options: BuildOptions = {}): Promise<BuildSummary> {
    const config = this.config;
    const skipQr = options.skipQr === true;
    const now = isoNow(options.now);

    this.progress("Loading clinic spreadsheet");
    const source = await loadClinicSource(config);

    if (
      options.ifChanged === true &&
      readStoredHash(config.hashPath) === source.sha256
    ) {
      buildLogger.info(
        { origin: source.origin, sha256: source.sha256 },
        "Source unchanged since last build, skipping"
      );
      return {
        status: "unchanged",
        origin: source.origin,
        sourceHash: source.sha256,
        records: 0,
        total: 0,
        active: 0,
        inactive: 0,
        changes: countChanges([]),
        newIds: [],
      };
    }

    const rows = await readWorkbookRows(source.data, config.sheetIndex);
    const extracted = extractClinicRecords(rows, config.columns);
    if (!extracted.ok) {
      throw new BatchValidationError(extracted.error);
    }
    const records: ClinicRecord[] = extracted.value;
    buildLogger.info(
      { origin: source.origin, records: records.length },
      "Clinic records loaded"
    );

    this.progress("Reconciling id map");
    const previous = await this.store.load();
    const result = reconcile(records, previous, {
      year: config.year,
      idPrefix: config.idPrefix,
      now,
    });
    if (!result.ok) {
      throw new BatchValidationError(result.error);
    }
    const reconciliation = result.value;
    assertAppendOnly(previous, reconciliation.table);

    const summary = summarize(source.origin, source.sha256, records.length, reconciliation);

    if (options.dryRun === true) {
      buildLogger.info(summary, "Dry run, nothing written");
      return { ...summary, status: "dry-run" };
    }

    const staging = new Staging(config.outputRoot, {
      site: config.siteRoot,
      output: config.outputRoot,
      outbox: config.outboxRoot,
    });

    try {
      const mapping = await this.stageSite(staging, reconciliation.clinics, now, skipQr);

      const paths = outputPaths(config);
      staging.write(paths.mappingPath, formatMappingCsv(mapping));
      staging.write(
        paths.changesPath,
        formatChangesCsv(reconciliation.changes, changeNotes(previous, reconciliation.changes))
      );

      const replace: string[] = [];
      let outbox: OutboxResult | undefined;
      const wantsDelivery = config.generateDelivery || config.generateOutbox;

      if (skipQr && wantsDelivery) {
        buildLogger.warn("Delivery and outbox skipped because QR generation is off");
      } else if (!skipQr) {
        replace.push(paths.qrRoot);

        if (wantsDelivery) {
          this.progress("Packaging deliveries");
          buildDeliveryPackages(mapping, config, {
            deliveryRoot: staging.path(paths.deliveryRoot),
            createdAt: now,
            locate: (path) => staging.path(path),
          });
        }
        if (config.generateDelivery) {
          replace.push(paths.deliveryRoot);
        }
        if (config.generateOutbox) {
          this.progress("Building outbox");
          outbox = await buildOutbox(mapping, reconciliation.changes, config, {
            outboxRoot: staging.path(config.outboxRoot),
            deliveryRoot: staging.path(paths.deliveryRoot),
            updatedAt: now,
          });
          replace.push(config.outboxRoot);
        }
        if (wantsDelivery && !config.generateDelivery) {
          // Packed into the outbox only; not published
          staging.discard(paths.deliveryRoot);
        }
      }

      const saveOptions = { expectedRevision: previous.revision };
      await this.store.verify(reconciliation.table, saveOptions);

      this.progress("Committing outputs");
      staging.commit({ replace });
      try {
        await this.store.save(reconciliation.table, saveOptions);
      } catch (error) {
        // Published outputs must never describe an id map that was not saved
        staging.rollback();
        throw error;
      }
      writeFileAtomic(config.hashPath, formatStoredHash(source.sha256));

      const built: BuildSummary = { ...summary, status: "built", outbox };
      logSummary(built);
      return built;
    } finally {
      staging.dispose();
    }
  }

  /**
   * Pages for every id-map entry, QR images for ACTIVE clinics.
   * Returns the mapping report rows with their final paths.
   */
  private async stageSite(
    staging: Staging,
    clinics: readonly ClinicView[],
    now: string,
    skipQr: boolean
  ): Promise<MappingRecord[]> {
    const config = this.config;
    const { qrRoot } = outputPaths(config);
    const qrOptions = qrOptionsFrom(config);

    staging.write(join(config.siteRoot, "index.html"), renderRootIndex(config));
    staging.write(join(config.siteRoot, "404.html"), renderNotFound(config));

    const mapping: MappingRecord[] = [];
    for (const [index, clinic] of clinics.entries()) {
      this.progress("Rendering clinics", index + 1, clinics.length, clinic.clinicId);

      const pagePath = clinicPagePath(config, clinic.clinicId);
      staging.write(pagePath, renderClinicPage(config, clinic, now));

      const url = clinicUrl(config.baseUrl, config.pathPrefix, clinic.clinicId);
      let qrPath = "";
      let qrNamedPath = "";
      if (clinic.status === "ACTIVE" && !skipQr) {
        qrPath = join(qrRoot, `${clinic.clinicId}.png`);
        staging.write(qrPath, await renderQrPng(url, qrOptions));
        if (config.generateQrNamed) {
          qrNamedPath = join(qrRoot, `${clinic.clinicId}_named.svg`);
          staging.write(
            qrNamedPath,
            renderNamedQrSvg(url, clinic.clinicName, {
              ...qrOptions,
              fontSize: config.captionFontSize,
            })
          );
        }
      }

      mapping.push({
        clinicName: clinic.clinicName,
        clinicId: clinic.clinicId,
        status: clinic.status,
        address: clinic.address,
        phone: clinic.phone,
        director: clinic.director,
        homepage: clinic.homepage,
        url,
        pagePath,
        qrPath,
        qrNamedPath,
      });
    }
    return mapping;
  }
}

// ============================================================================
// Summary
// ============================================================================

function summarize(
  origin: string,
  sourceHash: string,
  records: number,
  reconciliation: Reconciliation
): Omit<BuildSummary, "status"> {
  const active = reconciliation.clinics.filter(
    (clinic) => clinic.status === "ACTIVE"
  ).length;
  return {
    origin,
    sourceHash,
    records,
    total: reconciliation.clinics.length,
    active,
    inactive: reconciliation.clinics.length - active,
    changes: countChanges(reconciliation.changes),
    newIds: reconciliation.newIds,
  };
}

function logSummary(summary: BuildSummary): void {
  buildLogger.info(
    {
      total: summary.total,
      active: summary.active,
      inactive: summary.inactive,
    },
    "Build summary"
  );
  buildLogger.info({ ...summary.changes }, "Change summary");
  if (summary.outbox !== undefined) {
    buildLogger.info(
      {
        targets: summary.outbox.targets,
        zips: summary.outbox.zipsCreated,
      },
      "Outbox summary"
    );
  }
}
