import { existsSync, readFileSync } from "node:fs";

import { SourceFetchError, SpreadsheetError, errorMessage } from "../../errors.js";
import { sourceLogger } from "../../logger.js";
import { sha256 } from "./hash.js";

import type { AppConfig } from "../../config/index.js";

export interface ClinicSource {
  data: Buffer;
  /** File path or URL the bytes came from */
  origin: string;
  sha256: string;
}

async function fetchSpreadsheet(url: string): Promise<Buffer> {
  sourceLogger.info({ url }, "Downloading clinic spreadsheet");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new SourceFetchError(
      `Failed to download clinic spreadsheet: ${errorMessage(error)}`
    );
  }
  const duration = Math.round(performance.now() - startTime);

  sourceLogger.debug(
    {
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received spreadsheet response"
  );

  if (!response.ok) {
    sourceLogger.error(
      { status: response.status, statusText: response.statusText },
      "Failed to download clinic spreadsheet"
    );
    throw new SourceFetchError(
      `Failed to download clinic spreadsheet: ${String(response.status)} ${response.statusText}`,
      response.status
    );
  }

  return Buffer.from(await response.arrayBuffer());
}

/**
 * Bytes of the clinic spreadsheet from the configured source
 */
export async function loadClinicSource(
  config: Pick<AppConfig, "clinicsSource" | "clinicsUrl" | "inputPath">
): Promise<ClinicSource> {
  let data: Buffer;
  let origin: string;

  if (config.clinicsSource === "url") {
    origin = config.clinicsUrl;
    data = await fetchSpreadsheet(origin);
  } else {
    origin = config.inputPath;
    if (!existsSync(origin)) {
      throw new SpreadsheetError(`Input spreadsheet not found: ${origin}`);
    }
    data = readFileSync(origin);
  }

  const hash = sha256(data);
  sourceLogger.debug({ origin, bytes: data.length, sha256: hash }, "Source loaded");
  return { data, origin, sha256: hash };
}
