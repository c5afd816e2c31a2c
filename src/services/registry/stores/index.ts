import { CsvIdMapStore } from "./csv.js";
import { SqliteIdMapStore } from "./sqlite.js";

import type { AppConfig } from "../../../config/index.js";
import type { IdMapStore } from "./types.js";

export { CsvIdMapStore, formatIdMapCsv, parseIdMapCsv } from "./csv.js";
export { SqliteIdMapStore } from "./sqlite.js";
export * from "./types.js";

export function createIdMapStore(
  config: Pick<AppConfig, "idMapStore" | "idMapPath">
): IdMapStore {
  switch (config.idMapStore) {
    case "csv":
      return new CsvIdMapStore(config.idMapPath);
    case "sqlite":
      return new SqliteIdMapStore(config.idMapPath);
  }
}
