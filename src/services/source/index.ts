export { loadClinicSource, type ClinicSource } from "./fetch.js";
export { formatStoredHash, readStoredHash, sha256 } from "./hash.js";
export { extractClinicRecords, readWorkbookRows } from "./workbook.js";
