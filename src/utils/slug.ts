/**
 * Folder/file-name slug of a clinic name. Letters of any script are kept,
 * everything else collapses to "-".
 */
export function slugifyName(name: string, maxLength = 40): string {
  const slug = name
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
  const truncated = Array.from(slug)
    .slice(0, maxLength)
    .join("")
    .replace(/-+$/, "");
  return truncated === "" ? "clinic" : truncated;
}
