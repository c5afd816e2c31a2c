/**
 * HTML escaping and link helpers for clinic pages.
 * Every value that came from the spreadsheet goes through `escapeHtml`.
 */

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

const WEB_SCHEME = /^https?:\/\//i;
const EXPLICIT_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const OPAQUE_SCHEME = /^(?:javascript|data|vbscript|mailto|tel|file|blob):/i;

/**
 * Link target for a homepage cell, or null when it must not be linked.
 * Scheme-less values get https://; the stored value is never rewritten.
 */
export function homepageHref(value: string): string | null {
  const raw = value.trim();
  if (raw === "") return null;
  if (WEB_SCHEME.test(raw)) return raw;
  if (EXPLICIT_SCHEME.test(raw) || OPAQUE_SCHEME.test(raw)) return null;
  return `https://${raw}`;
}

/**
 * Homepage link text without scheme and trailing slash
 */
export function homepageLabel(href: string): string {
  return href.replace(/^https?:\/\//i, "").replace(/\/+$/, "");
}

/** Digits and "+" of a phone number, for tel: links */
export function telDigits(phone: string): string {
  return phone.replace(/[^0-9+]/g, "");
}

export function mapSearchUrl(query: string): string | null {
  const cleaned = query.trim();
  if (cleaned === "") return null;
  return `https://map.naver.com/v5/search/${encodeURIComponent(cleaned)}`;
}

export function displayOrDash(value: string): string {
  const trimmed = value.trim();
  return trimmed === "" ? "-" : trimmed;
}

const HANGUL_FIRST = 0xac00;
const HANGUL_LAST = 0xd7a3;

/**
 * Topic particle for a Korean noun: 은 after a final consonant, 는 otherwise
 */
export function topicParticle(text: string): "은" | "는" {
  const last = text.trim().at(-1);
  if (last === undefined) return "는";
  const code = last.codePointAt(0) ?? 0;
  if (code < HANGUL_FIRST || code > HANGUL_LAST) return "는";
  return (code - HANGUL_FIRST) % 28 === 0 ? "는" : "은";
}
