/**
 * QR images for clinic landing pages.
 *
 * `qr.png` is the bare code; `qr_named.svg` adds the clinic name under it
 * so operators can hand out a labelled version.
 */

import QRCode from "qrcode";

import { buildLogger } from "../../logger.js";
import { escapeHtml } from "../render/html.js";

import type { AppConfig } from "../../config/index.js";

export type ErrorCorrection = AppConfig["qrErrorCorrection"];

export interface QrOptions {
  errorCorrection: ErrorCorrection;
  /** Pixels per module */
  boxSize: number;
  /** Quiet zone, in modules */
  border: number;
}

export interface NamedQrOptions extends QrOptions {
  fontSize: number;
}

export function qrOptionsFrom(
  config: Pick<AppConfig, "qrErrorCorrection" | "qrBoxSize" | "qrBorder">
): QrOptions {
  return {
    errorCorrection: config.qrErrorCorrection,
    boxSize: config.qrBoxSize,
    border: config.qrBorder,
  };
}

/**
 * Public URL of a clinic page: `<baseUrl>/<pathPrefix>/<clinicId>/`.
 * Empty when no base URL is configured.
 */
export function clinicUrl(
  baseUrl: string,
  pathPrefix: string,
  clinicId: string
): string {
  const base = baseUrl.trim().replace(/\/+$/, "");
  if (base === "") return "";
  const prefix = pathPrefix.replace(/^\/+|\/+$/g, "");
  return prefix === ""
    ? `${base}/${clinicId}/`
    : `${base}/${prefix}/${clinicId}/`;
}

export async function renderQrPng(
  url: string,
  options: QrOptions
): Promise<Buffer> {
  return QRCode.toBuffer(url, {
    type: "png",
    errorCorrectionLevel: options.errorCorrection,
    scale: options.boxSize,
    margin: options.border,
    color: { dark: "#000000", light: "#ffffff" },
  });
}

// ============================================================================
// Caption layout
// ============================================================================

const MIN_FONT_SIZE = 16;
const MAX_CAPTION_LINES = 3;

/**
 * Rough advance width of a character: full width for CJK and other wide
 * scripts, a bit over half for Latin text.
 */
function charWidth(char: string, fontSize: number): number {
  const code = char.codePointAt(0) ?? 0;
  if (char === " ") return fontSize * 0.3;
  if (code >= 0x1100) return fontSize;
  return fontSize * 0.6;
}

export function textWidth(text: string, fontSize: number): number {
  let width = 0;
  for (const char of text) width += charWidth(char, fontSize);
  return width;
}

export interface CaptionLayout {
  lines: string[];
  fontSize: number;
  fits: boolean;
}

function wrapChars(text: string, fontSize: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const char of text) {
    if (current === "" && char === " ") continue;
    const candidate = current + char;
    if (current === "" || textWidth(candidate, fontSize) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current.trimEnd());
      current = char === " " ? "" : char;
    }
  }
  if (current !== "") lines.push(current);
  return lines;
}

function wrapWords(text: string, fontSize: number, maxWidth: number): string[] {
  const words = text.split(" ").filter((word) => word !== "");
  if (words.some((word) => textWidth(word, fontSize) > maxWidth)) {
    return wrapChars(text, fontSize, maxWidth);
  }
  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    const candidate = current === "" ? word : `${current} ${word}`;
    if (textWidth(candidate, fontSize) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current !== "") lines.push(current);
  return lines;
}

/**
 * Wrap a caption into at most three lines, shrinking the font down to
 * 16px before giving up. Words stay whole unless one is too wide.
 */
export function layoutCaption(
  text: string,
  preferredSize: number,
  maxWidth: number
): CaptionLayout {
  const wrap = text.includes(" ") ? wrapWords : wrapChars;
  const smallest = Math.min(preferredSize, MIN_FONT_SIZE);

  for (let size = preferredSize; size >= smallest; size--) {
    const lines = wrap(text, size, maxWidth);
    if (lines.length <= MAX_CAPTION_LINES) {
      return { lines, fontSize: size, fits: true };
    }
  }

  const lines = wrap(text, smallest, maxWidth).slice(0, MAX_CAPTION_LINES);
  const last = lines.length - 1;
  lines[last] = `${lines[last] ?? ""}…`;
  return { lines, fontSize: smallest, fits: false };
}

// ============================================================================
// Named QR
// ============================================================================

type ModuleMatrix = ReturnType<typeof QRCode.create>["modules"];

function modulePath(modules: ModuleMatrix, border: number): string {
  const parts: string[] = [];
  for (let row = 0; row < modules.size; row++) {
    for (let col = 0; col < modules.size; col++) {
      if (modules.data[row * modules.size + col] === 1) {
        parts.push(`M${String(col + border)} ${String(row + border)}h1v1h-1z`);
      }
    }
  }
  return parts.join("");
}

/**
 * SVG with the QR code on top and the clinic name centered underneath
 */
export function renderNamedQrSvg(
  url: string,
  caption: string,
  options: NamedQrOptions
): string {
  const qr = QRCode.create(url, {
    errorCorrectionLevel: options.errorCorrection,
  });
  const modules = qr.modules;
  const side = (modules.size + options.border * 2) * options.boxSize;

  const paddingX = Math.max(12, Math.floor(side * 0.06));
  const layout = layoutCaption(caption, options.fontSize, side - paddingX * 2);
  if (!layout.fits) {
    buildLogger.warn(
      { caption, fontSize: layout.fontSize },
      "Caption truncated at minimum font size"
    );
  }

  const lineHeight = Math.round(layout.fontSize * 1.2);
  const lineSpacing = Math.max(4, Math.floor(layout.fontSize * 0.2));
  const paddingY = Math.max(10, Math.floor(layout.fontSize * 0.4));
  const captionHeight =
    paddingY * 2 +
    lineHeight * layout.lines.length +
    lineSpacing * (layout.lines.length - 1);
  const height = side + captionHeight;

  const text = layout.lines
    .map((line, index) => {
      const baseline =
        side + paddingY + index * (lineHeight + lineSpacing) + layout.fontSize;
      return `<text x="${String(side / 2)}" y="${String(baseline)}">${escapeHtml(line)}</text>`;
    })
    .join("");

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${String(side)}" height="${String(height)}" viewBox="0 0 ${String(side)} ${String(height)}">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<g transform="scale(${String(options.boxSize)})"><path fill="#000000" d="${modulePath(modules, options.border)}"/></g>`,
    `<g fill="#000000" font-family="'Noto Sans CJK KR','Noto Sans KR','Apple SD Gothic Neo','Malgun Gothic',sans-serif" font-size="${String(layout.fontSize)}" text-anchor="middle">${text}</g>`,
    "</svg>",
    "",
  ].join("\n");
}
