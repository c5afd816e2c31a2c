import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { escapeHtml } from "./html.js";

import type { AppConfig } from "../../config/index.js";

export type LayoutConfig = Pick<
  AppConfig,
  "noindex" | "analyticsProvider" | "ga4MeasurementId"
>;

const SITE_CSS_PATH = fileURLToPath(
  new URL("../../../templates/site.css", import.meta.url)
);

let siteCss: string | undefined;

function loadSiteCss(): string {
  siteCss ??= readFileSync(SITE_CSS_PATH, "utf8").trim();
  return siteCss;
}

function renderRobots(noindex: boolean): string {
  return noindex ? '<meta name="robots" content="noindex,nofollow">' : "";
}

/**
 * gtag snippet reporting qr_view and click_* events, keyed by clinic id only
 */
export function renderAnalytics(config: LayoutConfig): string {
  const measurementId = config.ga4MeasurementId.trim();
  if (config.analyticsProvider !== "ga4" || measurementId === "") {
    return "";
  }

  const idAttr = escapeHtml(measurementId);
  const idJs = JSON.stringify(measurementId).replace(/</g, "\\u003c");
  return [
    `<script async src="https://www.googletagmanager.com/gtag/js?id=${idAttr}"></script>`,
    "<script>",
    "window.dataLayer = window.dataLayer || [];",
    "function gtag(){dataLayer.push(arguments);}",
    "gtag('js', new Date());",
    `gtag('config', ${idJs}, {'anonymize_ip': true});`,
    "document.addEventListener('DOMContentLoaded', function(){",
    "var container=document.querySelector('[data-page-type=\"clinic\"]');",
    "if (!container) {return;}",
    "var clinicId=container.getAttribute('data-clinic-id')||'';",
    "if (!clinicId) {return;}",
    "gtag('event','qr_view',{clinic_id:clinicId});",
    "container.querySelectorAll('[data-analytics-event]').forEach(function(el){",
    "el.addEventListener('click', function(){",
    "gtag('event', el.getAttribute('data-analytics-event'), {clinic_id:clinicId});",
    "});",
    "});",
    "});",
    "</script>",
  ].join("");
}

/**
 * Full HTML document around a page body. `title` is escaped here.
 */
export function renderLayout(
  config: LayoutConfig,
  title: string,
  body: string
): string {
  return [
    "<!doctype html>",
    '<html lang="ko">',
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    renderRobots(config.noindex),
    `<title>${escapeHtml(title)}</title>`,
    `<style>${loadSiteCss()}</style>`,
    renderAnalytics(config),
    "</head>",
    "<body>",
    '<main class="wrap">',
    body,
    "</main>",
    "</body>",
    "</html>",
    "\n",
  ].join("");
}
