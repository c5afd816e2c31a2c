/**
 * Static site pages: one landing page per clinic id, root index, 404 and
 * the outbox download index.
 */

import {
  displayOrDash,
  escapeHtml,
  homepageHref,
  homepageLabel,
  mapSearchUrl,
  telDigits,
  topicParticle,
} from "./html.js";
import { ICON_CHECK, ICON_HOME, ICON_MAP, ICON_PHONE, ICON_SEAL } from "./icons.js";
import { renderLayout, type LayoutConfig } from "./layout.js";

import type { AppConfig } from "../../config/index.js";
import type { ClinicStatus } from "../../types/index.js";

export type PageConfig = LayoutConfig &
  Pick<
    AppConfig,
    "year" | "associationName" | "messageActive" | "messageInactive"
  >;

export interface ClinicPageInput {
  clinicId: string;
  clinicName: string;
  status: ClinicStatus;
  address: string;
  phone: string;
  director: string;
  homepage: string;
}

const EXTERNAL_LINKS = [
  { label: "대한치과의사협회", url: "https://www.kda.or.kr" },
] as const;

const ASSOCIATION_VALUES = [
  { head: "윤리 진료 준수", desc: "원칙을 지키는 책임 진료" },
  { head: "지속적인 학술 활동", desc: "정기 학술대회 및 최신 임상 교육 이수" },
  { head: "지역사회 공헌", desc: "시민 구강검진, 취약계층 봉사활동 참여" },
] as const;

// ============================================================================
// Fragments
// ============================================================================

const NEW_TAB = 'target="_blank" rel="noopener noreferrer"';

function phoneValue(phone: string): string {
  const raw = phone.trim();
  if (raw === "") return "-";
  const digits = telDigits(raw);
  if (digits === "") return escapeHtml(raw);
  return `<a href="${escapeHtml(`tel:${digits}`)}" class="tel-link">${escapeHtml(raw)}</a>`;
}

function addressValue(address: string): string {
  const raw = address.trim();
  const url = mapSearchUrl(raw);
  if (url === null) return "-";
  return `<a href="${escapeHtml(url)}" class="map-link" ${NEW_TAB}>${escapeHtml(raw)}</a>`;
}

function homepageValue(homepage: string): string {
  const raw = homepage.trim();
  if (raw === "") return "-";
  const href = homepageHref(raw);
  if (href === null) return escapeHtml(raw);
  return `<a href="${escapeHtml(href)}" ${NEW_TAB}>${escapeHtml(homepageLabel(href))}</a>`;
}

function infoItem(label: string, value: string, valueClass = "value"): string {
  return (
    '<div class="info-item">' +
    `<span class="label">${label}</span>` +
    `<span class="${valueClass}">${value}</span>` +
    "</div>"
  );
}

function ctaButtons(clinic: ClinicPageInput): string[] {
  const idAttr = escapeHtml(clinic.clinicId);
  const buttons: string[] = [];

  const digits = telDigits(clinic.phone);
  if (digits !== "") {
    buttons.push(
      `<a href="${escapeHtml(`tel:${digits}`)}" class="btn btn-primary" data-analytics-event="click_call" data-clinic-id="${idAttr}">${ICON_PHONE}<span>전화상담</span></a>`
    );
  }

  // The map falls back to the clinic name when no address is known
  const query = clinic.address.trim() !== "" ? clinic.address : clinic.clinicName;
  const mapUrl = mapSearchUrl(query);
  if (mapUrl !== null) {
    buttons.push(
      `<a href="${escapeHtml(mapUrl)}" class="btn btn-secondary" ${NEW_TAB} data-analytics-event="click_map" data-clinic-id="${idAttr}">${ICON_MAP}<span>지도보기</span></a>`
    );
  }

  const href = homepageHref(clinic.homepage);
  if (href !== null) {
    buttons.push(
      `<a href="${escapeHtml(href)}" class="btn btn-tertiary" ${NEW_TAB} data-analytics-event="click_homepage" data-clinic-id="${idAttr}">${ICON_HOME}<span>홈페이지</span></a>`
    );
  }

  return buttons;
}

function footer(config: PageConfig, validity: string, updatedAt: string): string {
  const links = EXTERNAL_LINKS.map(
    (link) =>
      `<div class="link-item"><a href="${escapeHtml(link.url)}" ${NEW_TAB}>${escapeHtml(link.label)}</a></div>`
  ).join("");

  return (
    '<footer class="section-footer">' +
    `<p class="footer-msg">본 페이지는 <strong>${escapeHtml(config.associationName)}</strong>가<br>공식 정보를 보증하는 의료기관 안내입니다.</p>` +
    '<div class="footer-meta">' +
    `<span>인증기간: ${escapeHtml(validity)}</span>` +
    `<span>Updated: ${escapeHtml(updatedAt)}</span>` +
    "</div>" +
    `<div class="link-list">${links}</div>` +
    "</footer>"
  );
}

// ============================================================================
// Pages
// ============================================================================

/**
 * Landing page behind a clinic's QR code. INACTIVE clinics keep their page
 * so printed codes still resolve, but show the inactive message instead of
 * the membership statement.
 */
export function renderClinicPage(
  config: PageConfig,
  clinic: ClinicPageInput,
  updatedAt: string
): string {
  const isActive = clinic.status === "ACTIVE";
  const year = String(config.year);
  const validity = `${year}-01-01 ~ ${year}-12-31`;
  const safeName = escapeHtml(clinic.clinicName);
  const association = escapeHtml(config.associationName);

  const statusMessage = isActive
    ? '<div class="status-message success">' +
      `<p class="main-msg"><strong>${safeName}</strong>${topicParticle(clinic.clinicName)} ${year}년<br><strong>'${association}'</strong> 정회원입니다.</p>` +
      `<p class="sub-msg">${escapeHtml(config.messageActive)}</p>` +
      "</div>"
    : '<div class="status-message warning">' +
      '<p class="main-msg">현재 정회원으로 확인되지 않습니다.</p>' +
      `<p class="sub-msg">${escapeHtml(config.messageInactive)}</p>` +
      "</div>";

  const brandMeta =
    '<div class="brand-meta">' +
    (isActive
      ? `<span class="badge active">정회원</span><span class="seal">${ICON_SEAL}공식 인증</span>`
      : '<span class="badge inactive">미확인</span>') +
    "</div>";

  const buttons = ctaButtons(clinic);
  const actionSection =
    buttons.length > 0
      ? '<section class="section-action">' +
        `<div class="cta-row">${buttons.join("")}</div>` +
        (isActive
          ? '<p class="action-guide">진료 문의 및 예약은 위 버튼을 이용하세요.</p>'
          : "") +
        "</section>"
      : "";

  const values = ASSOCIATION_VALUES.map(
    (value) =>
      '<li class="value-item">' +
      `<div class="value-icon-box">${ICON_CHECK}</div>` +
      '<div class="value-text">' +
      `<strong class="value-head">${value.head}</strong>` +
      `<span class="value-desc">${value.desc}</span>` +
      "</div>" +
      "</li>"
  ).join("");

  const body =
    `<div class="page-container" data-page-type="clinic" data-clinic-id="${escapeHtml(clinic.clinicId)}">` +
    '<header class="section-brand">' +
    `<h1 class="clinic-title">${safeName}</h1>` +
    brandMeta +
    `<p class="validity-inline">인증기간: ${escapeHtml(validity)}</p>` +
    "</header>" +
    actionSection +
    statusMessage +
    '<section class="card info-card"><div class="info-grid">' +
    infoItem("대표원장", escapeHtml(displayOrDash(clinic.director))) +
    infoItem("전화번호", phoneValue(clinic.phone), "value phone") +
    infoItem("주소", addressValue(clinic.address)) +
    infoItem("홈페이지", homepageValue(clinic.homepage)) +
    "</div></section>" +
    '<section class="card value-card">' +
    `<h2 class="section-title">${association}가 보증하는 가치</h2>` +
    `<ul class="value-list">${values}</ul>` +
    "</section>" +
    footer(config, validity, updatedAt) +
    "</div>";

  return renderLayout(config, clinic.clinicName, body);
}

export function renderRootIndex(config: LayoutConfig): string {
  const body =
    '<div class="card empty-state">' +
    '<div class="icon-area">QR</div>' +
    "<h1>안내 페이지</h1>" +
    "<p>치과별 QR 코드 전용 안내 페이지입니다.<br>개별 QR 코드를 스캔해주세요.</p>" +
    "</div>";
  return renderLayout(config, "QR 안내", body);
}

export function renderNotFound(config: LayoutConfig): string {
  const body =
    '<div class="card empty-state error">' +
    '<div class="icon-area">!</div>' +
    "<h1>유효하지 않은 코드</h1>" +
    "<p>요청하신 페이지를 찾을 수 없거나<br>잘못된 접근입니다.</p>" +
    "</div>";
  return renderLayout(config, "페이지 없음", body);
}

/**
 * Download page of the outbox: the send list plus one link per ZIP
 */
export function renderOutboxIndex(
  config: LayoutConfig,
  updatedAt: string,
  zipNames: readonly string[]
): string {
  const items =
    zipNames.length > 0
      ? zipNames
          .map(
            (name) =>
              `<li><a href="zips/${escapeHtml(encodeURIComponent(name))}" class="file-link"><span class="file-icon">ZIP</span> ${escapeHtml(name)}</a></li>`
          )
          .join("")
      : '<li class="empty-list">다운로드 가능한 파일이 없습니다.</li>';

  const body =
    '<div class="card">' +
    '<h1 class="page-title">Outbox 다운로드</h1>' +
    `<p class="meta-info">최종 업데이트: ${escapeHtml(updatedAt)}</p>` +
    '<div class="action-area"><a href="sendlist.csv" class="btn btn-primary">sendlist.csv 다운로드</a></div>' +
    "</div>" +
    '<div class="card">' +
    '<h2 class="section-title">파일 목록</h2>' +
    `<ul class="zip-list">${items}</ul>` +
    "</div>";
  return renderLayout(config, "Outbox 다운로드", body);
}
