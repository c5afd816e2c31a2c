import { describe, it, expect } from "vitest";

import {
  renderClinicPage,
  renderNotFound,
  renderOutboxIndex,
  renderRootIndex,
  type ClinicPageInput,
  type PageConfig,
} from "../../../../src/services/render/index.js";

const CONFIG: PageConfig = {
  year: 2026,
  associationName: "테스트 치과의사회",
  messageActive: "active-message",
  messageInactive: "inactive-message",
  noindex: true,
  analyticsProvider: "none",
  ga4MeasurementId: "",
};

const CLINIC: ClinicPageInput = {
  clinicId: "SJ26-0001",
  clinicName: "가나치과",
  status: "ACTIVE",
  address: "세종시 한누리대로 1",
  phone: "044-123-4567",
  director: "김원장",
  homepage: "gana.example.kr",
};

const UPDATED_AT = "2026-03-01T09:00:00+09:00";

describe("services/render/pages", () => {
  describe("renderClinicPage", () => {
    it("should render an active clinic with its details and actions", () => {
      const html = renderClinicPage(CONFIG, CLINIC, UPDATED_AT);

      expect(html.startsWith("<!doctype html>")).toBe(true);
      expect(html.endsWith("</html>\n")).toBe(true);
      expect(html).toContain("<title>가나치과</title>");
      expect(html).toContain('<h1 class="clinic-title">가나치과</h1>');
      expect(html).toContain('data-clinic-id="SJ26-0001"');
      expect(html).toContain('<p class="sub-msg">active-message</p>');
      expect(html).toContain('<span class="badge active">정회원</span>');
      expect(html).toContain('href="tel:0441234567"');
      expect(html).toContain('href="https://gana.example.kr"');
      expect(html).toContain("인증기간: 2026-01-01 ~ 2026-12-31");
      expect(html).toContain(`Updated: ${UPDATED_AT}`);
      expect(html).toContain('<meta name="robots" content="noindex,nofollow">');
      expect(html).not.toContain("inactive-message");
    });

    it("should render an inactive clinic with the inactive message", () => {
      const html = renderClinicPage(CONFIG, { ...CLINIC, status: "INACTIVE" }, UPDATED_AT);

      expect(html).toContain('<p class="sub-msg">inactive-message</p>');
      expect(html).toContain('<span class="badge inactive">미확인</span>');
      expect(html).not.toContain('<p class="sub-msg">active-message</p>');
    });

    it("should escape every spreadsheet value", () => {
      const html = renderClinicPage(
        CONFIG,
        {
          ...CLINIC,
          clinicName: "<script>alert(1)</script>",
          director: '"김" & 이',
        },
        UPDATED_AT
      );

      expect(html).toContain("&lt;script&gt;alert(1)&lt;/script&gt;");
      expect(html).toContain("&quot;김&quot; &amp; 이");
      expect(html).not.toContain("<script>");
    });

    it("should not link homepages with a foreign scheme", () => {
      const html = renderClinicPage(
        CONFIG,
        { ...CLINIC, homepage: "javascript:alert(1)" },
        UPDATED_AT
      );

      expect(html).not.toContain('href="javascript:');
      expect(html).not.toContain("click_homepage");
    });

    it("should fall back to the clinic name for the map search", () => {
      const html = renderClinicPage(CONFIG, { ...CLINIC, address: "" }, UPDATED_AT);

      expect(html).toContain(
        `href="https://map.naver.com/v5/search/${encodeURIComponent("가나치과")}"`
      );
    });

    it("should include the analytics snippet only for ga4", () => {
      const html = renderClinicPage(
        { ...CONFIG, analyticsProvider: "ga4", ga4MeasurementId: "G-TEST123" },
        CLINIC,
        UPDATED_AT
      );

      expect(html).toContain("https://www.googletagmanager.com/gtag/js?id=G-TEST123");
      expect(html).toContain(`gtag('config', "G-TEST123", {'anonymize_ip': true});`);
    });

    it("should omit the robots meta when indexing is allowed", () => {
      const html = renderClinicPage({ ...CONFIG, noindex: false }, CLINIC, UPDATED_AT);

      expect(html).not.toContain('name="robots"');
    });
  });

  it("should render the root index and the not-found page", () => {
    expect(renderRootIndex(CONFIG)).toContain("<h1>안내 페이지</h1>");
    expect(renderNotFound(CONFIG)).toContain("<h1>유효하지 않은 코드</h1>");
  });

  describe("renderOutboxIndex", () => {
    it("should link every archive and the send list", () => {
      const html = renderOutboxIndex(CONFIG, UPDATED_AT, ["SJ26-0001_smile.zip"]);

      expect(html).toContain('href="zips/SJ26-0001_smile.zip"');
      expect(html).toContain('href="sendlist.csv"');
      expect(html).toContain(`최종 업데이트: ${UPDATED_AT}`);
    });

    it("should say so when there is nothing to download", () => {
      expect(renderOutboxIndex(CONFIG, UPDATED_AT, [])).toContain(
        "다운로드 가능한 파일이 없습니다."
      );
    });
  });
});
