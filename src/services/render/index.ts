export {
  displayOrDash,
  escapeHtml,
  homepageHref,
  homepageLabel,
  mapSearchUrl,
  telDigits,
  topicParticle,
} from "./html.js";
export { renderAnalytics, renderLayout, type LayoutConfig } from "./layout.js";
export {
  renderClinicPage,
  renderNotFound,
  renderOutboxIndex,
  renderRootIndex,
  type ClinicPageInput,
  type PageConfig,
} from "./pages.js";
