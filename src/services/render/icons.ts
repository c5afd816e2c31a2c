// Inline SVG icons used on clinic pages

const svg = (className: string, strokeWidth: number, paths: string): string =>
  `<svg class="${className}" aria-hidden="true" viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="${String(strokeWidth)}" stroke-linecap="round" stroke-linejoin="round">${paths}</svg>`;

export const ICON_PHONE = svg(
  "btn-ico",
  2,
  '<path d="M22 16.92V21a2 2 0 0 1-2.18 2 19.79 19.79 0 0 1-8.63-3.07 19.5 19.5 0 0 1-6-6A19.79 19.79 0 0 1 3 5.18 2 2 0 0 1 5 3h4.09a2 2 0 0 1 2 1.72l.57 3.23a2 2 0 0 1-.45 1.73L10 11a16 16 0 0 0 6.73 6.73l1.32-1.21a2 2 0 0 1 1.73-.45l3.23.57a2 2 0 0 1 1.72 2z"/>'
);

export const ICON_MAP = svg(
  "btn-ico",
  2,
  '<path d="M12 21s7-4.35 7-10a7 7 0 0 0-14 0c0 5.65 7 10 7 10z"/><circle cx="12" cy="11" r="3"/>'
);

export const ICON_HOME = svg(
  "btn-ico",
  2,
  '<path d="M3 11l9-8 9 8"/><path d="M5 10v10h14V10"/><path d="M9 20v-6h6v6"/>'
);

export const ICON_SEAL = svg(
  "seal-ico",
  2,
  '<circle cx="12" cy="12" r="9"/><path d="M8.5 12l2.5 2.5 4.5-4.5"/>'
);

export const ICON_CHECK = svg(
  "check-ico",
  3,
  '<polyline points="20 6 9 17 4 12"/>'
);
