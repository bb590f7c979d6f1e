const svg = (body: string, size = 16) =>
  `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2" stroke-linecap="round" stroke-linejoin="round">${body}</svg>`;

export const CHEVRON_DOWN_ICON = svg(`<path d="m6 9 6 6 6-6"/>`);
export const SEARCH_ICON = svg(`<circle cx="11" cy="11" r="8"/><path d="m21 21-4.3-4.3"/>`, 14);
export const CLOSE_ICON = svg(`<path d="M18 6 6 18"/><path d="m6 6 12 12"/>`, 14);
export const CHECK_ICON = svg(`<path d="M20 6 9 17l-5-5"/>`);
export const CHECKBOX_ICON = svg(`<rect width="18" height="18" x="3" y="3" rx="2"/>`);
export const CHECKBOX_CHECKED_ICON = svg(`<rect width="18" height="18" x="3" y="3" rx="2"/><path d="m9 12 2 2 4-4"/>`);
