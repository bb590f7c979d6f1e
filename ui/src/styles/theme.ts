/**
 * Default dropdown stylesheet, injected once as a <style> tag.
 *
 * Colors come from CSS custom properties so a host page can restyle the
 * widget without touching the class-name contract.
 */

export const DROPDOWN_TOKENS = [
  "--dropdown-bg",
  "--dropdown-border",
  "--dropdown-text",
  "--dropdown-muted",
  "--dropdown-accent",
  "--dropdown-hover",
  "--dropdown-radius",
] as const;

export type DropdownToken = (typeof DROPDOWN_TOKENS)[number];

const DEFAULT_TOKENS: Record<DropdownToken, string> = {
  "--dropdown-bg": "#fff",
  "--dropdown-border": "#9e9e9e",
  "--dropdown-text": "#1f1f1f",
  "--dropdown-muted": "#757575",
  "--dropdown-accent": "#2962ff",
  "--dropdown-hover": "rgba(41, 98, 255, 0.08)",
  "--dropdown-radius": "8px",
};

const STYLE_ID = "dropdown-style";
const KNOWN_TOKENS = new Set<string>(DROPDOWN_TOKENS);

const BASE_CSS = `
.dropdown-header { display:flex; align-items:center; width:100%; padding:12px; gap:8px;
  border:1px solid var(--dropdown-border); border-radius:var(--dropdown-radius);
  background:var(--dropdown-bg); color:var(--dropdown-text); font-size:16px; cursor:pointer; }
.dropdown-header.disabled { opacity:0.5; cursor:default; }
.dropdown-header-text { flex:1; overflow:hidden; text-overflow:ellipsis; white-space:nowrap; text-align:left; }
.dropdown-header-text.placeholder { color:var(--dropdown-muted); }
.dropdown-panel { display:flex; flex-direction:column; height:100%; padding:8px 0; box-sizing:border-box;
  background:var(--dropdown-bg); border-radius:var(--dropdown-radius); box-shadow:0 2px 8px rgba(0,0,0,0.2); }
.dropdown-search { display:flex; align-items:center; gap:6px; margin:4px 12px; padding:4px 8px;
  border:1px solid var(--dropdown-border); border-radius:var(--dropdown-radius); }
.dropdown-search-input { flex:1; border:none; outline:none; background:transparent; color:var(--dropdown-text); }
.dropdown-search-clear { border:none; background:none; cursor:pointer; color:var(--dropdown-muted); }
.dropdown-body-slot { flex:1; overflow-y:auto; }
.dropdown-list { list-style:none; margin:0; padding:0; }
.dropdown-item { display:flex; align-items:center; gap:12px; padding:12px 16px; cursor:pointer; }
.dropdown-row.active .dropdown-item, .dropdown-item:hover { background:var(--dropdown-hover); }
.dropdown-panel:not(.multiple) .dropdown-item.selected { background:var(--dropdown-hover); font-weight:bold; }
.dropdown-item-label { flex:1; }
.dropdown-item-check, .dropdown-item.selected .dropdown-item-checkbox { color:var(--dropdown-accent); }
.dropdown-loading, .dropdown-error, .empty-state { display:flex; flex-direction:column; align-items:center;
  justify-content:center; height:100%; gap:8px; color:var(--dropdown-muted); }
.dropdown-loading.compact { height:auto; padding:8px; }
.dropdown-retry { border:none; background:none; color:var(--dropdown-accent); cursor:pointer; }
.dropdown-done { width:100%; padding:12px 0; border:none; border-top:1px solid var(--dropdown-border);
  background:none; color:var(--dropdown-accent); font-weight:bold; cursor:pointer; }
.dropdown-sentinel { height:1px; }
.hidden { display:none !important; }
`;

/** Compile token overrides to a :root rule, ignoring unknown names. */
export function compileTokens(tokens: Partial<Record<string, string>>): string {
  const merged: Record<string, string> = { ...DEFAULT_TOKENS };
  for (const [k, v] of Object.entries(tokens)) {
    if (v !== undefined && KNOWN_TOKENS.has(k)) merged[k] = v;
  }
  const entries = Object.entries(merged)
    .map(([k, v]) => `  ${k}: ${v};`)
    .join("\n");
  return `:root {\n${entries}\n}`;
}

/** Inject (or update) the dropdown stylesheet in document.head. */
export function injectDropdownStyles(tokens: Partial<Record<DropdownToken, string>> = {}): HTMLStyleElement {
  let styleEl = document.getElementById(STYLE_ID);
  if (!(styleEl instanceof HTMLStyleElement)) {
    styleEl = document.createElement("style");
    styleEl.id = STYLE_ID;
    document.head.appendChild(styleEl);
  }
  styleEl.textContent = `${compileTokens(tokens)}\n${BASE_CSS}`;
  return styleEl;
}
