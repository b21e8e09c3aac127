import { TOKEN_GUARDS } from '../config/defaults.js';

// Script, style and inline SVG bodies carry no locator value and
// dominate page size.
const NOISE_TAGS = ['script', 'style', 'svg', 'noscript'] as const;

export function cleanMarkup(html: string): string {
  let cleaned = html;
  for (const tag of NOISE_TAGS) {
    cleaned = cleaned.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?</${tag}>`, 'gi'), '');
  }
  return cleaned.replace(/<!--[\s\S]*?-->/g, '');
}

/** Trim markup for the planner prompt, keeping the head of the document. */
export function truncateMarkup(
  html: string,
  limit: number = TOKEN_GUARDS.MAX_MARKUP_CHARS,
): string {
  if (html.length <= limit) return html;
  return `${html.slice(0, limit)}\n<!-- truncated ${String(html.length - limit)} chars -->`;
}
