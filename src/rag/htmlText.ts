/*
Game Sage - HTML to text extraction
GPL-2.0-only
*/

export interface SimpleSelector {
  tag: string;
  id?: string;
  className?: string;
  /** `[attr*="value"]` substring match. */
  attrContains?: { name: string; value: string };
}

interface ElementRange {
  start: number;
  innerStart: number;
  innerEnd: number;
}

const TAG_PATTERN = /<(\/?)([a-zA-Z][a-zA-Z0-9-]*)((?:[^>"']|"[^"]*"|'[^']*')*)>/g;
const ATTR_PATTERN = /([a-zA-Z_:][-a-zA-Z0-9_:.]*)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "br", "dd", "div", "dl", "dt", "fieldset", "figcaption",
  "figure", "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6", "header", "hr", "li", "main", "nav",
  "ol", "p", "pre", "section", "table", "tbody", "td", "tfoot", "th", "thead", "tr", "ul",
]);

const NAMED_ENTITIES = new Map<string, string>([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", '"'],
  ["apos", "'"],
  ["nbsp", " "],
  ["ndash", "-"],
  ["mdash", "-"],
  ["hellip", "..."],
  ["copy", "(c)"],
  ["rsquo", "'"],
  ["lsquo", "'"],
  ["rdquo", '"'],
  ["ldquo", '"'],
]);

/** Drops comments and script/style elements with their contents. */
export function stripNonContent(html: string): string {
  return html
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<script\b[^>]*>[\s\S]*?<\/script\s*>/gi, "")
    .replace(/<style\b[^>]*>[\s\S]*?<\/style\s*>/gi, "");
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (match, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return codePointOr(Number.parseInt(body.slice(2), 16), match);
    }
    if (body.startsWith("#")) {
      return codePointOr(Number.parseInt(body.slice(1), 10), match);
    }
    return NAMED_ENTITIES.get(body.toLowerCase()) ?? match;
  });
}

function codePointOr(code: number, fallback: string): string {
  if (!Number.isFinite(code) || code < 0 || code > 0x10ffff) return fallback;
  return String.fromCodePoint(code);
}

/** Visible text of an HTML fragment. Block-level tags turn into spaces, inline tags vanish. */
export function htmlToText(fragment: string): string {
  const withoutTags = fragment.replace(TAG_PATTERN, (_match, _slash: string, name: string) =>
    BLOCK_TAGS.has(name.toLowerCase()) ? " " : "",
  );
  return decodeEntities(withoutTags);
}

export function extractTitle(html: string): string {
  const match = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i.exec(html);
  if (!match) return "Unknown Title";
  return htmlToText(match[1]).trim();
}

export function parseSelector(selector: string): SimpleSelector {
  const match = /^([a-zA-Z][a-zA-Z0-9-]*)(?:\.([-\w]+)|#([-\w]+)|\[([-\w]+)\*="([^"]*)"\])?$/.exec(selector.trim());
  if (!match) {
    throw new Error(`Unsupported selector: ${selector}`);
  }
  const [, tag, className, id, attrName, attrValue] = match;
  return {
    tag: tag.toLowerCase(),
    ...(className ? { className } : {}),
    ...(id ? { id } : {}),
    ...(attrName ? { attrContains: { name: attrName.toLowerCase(), value: attrValue } } : {}),
  };
}

export function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTR_PATTERN)) {
    const name = match[1].toLowerCase();
    if (!attributes.has(name)) {
      attributes.set(name, decodeEntities(match[2] ?? match[3] ?? match[4] ?? ""));
    }
  }
  return attributes;
}

function matchesSelector(selector: SimpleSelector, tag: string, attributes: Map<string, string>): boolean {
  if (tag !== selector.tag) return false;
  if (selector.id !== undefined && attributes.get("id") !== selector.id) return false;
  if (selector.className !== undefined) {
    const classes = (attributes.get("class") ?? "").split(/\s+/);
    if (!classes.includes(selector.className)) return false;
  }
  if (selector.attrContains) {
    const value = attributes.get(selector.attrContains.name);
    if (value === undefined || !value.includes(selector.attrContains.value)) return false;
  }
  return true;
}

/** Every element matching the selector, in document order, nested matches included. */
export function selectAll(html: string, selector: string | SimpleSelector): string[] {
  const parsed = typeof selector === "string" ? parseSelector(selector) : selector;
  const ranges: ElementRange[] = [];

  for (const match of html.matchAll(new RegExp(TAG_PATTERN.source, "g"))) {
    const [raw, slash, name, attrSource] = match;
    const start = match.index ?? 0;
    if (slash || name.toLowerCase() !== parsed.tag) continue;
    if (!matchesSelector(parsed, name.toLowerCase(), parseAttributes(attrSource))) continue;
    const innerStart = start + raw.length;
    const selfClosing = attrSource.trimEnd().endsWith("/");
    ranges.push({
      start,
      innerStart,
      innerEnd: selfClosing ? innerStart : findClosingTag(html, parsed.tag, innerStart),
    });
  }

  return ranges.map((range) => html.slice(range.innerStart, range.innerEnd));
}

export function selectFirst(html: string, selector: string | SimpleSelector): string | null {
  const [first] = selectAll(html, selector);
  return first ?? null;
}

/** Index of the close tag balancing the element opened just before `from`, or the end of input. */
function findClosingTag(html: string, tag: string, from: number): number {
  const pattern = new RegExp(`<(/?)${tag}\\b(?:[^>"']|"[^"]*"|'[^']*')*>`, "gi");
  pattern.lastIndex = from;
  let depth = 1;
  for (let match = pattern.exec(html); match; match = pattern.exec(html)) {
    if (match[1]) {
      depth -= 1;
      if (depth === 0) return match.index;
    } else if (!match[0].endsWith("/>")) {
      depth += 1;
    }
  }
  return html.length;
}

export function bodyText(html: string): string {
  const body = selectFirst(html, "body");
  return body === null ? "" : htmlToText(body);
}

const BOILERPLATE_PATTERNS: readonly RegExp[] = [
  /Advertisement\s*/gi,
  /Cookie\s*Policy\s*/gi,
  /Privacy\s*Policy\s*/gi,
  /Terms\s*of\s*Service\s*/gi,
];

const BREADCRUMB_PATTERNS: readonly RegExp[] = [/Home\s*>\s*.*?>\s*/g, /You are here:\s*.*?>\s*/g];

/** Collapses whitespace and strips ad, legal and breadcrumb boilerplate. */
export function cleanText(text: string): string {
  if (!text) return "";
  let cleaned = text.replace(/\s+/g, " ");
  for (const pattern of BOILERPLATE_PATTERNS) {
    cleaned = cleaned.replace(pattern, "");
  }
  for (const pattern of BREADCRUMB_PATTERNS) {
    cleaned = cleaned.replace(pattern, "");
  }
  return cleaned.trim();
}
