/**
 * Minimal Atom/RSS parsing: enough for the well-formed quote news feeds we
 * read, not a general XML parser.
 */

export interface FeedItem {
  title: string;
  description?: string;
  url?: string;
  publishedAt: string; // ISO8601, "" when the feed gives no parseable date
}

function stripCdata(input: string): string {
  return input.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, "$1");
}

export function decodeHtmlEntities(input: string): string {
  return input
    .replace(/&nbsp;/gi, " ")
    .replace(/&amp;/gi, "&")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/g, "'")
    .replace(/&#x([0-9a-fA-F]+);/g, (match, h: string) =>
      fromCodePoint(parseInt(h, 16), match)
    )
    .replace(/&#(\d+);/g, (match, d: string) =>
      fromCodePoint(parseInt(d, 10), match)
    );
}

function fromCodePoint(code: number, fallback: string): string {
  return code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

/**
 * Plain text of a feed field. Escaped markup such as `&lt;b&gt;` is dropped
 * once decoded; a bare `&lt;` or `&gt;` in prose is kept.
 */
export function sanitizeText(input: string): string {
  if (!input) return "";
  const noHtml = stripCdata(input).replace(/<[^>]+>/g, " ");
  const decoded = decodeHtmlEntities(noHtml);
  return decoded
    .replace(/<\/?[a-z][^<>]*>/gi, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function tag(block: string, name: string): string | undefined {
  const match = block.match(
    new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`)
  );
  return match?.[1]?.trim();
}

function toIso(raw: string | undefined): string {
  if (!raw) return "";
  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? "" : new Date(ms).toISOString();
}

function optional(value: string): string | undefined {
  return value.length > 0 ? value : undefined;
}

export function parseFeed(xml: string): FeedItem[] {
  const entries = xml.match(/<entry[\s\S]*?<\/entry>/g) ?? [];
  if (entries.length > 0) {
    return entries.map(block => ({
      title: sanitizeText(tag(block, "title") ?? ""),
      description: optional(
        sanitizeText(tag(block, "summary") ?? tag(block, "content") ?? "")
      ),
      url:
        block.match(/<link[^>]*?href="([^"]+)"/)?.[1] ?? tag(block, "link"),
      publishedAt: toIso(tag(block, "updated") ?? tag(block, "published")),
    }));
  }

  const items = xml.match(/<item[\s\S]*?<\/item>/g) ?? [];
  return items.map(block => ({
    title: sanitizeText(tag(block, "title") ?? ""),
    description: optional(
      sanitizeText(
        tag(block, "description") ?? tag(block, "content:encoded") ?? ""
      )
    ),
    url: optional(sanitizeText(tag(block, "link") ?? "")),
    publishedAt: toIso(tag(block, "pubDate") ?? tag(block, "dc:date")),
  }));
}
