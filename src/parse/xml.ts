import { XMLParser, XMLValidator } from 'fast-xml-parser';

export type XmlNode = { [key: string]: unknown };

const ARRAY_TAGS = new Set([
  'PubmedArticle',
  'Author',
  'AffiliationInfo',
  'Affiliation',
  'ArticleId',
  'ArticleDate',
  'Email',
  'Id',
]);

/** Elements that may carry inline markup (`<i>`, `<sup>`, ...); kept as raw inner XML. */
const MARKUP_TAGS = ['ArticleTitle', 'VernacularTitle', 'Affiliation'];

export const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  // PMIDs must stay strings ("00123" is not 123).
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
  stopNodes: MARKUP_TAGS.map((tag) => `*.${tag}`),
  isArray: (name: string) => ARRAY_TAGS.has(name),
});

const fragmentParser = new XMLParser({
  parseTagValue: false,
  trimValues: true,
  htmlEntities: true,
});

export function validateXml(xml: string): string | null {
  const result = XMLValidator.validate(xml);
  if (result === true) return null;
  return `${result.err.msg} (line ${result.err.line}, column ${result.err.col})`;
}

export function isNode(v: unknown): v is XmlNode {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function child(node: unknown, key: string): unknown {
  if (Array.isArray(node)) return child(node[0], key);
  return isNode(node) ? node[key] : undefined;
}

export function children(node: unknown, key: string): unknown[] {
  const v = child(node, key);
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function path(node: unknown, ...keys: string[]): unknown {
  return keys.reduce<unknown>((acc, key) => child(acc, key), node);
}

export function attr(node: unknown, name: string): string | undefined {
  const v = child(node, `@_${name}`);
  return typeof v === 'string' ? v : undefined;
}

/**
 * Text of an element kept raw by `stopNodes`: inline tags are dropped in place, so
 * `CD4<sup>+</sup>` reads `CD4+`, and entities are decoded.
 */
export function markupText(v: unknown): string {
  const raw = typeof v === 'string' ? v : child(v, '#text');
  if (typeof raw !== 'string' || !raw.trim()) return '';
  const stripped = raw.replace(/<[^>]*>/g, '');
  const decoded: unknown = fragmentParser.parse(`<t>${stripped}</t>`);
  return textOf(child(decoded, 't'));
}

/** Text content of an element with entities already decoded by the parser. */
export function textOf(v: unknown): string {
  if (v === undefined || v === null) return '';
  if (typeof v === 'string') return v.replace(/\s+/g, ' ').trim();
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (Array.isArray(v)) return v.map(textOf).filter(Boolean).join(' ');
  if (isNode(v)) {
    return Object.entries(v)
      .filter(([key]) => !key.startsWith('@_'))
      .map(([, value]) => textOf(value))
      .filter(Boolean)
      .join(' ');
  }
  return '';
}
