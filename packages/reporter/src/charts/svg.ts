/**
 * String builders for the small subset of SVG the charts need.
 */

export type SvgAttributes = Record<string, string | number | undefined>;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Two decimals at most; keeps the markup short for large sample sets. */
export function coord(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function attributes(attrs: SvgAttributes): string {
  return Object.entries(attrs)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => {
      const rendered = typeof value === 'number' ? coord(value) : escapeXml(value);
      return ` ${key}="${rendered}"`;
    })
    .join('');
}

export function element(tag: string, attrs: SvgAttributes, content?: string): string {
  if (content === undefined) {
    return `<${tag}${attributes(attrs)}/>`;
  }
  return `<${tag}${attributes(attrs)}>${content}</${tag}>`;
}

export function text(x: number, y: number, content: string, attrs: SvgAttributes = {}): string {
  return element('text', { x, y, ...attrs }, escapeXml(content));
}

export function line(x1: number, y1: number, x2: number, y2: number, attrs: SvgAttributes = {}): string {
  return element('line', { x1, y1, x2, y2, ...attrs });
}

export function rect(x: number, y: number, width: number, height: number, attrs: SvgAttributes = {}): string {
  return element('rect', { x, y, width, height, ...attrs });
}

export function polyline(points: ReadonlyArray<readonly [number, number]>, attrs: SvgAttributes = {}): string {
  const serialized = points.map(([x, y]) => `${coord(x)},${coord(y)}`).join(' ');
  return element('polyline', { points: serialized, fill: 'none', ...attrs });
}

export function svgDocument(
  width: number,
  height: number,
  title: string,
  body: readonly string[],
  attrs: SvgAttributes = {}
): string {
  const open = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}"${attributes(attrs)}>`;
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    open,
    `<title>${escapeXml(title)}</title>`,
    rect(0, 0, width, height, { fill: 'white' }),
    ...body,
    '</svg>',
    '',
  ].join('\n');
}
