/**
 * Minimal XML helpers for list responses.
 */

/**
 * Text of the first `<tag>` element, attributes allowed, entities decoded.
 */
export function extractElement(xml: string, tag: string): string | undefined {
  const regex = new RegExp(`<${tag}(?:\\s[^>]*)?>([^<]*)</${tag}>`);
  const match = regex.exec(xml);
  return match?.[1] === undefined ? undefined : unescapeXml(match[1]);
}

/**
 * Inner XML of every `<tag>` element.
 */
export function extractBlocks(xml: string, tag: string): string[] {
  const regex = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`, 'g');
  const blocks: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(xml)) !== null) {
    blocks.push(match[1] ?? '');
  }
  return blocks;
}

/**
 * Decode the predefined XML entities and numeric character references.
 */
export function unescapeXml(str: string): string {
  return str.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|amp|lt|gt|quot|apos);/g, (entity, body: string) => {
    switch (body) {
      case 'amp':
        return '&';
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      case 'quot':
        return '"';
      case 'apos':
        return "'";
      default: {
        const codePoint = body.startsWith('#x') ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
        return Number.isNaN(codePoint) ? entity : String.fromCodePoint(codePoint);
      }
    }
  });
}

/**
 * Encode each `/`-separated segment of an object key for use in a URL path.
 */
export function encodeKeyPath(key: string): string {
  return key
    .split('/')
    .map((segment) => encodeRfc3986(segment))
    .join('/');
}

/**
 * `encodeURIComponent` plus the reserved characters it leaves alone.
 */
export function encodeRfc3986(str: string): string {
  return encodeURIComponent(str).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}
