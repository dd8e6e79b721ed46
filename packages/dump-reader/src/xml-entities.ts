const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;
const ENTITY_REGEX = /&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g;

/** Decode the XML predefined entities and numeric character references in one pass. */
export function decodeXmlEntities(text: string): string {
  if (!text.includes("&")) return text;

  return text.replace(ENTITY_REGEX, (match: string, body: string) => {
    if (body.startsWith("#")) {
      const codePoint = body.startsWith("#x")
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[body] ?? match;
  });
}
