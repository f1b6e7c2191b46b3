/**
 * Markup stripping for HTML/XHTML documents.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  nbsp: "\u00a0",
  shy: "\u00ad",
  ndash: "–",
  mdash: "—",
  hellip: "…",
  laquo: "«",
  raquo: "»",
};

/** Decode named and numeric character references. Unknown names stay as written. */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (whole, ref: string) => {
    if (ref[0] === "#") {
      const hex = ref[1] === "x" || ref[1] === "X";
      const code = parseInt(ref.slice(hex ? 2 : 1), hex ? 16 : 10);
      return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? whole;
  });
}

/**
 * Strip tags from an HTML/XHTML document, returning readable plain text.
 *
 * Non-content elements (scripts, styles, head, page headers and footers,
 * navigation) are dropped with their contents. Block-level closings become
 * line breaks.
 */
export function stripMarkup(raw: string): string {
  let text = raw;
  text = text.replace(/<!--[\s\S]*?-->/g, "");
  text = text.replace(/<!\[CDATA\[[\s\S]*?\]\]>/g, "");
  text = text.replace(/<\?[\s\S]*?\?>/g, "");
  text = text.replace(/<!DOCTYPE[^>]*>/gi, "");
  text = text.replace(/<(script|style|head|header|footer|nav)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, " ");
  text = text.replace(/<br\s*\/?>/gi, "\n");
  text = text.replace(/<\/(p|div|h[1-6]|li|tr|blockquote|section|article)\s*>/gi, "\n");
  text = text.replace(/<[^>]+>/g, " ");
  text = decodeEntities(text);
  text = text.replace(/[ \t\u00a0]+/g, " ");
  text = text.replace(/ *\n */g, "\n");
  text = text.replace(/\n{3,}/g, "\n\n");
  return text.trim();
}
