const BODY_OPEN = "<body";
const BODY_CLOSE = "</body>";

const scriptBlock = /<script[^>]*>[\s\S]*?<\/script>/gi;
const styleBlock = /<style[^>]*>[\s\S]*?<\/style>/gi;
const markupTag = /<[^>]+>/g;
const entity = /&(nbsp|amp|lt|gt);/g;

const entities: Record<string, string> = {
  nbsp: " ",
  amp: "&",
  lt: "<",
  gt: ">",
};

/**
 * Returns the `<body …>…</body>` slice, or the whole document when either marker is missing.
 */
export const isolateBody = (html: string): string => {
  const lowered = html.toLowerCase();
  const start = lowered.indexOf(BODY_OPEN);
  if (start < 0) {
    return html;
  }

  const end = lowered.indexOf(BODY_CLOSE, start);
  if (end < 0) {
    return html;
  }

  return html.slice(start, end + BODY_CLOSE.length);
};

/**
 * Mechanical cleanup only; navigation and boilerplate text survive and are left to the extractor.
 */
export const stripMarkup = (html: string): string =>
  html
    .replace(scriptBlock, "")
    .replace(styleBlock, "")
    .replace(markupTag, " ")
    .replace(entity, (_match, name: string) => entities[name] ?? "")
    .replace(/\s+/g, " ")
    .trim();

export const htmlToNearText = (html: string): string =>
  stripMarkup(isolateBody(html));
