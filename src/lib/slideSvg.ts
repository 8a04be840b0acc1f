/**
 * SVG markup for carousel slides, rasterized by sharp.
 */

export const SLIDE_WIDTH = 1080;
export const SLIDE_HEIGHT = 1350;

export const TITLE_FONT_SIZE = 44;
export const BODY_FONT_SIZE = 64;
export const BODY_LINE_HEIGHT = 84;
export const SLIDE_MARGIN = 96;

export interface SlideTheme {
  background: string;
  text: string;
  accent: string;
  fontFamily: string;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Greedy word wrap to at most `maxChars` per line.
 * A word longer than a line gets a line of its own.
 */
export function wrapText(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= maxChars) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/** Characters per body line, from a conservative glyph width estimate. */
export function bodyLineChars(width: number = SLIDE_WIDTH): number {
  const charWidth = BODY_FONT_SIZE * 0.55;
  return Math.floor((width - SLIDE_MARGIN * 2) / charWidth);
}

export interface SlideSvgInput {
  title: string;
  body: string;
  /** 1-based position, shown as "n/total". */
  index: number;
  total: number;
  brand: string;
  theme: SlideTheme;
}

export function createSlideSvg(
  input: SlideSvgInput,
  width: number = SLIDE_WIDTH,
  height: number = SLIDE_HEIGHT
): Buffer {
  const { theme } = input;
  const lines = wrapText(input.body, bodyLineChars(width));
  const blockHeight = lines.length * BODY_LINE_HEIGHT;
  const firstBaseline = Math.round((height - blockHeight) / 2 + BODY_FONT_SIZE);

  const tspans = lines
    .map(
      (line, i) =>
        `<tspan x="${SLIDE_MARGIN}" y="${firstBaseline + i * BODY_LINE_HEIGHT}">${escapeXml(line)}</tspan>`
    )
    .join("");

  const svg = `
<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <style>
      .title { font-family: ${theme.fontFamily}; font-size: ${TITLE_FONT_SIZE}px; font-weight: 700; fill: ${theme.accent}; letter-spacing: 2px; text-transform: uppercase; }
      .body { font-family: ${theme.fontFamily}; font-size: ${BODY_FONT_SIZE}px; font-weight: 600; fill: ${theme.text}; }
      .footer { font-family: ${theme.fontFamily}; font-size: 32px; fill: ${theme.accent}; }
    </style>
  </defs>
  <rect x="0" y="0" width="${width}" height="${height}" fill="${theme.background}" />
  <rect x="${SLIDE_MARGIN}" y="${SLIDE_MARGIN}" width="96" height="8" fill="${theme.accent}" />
  <text x="${SLIDE_MARGIN}" y="${SLIDE_MARGIN + 80}" class="title">${escapeXml(input.title)}</text>
  <text class="body">${tspans}</text>
  <text x="${SLIDE_MARGIN}" y="${height - SLIDE_MARGIN}" class="footer">${escapeXml(input.brand)}</text>
  <text x="${width - SLIDE_MARGIN}" y="${height - SLIDE_MARGIN}" class="footer" text-anchor="end">${input.index}/${input.total}</text>
</svg>`;

  return Buffer.from(svg);
}
