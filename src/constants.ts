/**
 * Centralized rendering and pipeline constants
 * Single source of truth for the font allow-list and typography defaults
 */

// Font used when the requested one is missing or not allowed
export const DEFAULT_FONT = "Times New Roman";

// Fonts a caller may ask for, mapped to the standard PDF family that renders it
export const FONT_FAMILIES = {
  Arial: "Helvetica",
  Calibri: "Helvetica",
  "Comic Sans MS": "Helvetica",
  "Courier New": "Courier",
  Garamond: "Times",
  Georgia: "Times",
  Tahoma: "Helvetica",
  "Times New Roman": "Times",
  // No standard font carries its glyphs; the text renders as plain letters
  Wingdings: "Times",
} as const;

export type AllowedFont = keyof typeof FONT_FAMILIES;
export type PdfFontFamily = (typeof FONT_FAMILIES)[AllowedFont];

export const ALLOWED_FONTS: AllowedFont[] = Object.keys(FONT_FAMILIES).filter(isAllowedFont);

// Helper function to validate font names
export function isAllowedFont(font: string): font is AllowedFont {
  return Object.prototype.hasOwnProperty.call(FONT_FAMILIES, font);
}

// Zoom is a percentage of the base sizes below
export const DEFAULT_ZOOM = 100;
export const MIN_ZOOM = 50;
export const MAX_ZOOM = 200;

// Point sizes at 100% zoom
export const BODY_FONT_SIZE = 12;
export const HEADING_FONT_SIZES = { 1: 18, 2: 14, 3: 13 } as const;
export const MIN_BODY_FONT_SIZE = 6;
export const MIN_HEADING_FONT_SIZE = 8;
export const LINE_HEIGHT_MULTIPLIER = 1.5;

// US letter with one-inch margins, in points
export const PAGE_WIDTH = 612;
export const PAGE_HEIGHT = 792;
export const PAGE_MARGIN = 72;

// Images never take more than this share of the printable width
export const MAX_IMAGE_WIDTH_RATIO = 0.6;

export const DEFAULT_FILENAME_STEM = "transcript";
export const MAX_FILENAME_STEM_LENGTH = 100;

export const TAKEAWAY_COUNT = 5;

export const DEFAULT_IMAGE_FETCH_TIMEOUT_MS = 5000;
