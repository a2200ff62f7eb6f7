import {
  BODY_FONT_SIZE,
  DEFAULT_FONT,
  DEFAULT_ZOOM,
  FONT_FAMILIES,
  HEADING_FONT_SIZES,
  LINE_HEIGHT_MULTIPLIER,
  MAX_IMAGE_WIDTH_RATIO,
  MAX_ZOOM,
  MIN_BODY_FONT_SIZE,
  MIN_HEADING_FONT_SIZE,
  MIN_ZOOM,
  PAGE_HEIGHT,
  PAGE_MARGIN,
  PAGE_WIDTH,
  isAllowedFont,
  type AllowedFont,
  type PdfFontFamily,
} from "../constants.js";
import type { LayoutRequest } from "../types.js";
import type { HeadingLevel } from "./markdown.js";

export interface PageGeometry {
  width: number;
  height: number;
  left: number;
  top: number;
  /** Lowest y a line may reach. */
  bottom: number;
  printableWidth: number;
}

/** Every size the layout pass needs, fixed before it starts. */
export interface Typography {
  font: AllowedFont;
  family: PdfFontFamily;
  zoom: number;
  bodySize: number;
  bodyLineHeight: number;
  headingSizes: Record<HeadingLevel, number>;
  headingLineHeights: Record<HeadingLevel, number>;
  bulletIndent: number;
  maxImageWidth: number;
  page: PageGeometry;
}

export function resolveFont(font: string | undefined): AllowedFont {
  const requested = font?.trim() ?? "";
  return isAllowedFont(requested) ? requested : DEFAULT_FONT;
}

/** Non-numeric zoom falls back to 100; numbers are clamped to [50, 200]. */
export function resolveZoom(zoom: string | number | undefined): number {
  const value = typeof zoom === "number" ? zoom : zoom === undefined || zoom.trim() === "" ? NaN : Number(zoom);
  if (!Number.isFinite(value)) return DEFAULT_ZOOM;
  return Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, value));
}

function scaled(size: number, zoom: number, min: number): number {
  return Math.max(min, (size * zoom) / 100);
}

export function pageGeometry(): PageGeometry {
  return {
    width: PAGE_WIDTH,
    height: PAGE_HEIGHT,
    left: PAGE_MARGIN,
    top: PAGE_MARGIN,
    bottom: PAGE_HEIGHT - PAGE_MARGIN,
    printableWidth: PAGE_WIDTH - 2 * PAGE_MARGIN,
  };
}

export function resolveTypography(request: LayoutRequest = {}): Typography {
  const font = resolveFont(request.font);
  const zoom = resolveZoom(request.zoom);
  const page = pageGeometry();

  const bodySize = scaled(BODY_FONT_SIZE, zoom, MIN_BODY_FONT_SIZE);
  const headingSizes = {
    1: scaled(HEADING_FONT_SIZES[1], zoom, MIN_HEADING_FONT_SIZE),
    2: scaled(HEADING_FONT_SIZES[2], zoom, MIN_HEADING_FONT_SIZE),
    3: scaled(HEADING_FONT_SIZES[3], zoom, MIN_HEADING_FONT_SIZE),
  };

  return {
    font,
    family: FONT_FAMILIES[font],
    zoom,
    bodySize,
    bodyLineHeight: bodySize * LINE_HEIGHT_MULTIPLIER,
    headingSizes,
    headingLineHeights: {
      1: headingSizes[1] * LINE_HEIGHT_MULTIPLIER,
      2: headingSizes[2] * LINE_HEIGHT_MULTIPLIER,
      3: headingSizes[3] * LINE_HEIGHT_MULTIPLIER,
    },
    bulletIndent: bodySize * 1.5,
    maxImageWidth: page.printableWidth * MAX_IMAGE_WIDTH_RATIO,
    page,
  };
}
