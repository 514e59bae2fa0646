import type { GeometryKind, LineStyle, MarkerShape, Style, StyleOverrides } from "./types.js";
import type { PaletteCursor } from "./palette.js";
import { InvalidSymbolError } from "./errors.js";

export const DEFAULT_STYLE: Readonly<Style> = {
  color: "#000000",
  marker: null,
  lineStyle: "-",
  fill: null,
  edgeColor: "#000000",
  lineWidth: 1,
  markerSize: 6,
  opacity: 1,
};

const COLOR_CODES: Record<string, string> = {
  b: "#0000ff",
  g: "#008000",
  r: "#ff0000",
  c: "#00bfbf",
  m: "#bf00bf",
  y: "#bfbf00",
  k: "#000000",
  w: "#ffffff",
};

const MARKERS: readonly MarkerShape[] = ["o", "s", "^", "v", ".", "x", "+", "D"];
const LINE_STYLES: readonly LineStyle[] = ["--", "-.", "-", ":"];

function isMarker(value: string): value is MarkerShape {
  return MARKERS.some((m) => m === value);
}

export interface ParsedSymbol {
  color?: string;
  marker?: MarkerShape;
  lineStyle?: LineStyle;
}

/** Parse a format shorthand such as "bo", "r--" or "k". */
export function parseSymbol(symbol: string): ParsedSymbol {
  const parsed: ParsedSymbol = {};
  let i = 0;
  while (i < symbol.length) {
    const rest = symbol.slice(i);
    const line = LINE_STYLES.find((ls) => rest.startsWith(ls));
    if (line) {
      if (parsed.lineStyle) throw new InvalidSymbolError(symbol, "more than one line style");
      parsed.lineStyle = line;
      i += line.length;
      continue;
    }
    const ch = symbol[i];
    if (ch in COLOR_CODES) {
      if (parsed.color) throw new InvalidSymbolError(symbol, "more than one color");
      parsed.color = COLOR_CODES[ch];
    } else if (isMarker(ch)) {
      if (parsed.marker) throw new InvalidSymbolError(symbol, "more than one marker");
      parsed.marker = ch;
    } else {
      throw new InvalidSymbolError(symbol, `unrecognized character '${ch}'`);
    }
    i += 1;
  }
  return parsed;
}

/** Overlay the defined fields of `overrides` onto a copy of `base`. Last writer wins per field. */
export function mergeStyle(base: Readonly<Style>, overrides: StyleOverrides): Style {
  const merged: Style = { ...base };
  if (overrides.color !== undefined) merged.color = overrides.color;
  if (overrides.marker !== undefined) merged.marker = overrides.marker;
  if (overrides.lineStyle !== undefined) merged.lineStyle = overrides.lineStyle;
  if (overrides.fill !== undefined) merged.fill = overrides.fill;
  if (overrides.edgeColor !== undefined) merged.edgeColor = overrides.edgeColor;
  if (overrides.lineWidth !== undefined) merged.lineWidth = overrides.lineWidth;
  if (overrides.markerSize !== undefined) merged.markerSize = overrides.markerSize;
  if (overrides.opacity !== undefined) merged.opacity = overrides.opacity;
  return merged;
}

/** True when the caller asked for any style at all. */
export function hasExplicitStyle(overrides?: StyleOverrides): boolean {
  if (!overrides) return false;
  return Object.entries(overrides).some(([key, value]) =>
    key === "symbol" ? typeof value === "string" && value.length > 0 : value !== undefined
  );
}

export type KindFamily = "point" | "line" | "polygon" | "collection";

export function kindFamily(kind: GeometryKind): KindFamily {
  switch (kind) {
    case "Point":
    case "MultiPoint":
      return "point";
    case "LineString":
    case "MultiLineString":
      return "line";
    case "Polygon":
    case "MultiPolygon":
      return "polygon";
    case "GeometryCollection":
      return "collection";
  }
}

/**
 * Fill in a complete style for one geometry family. The palette advances only
 * when the family needs a color the caller did not give.
 */
export function resolveStyle(
  family: Exclude<KindFamily, "collection">,
  overrides: StyleOverrides = {},
  palette: PaletteCursor,
  base: Readonly<Style> = DEFAULT_STYLE
): Style {
  const parsed: ParsedSymbol = overrides.symbol ? parseSymbol(overrides.symbol) : {};
  const style = mergeStyle(base, overrides);
  const explicitColor = overrides.color ?? parsed.color;

  switch (family) {
    case "point":
      style.color = explicitColor ?? palette.next();
      style.marker = overrides.marker ?? parsed.marker ?? "o";
      style.lineStyle = overrides.lineStyle ?? parsed.lineStyle ?? null;
      style.fill = null;
      break;
    case "line":
      style.color = explicitColor ?? palette.next();
      style.marker = overrides.marker ?? parsed.marker ?? null;
      style.lineStyle = overrides.lineStyle ?? parsed.lineStyle ?? (style.marker ? null : "-");
      style.fill = null;
      break;
    case "polygon":
      if (overrides.fill === undefined) {
        style.fill = parsed.color ?? overrides.color ?? palette.next();
      }
      style.color = style.fill ?? style.edgeColor;
      style.marker = null;
      style.lineStyle = overrides.lineStyle ?? parsed.lineStyle ?? "-";
      break;
  }
  return style;
}

const STYLE_KEYS = [
  "color",
  "marker",
  "lineStyle",
  "fill",
  "edgeColor",
  "lineWidth",
  "markerSize",
  "opacity",
] as const satisfies readonly (keyof Style)[];

/** Fresh record carrying every field of `from`, so primitives never share a style object. */
export function copyStyle(from: Readonly<Style>): Style {
  return { ...from };
}

export function sameStyle(a: Readonly<Style>, b: Readonly<Style>): boolean {
  return STYLE_KEYS.every((key) => a[key] === b[key]);
}
