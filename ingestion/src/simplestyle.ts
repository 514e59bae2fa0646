import type { GeoJsonProperties } from "geojson";
import type { KindFamily, StyleOverrides } from "vector-plot-engine";

function str(props: Record<string, unknown>, key: string): string | undefined {
  const value = props[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function num(props: Record<string, unknown>, key: string): number | undefined {
  const value = props[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

/**
 * Map simplestyle-style feature properties (`marker-color`, `stroke`,
 * `stroke-width`, `fill`, `fill-opacity`, `stroke-opacity`) onto style
 * overrides for the feature's geometry family. Returns undefined when the
 * feature carries no style.
 */
export function styleFromProperties(properties: GeoJsonProperties, family: KindFamily): StyleOverrides | undefined {
  if (!properties) return undefined;
  const style: StyleOverrides = {};
  const stroke = str(properties, "stroke");
  const strokeWidth = num(properties, "stroke-width");
  if (strokeWidth !== undefined) style.lineWidth = strokeWidth;

  switch (family) {
    case "point": {
      const color = str(properties, "marker-color") ?? stroke;
      if (color) style.color = color;
      break;
    }
    case "line": {
      if (stroke) style.color = stroke;
      const opacity = num(properties, "stroke-opacity");
      if (opacity !== undefined) style.opacity = opacity;
      break;
    }
    case "polygon":
    case "collection": {
      if (stroke) style.edgeColor = stroke;
      const fill = str(properties, "fill");
      if (fill) style.fill = fill;
      const opacity = num(properties, "fill-opacity");
      if (opacity !== undefined) style.opacity = opacity;
      break;
    }
  }
  return Object.keys(style).length > 0 ? style : undefined;
}
