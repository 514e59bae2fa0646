import type { LineStyle, Style } from "vector-plot-engine";
import { escapeAttr, fmt } from "./format.js";

const DASHES: Record<LineStyle, number[] | null> = {
  "-": null,
  "--": [3.7, 1.6],
  ":": [1, 1.65],
  "-.": [6.4, 1.6, 1, 1.6],
};

/** Dash pattern scaled by line width, or null for a solid line. */
export function dashArray(lineStyle: LineStyle, lineWidth: number): string | null {
  const pattern = DASHES[lineStyle];
  if (!pattern) return null;
  return pattern.map((segment) => fmt(segment * Math.max(lineWidth, 1))).join(",");
}

function polygonPoints(points: [number, number][]): string {
  return points.map(([x, y]) => `${fmt(x)},${fmt(y)}`).join(" ");
}

/** One SVG element for a marker glyph centered on a screen point; `markerSize` is its diameter. */
export function markerElement(center: [number, number], style: Style, extra = ""): string {
  const [cx, cy] = center;
  const r = style.markerSize / 2;
  const paint = `fill="${escapeAttr(style.color)}" stroke="${escapeAttr(style.color)}"${extra}`;
  switch (style.marker ?? "o") {
    case "o":
      return `<circle cx="${fmt(cx)}" cy="${fmt(cy)}" r="${fmt(r)}" ${paint}/>`;
    case ".":
      return `<circle cx="${fmt(cx)}" cy="${fmt(cy)}" r="${fmt(r / 2)}" ${paint}/>`;
    case "s":
      return `<rect x="${fmt(cx - r)}" y="${fmt(cy - r)}" width="${fmt(2 * r)}" height="${fmt(2 * r)}" ${paint}/>`;
    case "^":
      return `<polygon points="${polygonPoints([[cx, cy - r], [cx + r, cy + r], [cx - r, cy + r]])}" ${paint}/>`;
    case "v":
      return `<polygon points="${polygonPoints([[cx - r, cy - r], [cx + r, cy - r], [cx, cy + r]])}" ${paint}/>`;
    case "D":
      return `<polygon points="${polygonPoints([[cx, cy - r], [cx + r, cy], [cx, cy + r], [cx - r, cy]])}" ${paint}/>`;
    case "x":
      return `<path d="M${fmt(cx - r)},${fmt(cy - r)}L${fmt(cx + r)},${fmt(cy + r)}M${fmt(cx - r)},${fmt(cy + r)}L${fmt(cx + r)},${fmt(cy - r)}" fill="none" stroke="${escapeAttr(style.color)}"${extra}/>`;
    case "+":
      return `<path d="M${fmt(cx - r)},${fmt(cy)}L${fmt(cx + r)},${fmt(cy)}M${fmt(cx)},${fmt(cy - r)}L${fmt(cx)},${fmt(cy + r)}" fill="none" stroke="${escapeAttr(style.color)}"${extra}/>`;
  }
}
