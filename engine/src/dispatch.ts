import type { Geometry, Point2D, Primitive, RenderBackend, Ring, Shape, Style, StyleOverrides } from "./types.js";
import type { PaletteCursor } from "./palette.js";
import { extractCoordinates } from "./extract.js";
import { buildPolygonPath } from "./path.js";
import { callBackend } from "./backend.js";
import { DEFAULT_STYLE, resolveStyle } from "./style.js";

export interface DispatchContext {
  backend: RenderBackend;
  palette: PaletteCursor;
  baseStyle?: Readonly<Style>;
}

function markers(points: Point2D[], style: Style, ctx: DispatchContext): Primitive[] {
  return points.map((point) => callBackend("drawMarker", () => ctx.backend.drawMarker(point, style)));
}

function strokes(lines: Point2D[][], style: Style, ctx: DispatchContext): Primitive[] {
  return lines.map((line) => callBackend("drawPath", () => ctx.backend.drawPath(line, style, false)));
}

function polygons(polys: Ring[][], style: Style, ctx: DispatchContext): Primitive[] {
  return polys.map((rings) => {
    const path = buildPolygonPath(rings);
    return callBackend("drawCompoundPath", () =>
      ctx.backend.drawCompoundPath(path.vertices, path.instructions, style)
    );
  });
}

/** Member style wins over the enclosing collection's on a per-field basis. */
function memberOverrides(parent: StyleOverrides | undefined, own: StyleOverrides | undefined): StyleOverrides | undefined {
  if (!own) return parent;
  if (!parent) return own;
  return { ...parent, ...own };
}

/**
 * Draw an extracted shape. Each leaf kind resolves its style once, so a
 * multi-geometry shares one default color while collection members resolve
 * their own.
 */
export function plotShape(shape: Shape, overrides: StyleOverrides | undefined, ctx: DispatchContext): Primitive[] {
  const base = ctx.baseStyle ?? DEFAULT_STYLE;
  const own = memberOverrides(overrides, shape.style);
  switch (shape.kind) {
    case "Point":
      return markers([shape.point], resolveStyle("point", own, ctx.palette, base), ctx);
    case "MultiPoint":
      return markers(shape.points, resolveStyle("point", own, ctx.palette, base), ctx);
    case "LineString":
      return strokes([shape.line], resolveStyle("line", own, ctx.palette, base), ctx);
    case "MultiLineString":
      return strokes(shape.lines, resolveStyle("line", own, ctx.palette, base), ctx);
    case "Polygon":
      return polygons([shape.rings], resolveStyle("polygon", own, ctx.palette, base), ctx);
    case "MultiPolygon":
      return polygons(shape.polygons, resolveStyle("polygon", own, ctx.palette, base), ctx);
    case "GeometryCollection":
      return shape.members.flatMap((member) => plotShape(member, own, ctx));
  }
}

/** Extract and draw one geometry, returning the detached primitives in drawing order. */
export function plotGeometry(geometry: Geometry, overrides: StyleOverrides | undefined, ctx: DispatchContext): Primitive[] {
  return plotShape(extractCoordinates(geometry), overrides, ctx);
}
