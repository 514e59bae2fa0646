import type { Position } from "geojson";
import type { Geometry, Point2D, Ring, Shape } from "./types.js";
import { InvalidCoordinateError, UnsupportedGeometryKindError } from "./errors.js";

/** Describe whatever sits in a geometry's `type` slot, for error reporting. */
export function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "type" in value) {
    return String(value.type);
  }
  return typeof value;
}

/** Drop any Z/M ordinates; plotting is planar. */
export function toPoint2D(position: Position): Point2D {
  if (!Array.isArray(position) || position.length < 2) {
    throw new InvalidCoordinateError(position);
  }
  const [x, y] = position;
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new InvalidCoordinateError(position);
  }
  return [x, y];
}

function toLine(positions: Position[]): Point2D[] {
  return positions.map(toPoint2D);
}

function toRings(rings: Position[][]): Ring[] {
  return rings.map(toLine);
}

/**
 * Pull the (x, y) pairs out of a geometry, keeping its nesting: flat for
 * points and lines, rings for polygons, one more level for multi-kinds and a
 * full recursion for collections.
 */
export function extractCoordinates(geometry: Geometry): Shape {
  const style = geometry.style;
  switch (geometry.type) {
    case "Point":
      return { kind: "Point", point: toPoint2D(geometry.coordinates), style };
    case "MultiPoint":
      return { kind: "MultiPoint", points: toLine(geometry.coordinates), style };
    case "LineString":
      return { kind: "LineString", line: toLine(geometry.coordinates), style };
    case "MultiLineString":
      return { kind: "MultiLineString", lines: geometry.coordinates.map(toLine), style };
    case "Polygon":
      return { kind: "Polygon", rings: toRings(geometry.coordinates), style };
    case "MultiPolygon":
      return { kind: "MultiPolygon", polygons: geometry.coordinates.map(toRings), style };
    case "GeometryCollection":
      return {
        kind: "GeometryCollection",
        members: geometry.geometries.map((member) => extractCoordinates(member)),
        style,
      };
    default: {
      const unhandled: never = geometry;
      throw new UnsupportedGeometryKindError(describeKind(unhandled));
    }
  }
}

/** Iterate every point of an extracted shape in drawing order. */
export function* iterateShapePoints(shape: Shape): Generator<Point2D> {
  switch (shape.kind) {
    case "Point":
      yield shape.point;
      return;
    case "MultiPoint":
      yield* shape.points;
      return;
    case "LineString":
      yield* shape.line;
      return;
    case "MultiLineString":
      for (const line of shape.lines) yield* line;
      return;
    case "Polygon":
      for (const ring of shape.rings) yield* ring;
      return;
    case "MultiPolygon":
      for (const poly of shape.polygons) for (const ring of poly) yield* ring;
      return;
    case "GeometryCollection":
      for (const member of shape.members) yield* iterateShapePoints(member);
      return;
  }
}
