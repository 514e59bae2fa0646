import type { PathInstruction, PathSpec, Point2D, Ring } from "./types.js";
import { normalizeRing } from "./rings.js";

function ringInstructions(ring: Ring): PathInstruction[] {
  return Array.from({ length: ring.length }, (_, i): PathInstruction => (i === 0 ? "moveTo" : "lineTo"));
}

/**
 * Compose an outer ring and its holes into one compound path. The outer ring
 * is wound clockwise and the holes counter-clockwise so a nonzero fill leaves
 * the holes empty. Outer ring first, then holes in input order.
 */
export function buildCompoundPath(outer: readonly Point2D[], holes: readonly (readonly Point2D[])[] = []): PathSpec {
  const rings = [normalizeRing(outer, true), ...holes.map((hole) => normalizeRing(hole, false))];
  const vertices: Point2D[] = [];
  const instructions: PathInstruction[] = [];
  for (const ring of rings) {
    vertices.push(...ring);
    instructions.push(...ringInstructions(ring));
  }
  return { vertices, instructions };
}

/** Polygon rings are (outer, ...holes). */
export function buildPolygonPath(rings: readonly Ring[]): PathSpec {
  const [outer, ...holes] = rings;
  return buildCompoundPath(outer ?? [], holes);
}

/** Split a compound path back into its sub-contours, one per moveTo. */
export function pathContours(spec: PathSpec): Point2D[][] {
  const contours: Point2D[][] = [];
  spec.instructions.forEach((code, i) => {
    if (code === "moveTo" || contours.length === 0) contours.push([]);
    contours[contours.length - 1].push(spec.vertices[i]);
  });
  return contours;
}
