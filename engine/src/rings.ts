import type { Point2D, Ring } from "./types.js";
import { DegenerateRingError } from "./errors.js";

/**
 * Twice the signed area of a ring via the shoelace sum over consecutive
 * vertex pairs, wrapping last-to-first. Positive means clockwise with y
 * pointing up (map orientation).
 */
export function windingSum(ring: readonly Point2D[]): number {
  let total = 0;
  for (let i = 0; i < ring.length; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[(i + 1) % ring.length];
    total += (x2 - x1) * (y2 + y1);
  }
  return total;
}

export function signedArea(ring: readonly Point2D[]): number {
  return windingSum(ring) / 2;
}

export function isClockwise(ring: readonly Point2D[]): boolean {
  return windingSum(ring) > 0;
}

function samePoint(a: Point2D, b: Point2D): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Return a copy of the ring wound in the requested direction and explicitly
 * closed. Zero-area rings keep their order.
 */
export function normalizeRing(ring: readonly Point2D[], wantClockwise: boolean): Ring {
  if (ring.length < 1) throw new DegenerateRingError(ring.length);
  const sum = windingSum(ring);
  const wrongWay = wantClockwise ? sum < 0 : sum > 0;
  const ordered: Ring = wrongWay ? [...ring].reverse() : [...ring];
  if (!samePoint(ordered[0], ordered[ordered.length - 1])) {
    ordered.push(ordered[0]);
  }
  return ordered;
}
