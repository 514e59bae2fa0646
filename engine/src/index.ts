/**
 * Vector Plot Engine
 * ------------------
 * Geometry-to-primitive dispatch, ring winding, compound paths and a named
 * layer registry over a pluggable rendering backend.
 */
export * from "./types.js";
export * from "./errors.js";
export { extractCoordinates, iterateShapePoints, toPoint2D, describeKind } from "./extract.js";
export { windingSum, signedArea, isClockwise, normalizeRing } from "./rings.js";
export { buildCompoundPath, buildPolygonPath, pathContours } from "./path.js";
export { plotGeometry, plotShape, type DispatchContext } from "./dispatch.js";
export { PaletteCursor, DEFAULT_PALETTE } from "./palette.js";
export {
  DEFAULT_STYLE,
  parseSymbol,
  mergeStyle,
  hasExplicitStyle,
  kindFamily,
  resolveStyle,
  copyStyle,
  sameStyle,
  type KindFamily,
  type ParsedSymbol,
} from "./style.js";
export { LayerRegistry, sameDrawableKind } from "./layers.js";
export { callBackend, callBackendAsync } from "./backend.js";
export { resolvePlotterConfig, consoleLogger, DEFAULT_CONFIG, type PlotterConfig } from "./config.js";
export { VectorPlotter, collectGeometries, type PlotInput, type PlotterOptions } from "./plotter.js";
