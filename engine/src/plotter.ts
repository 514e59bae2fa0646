import type { Feature, FeatureCollection, Geometry as GeoJSONGeometry, Position } from "geojson";
import type {
  Bounds,
  Geometry,
  LayerName,
  PlotLogger,
  Point2D,
  Primitive,
  RenderBackend,
  Style,
  StyleOverrides,
} from "./types.js";
import { PaletteCursor } from "./palette.js";
import { LayerRegistry } from "./layers.js";
import { plotGeometry, type DispatchContext } from "./dispatch.js";
import { DEFAULT_STYLE, hasExplicitStyle, kindFamily, resolveStyle } from "./style.js";
import { callBackend, callBackendAsync } from "./backend.js";
import { consoleLogger, resolvePlotterConfig, type PlotterConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

type PlotFeature = Feature<GeoJSONGeometry | null>;

export type PlotInput =
  | Geometry
  | PlotFeature
  | FeatureCollection<GeoJSONGeometry | null>
  | Iterable<Geometry | PlotFeature>;

export interface PlotterOptions extends Partial<PlotterConfig> {
  limits?: Bounds;
  logger?: PlotLogger;
  env?: Record<string, string | undefined>;
}

function isGeoJSONObject(
  input: PlotInput
): input is Geometry | PlotFeature | FeatureCollection<GeoJSONGeometry | null> {
  return "type" in input && typeof input.type === "string";
}

function featureGeometry(feature: PlotFeature): Geometry | null {
  return feature.geometry;
}

/** Flatten any accepted input into plain geometries, dropping null feature geometries. */
export function collectGeometries(input: PlotInput): Geometry[] {
  if (isGeoJSONObject(input)) {
    if (input.type === "FeatureCollection") {
      return input.features.map(featureGeometry).filter((g): g is Geometry => g !== null);
    }
    if (input.type === "Feature") {
      const geometry = featureGeometry(input);
      return geometry ? [geometry] : [];
    }
    return [input];
  }
  const out: Geometry[] = [];
  for (const item of input) {
    if (item.type === "Feature") {
      const geometry = featureGeometry(item);
      if (geometry) out.push(geometry);
    } else {
      out.push(item);
    }
  }
  return out;
}

function toPosition(point: Point2D): Position {
  return [point[0], point[1]];
}

function checkBounds(bounds: Bounds): Bounds {
  const { xMin, xMax, yMin, yMax } = bounds;
  if (![xMin, xMax, yMin, yMax].every(Number.isFinite) || xMin >= xMax || yMin >= yMax) {
    throw new ConfigurationError(`Invalid limits x=[${xMin}, ${xMax}] y=[${yMin}, ${yMax}]`);
  }
  return { ...bounds };
}

/**
 * A plotting session: one palette cursor, one layer registry and the backend
 * they draw on. Calls must be serialized against a single instance.
 */
export class VectorPlotter {
  readonly config: PlotterConfig;
  readonly palette: PaletteCursor;
  readonly layers: LayerRegistry;
  private readonly logger: PlotLogger;
  private limits: Bounds | null = null;
  private baseStyle: Style = { ...DEFAULT_STYLE };

  constructor(
    private readonly backend: RenderBackend,
    options: PlotterOptions = {}
  ) {
    this.config = resolvePlotterConfig(options, options.env);
    this.logger = options.logger ?? consoleLogger(this.config.debug);
    this.palette = new PaletteCursor(this.config.palette);
    this.layers = new LayerRegistry(backend, this.logger);
    callBackend("setEqualAspect", () => backend.setEqualAspect(this.config.equalAspect));
    if (options.limits) {
      const { xMin, xMax, yMin, yMax } = options.limits;
      this.setLimits(xMin, xMax, yMin, yMax);
    }
  }

  /**
   * Draw a geometry, feature, feature collection or sequence of geometries as
   * one layer. Returns the layer name, or undefined when there was nothing to draw.
   */
  plot(input: PlotInput, style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    const geometries = collectGeometries(input);
    if (geometries.length === 0) {
      this.logger.warn(`Nothing to plot for layer ${name ?? "(unnamed)"}`);
      return undefined;
    }
    const ctx: DispatchContext = { backend: this.backend, palette: this.palette, baseStyle: this.baseStyle };
    const shared = geometries.length > 1 ? this.sharedStyle(geometries[0], style) : style;
    const primitives: Primitive[] = [];
    try {
      for (const geometry of geometries) primitives.push(...plotGeometry(geometry, shared, ctx));
    } catch (err) {
      // Geometries drawn before the failure never reach the registry.
      for (const primitive of primitives) callBackend("release", () => this.backend.release(primitive));
      throw err;
    }
    return this.layers.set(name, primitives, hasExplicitStyle(style));
  }

  plotPoint(point: Point2D, style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    return this.plot({ type: "Point", coordinates: toPosition(point) }, style, name);
  }

  plotMultiPoint(points: Point2D[], style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    return this.plot({ type: "MultiPoint", coordinates: points.map(toPosition) }, style, name);
  }

  plotLine(line: Point2D[], style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    return this.plot({ type: "LineString", coordinates: line.map(toPosition) }, style, name);
  }

  plotMultiLine(lines: Point2D[][], style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    return this.plot({ type: "MultiLineString", coordinates: lines.map((l) => l.map(toPosition)) }, style, name);
  }

  /** `rings` is the outer ring followed by any holes. */
  plotPolygon(rings: Point2D[][], style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    return this.plot({ type: "Polygon", coordinates: rings.map((r) => r.map(toPosition)) }, style, name);
  }

  plotMultiPolygon(polygons: Point2D[][][], style?: StyleOverrides, name?: LayerName): LayerName | undefined {
    const coordinates = polygons.map((rings) => rings.map((r) => r.map(toPosition)));
    return this.plot({ type: "MultiPolygon", coordinates }, style, name);
  }

  hide(name: LayerName): void {
    this.layers.hide(name);
  }

  show(name: LayerName): void {
    this.layers.show(name);
  }

  remove(name: LayerName): void {
    this.layers.remove(name);
  }

  layerNames(): LayerName[] {
    return this.layers.names();
  }

  /** Drop every layer and go back to automatic bounds. The palette keeps rotating. */
  clear(): void {
    this.layers.clear();
    this.limits = null;
    callBackend("setBounds", () => this.backend.setBounds(null));
  }

  close(): void {
    this.clear();
  }

  setLimits(xMin: number, xMax: number, yMin: number, yMax: number): void {
    const limits = checkBounds({ xMin, xMax, yMin, yMax });
    callBackend("setBounds", () => this.backend.setBounds(limits));
    this.limits = limits;
  }

  getLimits(): Bounds | null {
    return this.limits ? { ...this.limits } : null;
  }

  /** Zoom in by `percent` of the current extent on each side; negative zooms out. */
  zoom(percent: number): void {
    const current = this.limits ?? callBackend("contentBounds", () => this.backend.contentBounds());
    if (!current) {
      this.logger.warn("zoom ignored: no limits set and nothing drawn");
      return;
    }
    const dx = ((current.xMax - current.xMin) * percent) / 100;
    const dy = ((current.yMax - current.yMin) * percent) / 100;
    this.setLimits(current.xMin + dx, current.xMax - dx, current.yMin + dy, current.yMax - dy);
  }

  /** Scale default marker size and line width to a canvas size (800x600 is 1:1). */
  adjustMarkers(width = this.config.width, height = this.config.height): void {
    const r = Math.min(width / 800, height / 600);
    this.baseStyle = { ...this.baseStyle, markerSize: 6 * r, lineWidth: r };
  }

  get defaults(): Readonly<Style> {
    return this.baseStyle;
  }

  async save(path: string): Promise<void> {
    await callBackendAsync("rasterizeToFile", () => this.backend.rasterizeToFile(path));
  }

  /**
   * A whole source is drawn in one look, picked from its first geometry's
   * kind. Collections keep per-member resolution.
   */
  private sharedStyle(first: Geometry, style: StyleOverrides | undefined): StyleOverrides | undefined {
    const family = kindFamily(first.type);
    if (family === "collection") return style;
    return resolveStyle(family, style, this.palette, this.baseStyle);
  }
}
