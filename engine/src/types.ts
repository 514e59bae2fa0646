import type { Geometry as GeoJSONGeometry } from "geojson";

export type Point2D = readonly [number, number];
export type Ring = Point2D[];

/** Marker glyphs understood by the symbol shorthand and every backend. */
export type MarkerShape = "o" | "s" | "^" | "v" | "." | "x" | "+" | "D";
export type LineStyle = "-" | "--" | ":" | "-.";

export interface Style {
  color: string;
  marker: MarkerShape | null;
  lineStyle: LineStyle | null;
  fill: string | null; // null = outline only
  edgeColor: string;
  lineWidth: number;
  markerSize: number;
  opacity: number;
}

export interface StyleOverrides extends Partial<Style> {
  symbol?: string; // e.g. "bo", "r--", "k"
}

/**
 * GeoJSON geometry as accepted by the dispatcher. Collection members may carry
 * a `style` foreign member that takes precedence over the collection's style.
 */
export type Geometry = GeoJSONGeometry & { style?: StyleOverrides };
export type GeometryKind = Geometry["type"];

/** Coordinates pulled out of a geometry, nested the same way the geometry is. */
export type Shape =
  | { kind: "Point"; point: Point2D; style?: StyleOverrides }
  | { kind: "MultiPoint"; points: Point2D[]; style?: StyleOverrides }
  | { kind: "LineString"; line: Point2D[]; style?: StyleOverrides }
  | { kind: "MultiLineString"; lines: Point2D[][]; style?: StyleOverrides }
  | { kind: "Polygon"; rings: Ring[]; style?: StyleOverrides }
  | { kind: "MultiPolygon"; polygons: Ring[][]; style?: StyleOverrides }
  | { kind: "GeometryCollection"; members: Shape[]; style?: StyleOverrides };

export type PathInstruction = "moveTo" | "lineTo";

export interface PathSpec {
  vertices: Point2D[];
  instructions: PathInstruction[];
}

export type PrimitiveKind = "marker" | "path" | "compound";

export interface Primitive {
  readonly id: number;
  readonly kind: PrimitiveKind;
  readonly pointCount: number;
}

export interface Bounds {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

/** Drawing surface the engine hands primitives to. Every call is synchronous except rasterization. */
export interface RenderBackend {
  drawMarker(point: Point2D, style: Style): Primitive;
  drawPath(vertices: Point2D[], style: Style, closed?: boolean): Primitive;
  drawCompoundPath(vertices: Point2D[], instructions: PathInstruction[], style: Style): Primitive;
  attach(primitive: Primitive): void;
  detach(primitive: Primitive): void;
  /** Forget a detached primitive; the handle is invalid afterwards. */
  release(primitive: Primitive): void;
  getStyle(primitive: Primitive): Style;
  setStyle(primitive: Primitive, style: Style): void;
  setBounds(bounds: Bounds | null): void;
  setEqualAspect(on: boolean): void;
  /** Bounds of everything currently attached, or null when nothing is. */
  contentBounds(): Bounds | null;
  rasterizeToFile(path: string): Promise<void>;
}

export type LayerName = string | number;

export interface LayerSnapshot {
  name: LayerName;
  visible: boolean;
  primitives: Primitive[];
}

export interface PlotLogger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}
