import { writeFile } from "fs/promises";
import { geoIdentity, geoPath } from "d3-geo";
import { pathRound } from "d3-path";
import type { MultiPoint } from "geojson";
import type {
  Bounds,
  PathInstruction,
  PlotterConfig,
  Point2D,
  Primitive,
  PrimitiveKind,
  RenderBackend,
  Style,
} from "vector-plot-engine";
import { copyStyle, resolvePlotterConfig } from "vector-plot-engine";
import { dashArray, markerElement } from "./markers.js";
import { escapeAttr, fmt } from "./format.js";

export type ScreenTransform = (point: Point2D) => [number, number];

interface CanvasItem {
  primitive: Primitive;
  vertices: Point2D[];
  instructions: PathInstruction[] | null; // compound paths only
  closed: boolean;
  style: Style;
}

const DIGITS = 3;

/** Grow zero-width or zero-height bounds so a single point still gets a scale. */
function nonDegenerate(bounds: Bounds): Bounds {
  const { xMin, xMax, yMin, yMax } = bounds;
  const padX = xMax > xMin ? 0 : 0.5;
  const padY = yMax > yMin ? 0 : 0.5;
  return { xMin: xMin - padX, xMax: xMax + padX, yMin: yMin - padY, yMax: yMax + padY };
}

function boundsGeometry(bounds: Bounds): MultiPoint {
  return {
    type: "MultiPoint",
    coordinates: [
      [bounds.xMin, bounds.yMin],
      [bounds.xMax, bounds.yMax],
    ],
  };
}

/**
 * In-process SVG surface. Primitives are created detached; only attached
 * ones are written, in attach order. Data space has y pointing up.
 */
export class SvgCanvas implements RenderBackend {
  readonly config: PlotterConfig;
  private readonly items = new Map<number, CanvasItem>();
  private readonly attached: number[] = [];
  private nextId = 1;
  private bounds: Bounds | null = null;
  private equalAspect: boolean;

  constructor(options: Partial<PlotterConfig> = {}, env?: Record<string, string | undefined>) {
    this.config = resolvePlotterConfig(options, env);
    this.equalAspect = this.config.equalAspect;
  }

  drawMarker(point: Point2D, style: Style): Primitive {
    return this.create("marker", [point], null, false, style);
  }

  drawPath(vertices: Point2D[], style: Style, closed = false): Primitive {
    if (vertices.length === 0) throw new Error("Cannot draw a path with no vertices");
    return this.create("path", vertices, null, closed, style);
  }

  drawCompoundPath(vertices: Point2D[], instructions: PathInstruction[], style: Style): Primitive {
    if (vertices.length !== instructions.length) {
      throw new Error(`Compound path has ${vertices.length} vertices but ${instructions.length} instructions`);
    }
    if (instructions[0] !== "moveTo") throw new Error("Compound path must start with moveTo");
    return this.create("compound", vertices, instructions, true, style);
  }

  attach(primitive: Primitive): void {
    this.item(primitive);
    if (!this.attached.includes(primitive.id)) this.attached.push(primitive.id);
  }

  detach(primitive: Primitive): void {
    this.item(primitive);
    const idx = this.attached.indexOf(primitive.id);
    if (idx >= 0) this.attached.splice(idx, 1);
  }

  release(primitive: Primitive): void {
    this.detach(primitive);
    this.items.delete(primitive.id);
  }

  getStyle(primitive: Primitive): Style {
    return copyStyle(this.item(primitive).style);
  }

  setStyle(primitive: Primitive, style: Style): void {
    this.item(primitive).style = copyStyle(style);
  }

  setBounds(bounds: Bounds | null): void {
    this.bounds = bounds ? { ...bounds } : null;
  }

  setEqualAspect(on: boolean): void {
    this.equalAspect = on;
  }

  isAttached(primitive: Primitive): boolean {
    return this.attached.includes(primitive.id);
  }

  attachedCount(): number {
    return this.attached.length;
  }

  /** Primitives drawn and not yet released, attached or not. */
  primitiveCount(): number {
    return this.items.size;
  }

  contentBounds(): Bounds | null {
    const coordinates = this.attached.flatMap((id) => this.items.get(id)?.vertices ?? []).map(([x, y]) => [x, y]);
    if (coordinates.length === 0) return null;
    const [[xMin, yMin], [xMax, yMax]] = geoPath().bounds({ type: "MultiPoint", coordinates });
    return { xMin, xMax, yMin, yMax };
  }

  /** Data-to-pixel mapping for the current bounds and aspect setting. */
  screenTransform(): ScreenTransform {
    const { width, height, padding } = this.config;
    const view = nonDegenerate(this.bounds ?? this.contentBounds() ?? { xMin: 0, xMax: 1, yMin: 0, yMax: 1 });
    if (this.equalAspect) {
      const projection = geoIdentity()
        .reflectY(true)
        .fitExtent(
          [
            [padding, padding],
            [width - padding, height - padding],
          ],
          boundsGeometry(view)
        );
      return (point) => projection([point[0], point[1]]) ?? [Number.NaN, Number.NaN];
    }
    const sx = (width - 2 * padding) / (view.xMax - view.xMin);
    const sy = (height - 2 * padding) / (view.yMax - view.yMin);
    return ([x, y]) => [padding + (x - view.xMin) * sx, height - padding - (y - view.yMin) * sy];
  }

  toSVG(): string {
    const { width, height, background } = this.config;
    const project = this.screenTransform();
    const body = this.attached.flatMap((id) => {
      const item = this.items.get(id);
      return item ? this.renderItem(item, project) : [];
    });
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
      `<rect width="100%" height="100%" fill="${escapeAttr(background)}"/>`,
      ...body,
      "</svg>",
      "",
    ].join("\n");
  }

  async rasterizeToFile(path: string): Promise<void> {
    await writeFile(path, this.toSVG(), "utf-8");
  }

  private create(
    kind: PrimitiveKind,
    vertices: Point2D[],
    instructions: PathInstruction[] | null,
    closed: boolean,
    style: Style
  ): Primitive {
    const primitive: Primitive = Object.freeze({ id: this.nextId++, kind, pointCount: vertices.length });
    this.items.set(primitive.id, {
      primitive,
      vertices: [...vertices],
      instructions: instructions ? [...instructions] : null,
      closed,
      style: copyStyle(style),
    });
    return primitive;
  }

  private item(primitive: Primitive): CanvasItem {
    const item = this.items.get(primitive.id);
    if (!item || item.primitive !== primitive) throw new Error(`Primitive ${primitive.id} does not belong to this canvas`);
    return item;
  }

  private renderItem(item: CanvasItem, project: ScreenTransform): string[] {
    const { style } = item;
    const opacity = style.opacity < 1 ? ` opacity="${fmt(style.opacity)}"` : "";
    const screen = item.vertices.map(project);
    switch (item.primitive.kind) {
      case "marker":
        return [markerElement(screen[0], style, opacity)];
      case "path": {
        const out: string[] = [];
        if (style.lineStyle) {
          const d = pathRound(DIGITS);
          screen.forEach(([x, y], i) => (i === 0 ? d.moveTo(x, y) : d.lineTo(x, y)));
          if (item.closed) d.closePath();
          const dash = dashArray(style.lineStyle, style.lineWidth);
          out.push(
            `<path d="${d}" fill="none" stroke="${escapeAttr(style.color)}" stroke-width="${fmt(style.lineWidth)}"` +
              `${dash ? ` stroke-dasharray="${dash}"` : ""}${opacity}/>`
          );
        }
        if (style.marker) out.push(...screen.map((p) => markerElement(p, style, opacity)));
        return out;
      }
      case "compound": {
        const d = pathRound(DIGITS);
        const codes = item.instructions ?? [];
        screen.forEach(([x, y], i) => {
          if (codes[i] === "moveTo") {
            if (i > 0) d.closePath();
            d.moveTo(x, y);
          } else {
            d.lineTo(x, y);
          }
        });
        d.closePath();
        const fill = style.fill === null ? "none" : escapeAttr(style.fill);
        return [
          `<path d="${d}" fill="${fill}" fill-rule="nonzero" stroke="${escapeAttr(style.edgeColor)}"` +
            ` stroke-width="${fmt(style.lineWidth)}"${opacity}/>`,
        ];
      }
    }
  }
}
