import { mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_STYLE, VectorPlotter, type Style } from "vector-plot-engine";
import { SvgCanvas } from "../src/svgCanvas.js";

const HEADER = [
  '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100" viewBox="0 0 100 100">',
  '<rect width="100%" height="100%" fill="white"/>',
];

const red: Style = { ...DEFAULT_STYLE, color: "#ff0000", marker: "o", lineStyle: null };

/** 100x100 canvas, 10px padding, data box 0..10 on both axes: (x, y) maps to (10 + 8x, 90 - 8y). */
function grid(): SvgCanvas {
  const canvas = new SvgCanvas({ width: 100, height: 100, padding: 10, equalAspect: false }, {});
  canvas.setBounds({ xMin: 0, xMax: 10, yMin: 0, yMax: 10 });
  return canvas;
}

function body(canvas: SvgCanvas): string[] {
  return canvas.toSVG().split("\n").slice(2, -2);
}

describe("SvgCanvas", () => {
  it("writes an empty document with only the background", () => {
    expect(grid().toSVG()).toBe([...HEADER, "</svg>", ""].join("\n"));
  });

  it("writes only attached primitives, in attach order", () => {
    const canvas = grid();
    const first = canvas.drawMarker([5, 5], red);
    const second = canvas.drawMarker([0, 10], red);
    canvas.drawMarker([1, 1], red);
    canvas.attach(second);
    canvas.attach(first);
    canvas.attach(first);

    expect(canvas.attachedCount()).toBe(2);
    expect(body(canvas)).toEqual([
      '<circle cx="10" cy="10" r="3" fill="#ff0000" stroke="#ff0000"/>',
      '<circle cx="50" cy="50" r="3" fill="#ff0000" stroke="#ff0000"/>',
    ]);

    canvas.detach(second);
    expect(canvas.isAttached(second)).toBe(false);
    expect(body(canvas)).toEqual(['<circle cx="50" cy="50" r="3" fill="#ff0000" stroke="#ff0000"/>']);
  });

  it("strokes open paths with their dash pattern", () => {
    const canvas = grid();
    const solid = canvas.drawPath(
      [
        [0, 0],
        [10, 10],
      ],
      DEFAULT_STYLE
    );
    const dashed = canvas.drawPath(
      [
        [0, 10],
        [10, 0],
      ],
      { ...DEFAULT_STYLE, lineStyle: "--", lineWidth: 2 }
    );
    canvas.attach(solid);
    canvas.attach(dashed);
    expect(body(canvas)).toEqual([
      '<path d="M10,90L90,10" fill="none" stroke="#000000" stroke-width="1"/>',
      '<path d="M10,10L90,90" fill="none" stroke="#000000" stroke-width="2" stroke-dasharray="7.4,3.2"/>',
    ]);
  });

  it("draws markers along a line that has no stroke", () => {
    const canvas = grid();
    canvas.attach(
      canvas.drawPath(
        [
          [0, 0],
          [5, 5],
        ],
        { ...red, opacity: 0.5 }
      )
    );
    expect(body(canvas)).toEqual([
      '<circle cx="10" cy="90" r="3" fill="#ff0000" stroke="#ff0000" opacity="0.5"/>',
      '<circle cx="50" cy="50" r="3" fill="#ff0000" stroke="#ff0000" opacity="0.5"/>',
    ]);
  });

  it("fills compound paths with the nonzero rule and closes every ring", () => {
    const canvas = grid();
    const polygon = canvas.drawCompoundPath(
      [
        [0, 0],
        [0, 10],
        [10, 10],
        [10, 0],
        [0, 0],
        [5, 5],
        [6, 5],
        [6, 6],
        [5, 5],
      ],
      ["moveTo", "lineTo", "lineTo", "lineTo", "lineTo", "moveTo", "lineTo", "lineTo", "lineTo"],
      { ...DEFAULT_STYLE, fill: "#1f77b4" }
    );
    const outline = canvas.drawCompoundPath(
      [
        [1, 1],
        [1, 2],
        [2, 1],
      ],
      ["moveTo", "lineTo", "lineTo"],
      { ...DEFAULT_STYLE, fill: null, edgeColor: "#333333" }
    );
    canvas.attach(polygon);
    canvas.attach(outline);
    expect(body(canvas)).toEqual([
      '<path d="M10,90L10,10L90,10L90,90L10,90ZM50,50L58,50L58,42L50,50Z" fill="#1f77b4" fill-rule="nonzero" stroke="#000000" stroke-width="1"/>',
      '<path d="M18,82L18,74L26,82Z" fill="none" fill-rule="nonzero" stroke="#333333" stroke-width="1"/>',
    ]);
  });

  it("escapes attribute values", () => {
    const canvas = new SvgCanvas({ width: 100, height: 100, padding: 10, background: 'url("#a")' }, {});
    expect(canvas.toSVG().split("\n")[1]).toBe('<rect width="100%" height="100%" fill="url(&quot;#a&quot;)"/>');
  });

  it("rejects malformed paths and foreign primitives", () => {
    const canvas = grid();
    expect(() => canvas.drawPath([], DEFAULT_STYLE)).toThrow("Cannot draw a path with no vertices");
    expect(() => canvas.drawCompoundPath([[0, 0]], [], DEFAULT_STYLE)).toThrow(
      "Compound path has 1 vertices but 0 instructions"
    );
    expect(() => canvas.drawCompoundPath([[0, 0]], ["lineTo"], DEFAULT_STYLE)).toThrow(
      "Compound path must start with moveTo"
    );
    const foreign = grid().drawMarker([0, 0], red);
    expect(() => canvas.attach(foreign)).toThrow("Primitive 1 does not belong to this canvas");
  });

  it("hands out style copies", () => {
    const canvas = grid();
    const marker = canvas.drawMarker([0, 0], red);
    const style = canvas.getStyle(marker);
    style.color = "#00ff00";
    expect(canvas.getStyle(marker).color).toBe("#ff0000");
    canvas.setStyle(marker, style);
    expect(canvas.getStyle(marker).color).toBe("#00ff00");
  });

  it("measures attached content only", () => {
    const canvas = grid();
    expect(canvas.contentBounds()).toBeNull();
    const line = canvas.drawPath(
      [
        [0, 0],
        [10, 20],
      ],
      DEFAULT_STYLE
    );
    canvas.drawMarker([50, 50], red);
    canvas.attach(line);
    expect(canvas.contentBounds()).toEqual({ xMin: 0, xMax: 10, yMin: 0, yMax: 20 });
  });

  it("centers a lone point when bounds come from the content", () => {
    const canvas = new SvgCanvas({ width: 100, height: 100, padding: 10, equalAspect: false }, {});
    canvas.attach(canvas.drawMarker([3, 3], red));
    expect(canvas.screenTransform()([3, 3])).toEqual([50, 50]);
  });

  it("keeps one unit the same length on both axes with equal aspect", () => {
    const canvas = new SvgCanvas({ width: 100, height: 100, padding: 10 }, {});
    canvas.setBounds({ xMin: 0, xMax: 10, yMin: 0, yMax: 5 });
    const project = canvas.screenTransform();
    const [x0, y0] = project([0, 0]);
    const [x1, y1] = project([10, 5]);
    expect(x0).toBeCloseTo(10);
    expect(y0).toBeCloseTo(70);
    expect(x1).toBeCloseTo(90);
    expect(y1).toBeCloseTo(30);
  });

  it("saves the document to disk", async () => {
    const canvas = grid();
    canvas.attach(canvas.drawMarker([5, 5], red));
    const dir = mkdtempSync(join(tmpdir(), "vector-plot-"));
    const file = join(dir, "plot.svg");
    await canvas.rasterizeToFile(file);
    expect(readFileSync(file, "utf-8")).toBe(canvas.toSVG());
  });

  it("renders what a plotter draws", () => {
    const canvas = new SvgCanvas({ width: 100, height: 100, padding: 10 }, {});
    const plotter = new VectorPlotter(canvas, {
      env: {},
      logger: { debug: () => {}, warn: () => {} },
      limits: { xMin: 0, xMax: 4, yMin: 0, yMax: 4 },
    });
    plotter.plotPolygon([
      [
        [0, 0],
        [4, 0],
        [0, 4],
      ],
    ]);
    expect(body(canvas)).toEqual([
      '<path d="M10,10L90,90L10,90L10,10Z" fill="#1f77b4" fill-rule="nonzero" stroke="#000000" stroke-width="1"/>',
    ]);
    plotter.hide(0);
    expect(body(canvas)).toEqual([]);
  });
});

describe("SvgCanvas release", () => {
  it("forgets released primitives", () => {
    const canvas = grid();
    const marker = canvas.drawMarker([5, 5], red);
    canvas.attach(marker);
    canvas.release(marker);
    expect(canvas.attachedCount()).toBe(0);
    expect(canvas.primitiveCount()).toBe(0);
    expect(() => canvas.getStyle(marker)).toThrow("Primitive 1 does not belong to this canvas");
  });

  it("holds only the live layers' primitives after repeated replacement", () => {
    const canvas = grid();
    const plotter = new VectorPlotter(canvas, { env: {}, logger: { debug: () => {}, warn: () => {} } });
    for (let i = 0; i < 200; i += 1) plotter.plotPoint([i % 10, 1], undefined, "moving");
    plotter.plotPoint([2, 2], undefined, "fixed");
    expect(canvas.primitiveCount()).toBe(2);

    plotter.remove("moving");
    expect(canvas.primitiveCount()).toBe(1);
    plotter.clear();
    expect(canvas.primitiveCount()).toBe(0);
    expect(canvas.attachedCount()).toBe(0);
  });
});
