import { readFileSync } from "fs";
import { createRequire } from "module";
import { resolve } from "path";
import { geoGraticule10 } from "d3-geo";
import { VectorPlotter } from "vector-plot-engine";
import { SvgCanvas } from "vector-plot-canvas";
import { findGeometryByRef, loadGeometries } from "vector-plot-ingestion";

// Usage: render-world.ts [out.svg] [country name or id ...]
async function main(): Promise<void> {
  const [out = "world.svg", ...highlights] = process.argv.slice(2);
  const require = createRequire(import.meta.url);
  const world: unknown = JSON.parse(readFileSync(require.resolve("world-atlas/countries-110m.json"), "utf-8"));

  const canvas = new SvgCanvas({ width: 1600, height: 900 });
  const plotter = new VectorPlotter(canvas, {
    width: 1600,
    height: 900,
    limits: { xMin: -180, xMax: 180, yMin: -90, yMax: 90 },
  });
  plotter.adjustMarkers();

  plotter.plot(geoGraticule10(), { symbol: "k:", lineWidth: 0.5 }, "graticule");
  const countries = loadGeometries(world, "countries");
  plotter.plot(countries, { fill: "#d9d9d9", edgeColor: "#ffffff" }, "countries");

  for (const ref of highlights) {
    const geometry = findGeometryByRef(world, ref);
    if (!geometry) {
      console.warn(`No country matches "${ref}"`);
      continue;
    }
    plotter.plot(geometry, undefined, ref);
  }

  const path = resolve(out);
  await plotter.save(path);
  console.log(`Wrote ${countries.length} countries, ${plotter.layerNames().length} layers to ${path}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
