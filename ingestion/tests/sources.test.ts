import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import type { FeatureCollection } from "geojson";
import type { Topology } from "topojson-specification";
import { UnsupportedGeometryKindError } from "vector-plot-engine";
import {
  findGeometryByRef,
  geometriesFromGeoJSON,
  geometriesFromTopology,
  isGeometry,
  isTopology,
  loadGeometries,
  readJsonSource,
} from "../src/sources.js";

const square = [
  [
    [0, 0],
    [0, 1],
    [1, 1],
    [1, 0],
    [0, 0],
  ],
];

const parcels: FeatureCollection = {
  type: "FeatureCollection",
  features: [
    {
      type: "Feature",
      id: "p-1",
      properties: { name: "North", fill: "#222222" },
      geometry: { type: "Polygon", coordinates: square },
    },
    {
      type: "Feature",
      properties: { name: "Well" },
      geometry: { type: "Point", coordinates: [0.5, 0.5] },
    },
  ],
};

const topology: Topology = {
  type: "Topology",
  objects: {
    squares: {
      type: "GeometryCollection",
      geometries: [{ type: "Polygon", arcs: [[0]], id: "a", properties: { name: "Alpha" } }],
    },
  },
  arcs: [square[0]],
};

describe("GeoJSON sources", () => {
  it("turns features into geometries carrying their simplestyle", () => {
    expect(geometriesFromGeoJSON(parcels)).toEqual([
      { type: "Polygon", coordinates: square, style: { fill: "#222222" } },
      { type: "Point", coordinates: [0.5, 0.5] },
    ]);
  });

  it("lets a geometry's own style win over its feature's properties", () => {
    const feature = {
      type: "Feature",
      properties: { fill: "#222222", stroke: "#333333" },
      geometry: { type: "Polygon", coordinates: square, style: { fill: "#999999" } },
    };
    expect(geometriesFromGeoJSON(feature)).toEqual([
      { type: "Polygon", coordinates: square, style: { fill: "#999999", edgeColor: "#333333" } },
    ]);
  });

  it("skips features without geometry", () => {
    expect(geometriesFromGeoJSON({ type: "Feature", properties: null, geometry: null })).toEqual([]);
  });

  it("accepts a bare geometry", () => {
    const point = { type: "Point", coordinates: [1, 2] };
    expect(geometriesFromGeoJSON(point)).toEqual([point]);
  });

  it("rejects unknown or malformed geometries", () => {
    expect(() => geometriesFromGeoJSON({ type: "Circle" })).toThrow("Unsupported geometry type: Circle");
    expect(() =>
      geometriesFromGeoJSON({
        type: "FeatureCollection",
        features: [{ type: "Feature", properties: null, geometry: { type: "Point", coordinates: "here" } }],
      })
    ).toThrow(UnsupportedGeometryKindError);
    expect(() => geometriesFromGeoJSON({ type: "FeatureCollection" })).toThrow("FeatureCollection has no features array");
  });

  it("checks geometry structure recursively", () => {
    expect(isGeometry({ type: "LineString", coordinates: [[0, 0], [1, 1]] })).toBe(true);
    expect(isGeometry({ type: "LineString", coordinates: [0, 0] })).toBe(false);
    expect(
      isGeometry({ type: "GeometryCollection", geometries: [{ type: "Point", coordinates: [0, 0] }, { type: "Box" }] })
    ).toBe(false);
  });

  it("finds a feature by id or name", () => {
    expect(findGeometryByRef(parcels, "p-1")?.type).toBe("Polygon");
    expect(findGeometryByRef(parcels, "Well")).toEqual({ type: "Point", coordinates: [0.5, 0.5] });
    expect(findGeometryByRef(parcels, "South")).toBeNull();
  });
});

describe("TopoJSON sources", () => {
  it("recognizes topologies", () => {
    expect(isTopology(topology)).toBe(true);
    expect(isTopology(parcels)).toBe(false);
  });

  it("decodes a named object", () => {
    expect(geometriesFromTopology(topology, "squares")).toEqual([{ type: "Polygon", coordinates: square }]);
    expect(() => geometriesFromTopology(topology, "circles")).toThrow("Topology has no object named circles");
  });

  it("decodes every object when no name is given", () => {
    expect(loadGeometries(topology)).toHaveLength(1);
  });

  it("finds geometries by object name, feature id or feature name", () => {
    expect(findGeometryByRef(topology, "squares")).toEqual({ type: "Polygon", coordinates: square });
    expect(findGeometryByRef(topology, "a")).toEqual({ type: "Polygon", coordinates: square });
    expect(findGeometryByRef(topology, "Alpha")).toEqual({ type: "Polygon", coordinates: square });
    expect(findGeometryByRef(topology, "Beta")).toBeNull();
  });

  it("reads either format from disk", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vector-plot-ingest-"));
    const topoPath = join(dir, "squares.topojson");
    const geoPath = join(dir, "parcels.geojson");
    writeFileSync(topoPath, JSON.stringify(topology));
    writeFileSync(geoPath, JSON.stringify(parcels));

    expect(await readJsonSource(topoPath, "squares")).toEqual([{ type: "Polygon", coordinates: square }]);
    expect(await readJsonSource(geoPath)).toHaveLength(2);
  });
});
