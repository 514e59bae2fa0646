import { readFile } from "fs/promises";
import { feature } from "topojson-client";
import type { Feature, FeatureCollection, GeoJsonProperties } from "geojson";
import type { Topology } from "topojson-specification";
import type { Geometry, GeometryKind } from "vector-plot-engine";
import { UnsupportedGeometryKindError, describeKind, kindFamily } from "vector-plot-engine";
import { styleFromProperties } from "./simplestyle.js";

const GEOMETRY_KINDS: readonly GeometryKind[] = [
  "Point",
  "MultiPoint",
  "LineString",
  "MultiLineString",
  "Polygon",
  "MultiPolygon",
  "GeometryCollection",
];

/** Nesting depth of the `coordinates` array for each kind. */
const COORDINATE_DEPTH: Record<Exclude<GeometryKind, "GeometryCollection">, number> = {
  Point: 0,
  MultiPoint: 1,
  LineString: 1,
  MultiLineString: 2,
  Polygon: 2,
  MultiPolygon: 3,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isGeometryKind(value: unknown): value is GeometryKind {
  return GEOMETRY_KINDS.some((kind) => kind === value);
}

function isCoordinates(value: unknown, depth: number): boolean {
  if (!Array.isArray(value)) return false;
  if (depth === 0) return value.length >= 2 && value.every((n) => typeof n === "number");
  return value.every((child) => isCoordinates(child, depth - 1));
}

/** Structural GeoJSON geometry check; coordinate finiteness is left to the extractor. */
export function isGeometry(value: unknown): value is Geometry {
  if (!isRecord(value)) return false;
  const kind = value.type;
  if (!isGeometryKind(kind)) return false;
  if (kind === "GeometryCollection") {
    const members = value.geometries;
    return Array.isArray(members) && members.every((member) => isGeometry(member));
  }
  return isCoordinates(value.coordinates, COORDINATE_DEPTH[kind]);
}

export function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === "Topology" && isRecord(value.objects) && Array.isArray(value.arcs);
}

function withFeatureStyle(geometry: Geometry, properties: GeoJsonProperties): Geometry {
  const style = styleFromProperties(properties, kindFamily(geometry.type));
  return style ? { ...geometry, style: { ...style, ...geometry.style } } : geometry;
}

function featureToGeometry(value: unknown): Geometry | null {
  if (!isRecord(value) || value.type !== "Feature") {
    throw new UnsupportedGeometryKindError(describeKind(value));
  }
  const geometry = value.geometry;
  if (geometry === null || geometry === undefined) return null;
  if (!isGeometry(geometry)) throw new UnsupportedGeometryKindError(describeKind(geometry));
  const properties = isRecord(value.properties) ? value.properties : null;
  return withFeatureStyle(geometry, properties);
}

/**
 * Geometries of a GeoJSON FeatureCollection, Feature or bare geometry, in
 * document order. Features without geometry are skipped; simplestyle
 * properties become each geometry's own style.
 */
export function geometriesFromGeoJSON(source: unknown): Geometry[] {
  if (isRecord(source) && source.type === "FeatureCollection") {
    if (!Array.isArray(source.features)) throw new Error("FeatureCollection has no features array");
    return source.features.map(featureToGeometry).filter((g): g is Geometry => g !== null);
  }
  if (isRecord(source) && source.type === "Feature") {
    const geometry = featureToGeometry(source);
    return geometry ? [geometry] : [];
  }
  if (isGeometry(source)) return [source];
  throw new UnsupportedGeometryKindError(describeKind(source));
}

/** Decode one named object (or every object) of a TopoJSON topology. */
export function geometriesFromTopology(topology: Topology, objectName?: string): Geometry[] {
  const names = objectName ? [objectName] : Object.keys(topology.objects);
  return names.flatMap((name) => {
    const object = topology.objects[name];
    if (!object) throw new Error(`Topology has no object named ${name}`);
    const decoded: Feature | FeatureCollection = feature(topology, object);
    return geometriesFromGeoJSON(decoded);
  });
}

/** Either a topology or any GeoJSON value. */
export function loadGeometries(source: unknown, objectName?: string): Geometry[] {
  return isTopology(source) ? geometriesFromTopology(source, objectName) : geometriesFromGeoJSON(source);
}

/**
 * Find a feature's geometry by id or `properties.name`, searching GeoJSON
 * features or every object of a topology. Null when nothing matches.
 */
export function findGeometryByRef(source: unknown, ref: string): Geometry | null {
  const features: unknown[] = [];
  if (isTopology(source)) {
    if (source.objects[ref]) return geometriesFromTopology(source, ref)[0] ?? null;
    for (const name of Object.keys(source.objects)) {
      const decoded: Feature | FeatureCollection = feature(source, source.objects[name]);
      features.push(...(decoded.type === "FeatureCollection" ? decoded.features : [decoded]));
    }
  } else if (isRecord(source) && source.type === "FeatureCollection" && Array.isArray(source.features)) {
    features.push(...source.features);
  } else if (isRecord(source) && source.type === "Feature") {
    features.push(source);
  }
  const match = features.find(
    (f) => isRecord(f) && (String(f.id ?? "") === ref || (isRecord(f.properties) && f.properties.name === ref))
  );
  return match ? featureToGeometry(match) : null;
}

/** Read a GeoJSON or TopoJSON document from disk and decode its geometries. */
export async function readJsonSource(path: string, objectName?: string): Promise<Geometry[]> {
  const raw = await readFile(path, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return loadGeometries(parsed, objectName);
}
