export {
  geometriesFromGeoJSON,
  geometriesFromTopology,
  loadGeometries,
  findGeometryByRef,
  readJsonSource,
  isGeometry,
  isTopology,
} from "./sources.js";
export { styleFromProperties } from "./simplestyle.js";
