export { SvgCanvas, type ScreenTransform } from "./svgCanvas.js";
export { dashArray, markerElement } from "./markers.js";
export { fmt, escapeAttr } from "./format.js";
