import { ConfigurationError } from "./errors.js";

/** Ten-color category cycle used when a plot call names no color. */
export const DEFAULT_PALETTE: readonly string[] = [
  "#1f77b4",
  "#ff7f0e",
  "#2ca02c",
  "#d62728",
  "#9467bd",
  "#8c564b",
  "#e377c2",
  "#7f7f7f",
  "#bcbd22",
  "#17becf",
];

/** Rotating pointer into a fixed color list. Owned by one plotting session. */
export class PaletteCursor {
  private readonly colors: readonly string[];
  private index = 0;

  constructor(colors: readonly string[] = DEFAULT_PALETTE) {
    if (colors.length === 0) throw new ConfigurationError("Palette must contain at least one color");
    this.colors = [...colors];
  }

  /** Read the current color, then advance (wrapping). */
  next(): string {
    const color = this.colors[this.index];
    this.index = (this.index + 1) % this.colors.length;
    return color;
  }

  peek(): string {
    return this.colors[this.index];
  }

  reset(): void {
    this.index = 0;
  }

  get position(): number {
    return this.index;
  }

  get size(): number {
    return this.colors.length;
  }
}
