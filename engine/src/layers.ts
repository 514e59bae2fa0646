import type { LayerName, LayerSnapshot, PlotLogger, Primitive, RenderBackend } from "./types.js";
import { callBackend } from "./backend.js";
import { copyStyle } from "./style.js";

interface LayerEntry {
  primitives: Primitive[];
  visible: boolean;
}

const silentLogger: PlotLogger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Whether a new occupant may inherit the previous occupant's look. Paths
 * must match in point count, or both be real polylines (more than one point).
 */
export function sameDrawableKind(next: Primitive, previous: Primitive): boolean {
  if (next.kind !== previous.kind) return false;
  if (next.kind !== "path") return true;
  if (next.pointCount === previous.pointCount) return true;
  return next.pointCount > 1 && previous.pointCount > 1;
}

/**
 * Named groups of primitives that can be hidden, shown, replaced and removed.
 * A layer is absent, visible or hidden; the registry owns every primitive it
 * stores and is the only caller of attach/detach for them.
 */
export class LayerRegistry {
  private readonly layers = new Map<LayerName, LayerEntry>();
  private nextOrdinal = 0;

  constructor(
    private readonly backend: RenderBackend,
    private readonly logger: PlotLogger = silentLogger
  ) {}

  /**
   * Install primitives under `name` (or the next free ordinal when the name is
   * missing or empty), detaching and releasing any previous occupant first.
   * Without an explicit style, a same-kind replacement takes over the previous
   * occupant's style.
   */
  set(name: LayerName | undefined, primitives: Primitive[], explicitStyle: boolean): LayerName {
    const key = name === undefined || name === "" ? this.allocateOrdinal() : name;
    const previous = this.layers.get(key);
    if (previous) {
      this.hide(key);
      const [first] = primitives;
      const [prior] = previous.primitives;
      if (!explicitStyle && first && prior && sameDrawableKind(first, prior)) {
        const inherited = callBackend("getStyle", () => this.backend.getStyle(prior));
        for (const primitive of primitives) {
          callBackend("setStyle", () => this.backend.setStyle(primitive, copyStyle(inherited)));
        }
        this.logger.debug(`layer ${key}: kept previous style`);
      }
      this.release(previous);
    }
    this.layers.set(key, { primitives: [...primitives], visible: true });
    for (const primitive of primitives) {
      callBackend("attach", () => this.backend.attach(primitive));
    }
    this.logger.debug(`layer ${key}: ${previous ? "replaced" : "created"} with ${primitives.length} primitives`);
    return key;
  }

  hide(name: LayerName): void {
    const entry = this.layers.get(name);
    if (!entry || !entry.visible) return;
    for (const primitive of entry.primitives) {
      callBackend("detach", () => this.backend.detach(primitive));
    }
    entry.visible = false;
    this.logger.debug(`layer ${name}: hidden`);
  }

  show(name: LayerName): void {
    const entry = this.layers.get(name);
    if (!entry || entry.visible) return;
    for (const primitive of entry.primitives) {
      callBackend("attach", () => this.backend.attach(primitive));
    }
    entry.visible = true;
    this.logger.debug(`layer ${name}: shown`);
  }

  remove(name: LayerName): void {
    const entry = this.layers.get(name);
    if (!entry) return;
    this.hide(name);
    this.release(entry);
    this.layers.delete(name);
    this.logger.debug(`layer ${name}: removed`);
  }

  /** Release every layer; ordinals start over at 0. */
  clear(): void {
    for (const name of [...this.layers.keys()]) this.remove(name);
    this.nextOrdinal = 0;
  }

  has(name: LayerName): boolean {
    return this.layers.has(name);
  }

  isVisible(name: LayerName): boolean {
    return this.layers.get(name)?.visible ?? false;
  }

  get(name: LayerName): Primitive[] | undefined {
    const entry = this.layers.get(name);
    return entry ? [...entry.primitives] : undefined;
  }

  names(): LayerName[] {
    return [...this.layers.keys()];
  }

  entries(): LayerSnapshot[] {
    return [...this.layers].map(([name, entry]) => ({
      name,
      visible: entry.visible,
      primitives: [...entry.primitives],
    }));
  }

  get size(): number {
    return this.layers.size;
  }

  private release(entry: LayerEntry): void {
    for (const primitive of entry.primitives) {
      callBackend("release", () => this.backend.release(primitive));
    }
  }

  /** Strictly increasing, never handing out a name that is currently taken. */
  private allocateOrdinal(): number {
    while (this.layers.has(this.nextOrdinal)) this.nextOrdinal += 1;
    const ordinal = this.nextOrdinal;
    this.nextOrdinal += 1;
    return ordinal;
  }
}
