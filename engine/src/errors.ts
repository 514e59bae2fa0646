export class PlotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedGeometryKindError extends PlotError {
  constructor(readonly kind: string) {
    super(`Unsupported geometry type: ${kind}`);
  }
}

export class InvalidCoordinateError extends PlotError {
  constructor(readonly position: unknown) {
    super(`Coordinate ${JSON.stringify(position)} is not a finite (x, y) pair`);
  }
}

export class DegenerateRingError extends PlotError {
  constructor(readonly pointCount: number) {
    super(`Ring needs at least one point to determine winding, got ${pointCount}`);
  }
}

export class InvalidSymbolError extends PlotError {
  constructor(readonly symbol: string, detail: string) {
    super(`Invalid symbol "${symbol}": ${detail}`);
  }
}

export class BackendFailureError extends PlotError {
  constructor(readonly operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Rendering backend failed during ${operation}: ${reason}`, { cause });
  }
}

export class ConfigurationError extends PlotError {}
