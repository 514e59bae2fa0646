import type { PlotLogger } from "./types.js";
import { DEFAULT_PALETTE } from "./palette.js";
import { ConfigurationError } from "./errors.js";

export interface PlotterConfig {
  width: number; // canvas pixels
  height: number;
  padding: number;
  background: string;
  palette: readonly string[];
  equalAspect: boolean;
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<PlotterConfig> = {
  width: 800,
  height: 600,
  padding: 20,
  background: "white",
  palette: DEFAULT_PALETTE,
  equalAspect: true,
  debug: false,
};

type Env = Record<string, string | undefined>;

function processEnv(): Env {
  return typeof process !== "undefined" ? process.env : {};
}

function positiveFromEnv(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

/**
 * Defaults, then VECTOR_PLOT_* environment overrides, then explicit options.
 */
export function resolvePlotterConfig(options: Partial<PlotterConfig> = {}, env: Env = processEnv()): PlotterConfig {
  const config: PlotterConfig = {
    width: options.width ?? positiveFromEnv(env, "VECTOR_PLOT_WIDTH") ?? DEFAULT_CONFIG.width,
    height: options.height ?? positiveFromEnv(env, "VECTOR_PLOT_HEIGHT") ?? DEFAULT_CONFIG.height,
    padding: options.padding ?? positiveFromEnv(env, "VECTOR_PLOT_PADDING") ?? DEFAULT_CONFIG.padding,
    background: options.background ?? DEFAULT_CONFIG.background,
    palette: options.palette ?? DEFAULT_CONFIG.palette,
    equalAspect: options.equalAspect ?? DEFAULT_CONFIG.equalAspect,
    debug: options.debug ?? (env.VECTOR_PLOT_DEBUG === "1" || DEFAULT_CONFIG.debug),
  };
  if (config.palette.length === 0) throw new ConfigurationError("Palette must contain at least one color");
  if (config.width <= 0 || config.height <= 0) {
    throw new ConfigurationError(`Canvas size must be positive, got ${config.width}x${config.height}`);
  }
  if (config.padding < 0 || 2 * config.padding >= Math.min(config.width, config.height)) {
    throw new ConfigurationError(`Padding ${config.padding} does not fit a ${config.width}x${config.height} canvas`);
  }
  return config;
}

/** Console-backed logger; debug lines only when `debug` is on. */
export function consoleLogger(debug: boolean): PlotLogger {
  return {
    debug: debug ? (...args: unknown[]) => console.debug(...args) : () => {},
    warn: (...args: unknown[]) => console.warn(...args),
  };
}
