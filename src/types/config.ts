import { widgetDriverConfigSchema, widgetSettingsSchema } from "../config/config-schema.js";

/** Widget driver configuration with sensible defaults */
export interface WidgetDriverConfig {
  // Timeouts
  requestTimeoutMs?: number; // default: 10000 (upper bound mandated by the Widget API)
  openIdTimeoutMs?: number; // default: 30000

  // Read paging
  defaultMessageLimit?: number; // default: 50
  defaultStateLimit?: number; // default: 1
  maxReadLimit?: number; // default: 1000
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<WidgetDriverConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  requestTimeoutMs: 10_000,
  openIdTimeoutMs: 30_000,
  defaultMessageLimit: 50,
  defaultStateLimit: 1,
  maxReadLimit: 1000,
};

/** Describes the widget a driver is attached to. */
export interface WidgetSettings {
  /** Widget's unique identifier, stamped on every outgoing message. */
  id: string;
  /**
   * Wait for the widget's `content_loaded` request before negotiating
   * capabilities. When false, negotiation starts as soon as the driver runs.
   */
  initOnContentLoad: boolean;
}

export function resolveConfig(config: WidgetDriverConfig = {}): ResolvedConfig {
  const validation = widgetDriverConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  const data = validation.data;
  const resolved: ResolvedConfig = {
    requestTimeoutMs: data.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    openIdTimeoutMs: data.openIdTimeoutMs ?? DEFAULT_CONFIG.openIdTimeoutMs,
    defaultMessageLimit: data.defaultMessageLimit ?? DEFAULT_CONFIG.defaultMessageLimit,
    defaultStateLimit: data.defaultStateLimit ?? DEFAULT_CONFIG.defaultStateLimit,
    maxReadLimit: data.maxReadLimit ?? DEFAULT_CONFIG.maxReadLimit,
  };
  if (resolved.defaultMessageLimit > resolved.maxReadLimit) {
    throw new Error("Invalid configuration: defaultMessageLimit exceeds maxReadLimit");
  }
  return resolved;
}

export function validateSettings(settings: WidgetSettings): WidgetSettings {
  const validation = widgetSettingsSchema.safeParse(settings);
  if (!validation.success) {
    throw new Error(`Invalid widget settings: ${validation.error.message}`);
  }
  return validation.data;
}
