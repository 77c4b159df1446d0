import type { ConfigService } from "@/config/config.service";
import { DEFAULT_API_UPDATE_INTERVAL_S } from "@/config/config.defaults";

/**
 * Refresh interval for a config section, re-read on every call so runtime overrides apply.
 * Falls back to app.api_update_interval. Config values are seconds.
 */
export function refreshIntervalFrom(config: ConfigService, section: string): () => number {
  return () => {
    const fallback = config.getNumber("app.api_update_interval", DEFAULT_API_UPDATE_INTERVAL_S);
    return config.getNumber(`${section}.refresh_interval`, fallback) * 1000;
  };
}

/**
 * Default endpoints with per-name overrides from `<section>.endpoints`
 */
export function resolveEndpoints<K extends string>(
  config: ConfigService,
  section: string,
  defaults: Readonly<Record<K, string>>
): Record<K, string> {
  const resolved: Record<K, string> = { ...defaults };

  for (const name of Object.keys(defaults)) {
    const override = config.getString(`${section}.endpoints.${name}`);
    if (override && isEndpointName(defaults, name)) {
      resolved[name] = override;
    }
  }

  return resolved;
}

function isEndpointName<K extends string>(defaults: Readonly<Record<K, string>>, name: string): name is K {
  return name in defaults;
}
