/**
 * Environment Utilities
 * Consolidates environment variable parsing with range checks and warnings
 */

type EnvSource = Record<string, string | undefined>;

interface NumberOptions {
  min?: number;
  max?: number;
  fieldName?: string;
  env?: EnvSource;
}

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

export class EnvironmentUtils {
  /**
   * Parse integer from environment variable with validation
   */
  static parseInt(key: string, defaultValue: number, options: NumberOptions = {}): number {
    const value = (options.env ?? process.env)[key];
    if (!value) return defaultValue;

    const parsed = Number.parseInt(value, 10);
    if (isNaN(parsed)) {
      console.warn(`Invalid integer value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
      return defaultValue;
    }

    return EnvironmentUtils.checkRange(key, parsed, defaultValue, options);
  }

  /**
   * Parse boolean from environment variable
   */
  static parseBoolean(
    key: string,
    defaultValue: boolean,
    options: { fieldName?: string; env?: EnvSource } = {}
  ): boolean {
    const value = (options.env ?? process.env)[key];
    if (!value) return defaultValue;

    const parsed = EnvironmentUtils.toBoolean(value);
    if (parsed === undefined) {
      console.warn(`Invalid boolean value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
      return defaultValue;
    }
    return parsed;
  }

  /**
   * Read a string environment variable, falling back when unset or empty
   */
  static parseString(key: string, defaultValue: string, options: { env?: EnvSource } = {}): string {
    return (options.env ?? process.env)[key] || defaultValue;
  }

  /**
   * Interpret a raw string as a boolean, undefined when it is not one
   */
  static toBoolean(value: string): boolean | undefined {
    const lowerValue = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(lowerValue)) return true;
    if (FALSE_VALUES.includes(lowerValue)) return false;
    return undefined;
  }

  /**
   * Interpret a raw string as a finite number, undefined when it is not one
   */
  static toNumber(value: string): number | undefined {
    if (value.trim() === "") return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  private static checkRange(key: string, parsed: number, defaultValue: number, options: NumberOptions): number {
    if (options.min !== undefined && parsed < options.min) {
      console.warn(
        `Value ${parsed} for ${options.fieldName || key} is below minimum ${options.min}, using default ${defaultValue}`
      );
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      console.warn(
        `Value ${parsed} for ${options.fieldName || key} is above maximum ${options.max}, using default ${defaultValue}`
      );
      return defaultValue;
    }

    return parsed;
  }
}
