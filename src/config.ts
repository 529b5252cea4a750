import { ConfigSchema, parseOrThrow } from "./schemas.js";
import { setLogLevel, type LogLevel } from "./utils/logger.js";

export type AbsorbPolicy = "absorb" | "inherit";

export type HashAlgorithm = "sha256" | "sha1" | "md5";

export type SweepgraphConfig = {
  cache: {
    enabled: boolean;
  };
  hashing: {
    algorithm: HashAlgorithm;
    /** Hex characters kept from each digest (0 keeps the whole digest) */
    digestLength: number;
  };
  naming: {
    /** Joins a derived node name and its disambiguation counter, e.g. "Add_2" */
    separator: string;
  };
  state: {
    absorbPolicy: AbsorbPolicy;
  };
  log: {
    level: LogLevel;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: SweepgraphConfig = {
  cache: {
    enabled: true,
  },
  hashing: {
    algorithm: "sha256",
    digestLength: 0,
  },
  naming: {
    separator: "_",
  },
  state: {
    absorbPolicy: "absorb",
  },
  log: {
    level: "info",
  },
};

let current: SweepgraphConfig = structuredClone(DEFAULTS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isRecord(val) && isRecord(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults and validates the result. */
export function configure(overrides: DeepPartial<SweepgraphConfig>): void {
  const merged = deepMerge(DEFAULTS, overrides);
  current = parseOrThrow(ConfigSchema, merged, "config");
  setLogLevel(current.log.level);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
  setLogLevel(current.log.level);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<SweepgraphConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<SweepgraphConfig> = Object.freeze(structuredClone(DEFAULTS));
