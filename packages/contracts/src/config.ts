/**
 * Contract Configuration
 *
 * Configuration sources (later sources win):
 * 1. Defaults: mode="full", nothing stripped, static budgets below
 * 2. Config files found by cosmiconfig: package.json "covenant" key,
 *    .covenantrc, .covenantrc.json, covenant.config.js, ...
 *    (only after `loadContractConfig()` has been called)
 * 3. Environment variables: COVENANT_CONTRACTS_MODE, COVENANT_DEBUG, ...
 * 4. Programmatic: setContractConfig({ ... })
 *
 * @example Environment variables
 * ```bash
 * COVENANT_CONTRACTS_MODE=none npm start             # No runtime checks
 * COVENANT_CONTRACTS_MODE=assertions npm start       # Only invariants
 * COVENANT_CONTRACTS_STRIP_POSTCONDITIONS=1 npm test # Skip Ensures
 * COVENANT_STATIC_MAX_BLOCK_VISITS=8                 # Widen loops later
 * ```
 *
 * @example Config file (.covenantrc.json)
 * ```json
 * {
 *   "mode": "full",
 *   "static": { "maxCaseSplitDepth": 3, "unprovenSeverity": "error" }
 * }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ContractConfigError, type ContractKind } from "./runtime/errors.js";

// ============================================================================
// Types
// ============================================================================

export type ContractMode = "full" | "assertions" | "none";

export type Severity = "error" | "warning" | "info";

export interface StaticAnalysisConfig {
  /** Revisits of one block before its entry facts are widened to nothing */
  maxBlockVisits: number;
  /** Block visits per operation before the analysis gives up */
  maxSteps: number;
  /** Nesting depth of disjunctive case splits when discharging obligations */
  maxCaseSplitDepth: number;
  /** Check type invariants at the return points of public operations */
  checkInvariants: boolean;
  /** Severity given to obligations the checker cannot prove */
  unprovenSeverity: Severity;
}

export interface ContractConfig {
  /**
   * Runtime checking mode:
   * - "full": All checks enabled (default)
   * - "assertions": Only type invariants
   * - "none": No runtime checks
   */
  mode: ContractMode;

  /**
   * Fine-grained control per contract kind.
   * When a key is true, that kind is not checked at runtime.
   */
  strip: {
    preconditions?: boolean;
    postconditions?: boolean;
    invariants?: boolean;
  };

  /** Emit debug logging */
  debug: boolean;

  static: StaticAnalysisConfig;
}

export interface ContractConfigInput {
  mode?: ContractMode;
  strip?: ContractConfig["strip"];
  debug?: boolean;
  static?: Partial<StaticAnalysisConfig>;
}

// ============================================================================
// Internal State
// ============================================================================

const DEFAULT_STATIC: StaticAnalysisConfig = {
  maxBlockVisits: 4,
  maxSteps: 2000,
  maxCaseSplitDepth: 2,
  checkInvariants: true,
  unprovenSeverity: "warning",
};

const MODULE_NAME = "covenant";

let fileConfig: ContractConfigInput | null = null;
let localConfig: ContractConfigInput | null = null;

// ============================================================================
// Public API
// ============================================================================

/**
 * Get the current contract configuration.
 */
export function getContractConfig(): ContractConfig {
  const layers = [fileConfig, loadConfigFromEnv(), localConfig];

  const config: ContractConfig = {
    mode: "full",
    strip: {},
    debug: false,
    static: { ...DEFAULT_STATIC },
  };

  for (const layer of layers) {
    if (!layer) continue;
    if (layer.mode !== undefined) config.mode = layer.mode;
    if (layer.debug !== undefined) config.debug = layer.debug;
    if (layer.strip) config.strip = { ...config.strip, ...layer.strip };
    if (layer.static) config.static = { ...config.static, ...layer.static };
  }

  return config;
}

/**
 * Set contract configuration programmatically. Values are merged into
 * earlier programmatic settings.
 */
export function setContractConfig(input: ContractConfigInput): void {
  const checked = parseConfigInput(input, "setContractConfig()");
  localConfig = {
    ...localConfig,
    ...checked,
    strip: { ...localConfig?.strip, ...checked.strip },
    static: { ...localConfig?.static, ...checked.static },
  };
}

/**
 * Drop programmatic and file-based settings.
 */
export function resetContractConfig(): void {
  localConfig = null;
  fileConfig = null;
}

/**
 * Search for a config file starting at `searchFrom` (default: the working
 * directory) and make its settings part of the configuration.
 *
 * @returns the path of the file that was loaded, if any
 */
export function loadContractConfig(searchFrom?: string): string | undefined {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) return undefined;

  const raw: unknown = result.config;
  fileConfig = parseConfigInput(raw, result.filepath);
  return result.filepath;
}

/**
 * Should a runtime check be performed for the given contract kind?
 */
export function shouldEmitCheck(kind: ContractKind): boolean {
  const config = getContractConfig();

  if (config.mode === "none") return false;
  if (config.mode === "assertions" && kind !== "invariant") return false;

  const stripKey = {
    precondition: "preconditions" as const,
    postcondition: "postconditions" as const,
    invariant: "invariants" as const,
  }[kind];

  return !config.strip[stripKey];
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Read COVENANT_* variables:
 *
 *   COVENANT_CONTRACTS_MODE=none                 → { mode: "none" }
 *   COVENANT_CONTRACTS_STRIP_PRECONDITIONS=1     → { strip: { preconditions: true } }
 *   COVENANT_DEBUG=1                             → { debug: true }
 *   COVENANT_STATIC_MAX_STEPS=500                → { static: { maxSteps: 500 } }
 */
function loadConfigFromEnv(): ContractConfigInput | null {
  const env = process.env;
  const raw: Record<string, unknown> = {};
  const strip: Record<string, unknown> = {};
  const statics: Record<string, unknown> = {};

  if (env.COVENANT_CONTRACTS_MODE) raw.mode = env.COVENANT_CONTRACTS_MODE;
  if (env.COVENANT_DEBUG !== undefined) raw.debug = parseFlag(env.COVENANT_DEBUG);

  const stripVars = {
    preconditions: env.COVENANT_CONTRACTS_STRIP_PRECONDITIONS,
    postconditions: env.COVENANT_CONTRACTS_STRIP_POSTCONDITIONS,
    invariants: env.COVENANT_CONTRACTS_STRIP_INVARIANTS,
  };
  for (const [key, value] of Object.entries(stripVars)) {
    if (value !== undefined) strip[key] = parseFlag(value);
  }

  const staticVars = {
    maxBlockVisits: env.COVENANT_STATIC_MAX_BLOCK_VISITS,
    maxSteps: env.COVENANT_STATIC_MAX_STEPS,
    maxCaseSplitDepth: env.COVENANT_STATIC_MAX_CASE_SPLIT_DEPTH,
  };
  for (const [key, value] of Object.entries(staticVars)) {
    if (value !== undefined) statics[key] = /^\d+$/.test(value) ? parseInt(value, 10) : value;
  }
  if (env.COVENANT_STATIC_CHECK_INVARIANTS !== undefined) {
    statics.checkInvariants = parseFlag(env.COVENANT_STATIC_CHECK_INVARIANTS);
  }
  if (env.COVENANT_STATIC_UNPROVEN_SEVERITY) {
    statics.unprovenSeverity = env.COVENANT_STATIC_UNPROVEN_SEVERITY;
  }

  if (Object.keys(strip).length > 0) raw.strip = strip;
  if (Object.keys(statics).length > 0) raw.static = statics;
  if (Object.keys(raw).length === 0) return null;

  return parseConfigInput(raw, "environment");
}

function parseFlag(value: string): boolean {
  return value === "1" || value === "true";
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseConfigInput(raw: unknown, source: string): ContractConfigInput {
  if (!isRecord(raw)) {
    throw new ContractConfigError(`Configuration from ${source} must be an object`);
  }

  const input: ContractConfigInput = {};

  if (raw.mode !== undefined) {
    if (raw.mode !== "full" && raw.mode !== "assertions" && raw.mode !== "none") {
      throw new ContractConfigError(
        `Invalid mode ${JSON.stringify(raw.mode)} in ${source}; expected "full", "assertions" or "none"`
      );
    }
    input.mode = raw.mode;
  }

  if (raw.debug !== undefined) input.debug = expectBoolean(raw.debug, "debug", source);

  if (raw.strip !== undefined) {
    if (!isRecord(raw.strip)) throw new ContractConfigError(`strip in ${source} must be an object`);
    const strip: ContractConfig["strip"] = {};
    for (const key of ["preconditions", "postconditions", "invariants"] as const) {
      const value = raw.strip[key];
      if (value !== undefined) strip[key] = expectBoolean(value, `strip.${key}`, source);
    }
    input.strip = strip;
  }

  if (raw.static !== undefined) {
    if (!isRecord(raw.static)) throw new ContractConfigError(`static in ${source} must be an object`);
    const s = raw.static;
    const statics: Partial<StaticAnalysisConfig> = {};
    if (s.maxBlockVisits !== undefined) {
      statics.maxBlockVisits = expectCount(s.maxBlockVisits, "static.maxBlockVisits", source, 1);
    }
    if (s.maxSteps !== undefined) {
      statics.maxSteps = expectCount(s.maxSteps, "static.maxSteps", source, 1);
    }
    if (s.maxCaseSplitDepth !== undefined) {
      statics.maxCaseSplitDepth = expectCount(s.maxCaseSplitDepth, "static.maxCaseSplitDepth", source, 0);
    }
    if (s.checkInvariants !== undefined) {
      statics.checkInvariants = expectBoolean(s.checkInvariants, "static.checkInvariants", source);
    }
    if (s.unprovenSeverity !== undefined) {
      const severity = s.unprovenSeverity;
      if (severity !== "error" && severity !== "warning" && severity !== "info") {
        throw new ContractConfigError(
          `Invalid static.unprovenSeverity ${JSON.stringify(severity)} in ${source}`
        );
      }
      statics.unprovenSeverity = severity;
    }
    input.static = statics;
  }

  return input;
}

function expectBoolean(value: unknown, key: string, source: string): boolean {
  if (typeof value !== "boolean") {
    throw new ContractConfigError(`${key} in ${source} must be a boolean`);
  }
  return value;
}

function expectCount(value: unknown, key: string, source: string, minimum: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < minimum) {
    throw new ContractConfigError(`${key} in ${source} must be an integer >= ${minimum}`);
  }
  return value;
}
