import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ContractConfigError,
  getContractConfig,
  loadContractConfig,
  resetContractConfig,
  setContractConfig,
  shouldEmitCheck,
} from "../index.js";

const ENV_KEYS = [
  "COVENANT_CONTRACTS_MODE",
  "COVENANT_CONTRACTS_STRIP_PRECONDITIONS",
  "COVENANT_CONTRACTS_STRIP_POSTCONDITIONS",
  "COVENANT_CONTRACTS_STRIP_INVARIANTS",
  "COVENANT_DEBUG",
  "COVENANT_STATIC_MAX_BLOCK_VISITS",
  "COVENANT_STATIC_MAX_STEPS",
  "COVENANT_STATIC_MAX_CASE_SPLIT_DEPTH",
  "COVENANT_STATIC_CHECK_INVARIANTS",
  "COVENANT_STATIC_UNPROVEN_SEVERITY",
];

function clearEnv(): void {
  for (const key of ENV_KEYS) vi.stubEnv(key, undefined);
}

const tempDirs: string[] = [];

function tempProject(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), "covenant-config-"));
  tempDirs.push(dir);
  for (const [name, content] of Object.entries(files)) writeFileSync(join(dir, name), content);
  return dir;
}

afterEach(() => {
  resetContractConfig();
  vi.unstubAllEnvs();
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("contract configuration", () => {
  it("starts from defaults", () => {
    clearEnv();
    expect(getContractConfig()).toEqual({
      mode: "full",
      strip: {},
      debug: false,
      static: {
        maxBlockVisits: 4,
        maxSteps: 2000,
        maxCaseSplitDepth: 2,
        checkInvariants: true,
        unprovenSeverity: "warning",
      },
    });
  });

  it("keeps only invariants in assertions mode", () => {
    clearEnv();
    setContractConfig({ mode: "assertions" });
    expect(shouldEmitCheck("precondition")).toBe(false);
    expect(shouldEmitCheck("postcondition")).toBe(false);
    expect(shouldEmitCheck("invariant")).toBe(true);
  });

  it("strips single kinds", () => {
    clearEnv();
    setContractConfig({ strip: { postconditions: true } });
    expect(shouldEmitCheck("precondition")).toBe(true);
    expect(shouldEmitCheck("postcondition")).toBe(false);
  });

  it("merges successive programmatic settings", () => {
    clearEnv();
    setContractConfig({ static: { maxSteps: 50 } });
    setContractConfig({ static: { maxBlockVisits: 2 }, strip: { invariants: true } });
    const config = getContractConfig();
    expect(config.static.maxSteps).toBe(50);
    expect(config.static.maxBlockVisits).toBe(2);
    expect(config.strip).toEqual({ invariants: true });
  });

  it("rejects out-of-range values", () => {
    expect(() => setContractConfig({ static: { maxSteps: 0 } })).toThrow(ContractConfigError);
    expect(() => setContractConfig({ static: { maxCaseSplitDepth: 1.5 } })).toThrow(
      "static.maxCaseSplitDepth in setContractConfig() must be an integer >= 0"
    );
  });
});

describe("environment variables", () => {
  it("override defaults", () => {
    clearEnv();
    vi.stubEnv("COVENANT_CONTRACTS_MODE", "none");
    vi.stubEnv("COVENANT_CONTRACTS_STRIP_INVARIANTS", "1");
    vi.stubEnv("COVENANT_STATIC_MAX_STEPS", "500");
    vi.stubEnv("COVENANT_DEBUG", "true");
    const config = getContractConfig();
    expect(config.mode).toBe("none");
    expect(config.strip).toEqual({ invariants: true });
    expect(config.static.maxSteps).toBe(500);
    expect(config.debug).toBe(true);
  });

  it("are overridden by programmatic settings", () => {
    clearEnv();
    vi.stubEnv("COVENANT_CONTRACTS_MODE", "none");
    setContractConfig({ mode: "full" });
    expect(getContractConfig().mode).toBe("full");
  });

  it("are validated", () => {
    clearEnv();
    vi.stubEnv("COVENANT_CONTRACTS_MODE", "fast");
    expect(() => getContractConfig()).toThrow(
      'Invalid mode "fast" in environment; expected "full", "assertions" or "none"'
    );

    vi.stubEnv("COVENANT_CONTRACTS_MODE", "full");
    vi.stubEnv("COVENANT_STATIC_MAX_BLOCK_VISITS", "many");
    expect(() => getContractConfig()).toThrow(ContractConfigError);
  });
});

describe("loadContractConfig", () => {
  it("reads an rc file", () => {
    clearEnv();
    const dir = tempProject({
      ".covenantrc.json": JSON.stringify({ mode: "assertions", static: { unprovenSeverity: "error" } }),
    });
    expect(loadContractConfig(dir)).toBe(join(dir, ".covenantrc.json"));
    const config = getContractConfig();
    expect(config.mode).toBe("assertions");
    expect(config.static.unprovenSeverity).toBe("error");
  });

  it("reads the covenant key of package.json", () => {
    clearEnv();
    const dir = tempProject({
      "package.json": JSON.stringify({ name: "app", covenant: { static: { maxSteps: 10 } } }),
    });
    expect(loadContractConfig(dir)).toBe(join(dir, "package.json"));
    expect(getContractConfig().static.maxSteps).toBe(10);
  });

  it("lets programmatic settings win over files", () => {
    clearEnv();
    const dir = tempProject({ ".covenantrc.json": JSON.stringify({ mode: "none" }) });
    loadContractConfig(dir);
    setContractConfig({ mode: "full" });
    expect(getContractConfig().mode).toBe("full");
  });

  it("rejects invalid files", () => {
    const dir = tempProject({ ".covenantrc.json": JSON.stringify({ debug: "yes" }) });
    expect(() => loadContractConfig(dir)).toThrow(ContractConfigError);
  });

  it("returns undefined when there is no file", () => {
    const dir = tempProject({});
    expect(loadContractConfig(dir)).toBeUndefined();
  });
});
