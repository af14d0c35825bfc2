// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  optionsFromConfig,
  overridesFromEnv,
  tryLoadConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";
import { ConfigError } from "../../../src/core/errors";
import { DEFAULT_MAX_STEPS } from "../../../src/core/eval/source";
import { GraphBuilder } from "../../../src/core/graph/builder";
import { tNumber } from "../../../src/core/types/types";

const fixtures = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.ORDSTREAM_VALIDATION;
    delete process.env.ORDSTREAM_MAX_STEPS;
    delete process.env.ORDSTREAM_TRACE;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.eval.maxSteps).toBe(DEFAULT_MAX_STEPS);
  });

  it("reads settings from ORDSTREAM_*", () => {
    process.env.ORDSTREAM_VALIDATION = "deferred";
    process.env.ORDSTREAM_MAX_STEPS = "250";
    process.env.ORDSTREAM_TRACE = "1";
    expect(configFromEnv()).toEqual({
      check: { validation: "deferred" },
      eval: { maxSteps: 250, trace: true },
    });
  });

  it("takes another prefix and environment", () => {
    expect(overridesFromEnv("STREAMS", { STREAMS_TRACE: "false" })).toEqual({ eval: { trace: false } });
    expect(overridesFromEnv("STREAMS", {})).toEqual({});
  });

  it("treats empty variables as unset", () => {
    process.env.ORDSTREAM_MAX_STEPS = "";
    expect(configFromEnv().eval.maxSteps).toBe(DEFAULT_MAX_STEPS);
  });

  it("rejects bad values", () => {
    expect(() => overridesFromEnv("ORDSTREAM", { ORDSTREAM_MAX_STEPS: "lots" })).toThrow(ConfigError);
    expect(() => overridesFromEnv("ORDSTREAM", { ORDSTREAM_VALIDATION: "lazy" })).toThrow(
      /^InvalidConfig: Invalid configuration: environment ORDSTREAM_\*: VALIDATION: /
    );
  });
});

describe("configFromObject", () => {
  it("accepts snake_case keys", () => {
    expect(configFromObject({ eval: { max_steps: 10 } })).toEqual({
      check: { validation: "eager" },
      eval: { maxSteps: 10, trace: false },
    });
  });

  it("accepts camelCase keys", () => {
    expect(configFromObject({ eval: { maxSteps: 10 } }).eval.maxSteps).toBe(10);
  });

  it("rejects unknown keys", () => {
    expect(() => configFromObject({ eval: { max_step: 10 } })).toThrow("maxStep");
    expect(() => configFromObject({ output: {} })).toThrow(ConfigError);
  });

  it("rejects values of the wrong type", () => {
    expect(() => configFromObject({ eval: { maxSteps: 0 } })).toThrow(ConfigError);
    expect(() => configFromObject({ check: { validation: true } })).toThrow(ConfigError);
  });
});

describe("configFromFile", () => {
  it("reads a JSON file", () => {
    expect(configFromFile(path.join(fixtures, "ordstream.config.json"))).toEqual({
      check: { validation: "deferred" },
      eval: { maxSteps: 5000, trace: false },
    });
  });

  it("reports a missing file", () => {
    const missing = path.join(fixtures, "missing.json");
    expect(() => configFromFile(missing)).toThrow(`InvalidConfig: Invalid configuration: file not found: ${missing}`);
  });

  it("reports formats other than JSON", () => {
    expect(() => configFromFile(path.join(fixtures, "unsupported.yaml"))).toThrow(
      "InvalidConfig: Invalid configuration: unsupported file format: .yaml"
    );
  });
});

describe("mergeConfigs", () => {
  it("lets later configs override earlier ones", () => {
    const merged = mergeConfigs({ eval: { maxSteps: 10, trace: true } }, { eval: { maxSteps: 20 } });
    expect(merged.eval).toEqual({ maxSteps: 20, trace: true });
    expect(merged.check).toEqual(DEFAULT_CONFIG.check);
  });

  it("does not touch the defaults", () => {
    mergeConfigs({ check: { validation: "deferred" } });
    expect(DEFAULT_CONFIG.check.validation).toBe("eager");
  });
});

describe("loadConfig", () => {
  it("finds the default file in cwd", () => {
    expect(loadConfig({ cwd: fixtures, env: {} }).eval.maxSteps).toBe(5000);
  });

  it("layers environment, file and overrides", () => {
    const config = loadConfig({
      cwd: fixtures,
      env: { ORDSTREAM_TRACE: "true", ORDSTREAM_MAX_STEPS: "9" },
      overrides: { check: { validation: "eager" } },
    });
    expect(config).toEqual({
      check: { validation: "eager" },
      eval: { maxSteps: 5000, trace: false },
    });
  });

  it("uses defaults without a file", () => {
    expect(loadConfig({ cwd: path.join(fixtures, "none"), env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("reads an explicit file", () => {
    expect(() => loadConfig({ configFile: path.join(fixtures, "unsupported.yaml"), env: {} })).toThrow(ConfigError);
  });

  it("checks overrides like any other source", () => {
    const none = path.join(fixtures, "none");
    expect(() => loadConfig({ cwd: none, env: {}, overrides: { eval: { maxSteps: 0 } } })).toThrow(
      "InvalidConfig: Invalid configuration: eval.maxSteps: Number must be greater than 0"
    );
    expect(loadConfig({ cwd: none, env: {}, overrides: { eval: { trace: true } } }).eval).toEqual({
      maxSteps: DEFAULT_MAX_STEPS,
      trace: true,
    });
  });
});

describe("tryLoadConfig", () => {
  it("returns the loaded config", () => {
    const outcome = tryLoadConfig({ cwd: fixtures, env: {} });
    expect(outcome.tag).toBe("Done");
    if (outcome.tag === "Done") expect(outcome.value.eval.maxSteps).toBe(5000);
  });

  it("reports a bad setting as a recoverable failure", () => {
    const outcome = tryLoadConfig({ cwd: fixtures, env: { ORDSTREAM_VALIDATION: "lazy" } });
    expect(outcome.tag).toBe("Fail");
    if (outcome.tag === "Fail") {
      expect(outcome.failure.reason).toBe("validation-failed");
      expect(outcome.failure.recoverable).toBe(true);
      expect(outcome.failure.diagnostics.map((d) => d.code)).toEqual(["E1000"]);
      expect(outcome.failure.message).toMatch(/^Invalid configuration: environment ORDSTREAM_\*: VALIDATION: /);
    }
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("warns on a low step limit", () => {
    const result = validateConfig(mergeConfigs({ eval: { maxSteps: 50 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["eval.maxSteps is very low, may cause premature termination"]);
  });

  it("reports a step limit that is not a positive integer", () => {
    const result = validateConfig(mergeConfigs({ eval: { maxSteps: 1.5 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["eval.maxSteps must be a positive integer"]);
  });
});

describe("optionsFromConfig", () => {
  it("wires the step limit and validation mode", () => {
    const options = optionsFromConfig(mergeConfigs({ check: { validation: "deferred" }, eval: { maxSteps: 300 } }));
    expect(options.builder.validation).toBe("deferred");
    expect(options.interpret.maxSteps).toBe(300);
    expect(options.vm.maxSteps).toBe(300);
    expect(new GraphBuilder(options.builder).validation).toBe("deferred");
  });

  it("prefixes trace lines", () => {
    const lines: unknown[][] = [];
    const options = optionsFromConfig(mergeConfigs({ eval: { trace: true } }), (...args) => {
      lines.push(args);
    });
    const b = new GraphBuilder(options.builder);
    b.build(b.input("x", tNumber));
    expect(lines.length).toBeGreaterThan(0);
    for (const line of lines) {
      expect(String(line[0]).startsWith("[ordstream] ")).toBe(true);
    }
  });

  it("writes nothing when tracing is off", () => {
    const lines: string[] = [];
    const options = optionsFromConfig(DEFAULT_CONFIG, (msg) => lines.push(msg));
    options.trace("anything");
    expect(lines).toEqual([]);
  });
});
