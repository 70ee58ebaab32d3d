import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  configFromEnv,
  parseConcurrency,
  defaultConcurrency,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "./config.js";
import { CLIError } from "./errors/types.js";

vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when nothing is configured", () => {
      const config = resolveConfig();

      expect(config).toEqual({
        catalogUrl: CONFIG_DEFAULTS.catalogUrl,
        theme: "Hospitals",
        outputDir: "cms_hospitals_data",
        metadataFile: "cms_hospitals_data/metadata.json",
        concurrency: defaultConcurrency(),
        logLevel: "info",
        logJson: false,
      });
    });

    it("places the metadata file inside a configured output dir", () => {
      const config = resolveConfig({ outputDir: "/srv/cms" });

      expect(config.metadataFile).toBe("/srv/cms/metadata.json");
    });

    it("keeps an explicit metadata file path", () => {
      const config = resolveConfig({}, { output: { dir: "/srv/cms", metadataFile: "/var/lib/meta.json" } });

      expect(config.metadataFile).toBe("/var/lib/meta.json");
    });

    it("user config overrides system config", () => {
      const config = resolveConfig({}, { concurrency: 5 }, { concurrency: 3 });

      expect(config.concurrency).toBe(5);
    });

    it("environment overrides config files", () => {
      const config = resolveConfig({}, { catalog: { theme: "Nursing" } }, undefined, {
        theme: "Hospitals - General",
      });

      expect(config.theme).toBe("Hospitals - General");
    });

    it("CLI options override everything", () => {
      const config = resolveConfig(
        { concurrency: 1, outputDir: "cli-out" },
        { concurrency: 5, output: { dir: "user-out" } },
        undefined,
        { concurrency: 8 }
      );

      expect(config.concurrency).toBe(1);
      expect(config.outputDir).toBe("cli-out");
    });

    it("ignores undefined CLI options", () => {
      const config = resolveConfig({ theme: undefined }, { catalog: { theme: "Hospitals" } });

      expect(config.theme).toBe("Hospitals");
    });

    it("applies logging settings", () => {
      const config = resolveConfig({}, { logging: { level: "debug", json: true } });

      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("ConfigFileSchema", () => {
    it("accepts a full config", () => {
      const result = ConfigFileSchema.safeParse({
        catalog: { url: "https://catalog.test/items", theme: "Hospitals" },
        output: { dir: "data" },
        concurrency: 4,
        logging: { level: "warn", json: false },
      });

      expect(result.success).toBe(true);
    });

    it("rejects unknown keys", () => {
      expect(ConfigFileSchema.safeParse({ retries: 3 }).success).toBe(false);
    });

    it("rejects concurrency outside 1-64", () => {
      expect(ConfigFileSchema.safeParse({ concurrency: 0 }).success).toBe(false);
      expect(ConfigFileSchema.safeParse({ concurrency: 65 }).success).toBe(false);
    });

    it("rejects a catalog url that is not a URL", () => {
      expect(ConfigFileSchema.safeParse({ catalog: { url: "not a url" } }).success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined when the file does not exist", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadConfigFile("/missing.yaml")).toBeUndefined();
    });

    it("parses YAML content", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("catalog:\n  theme: Hospitals\nconcurrency: 2\n");

      expect(loadConfigFile("/config.yaml")).toEqual({
        catalog: { theme: "Hospitals" },
        concurrency: 2,
      });
    });

    it("treats an empty file as an empty config", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      expect(loadConfigFile("/config.yaml")).toEqual({});
    });

    it("throws a config error with the offending path", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("concurrency: lots\n");

      try {
        loadConfigFile("/config.yaml");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CLIError);
        expect((error as CLIError).code).toBe("VALIDATION_CONFIG_INVALID");
        expect((error as CLIError).details).toContain("concurrency:");
      }
    });

    it("throws on invalid YAML", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("catalog: [unclosed\n");

      expect(() => loadConfigFile("/config.yaml")).toThrow("Config file has errors: /config.yaml");
    });
  });

  describe("loadConfig", () => {
    it("reads system then user config", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockImplementation((path) =>
        String(path) === SYSTEM_CONFIG_PATH ? "concurrency: 2\n" : "concurrency: 6\n"
      );

      const { config, sources } = loadConfig(undefined, {}, {});

      expect(sources).toEqual([SYSTEM_CONFIG_PATH, USER_CONFIG_PATH]);
      expect(config.concurrency).toBe(6);
    });

    it("uses only the explicit path when given", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("output:\n  dir: /tmp/cms\n");

      const { config, sources } = loadConfig("/custom.yaml", {}, {});

      expect(sources).toEqual(["/custom.yaml"]);
      expect(config.outputDir).toBe("/tmp/cms");
      expect(readFileSync).toHaveBeenCalledTimes(1);
    });

    it("fails when the explicit path is missing", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(() => loadConfig("/nope.yaml", {}, {})).toThrow(CLIError);
    });

    it("applies environment overrides", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      const { config } = loadConfig(undefined, {}, { HOSPITAL_DATA_OUTPUT_DIR: "/env/out" });

      expect(config.outputDir).toBe("/env/out");
    });
  });

  describe("configFromEnv", () => {
    it("reads every supported variable", () => {
      expect(
        configFromEnv({
          HOSPITAL_DATA_CATALOG_URL: "https://catalog.test/items",
          HOSPITAL_DATA_THEME: "Hospitals",
          HOSPITAL_DATA_OUTPUT_DIR: "out",
          HOSPITAL_DATA_METADATA_FILE: "out/meta.json",
          HOSPITAL_DATA_CONCURRENCY: "3",
          HOSPITAL_DATA_LOG_LEVEL: "debug",
          HOSPITAL_DATA_LOG_JSON: "true",
        })
      ).toEqual({
        catalogUrl: "https://catalog.test/items",
        theme: "Hospitals",
        outputDir: "out",
        metadataFile: "out/meta.json",
        concurrency: 3,
        logLevel: "debug",
        logJson: true,
      });
    });

    it("rejects a bad log level", () => {
      expect(() => configFromEnv({ HOSPITAL_DATA_LOG_LEVEL: "loud" })).toThrow(
        'Invalid value for HOSPITAL_DATA_LOG_LEVEL: "loud"'
      );
    });
  });

  describe("parseConcurrency", () => {
    it("accepts whole numbers in range", () => {
      expect(parseConcurrency("8")).toBe(8);
    });

    it("rejects fractions, zero and text", () => {
      expect(() => parseConcurrency("1.5")).toThrow(CLIError);
      expect(() => parseConcurrency("0")).toThrow(CLIError);
      expect(() => parseConcurrency("many")).toThrow(CLIError);
    });
  });
});
