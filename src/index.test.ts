import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigurationError } from "./errors";
import {
  loadConfig,
  requireEnv,
  resolveCronExpression,
  scheduledHours,
} from "./config";
import { createLogger } from "./logger";
import { createCore, createPublishDeps } from "./app";
import {
  createTestConfig,
  createTestDatabase,
  silentLogger,
} from "./test-utils/db";

/**
 * Startup wiring: configuration loading and validation, schedule
 * derivation, logger defaults and component assembly.
 */
describe("entry point and integration", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `rss-relay-test-${Date.now()}-${Math.random()}`);
    mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeConfig = (name: string, yaml: string): string => {
    const path = join(tmpDir, name);
    writeFileSync(path, yaml);
    return path;
  };

  describe("loadConfig", () => {
    it("should load a minimal config and fill in defaults", () => {
      const path = writeConfig(
        "minimal.yaml",
        `
feed:
  title: Planet Python
  url: https://planetpython.org/rss20.xml
telegram:
  chatId: -100123456
`,
      );

      expect(loadConfig(path)).toEqual({
        feed: {
          title: "Planet Python",
          url: "https://planetpython.org/rss20.xml",
        },
        telegram: {
          chatId: "-100123456",
          apiBaseUrl: "https://api.telegram.org",
          openButtonLabel: "Open",
          pollTimeoutSeconds: 25,
          requestTimeoutMs: 15000,
        },
        schedule: { firstUpdateAtHour: 2, updateEveryHours: 8 },
        publish: { maxEntriesPerCycle: 1, minIntervalMinutes: 0, reactions: true },
        blacklist: { words: [], urlPrefixes: [] },
        store: { keyPrefix: "rssbot" },
      });
    });

    it("should load blacklists, schedule and publish settings", () => {
      const path = writeConfig(
        "full.yaml",
        `
feed:
  title: Planet Python
  url: https://planetpython.org/rss20.xml
telegram:
  chatId: "@example_channel"
schedule:
  cron: "*/30 * * * *"
  timezone: Europe/Berlin
publish:
  maxEntriesPerCycle: 5
  minIntervalMinutes: 90
  reactions: false
blacklist:
  words: [pycon, webinar]
  urlPrefixes: ["https://spam.example"]
store:
  keyPrefix: planetbot
`,
      );

      const config = loadConfig(path);

      expect(config.telegram.chatId).toBe("@example_channel");
      expect(config.schedule).toEqual({
        cron: "*/30 * * * *",
        timezone: "Europe/Berlin",
        firstUpdateAtHour: 2,
        updateEveryHours: 8,
      });
      expect(config.publish).toEqual({
        maxEntriesPerCycle: 5,
        minIntervalMinutes: 90,
        reactions: false,
      });
      expect(config.blacklist).toEqual({
        words: ["pycon", "webinar"],
        urlPrefixes: ["https://spam.example"],
      });
      expect(config.store.keyPrefix).toBe("planetbot");
    });

    it("should throw ConfigurationError naming every invalid field", () => {
      const path = writeConfig(
        "invalid.yaml",
        `
feed:
  title: Planet Python
  url: not-a-url
telegram:
  chatId: ""
publish:
  maxEntriesPerCycle: 0
`,
      );

      expect(() => loadConfig(path)).toThrow(ConfigurationError);
      expect(() => loadConfig(path)).toThrow(/invalid configuration/);
      expect(() => loadConfig(path)).toThrow(/feed\.url/);
      expect(() => loadConfig(path)).toThrow(/publish\.maxEntriesPerCycle/);
    });

    it("should reject a key prefix containing the separator", () => {
      const path = writeConfig(
        "prefix.yaml",
        `
feed: { title: T, url: "https://example.com/rss" }
telegram: { chatId: 1 }
store: { keyPrefix: "a:b" }
`,
      );

      expect(() => loadConfig(path)).toThrow(/store\.keyPrefix: must not contain ':'/);
    });

    it("should reject an invalid cron expression before startup", () => {
      const path = writeConfig(
        "cron.yaml",
        `
feed: { title: T, url: "https://example.com/rss" }
telegram: { chatId: 1 }
schedule: { cron: "not a cron" }
`,
      );

      expect(() => loadConfig(path)).toThrow(ConfigurationError);
      expect(() => loadConfig(path)).toThrow(/schedule\.cron: invalid cron expression/);
    });

    it("should accept an optional proxy url for the Telegram API", () => {
      const path = writeConfig(
        "proxy.yaml",
        `
feed: { title: T, url: "https://example.com/rss" }
telegram: { chatId: 1, proxyUrl: "http://proxy.test:3128" }
`,
      );

      expect(loadConfig(path).telegram.proxyUrl).toBe("http://proxy.test:3128");
    });

    it("should throw when the file does not exist", () => {
      expect(() => loadConfig(join(tmpDir, "missing.yaml"))).toThrow(
        /failed to read config file/,
      );
    });

    it("should throw on malformed YAML", () => {
      const path = writeConfig("broken.yaml", "feed: [unclosed\n");

      expect(() => loadConfig(path)).toThrow(/failed to parse YAML/);
    });
  });

  describe("schedule", () => {
    it("should run at 02:00, 10:00 and 18:00 with the defaults", () => {
      const { schedule } = createTestConfig();

      expect(scheduledHours(schedule)).toEqual([2, 10, 18]);
      expect(resolveCronExpression(schedule)).toBe("0 2,10,18 * * *");
    });

    it("should run once a day when the step reaches past midnight", () => {
      expect(
        scheduledHours({ firstUpdateAtHour: 9, updateEveryHours: 24 }),
      ).toEqual([9]);
    });

    it("should prefer an explicit cron expression", () => {
      expect(
        resolveCronExpression({
          cron: "*/5 * * * *",
          firstUpdateAtHour: 2,
          updateEveryHours: 8,
        }),
      ).toBe("*/5 * * * *");
    });
  });

  describe("requireEnv", () => {
    it("should return the trimmed value", () => {
      expect(requireEnv("TOKEN", { TOKEN: " test-token " })).toBe("test-token");
    });

    it("should throw ConfigurationError when unset or blank", () => {
      expect(() => requireEnv("TOKEN", {})).toThrow("TOKEN is not set");
      expect(() => requireEnv("TOKEN", { TOKEN: "  " })).toThrow(ConfigurationError);
    });
  });

  describe("createLogger", () => {
    it("should default to info and honour an explicit level", () => {
      expect(createLogger().level).toBe(process.env["LOG_LEVEL"] ?? "info");
      expect(createLogger("debug").level).toBe("debug");
    });
  });

  describe("createCore", () => {
    it("should share one store between registry, reactions and cursor", () => {
      const core = createCore(
        createTestDatabase(),
        createTestConfig({ store: { keyPrefix: "planetbot" } }),
        silentLogger,
      );

      core.registry.recordPosted("https://example.com/a", "1", "a");
      core.reactions.toggleLike("https://example.com/a", "1001");
      core.cursor.markPostedNow();

      expect(core.store.keys("planetbot:")).toHaveLength(4);
      expect(core.engine.selectBatch([{ title: "A", url: "https://example.com/a" }], 1)).toEqual(
        [],
      );
    });

    it("should leave reactions out of publishing when disabled", () => {
      const config = createTestConfig({ publish: { reactions: false } });
      const core = createCore(createTestDatabase(), config, silentLogger);

      const deps = createPublishDeps(
        core,
        config,
        async () => ({ feedTitle: "Example Feed", candidates: [], error: null }),
        { sendMessage: async () => "1", editMessageControls: async () => undefined },
      );

      expect(deps.reactions).toBeNull();
      expect(deps.feedTitle).toBe("Example Feed");
      expect(deps.maxEntriesPerCycle).toBe(1);
      expect(deps.minIntervalMs).toBe(0);
    });
  });
});
