import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { ConfigError, loadConfig } from "./config";
import { createLogger } from "./logger";

/**
 * Startup wiring checks that do not need the server: configuration loading
 * and structured logging.
 */

const validYaml = `
llm:
  provider: anthropic
  model: claude-3-5-sonnet-20241022
sources:
  - id: wire
    kind: rss
    name: Wire
    url: https://example.com/feed.xml
  - id: city
    kind: html
    name: City News
    url: https://example.com/news/
    itemSelector: li.story
    titleSelector: h2
    linkSelector: a
channel:
  chatId: "@news"
schedule:
  poll: "*/15 * * * *"
`;

function captureStream(chunks: Array<string>): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      chunks.push(chunk.toString("utf-8"));
      callback();
    },
  });
}

describe("entry point and integration", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `news-relay-test-${Date.now()}-${Math.random()}`);
    mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(tmpDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  describe("loadConfig", () => {
    it("loads a valid config and fills in defaults", () => {
      const config = loadConfig(writeConfig("valid.yaml", validYaml));

      expect(config.llm.provider).toBe("anthropic");
      expect(config.llm.timeoutMs).toBe(60000);
      expect(config.sources.map((s) => s.id)).toEqual(["wire", "city"]);
      expect(config.sources[0]?.enabled).toBe(true);
      expect(config.channel.disableWebPagePreview).toBe(true);
      expect(config.schedule.runOnStart).toBe(true);
      expect(config.fetch).toEqual({ maxConcurrency: 4, timeoutMs: 15000 });
      expect(config.batch).toEqual({ maxItems: 10, maxChars: 12000 });
      expect(config.retry.llm).toEqual({
        maxAttempts: 3,
        baseDelayMs: 2000,
        maxDelayMs: 60000,
      });
      expect(config.items.maxAttempts).toBe(5);
      expect(config.filter.keywords).toEqual([]);
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("throws when the file does not exist", () => {
      expect(() => loadConfig(join(tmpDir, "missing.yaml"))).toThrow(
        "failed to read config file",
      );
    });

    it("throws on unparseable YAML", () => {
      const configPath = writeConfig("broken.yaml", "llm: [unclosed");
      expect(() => loadConfig(configPath)).toThrow("failed to parse YAML");
    });

    it("throws when the channel section is missing", () => {
      const configPath = writeConfig(
        "no-channel.yaml",
        validYaml.replace('channel:\n  chatId: "@news"\n', ""),
      );

      expect(() => loadConfig(configPath)).toThrow("invalid configuration");
      expect(() => loadConfig(configPath)).toThrow(/channel/);
    });

    it("throws on an unknown provider", () => {
      const configPath = writeConfig(
        "bad-provider.yaml",
        validYaml.replace("provider: anthropic", "provider: invalid_provider"),
      );

      expect(() => loadConfig(configPath)).toThrow(/llm\.provider/);
    });

    it("reports each validation issue by path", () => {
      const configPath = writeConfig(
        "bad-provider-issues.yaml",
        validYaml.replace("provider: anthropic", "provider: invalid_provider"),
      );

      let caught: unknown;
      try {
        loadConfig(configPath);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.configPath).toBe(configPath);
      expect(caught.issues.map((i) => i.path)).toEqual(["llm.provider"]);
    });

    it("returns a frozen config", () => {
      const config = loadConfig(writeConfig("frozen.yaml", validYaml));

      expect(Object.isFrozen(config)).toBe(true);
    });

    it("throws on an invalid cron expression", () => {
      const configPath = writeConfig(
        "bad-cron.yaml",
        validYaml.replace('poll: "*/15 * * * *"', 'poll: "not a cron"'),
      );

      expect(() => loadConfig(configPath)).toThrow(
        "schedule.poll: must be a valid cron expression",
      );
    });

    it("throws on duplicate source ids", () => {
      const configPath = writeConfig(
        "duplicate.yaml",
        validYaml.replace("id: city", "id: wire"),
      );

      expect(() => loadConfig(configPath)).toThrow("source ids must be unique");
    });

    it("throws when an html source lacks its selectors", () => {
      const configPath = writeConfig(
        "no-selectors.yaml",
        validYaml.replace("    itemSelector: li.story\n", ""),
      );

      expect(() => loadConfig(configPath)).toThrow(/sources\.1\.itemSelector/);
    });
  });

  describe("structured log output", () => {
    it("writes JSON lines with label level, ISO time and message", () => {
      const chunks: Array<string> = [];
      const logger = createLogger("info", captureStream(chunks));

      logger.info({ sourceId: "wire", itemCount: 3 }, "source fetched");

      expect(chunks).toHaveLength(1);
      const logJson = JSON.parse(chunks[0]!);
      expect(logJson.level).toBe("info");
      expect(logJson.msg).toBe("source fetched");
      expect(logJson.sourceId).toBe("wire");
      expect(logJson.itemCount).toBe(3);
      expect(new Date(logJson.time).toISOString()).toBe(logJson.time);
    });

    it("drops messages below the configured level", () => {
      const chunks: Array<string> = [];
      const logger = createLogger("warn", captureStream(chunks));

      logger.info("ignored");
      logger.warn("kept");

      expect(chunks.map((c) => JSON.parse(c).msg)).toEqual(["kept"]);
    });
  });
});
