import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { createProgram, resolveConfigPath, resolveHistoryPath } from "./cli";
import { openHistoryStore } from "./db";
import { createTempDir, createTestConfig } from "./test-utils/fixtures";

const ENV_KEYS = ["PODFETCH_CONFIG", "PODFETCH_HISTORY"] as const;

describe("cli", () => {
  const savedEnv = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    vi.restoreAllMocks();
  });

  describe("resolveConfigPath", () => {
    it("should prefer the command line option", () => {
      process.env["PODFETCH_CONFIG"] = "/etc/podfetch/env.yaml";

      expect(resolveConfigPath({ config: "/srv/podfetch.yaml" })).toBe(
        "/srv/podfetch.yaml",
      );
    });

    it("should fall back to the environment", () => {
      process.env["PODFETCH_CONFIG"] = "/etc/podfetch/env.yaml";

      expect(resolveConfigPath({})).toBe("/etc/podfetch/env.yaml");
    });

    it("should default to a file in the home directory", () => {
      expect(resolveConfigPath({})).toBe(join(homedir(), ".podfetch.yaml"));
    });
  });

  describe("resolveHistoryPath", () => {
    it("should prefer the option, then env, then config", () => {
      const config = createTestConfig({ history: "/var/lib/podfetch.db" });
      process.env["PODFETCH_HISTORY"] = "/tmp/env.db";

      expect(resolveHistoryPath({ history: "/tmp/cli.db" }, config)).toBe(
        "/tmp/cli.db",
      );
      expect(resolveHistoryPath({}, config)).toBe("/tmp/env.db");

      delete process.env["PODFETCH_HISTORY"];
      expect(resolveHistoryPath({}, config)).toBe("/var/lib/podfetch.db");
    });

    it("should expand ~ in the configured path", () => {
      const config = createTestConfig({ history: "~/feeds/history.db" });

      expect(resolveHistoryPath({}, config)).toBe(
        join(homedir(), "feeds", "history.db"),
      );
    });

    it("should default to a file in the home directory", () => {
      expect(resolveHistoryPath({}, createTestConfig())).toBe(
        join(homedir(), ".podfetch.db"),
      );
    });
  });

  describe("history command", () => {
    it("should print recorded downloads newest first", async () => {
      const { dir, cleanup } = createTempDir();
      try {
        const configPath = join(dir, "podfetch.yaml");
        const historyPath = join(dir, "history.db");
        writeFileSync(configPath, "feeds: {}\n");

        const dates = [
          new Date("2026-03-01T10:00:00.000Z"),
          new Date("2026-03-02T10:00:00.000Z"),
        ];
        let next = 0;
        const store = openHistoryStore(historyPath, () => dates[next++] ?? new Date());
        store.record("Show A", "https://example.com/a1.mp3", "Episode 1");
        store.record("Show B", "https://example.com/b1.mp3", "Pilot");
        store.close();

        const written: Array<string> = [];
        vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
          written.push(String(chunk));
          return true;
        });

        await createProgram().parseAsync(
          ["-c", configPath, "-H", historyPath, "history"],
          { from: "user" },
        );

        expect(written).toEqual([
          "2026-03-02T10:00:00.000Z  Show B  Pilot\n",
          "2026-03-01T10:00:00.000Z  Show A  Episode 1\n",
        ]);
      } finally {
        cleanup();
      }
    });

    it("should filter by feed and limit the rows", async () => {
      const { dir, cleanup } = createTempDir();
      try {
        const configPath = join(dir, "podfetch.yaml");
        const historyPath = join(dir, "history.db");
        writeFileSync(configPath, `feeds: {}\nhistory: ${historyPath}\n`);

        const dates = [
          new Date("2026-03-01T10:00:00.000Z"),
          new Date("2026-03-02T10:00:00.000Z"),
          new Date("2026-03-03T10:00:00.000Z"),
        ];
        let next = 0;
        const store = openHistoryStore(historyPath, () => dates[next++] ?? new Date());
        store.record("Show A", "https://example.com/a1.mp3", "Episode 1");
        store.record("Show B", "https://example.com/b1.mp3", "Pilot");
        store.record("Show A", "https://example.com/a2.mp3", "Episode 2");
        store.close();

        const written: Array<string> = [];
        vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
          written.push(String(chunk));
          return true;
        });

        await createProgram().parseAsync(
          ["-c", configPath, "history", "-f", "Show A", "-n", "1"],
          { from: "user" },
        );

        expect(written).toEqual([
          "2026-03-03T10:00:00.000Z  Show A  Episode 2\n",
        ]);
      } finally {
        cleanup();
      }
    });
  });
});
