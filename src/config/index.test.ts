import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { expandHome, loadConfig, resolveFeedConfig } from "./index";
import { ConfigError } from "../errors";
import { createTempDir } from "../test-utils/fixtures";

describe("loadConfig", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  function writeConfig(yaml: string): string {
    const path = join(dir, "config.yaml");
    writeFileSync(path, yaml);
    return path;
  }

  it("should load feeds and apply http defaults", () => {
    const path = writeConfig(`
feeds:
  My Show:
    url: https://example.com/feed.xml
    output: ~/Podcasts/My Show
`);

    const config = loadConfig(path);

    expect(config.http).toEqual({
      timeoutMs: 30000,
      userAgent: "PodFetch/1.0",
      atomicDownloads: true,
    });
    expect(config.notifiers).toEqual({});
    expect(Object.keys(config.feeds)).toEqual(["My Show"]);
  });

  it("should keep optional settings", () => {
    const path = writeConfig(`
history: /var/lib/podfetch/history.db
schedule: "0 * * * *"
http:
  timeoutMs: 5000
  atomicDownloads: false
feeds: {}
notifiers:
  pushbullet:
    token: test-token
`);

    const config = loadConfig(path);

    expect(config.history).toBe("/var/lib/podfetch/history.db");
    expect(config.schedule).toBe("0 * * * *");
    expect(config.http).toEqual({
      timeoutMs: 5000,
      userAgent: "PodFetch/1.0",
      atomicDownloads: false,
    });
    expect(config.notifiers).toEqual({ pushbullet: { token: "test-token" } });
  });

  it("should throw when the file cannot be read", () => {
    expect(() => loadConfig(join(dir, "missing.yaml"))).toThrow(
      "failed to read config file",
    );
  });

  it("should throw on malformed YAML", () => {
    const path = writeConfig("feeds: [unclosed");
    expect(() => loadConfig(path)).toThrow("failed to parse YAML");
  });

  it("should throw when the feeds section is missing", () => {
    const path = writeConfig("notifiers: {}\n");
    expect(() => loadConfig(path)).toThrow(/invalid configuration[\s\S]*feeds/);
  });

  it("should not reject the file for a single bad feed", () => {
    const path = writeConfig(`
feeds:
  Good:
    url: https://example.com/feed.xml
    output: /tmp/good
  Bad:
    output: /tmp/bad
`);

    expect(Object.keys(loadConfig(path).feeds)).toEqual(["Good", "Bad"]);
  });
});

describe("resolveFeedConfig", () => {
  it("should resolve a feed without auth or whitelist", () => {
    const feed = resolveFeedConfig("Show", {
      url: "https://example.com/feed.xml",
      output: "/out",
    });

    expect(feed).toEqual({
      name: "Show",
      url: "https://example.com/feed.xml",
      outputDir: "/out",
      auth: { kind: "none" },
      whitelist: [],
    });
  });

  it("should expand ~ in the output directory", () => {
    const feed = resolveFeedConfig("Show", {
      url: "https://example.com/feed.xml",
      output: "~/Podcasts/Show",
    });

    expect(feed.outputDir).toBe(join(homedir(), "Podcasts/Show"));
  });

  it("should read a string as basic auth, splitting at the first colon", () => {
    const feed = resolveFeedConfig("Show", {
      url: "https://example.com/feed.xml",
      output: "/out",
      auth: "listener:test:secret",
    });

    expect(feed.auth).toEqual({
      kind: "basic",
      username: "listener",
      password: "test:secret",
    });
  });

  it("should read a mapping as query-string auth", () => {
    const feed = resolveFeedConfig("Show", {
      url: "https://example.com/feed.xml",
      output: "/out",
      auth: { token: "test-token", id: 42 },
    });

    expect(feed.auth).toEqual({
      kind: "query",
      params: { token: "test-token", id: "42" },
    });
  });

  it("should reject basic auth without a colon", () => {
    expect(() =>
      resolveFeedConfig("Show", {
        url: "https://example.com/feed.xml",
        output: "/out",
        auth: "just-a-user",
      }),
    ).toThrow(ConfigError);
  });

  it("should compile the whitelist into prefix-anchored patterns", () => {
    const feed = resolveFeedConfig("Show", {
      url: "https://example.com/feed.xml",
      output: "/out",
      whitelist: ["Episode", "^Special"],
    });

    expect(feed.whitelist.map((p) => p.source)).toEqual([
      "^(?:Episode)",
      "^(?:^Special)",
    ]);
  });

  it("should raise ConfigError naming the pattern when a regex is invalid", () => {
    expect(() =>
      resolveFeedConfig("Show", {
        url: "https://example.com/feed.xml",
        output: "/out",
        whitelist: ["Episode (", "ok"],
      }),
    ).toThrow(/invalid whitelist pattern "Episode \("/);
  });

  it("should reject a pattern that only compiles once wrapped", () => {
    expect(() =>
      resolveFeedConfig("Show", {
        url: "https://example.com/feed.xml",
        output: "/out",
        whitelist: ["a)|(b"],
      }),
    ).toThrow(ConfigError);
  });

  it("should raise ConfigError for a feed missing its url", () => {
    expect(() => resolveFeedConfig("Show", { output: "/out" })).toThrow(
      /invalid configuration for feed "Show":\n {2}- url:/,
    );
  });

  it("should give each feed its own whitelist and auth", () => {
    const a = resolveFeedConfig("A", {
      url: "https://example.com/a.xml",
      output: "/a",
      auth: { token: "a" },
      whitelist: ["^A"],
    });
    const b = resolveFeedConfig("B", {
      url: "https://example.com/b.xml",
      output: "/b",
    });

    expect(a.whitelist).toHaveLength(1);
    expect(b.whitelist).toHaveLength(0);
    expect(b.auth).toEqual({ kind: "none" });
  });
});

describe("expandHome", () => {
  it("should expand a bare ~ and a ~/ prefix only", () => {
    expect(expandHome("~")).toBe(homedir());
    expect(expandHome("~/x.db")).toBe(join(homedir(), "x.db"));
    expect(expandHome("/abs/~/x")).toBe("/abs/~/x");
  });
});
