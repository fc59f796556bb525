import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { CommandContext } from "../../src/cli/context";
import { type ParsedCli, parseCli, run, UsageError } from "../../src/cli/run";
import { VERSION } from "../../src/cli/ui";
import { getLogLevel, setLogLevel } from "../../src/utils/logger";
import { FakeArchiver, FakeIntegrity, FakeRuntime, makeTempDir, removeTempDir } from "../helpers/fakes";

describe("parseCli", () => {
  test("no flags means unattended backup", () => {
    expect(parseCli([])).toEqual({ mode: "backup", configPath: undefined, verbose: false });
  });

  test.each([
    [["-i"], "interactive"],
    [["--restore"], "restore"],
    [["-c"], "configure"],
    [["--list"], "list"],
    [["-h"], "help"],
    [["--version"], "version"],
  ])("%j selects %s", (args, mode) => {
    expect(parseCli(args).mode).toBe(mode);
  });

  test("reads the config path and verbosity", () => {
    expect(parseCli(["--config", "/etc/backups.yaml", "-v"])).toEqual({
      mode: "backup",
      configPath: "/etc/backups.yaml",
      verbose: true,
    });
  });

  test("help wins over other modes", () => {
    expect(parseCli(["-r", "--help"]).mode).toBe("help");
  });

  test("rejects conflicting modes", () => {
    expect(() => parseCli(["-i", "-r"])).toThrow(
      new UsageError("Options --interactive, --restore cannot be combined"),
    );
  });

  test("rejects unknown flags and positionals", () => {
    expect(() => parseCli(["--force"])).toThrow(UsageError);
    expect(() => parseCli(["backup"])).toThrow(UsageError);
  });
});

describe("run", () => {
  let cwd: string;
  let level: ReturnType<typeof getLogLevel>;
  let createContext: (cli: ParsedCli) => CommandContext;

  beforeEach(async () => {
    level = getLogLevel();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    cwd = await makeTempDir("run");
    createContext = (cli) => ({
      configPath: cli.configPath,
      cwd,
      verbose: cli.verbose,
      services: {
        runtime: new FakeRuntime(),
        archiver: new FakeArchiver(),
        integrity: new FakeIntegrity(),
      },
    });
  });

  afterEach(async () => {
    setLogLevel(level);
    vi.restoreAllMocks();
    await removeTempDir(cwd);
  });

  test("prints the version", async () => {
    expect(await run(["--version"], createContext, async () => true)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("1.0.0");
    expect(VERSION).toBe("1.0.0");
  });

  test("a usage error exits 1", async () => {
    expect(await run(["--nope"], createContext, async () => true)).toBe(1);
  });

  test("fails when docker is unavailable", async () => {
    const dockerCheck = vi.fn(async () => false);

    expect(await run([], createContext, dockerCheck)).toBe(1);
    expect(dockerCheck).toHaveBeenCalledTimes(1);
  });

  test("runs an unattended backup with nothing configured", async () => {
    expect(await run([], createContext, async () => true)).toBe(0);
  });

  test("--verbose turns on debug logging", async () => {
    await run(["-v"], createContext, async () => true);
    expect(getLogLevel()).toBe("debug");
  });
});
