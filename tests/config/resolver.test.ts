import { describe, expect, test } from "vitest";
import {
  getVolumePolicy,
  isValidRetention,
  listConfiguredVolumes,
  resolveRetention,
} from "../../src/config/resolver";
import type { VolumeManagerConfig } from "../../src/types";

const config: VolumeManagerConfig = {
  backupDirectory: "/backups",
  defaultMaxBackups: 5,
  volumes: [{ name: "app_data", maxBackups: 2 }, { name: "logs" }],
};

describe("retention resolution", () => {
  test("uses a volume override when present", () => {
    expect(resolveRetention(config, "app_data")).toBe(2);
  });

  test("falls back to the default", () => {
    expect(resolveRetention(config, "logs")).toBe(5);
    expect(resolveRetention(config, "unlisted")).toBe(5);
  });

  test("falls back to 1 when the default is unusable", () => {
    expect(resolveRetention({ ...config, defaultMaxBackups: 0 }, "logs")).toBe(1);
  });

  test("ignores an unusable override", () => {
    const broken: VolumeManagerConfig = { ...config, volumes: [{ name: "db", maxBackups: -3 }] };
    expect(resolveRetention(broken, "db")).toBe(5);
  });

  test("getVolumePolicy only reports explicit overrides", () => {
    expect(getVolumePolicy(config, "app_data")).toBe(2);
    expect(getVolumePolicy(config, "logs")).toBeUndefined();
  });

  test("lists configured volumes in file order", () => {
    expect(listConfiguredVolumes(config)).toEqual(["app_data", "logs"]);
    expect(listConfiguredVolumes({ ...config, volumes: [] })).toEqual([]);
  });

  test("isValidRetention accepts positive integers only", () => {
    expect(isValidRetention(1)).toBe(true);
    expect(isValidRetention(0)).toBe(false);
    expect(isValidRetention(2.5)).toBe(false);
    expect(isValidRetention("3")).toBe(false);
  });
});
