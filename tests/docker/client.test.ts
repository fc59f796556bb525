import { describe, expect, test } from "vitest";
import { buildRunArgs, formatMountSpec } from "../../src/docker/client";

describe("docker client", () => {
  describe("formatMountSpec", () => {
    test("read-write mount", () => {
      expect(formatMountSpec({ source: "app_data", target: "/volume_data" })).toBe("app_data:/volume_data");
    });

    test("read-only mount", () => {
      expect(formatMountSpec({ source: "/backups/db", target: "/backup", readonly: true })).toBe(
        "/backups/db:/backup:ro",
      );
    });
  });

  describe("buildRunArgs", () => {
    test("removes the container by default", () => {
      expect(buildRunArgs({ image: "alpine:latest", command: ["true"] })).toEqual([
        "run",
        "--rm",
        "alpine:latest",
        "true",
      ]);
    });

    test("adds name and mounts before the image", () => {
      expect(
        buildRunArgs({
          image: "alpine:latest",
          name: "helper",
          command: ["tar", "-czf", "/backup/a.tar.gz", "-C", "/volume_data", "."],
          volumes: [
            { source: "app_data", target: "/volume_data", readonly: true },
            { source: "/backups/app_data", target: "/backup" },
          ],
        }),
      ).toEqual([
        "run",
        "--rm",
        "--name",
        "helper",
        "-v",
        "app_data:/volume_data:ro",
        "-v",
        "/backups/app_data:/backup",
        "alpine:latest",
        "tar",
        "-czf",
        "/backup/a.tar.gz",
        "-C",
        "/volume_data",
        ".",
      ]);
    });

    test("keeps the container when asked", () => {
      expect(buildRunArgs({ image: "alpine", command: ["ls"], remove: false })).toEqual(["run", "alpine", "ls"]);
    });
  });
});
