import { afterEach, describe, expect, test, vi } from "vitest";
import { ensureImage, runContainer } from "../../src/docker/client";
import { ARCHIVER_IMAGE, DockerArchiver } from "../../src/docker/runtime";

vi.mock("../../src/docker/client", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/docker/client")>();
  return {
    ...actual,
    ensureImage: vi.fn(async () => true),
    runContainer: vi.fn(async () => ({ success: true, stdout: "", stderr: "", exitCode: 0 })),
  };
});

describe("DockerArchiver", () => {
  afterEach(() => {
    vi.mocked(runContainer).mockClear();
  });

  test("compresses with the volume mounted read-only", async () => {
    const result = await new DockerArchiver().compress("app_data", "/backups/app_data", "a.tar.gz");

    expect(result).toEqual({ success: true, exitCode: 0, message: "" });
    expect(vi.mocked(runContainer).mock.calls[0]?.[0]).toMatchObject({
      image: ARCHIVER_IMAGE,
      command: ["tar", "-czf", "/backup/a.tar.gz", "-C", "/volume_data", "."],
      volumes: [
        { source: "app_data", target: "/volume_data", readonly: true },
        { source: "/backups/app_data", target: "/backup" },
      ],
    });
  });

  test("extracts with the backup directory mounted read-only", async () => {
    await new DockerArchiver().extract("db", "/backups/db", "db_20240115_100000.tar.gz");

    expect(vi.mocked(runContainer).mock.calls[0]?.[0]).toMatchObject({
      command: ["tar", "-xzf", "/backup/db_20240115_100000.tar.gz", "-C", "/volume_data"],
      volumes: [
        { source: "db", target: "/volume_data" },
        { source: "/backups/db", target: "/backup", readonly: true },
      ],
    });
  });

  test("reports stderr from a failed run", async () => {
    vi.mocked(runContainer).mockResolvedValueOnce({
      success: false,
      stdout: "",
      stderr: "tar: short read",
      exitCode: 1,
    });

    await expect(new DockerArchiver().compress("db", "/backups/db", "x.tar.gz")).resolves.toEqual({
      success: false,
      exitCode: 1,
      message: "tar: short read",
    });
  });

  test("fails without running when the image is unavailable", async () => {
    vi.mocked(ensureImage).mockResolvedValueOnce(false);

    const result = await new DockerArchiver().compress("db", "/backups/db", "x.tar.gz");

    expect(result.success).toBe(false);
    expect(result.message).toBe(`Docker image ${ARCHIVER_IMAGE} is not available`);
    expect(runContainer).not.toHaveBeenCalled();
  });
});
