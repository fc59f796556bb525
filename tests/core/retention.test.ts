import { mkdir, readdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { normalizeKeepCount, rotateArchives, selectForDeletion } from "../../src/core/cleanup/retention";
import { deleteArchiveFile } from "../../src/storage/local";
import type { Archive } from "../../src/types";
import { makeTempDir, removeTempDir } from "../helpers/fakes";

vi.mock("../../src/storage/local", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/storage/local")>();
  return { ...actual, deleteArchiveFile: vi.fn(actual.deleteArchiveFile) };
});

function archive(timestamp: string): Archive {
  const filename = `db_${timestamp}.tar.gz`;
  return { volumeName: "db", timestamp, filename, path: `/backups/db/${filename}`, sizeBytes: 1 };
}

describe("retention", () => {
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("normalizeKeepCount", () => {
    test("passes valid counts through", () => {
      expect(normalizeKeepCount(3)).toBe(3);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    test("clamps invalid counts to 1 with a warning", () => {
      expect(normalizeKeepCount(0)).toBe(1);
      expect(normalizeKeepCount(-2)).toBe(1);
      expect(normalizeKeepCount("three")).toBe(1);
      expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("Invalid max_backups value 'three'. Using 1."));
    });
  });

  describe("selectForDeletion", () => {
    const newestFirst = [archive("20240103_000000"), archive("20240102_000000"), archive("20240101_000000")];

    test("keeps the newest N", () => {
      expect(selectForDeletion(newestFirst, 2)).toEqual([archive("20240101_000000")]);
    });

    test("deletes nothing when there are fewer archives than the keep-count", () => {
      expect(selectForDeletion(newestFirst, 3)).toEqual([]);
      expect(selectForDeletion(newestFirst, 10)).toEqual([]);
    });

    test("an invalid keep-count keeps only the newest", () => {
      expect(selectForDeletion(newestFirst, 0)).toEqual([archive("20240102_000000"), archive("20240101_000000")]);
    });
  });

  describe("rotateArchives", () => {
    let root: string;
    let dir: string;

    beforeEach(async () => {
      root = await makeTempDir("retention");
      dir = path.join(root, "db");
      await mkdir(dir, { recursive: true });
      for (const day of ["01", "02", "03", "04"]) {
        await writeFile(path.join(dir, `db_202401${day}_120000.tar.gz`), day);
      }
    });

    afterEach(async () => {
      await removeTempDir(root);
    });

    test("deletes everything beyond the newest N", async () => {
      const result = await rotateArchives(root, "db", 2);

      expect(result.kept.map((a) => a.filename)).toEqual(["db_20240104_120000.tar.gz", "db_20240103_120000.tar.gz"]);
      expect(result.deleted.map((a) => a.filename)).toEqual([
        "db_20240102_120000.tar.gz",
        "db_20240101_120000.tar.gz",
      ]);
      expect(result.failed).toEqual([]);
      expect((await readdir(dir)).sort()).toEqual(["db_20240103_120000.tar.gz", "db_20240104_120000.tar.gz"]);
    });

    test("a failed deletion does not stop the others", async () => {
      vi.mocked(deleteArchiveFile).mockRejectedValueOnce(new Error("permission denied"));

      const result = await rotateArchives(root, "db", 1);

      expect(result.failed).toHaveLength(1);
      expect(result.failed[0]?.archive.filename).toBe("db_20240103_120000.tar.gz");
      expect(result.failed[0]?.message).toBe("permission denied");
      expect(result.deleted.map((a) => a.filename)).toEqual([
        "db_20240102_120000.tar.gz",
        "db_20240101_120000.tar.gz",
      ]);
      expect((await readdir(dir)).sort()).toEqual(["db_20240103_120000.tar.gz", "db_20240104_120000.tar.gz"]);
    });

    test("a volume without a directory rotates nothing", async () => {
      const result = await rotateArchives(root, "other", 1);
      expect(result).toEqual({ kept: [], deleted: [], failed: [] });
    });

    test("keeps exactly the newest min(n, k) for small n and k", async () => {
      for (let keep = 1; keep <= 4; keep++) {
        for (let count = 0; count <= 5; count++) {
          const volume = `v${keep}x${count}`;
          const volumeDir = path.join(root, volume);
          await mkdir(volumeDir, { recursive: true });
          for (let day = 1; day <= count; day++) {
            const stamp = `202401${String(day).padStart(2, "0")}_120000`;
            await writeFile(path.join(volumeDir, `${volume}_${stamp}.tar.gz`), stamp);
          }

          const result = await rotateArchives(root, volume, keep);

          expect(result.kept).toHaveLength(Math.min(count, keep));
          expect(result.deleted).toHaveLength(Math.max(0, count - keep));
          expect(await readdir(volumeDir)).toHaveLength(Math.min(count, keep));
          const oldestKept = result.kept.map((a) => a.timestamp).sort()[0];
          for (const deleted of result.deleted) {
            expect(oldestKept !== undefined && deleted.timestamp < oldestKept).toBe(true);
          }
        }
      }
    });
  });
});
