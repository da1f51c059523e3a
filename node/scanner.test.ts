import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { filterFiles, isExcluded, listFiles, loadAllImages } from "./scanner.js";

const rules = {
  excludedExtensions: [".mov"],
  excludedDirectories: ["trash"],
};

describe("filterFiles", () => {
  it("keeps only files that pass every exclusion rule", () => {
    const files = ["/data/a.jpg", "/data/b.mov", "/data/trash/c.jpg"];
    expect(filterFiles(files, rules, "/data")).toEqual(["/data/a.jpg"]);
  });

  it("matches extensions case-insensitively", () => {
    expect(isExcluded("/data/clip.MOV", rules, "/data")).toBe(true);
    const upper = { excludedExtensions: [".MOV"], excludedDirectories: [] };
    expect(isExcluded("/data/clip.mov", upper, "/data")).toBe(true);
  });

  it("excludes hidden files", () => {
    expect(isExcluded("/data/.DS_Store", rules, "/data")).toBe(true);
    expect(isExcluded("/data/.hidden.jpg", rules, "/data")).toBe(true);
  });

  it("matches excluded directories as substrings of the directory path", () => {
    expect(isExcluded("/data/old-trash-2020/x.jpg", rules, "/data")).toBe(true);
    expect(isExcluded("/data/2020/trash/deep/x.jpg", rules, "/data")).toBe(true);
    expect(isExcluded("/data/trash.jpg", rules, "/data")).toBe(false);
  });

  it("ignores the image root when matching directories", () => {
    const root = "/srv/trash-can/photos";
    expect(isExcluded(`${root}/a.jpg`, rules, root)).toBe(false);
    expect(isExcluded(`${root}/2023/b.jpg`, rules, root)).toBe(false);
    expect(isExcluded(`${root}/trash/c.jpg`, rules, root)).toBe(true);
    expect(
      filterFiles([`${root}/a.jpg`, `${root}/trash/c.jpg`], rules, `${root}/`)
    ).toEqual([`${root}/a.jpg`]);
  });

  it("keeps the input order", () => {
    const files = ["/data/z.jpg", "/data/a.mov", "/data/m.png", "/data/b.jpg"];
    expect(filterFiles(files, rules, "/data")).toEqual([
      "/data/z.jpg",
      "/data/m.png",
      "/data/b.jpg",
    ]);
  });

  it("never yields an excluded file", () => {
    const files = [
      "/p/a.jpg",
      "/p/b.MP4",
      "/p/.c.jpg",
      "/p/@eaDir/d.jpg",
      "/p/x/y/e.heic",
      "/p/x/f.png",
    ];
    const strict = {
      excludedExtensions: [".mp4", ".heic"],
      excludedDirectories: ["@eaDir"],
    };
    const kept = filterFiles(files, strict, "/p");
    expect(kept).toEqual(["/p/a.jpg", "/p/x/f.png"]);
    for (const file of kept) {
      expect(isExcluded(file, strict, "/p")).toBe(false);
    }
  });
});

describe("listFiles", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "picture-frame-"));
    await mkdir(path.join(root, "trash"));
    await mkdir(path.join(root, "2023", "summer"), { recursive: true });
    await writeFile(path.join(root, "a.jpg"), "a");
    await writeFile(path.join(root, "b.mov"), "b");
    await writeFile(path.join(root, "trash", "c.jpg"), "c");
    await writeFile(path.join(root, "2023", "summer", "d.png"), "d");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists absolute paths of regular files only", async () => {
    expect(await listFiles(root)).toEqual([
      path.join(root, "2023", "summer", "d.png"),
      path.join(root, "a.jpg"),
      path.join(root, "b.mov"),
      path.join(root, "trash", "c.jpg"),
    ]);
  });

  it("skips dangling symlinks", async () => {
    await symlink(path.join(root, "gone.jpg"), path.join(root, "link.jpg"));
    expect(await listFiles(root)).toEqual([
      path.join(root, "2023", "summer", "d.png"),
      path.join(root, "a.jpg"),
      path.join(root, "b.mov"),
      path.join(root, "trash", "c.jpg"),
    ]);

    const logger = { info: vi.fn(), error: vi.fn() };
    const images = await loadAllImages(root, rules, logger);
    expect(images).toEqual([
      path.join(root, "2023", "summer", "d.png"),
      path.join(root, "a.jpg"),
    ]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("rejects when the root cannot be read", async () => {
    await expect(listFiles(path.join(root, "missing"))).rejects.toThrow(
      /ENOENT/
    );
  });

  it("loads the filtered image list", async () => {
    const logger = { info: vi.fn(), error: vi.fn() };
    const images = await loadAllImages(root, rules, logger);
    expect(images).toEqual([
      path.join(root, "2023", "summer", "d.png"),
      path.join(root, "a.jpg"),
    ]);
    expect(Object.isFrozen(images)).toBe(true);
    expect(logger.info).toHaveBeenCalledOnce();
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("degrades to an empty list when the scan fails", async () => {
    const logger = { info: vi.fn(), error: vi.fn() };
    const missing = path.join(root, "missing");
    const images = await loadAllImages(missing, rules, logger);
    expect(images).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      `Error scanning ${missing}`,
      expect.any(Error)
    );
  });
});
