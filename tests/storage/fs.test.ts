import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { FileSystemStorageAdapter } from "../../src/storage/fs.js";
import { FileStorage } from "../../src/storage/file-storage.js";
import { FileNotFoundError, InvalidFileKeyError } from "../../src/errors.js";

describe("FileSystemStorageAdapter", () => {
  let tmpDir: string;
  let adapter: FileSystemStorageAdapter;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "fs-storage-test-"));
    adapter = new FileSystemStorageAdapter({ baseDir: tmpDir });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("save / load", () => {
    it("writes and reads a file", async () => {
      expect(await adapter.save({ key: "hello.txt", content: "world" })).toBe(true);
      const file = await adapter.load("hello.txt");
      expect(file.key).toBe("hello.txt");
      expect(file.content).toBe("world");
      expect(file.modifiedAt).toBeInstanceOf(Date);
    });

    it("writes the key as a path under the base directory", async () => {
      await adapter.save({ key: "a/b/c.txt", content: "nested" });
      const raw = await fs.readFile(path.join(tmpDir, "a", "b", "c.txt"), "utf-8");
      expect(raw).toBe("nested");
    });

    it("overwrites an existing file", async () => {
      await adapter.save({ key: "f.txt", content: "v1" });
      await adapter.save({ key: "f.txt", content: "v2" });
      expect((await adapter.load("f.txt")).content).toBe("v2");
    });

    it("writes null content as an empty file", async () => {
      await adapter.save({ key: "empty.txt", content: null });
      const stats = await fs.stat(path.join(tmpDir, "empty.txt"));
      expect(stats.size).toBe(0);
    });

    it("throws FileNotFoundError for a missing file", async () => {
      const err = await adapter.load("missing.txt").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(FileNotFoundError);
      expect(err).toMatchObject({ key: "missing.txt", message: "File not found: missing.txt" });
    });
  });

  describe("binary encoding", () => {
    it("loads content as bytes", async () => {
      const binary = new FileSystemStorageAdapter({ baseDir: tmpDir, encoding: "binary" });
      await binary.save({ key: "data.bin", content: new Uint8Array([0, 255, 16]) });

      const file = await binary.load("data.bin");
      expect(file.content).toBeInstanceOf(Uint8Array);
      expect(file.content).toEqual(new Uint8Array([0, 255, 16]));
    });

    it("touches with zero-length bytes", async () => {
      const binary = new FileSystemStorageAdapter({ baseDir: tmpDir, encoding: "binary" });
      const file = await binary.init("data.bin", true);
      expect(file.content).toEqual(new Uint8Array(0));
    });
  });

  describe("init", () => {
    it("returns a null-content record without writing", async () => {
      expect(await adapter.init("new.txt", false)).toEqual({ key: "new.txt", content: null });
      expect(await fs.readdir(tmpDir)).toEqual([]);
    });

    it("returns an empty sentinel when touching", async () => {
      expect(await adapter.init("new.txt", true)).toEqual({ key: "new.txt", content: "" });
      expect(await fs.readdir(tmpDir)).toEqual([]);
    });
  });

  describe("delete", () => {
    it("deletes an existing file", async () => {
      await adapter.save({ key: "del.txt", content: "bye" });
      expect(await adapter.delete("del.txt")).toBe(true);
      await expect(adapter.load("del.txt")).rejects.toBeInstanceOf(FileNotFoundError);
    });

    it("throws FileNotFoundError for a missing file", async () => {
      await expect(adapter.delete("nope.txt")).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });

  describe("I/O errors", () => {
    it("passes through errors other than a missing file on load", async () => {
      await adapter.save({ key: "dir/a.txt", content: "x" });

      const err = await adapter.load("dir").catch((e: unknown) => e);
      expect(err).not.toBeInstanceOf(FileNotFoundError);
      expect(err).toMatchObject({ code: "EISDIR" });
    });

    it("passes through errors other than a missing file on delete", async () => {
      await adapter.save({ key: "dir/a.txt", content: "x" });

      const err = await adapter.delete("dir").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(Error);
      expect(err).not.toBeInstanceOf(FileNotFoundError);
      expect((await fs.stat(path.join(tmpDir, "dir"))).isDirectory()).toBe(true);
    });

    it("lets the error escape FileStorage.init", async () => {
      const storage = new FileStorage({ adapter });
      await storage.save({ key: "dir/a.txt", content: "x" });

      await expect(storage.init("dir")).rejects.toMatchObject({ code: "EISDIR" });
    });

    it("reports a key below a regular file as missing", async () => {
      await adapter.save({ key: "a", content: "x" });

      await expect(adapter.load("a/b.txt")).rejects.toMatchObject({
        name: "FileNotFoundError",
        key: "a/b.txt",
        cause: expect.objectContaining({ code: "ENOTDIR" }),
      });
      await expect(adapter.delete("a/b.txt")).rejects.toBeInstanceOf(FileNotFoundError);
    });

    it("lets FileStorage.init claim a key below a regular file", async () => {
      const storage = new FileStorage({ adapter });
      await storage.save({ key: "a", content: "x" });

      await expect(storage.init("a/b.txt")).resolves.toEqual({
        key: "a/b.txt",
        content: null,
      });
    });
  });

  describe("key resolution", () => {
    it.each(["../outside.txt", "a/../../outside.txt", "."])(
      "rejects %j",
      async (key) => {
        await expect(adapter.save({ key, content: "x" })).rejects.toBeInstanceOf(
          InvalidFileKeyError,
        );
        await expect(adapter.load(key)).rejects.toBeInstanceOf(InvalidFileKeyError);
        await expect(adapter.init(key, true)).rejects.toBeInstanceOf(InvalidFileKeyError);
        await expect(adapter.delete(key)).rejects.toBeInstanceOf(InvalidFileKeyError);
      },
    );

    it("accepts keys when the base directory is the filesystem root", async () => {
      const root = new FileSystemStorageAdapter({ baseDir: path.parse(tmpDir).root });
      const key = path.relative(root.baseDir, path.join(tmpDir, "at-root.txt"));

      expect(await root.init(key, false)).toEqual({ key, content: null });
      await root.save({ key, content: "from root" });
      expect((await root.load(key)).content).toBe("from root");
      await expect(root.init("", false)).rejects.toBeInstanceOf(InvalidFileKeyError);
    });

    it("resolves relative base directories", () => {
      const relative = new FileSystemStorageAdapter({ baseDir: "storage" });
      expect(relative.baseDir).toBe(path.resolve("storage"));
    });
  });
});
