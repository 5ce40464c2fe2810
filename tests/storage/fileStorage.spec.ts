import "../setup";
import { makeTempDir } from "../setup";
import { readdirSync, readFileSync, statSync, writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { FileStorage, errnoCode } from "../../src/storage/FileStorage";
import { AlreadyExistsError, NotFoundError, PersistenceError } from "../../src/errors";
import { LogRing } from "../../src/diagnostics/LogRing";

describe("FileStorage", () => {
  let dir: string;
  let cleanup: () => void;
  const storage = new FileStorage();

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });
  afterEach(() => cleanup());

  it("reads whole files and reports missing ones as NotFoundError", async () => {
    const path = join(dir, "a.mpmdb");
    writeFileSync(path, "x,y\r\n");
    await expect(storage.read(path)).resolves.toBe("x,y\r\n");
    await expect(storage.read(join(dir, "missing.mpmdb"))).rejects.toBeInstanceOf(NotFoundError);
  });

  it("exists() is true only for regular files", async () => {
    const file = join(dir, "a.mpmdb");
    writeFileSync(file, "");
    mkdirSync(join(dir, "folder.mpmdb"));
    expect(await storage.exists(file)).toBe(true);
    expect(await storage.exists(join(dir, "folder.mpmdb"))).toBe(false);
    expect(await storage.exists(join(dir, "nope.mpmdb"))).toBe(false);
  });

  it("createExclusive() refuses to overwrite", async () => {
    const path = join(dir, "a.mpmdb");
    await storage.createExclusive(path, "first");
    await expect(storage.createExclusive(path, "second")).rejects.toBeInstanceOf(AlreadyExistsError);
    expect(readFileSync(path, "utf8")).toBe("first");
  });

  it("creates files readable by the owner only", async () => {
    const path = join(dir, "a.mpmdb");
    await storage.createExclusive(path, "x");
    await storage.write(join(dir, "b.mpmdb"), "y");
    if (process.platform !== "win32") {
      expect(statSync(path).mode & 0o777).toBe(0o600);
      expect(statSync(join(dir, "b.mpmdb")).mode & 0o777).toBe(0o600);
    }
  });

  it("write() replaces content and leaves no temp file behind", async () => {
    const path = join(dir, "a.mpmdb");
    writeFileSync(path, "old");
    await storage.write(path, "new content");
    expect(readFileSync(path, "utf8")).toBe("new content");
    expect(readdirSync(dir)).toEqual(["a.mpmdb"]);
  });

  it("write() into a missing directory fails cleanly", async () => {
    const logger = new LogRing({ level: "debug" });
    const failing = new FileStorage(logger);
    await expect(failing.write(join(dir, "no-such-dir", "a.mpmdb"), "x")).rejects.toBeInstanceOf(PersistenceError);
    expect(readdirSync(dir)).toEqual([]);
    expect(logger.getEntries()).toEqual([]);
  });

  it("remove() deletes the file and reports a missing one", async () => {
    const path = join(dir, "a.mpmdb");
    writeFileSync(path, "");
    await storage.remove(path);
    expect(readdirSync(dir)).toEqual([]);
    await expect(storage.remove(path)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("errnoCode", () => {
  it("extracts string codes only", () => {
    expect(errnoCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(errnoCode({ code: 22 })).toBeUndefined();
    expect(errnoCode("ENOENT")).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});
