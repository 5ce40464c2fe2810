import { makeTempDir } from "../setup";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { listDatabases } from "../../src/catalog/DatabaseCatalog";
import { NotFoundError } from "../../src/errors";

describe("listDatabases", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });
  afterEach(() => cleanup());

  it("lists regular files with the extension, stripped and sorted", async () => {
    for (const name of ["b.mpmdb", "a.mpmdb", "c.txt", "notes.mpmdb.bak", ".mpmdb"]) {
      writeFileSync(join(dir, name), "");
    }
    mkdirSync(join(dir, "folder.mpmdb"));

    await expect(listDatabases(dir)).resolves.toEqual(["a", "b"]);
  });

  it("keeps dots inside names", async () => {
    writeFileSync(join(dir, "work.2024.mpmdb"), "");
    await expect(listDatabases(dir)).resolves.toEqual(["work.2024"]);
  });

  it("honours a custom extension", async () => {
    writeFileSync(join(dir, "a.mpmdb"), "");
    writeFileSync(join(dir, "b.vault"), "");
    await expect(listDatabases(dir, ".vault")).resolves.toEqual(["b"]);
  });

  it("returns an empty list for an empty directory", async () => {
    await expect(listDatabases(dir)).resolves.toEqual([]);
  });

  it("reports a missing directory or a file in its place", async () => {
    await expect(listDatabases(join(dir, "missing"))).rejects.toBeInstanceOf(NotFoundError);
    writeFileSync(join(dir, "plain"), "");
    await expect(listDatabases(join(dir, "plain"))).rejects.toBeInstanceOf(NotFoundError);
  });
});
