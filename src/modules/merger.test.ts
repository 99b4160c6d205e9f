import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mergeSessions } from "./merger";

async function createSession(
  root: string,
  name: string,
  files: string[],
  processDir = "process",
): Promise<string> {
  const sessionPath = path.join(root, name);
  await mkdir(path.join(sessionPath, processDir), { recursive: true });
  for (const file of files) {
    await writeFile(path.join(sessionPath, processDir, file), `${name}/${file}`);
  }
  return sessionPath;
}

// Order the merger will see, without assuming the filesystem sorts
async function listed(sessionPath: string, prefix = "pp_light_"): Promise<string[]> {
  const names = await readdir(path.join(sessionPath, "process"));
  return names.filter((n) => n.startsWith(prefix) && n.includes(".fit"));
}

describe("mergeSessions", () => {
  let root: string;
  let output: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "merge-"));
    output = path.join(root, "merged");
    await mkdir(output);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("numbers files across sessions in one contiguous sequence", async () => {
    const a = await createSession(root, "a", ["pp_light_a1.fit", "pp_light_a2.fit", "pp_light_a3.fit"]);
    const b = await createSession(root, "b", ["pp_light_b1.fit", "pp_light_b2.fit"]);

    const result = await mergeSessions({
      sessionPaths: [a, b],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
      sort: true,
    });

    expect(result.manifest.entries()).toEqual([
      [path.join(a, "process/pp_light_a1.fit"), path.join(output, "pp_light_00001.fit")],
      [path.join(a, "process/pp_light_a2.fit"), path.join(output, "pp_light_00002.fit")],
      [path.join(a, "process/pp_light_a3.fit"), path.join(output, "pp_light_00003.fit")],
      [path.join(b, "process/pp_light_b1.fit"), path.join(output, "pp_light_00004.fit")],
      [path.join(b, "process/pp_light_b2.fit"), path.join(output, "pp_light_00005.fit")],
    ]);
    expect(result.sessions).toEqual([
      { sessionPath: a, files: 3 },
      { sessionPath: b, files: 2 },
    ]);
    expect(await readFile(path.join(output, "pp_light_00004.fit"), "utf-8")).toBe(
      "b/pp_light_b1.fit",
    );
  });

  it("follows directory listing order when not sorting", async () => {
    const a = await createSession(root, "a", ["pp_light_x.fit", "pp_light_m.fit", "pp_light_c.fit"]);
    const b = await createSession(root, "b", ["pp_light_z.fit", "pp_light_k.fit"]);
    const expectedOrder = [
      ...(await listed(a)).map((n) => path.join(a, "process", n)),
      ...(await listed(b)).map((n) => path.join(b, "process", n)),
    ];

    const result = await mergeSessions({
      sessionPaths: [a, b],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
    });

    expect(result.manifest.entries().map(([original]) => original)).toEqual(expectedOrder);
    expect(result.manifest.entries().map(([, merged]) => path.basename(merged))).toEqual([
      "pp_light_00001.fit",
      "pp_light_00002.fit",
      "pp_light_00003.fit",
      "pp_light_00004.fit",
      "pp_light_00005.fit",
    ]);
  });

  it("writes the manifest in copy order", async () => {
    const a = await createSession(root, "a", ["pp_light_1.fit", "pp_light_2.fit"]);

    const result = await mergeSessions({
      sessionPaths: [a],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
      sort: true,
    });

    expect(result.manifestPath).toBe(path.join(output, "conversion.txt"));
    expect(await readFile(result.manifestPath, "utf-8")).toBe(
      `'${path.join(a, "process/pp_light_1.fit")}' -> '${path.join(output, "pp_light_00001.fit")}'\n` +
        `'${path.join(a, "process/pp_light_2.fit")}' -> '${path.join(output, "pp_light_00002.fit")}'\n`,
    );
  });

  it("skips sessions without matches without shifting numbering", async () => {
    const a = await createSession(root, "a", ["pp_light_1.fit"]);
    const empty = await createSession(root, "empty", ["light_1.fit", "notes.txt"]);
    const c = await createSession(root, "c", ["pp_light_9.fit"]);

    const result = await mergeSessions({
      sessionPaths: [a, empty, c],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
    });

    expect(result.manifest.size).toBe(2);
    expect(result.manifest.get(path.join(c, "process/pp_light_9.fit"))).toBe(
      path.join(output, "pp_light_00002.fit"),
    );
    expect(result.sessions[1]).toEqual({ sessionPath: empty, files: 0 });
  });

  it("ignores files that do not match the sequence name", async () => {
    const a = await createSession(root, "a", [
      "pp_light_1.fit",
      "r_pp_light_1.fit",
      "pp_flat_1.fit",
      "pp_light_.seq",
    ]);

    const result = await mergeSessions({
      sessionPaths: [a],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
    });

    expect(result.manifest.entries()).toEqual([
      [path.join(a, "process/pp_light_1.fit"), path.join(output, "pp_light_00001.fit")],
    ]);
  });

  it("uses the given process directory and sequence name", async () => {
    const a = await createSession(root, "a", ["r_pp_1.fit", "r_pp_2.fit"], "work");

    const result = await mergeSessions({
      sessionPaths: [a],
      outputPath: output,
      processDir: "work",
      seqName: "r_pp",
      sort: true,
    });

    expect(result.manifest.entries().map(([, merged]) => merged)).toEqual([
      path.join(output, "r_pp_00001.fit"),
      path.join(output, "r_pp_00002.fit"),
    ]);
  });

  it("copies without touching the sources", async () => {
    const a = await createSession(root, "a", ["pp_light_1.fit"]);

    await mergeSessions({
      sessionPaths: [a],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
    });

    expect(await readdir(path.join(a, "process"))).toEqual(["pp_light_1.fit"]);
    expect(await readFile(path.join(a, "process/pp_light_1.fit"), "utf-8")).toBe(
      "a/pp_light_1.fit",
    );
  });

  it("keeps earlier files in a reused output directory and replaces the manifest", async () => {
    await writeFile(path.join(output, "pp_light_00007.fit"), "old");
    await writeFile(path.join(output, "conversion.txt"), "old manifest\n");
    const a = await createSession(root, "a", ["pp_light_1.fit"]);

    const result = await mergeSessions({
      sessionPaths: [a],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
    });

    expect((await readdir(output)).sort()).toEqual([
      "conversion.txt",
      "pp_light_00001.fit",
      "pp_light_00007.fit",
    ]);
    expect(await readFile(result.manifestPath, "utf-8")).toBe(result.manifest.serialize());
  });

  it("fails when a session has no process directory", async () => {
    const a = await createSession(root, "a", ["pp_light_1.fit"]);
    const missing = path.join(root, "no-process");
    await mkdir(missing);

    await expect(
      mergeSessions({
        sessionPaths: [a, missing],
        outputPath: output,
        processDir: "process",
        seqName: "pp_light",
      }),
    ).rejects.toMatchObject({ code: "ENOENT" });

    // Already-copied files stay, and no manifest is written
    expect(await readdir(output)).toEqual(["pp_light_00001.fit"]);
  });

  it("reports each session as it is merged", async () => {
    const a = await createSession(root, "a", ["pp_light_1.fit"]);
    const b = await createSession(root, "b", []);
    const reported: string[] = [];

    await mergeSessions({
      sessionPaths: [a, b],
      outputPath: output,
      processDir: "process",
      seqName: "pp_light",
      onSessionMerged: ({ sessionPath, files }) =>
        reported.push(`${path.basename(sessionPath)}:${files}`),
    });

    expect(reported).toEqual(["a:1", "b:0"]);
  });

  it("rejects a session listed twice before copying anything", async () => {
    const a = await createSession(root, "a", ["pp_light_1.fit", "pp_light_2.fit"]);

    await expect(
      mergeSessions({
        sessionPaths: [a, path.join(root, "a", ".")],
        outputPath: output,
        processDir: "process",
        seqName: "pp_light",
      }),
    ).rejects.toThrow(`Session listed more than once: ${a}`);

    expect(await readdir(output)).toEqual([]);
  });
});
