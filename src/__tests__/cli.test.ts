import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildProgram, type CliIO } from "../cli.js";

describe("term-matcher CLI", () => {
  let dir: string;
  let terms: string;
  let out: string[];
  let err: string[];
  let io: CliIO;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "term-matcher-cli-"));
    terms = join(dir, "terms.txt");
    await writeFile(terms, "the bronx\nbronx\n", "utf8");
    out = [];
    err = [];
    io = {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      readStdin: async () => "Bronx and the Bronx",
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints matches for text arguments", async () => {
    await buildProgram(io).parseAsync(["match", "--terms", terms, "I", "live", "in", "the", "Bronx"], { from: "user" });
    expect(out).toEqual(["10\t19\tthe Bronx", "14\t19\tBronx"]);
  });

  it("reads stdin when no text is given", async () => {
    await buildProgram(io).parseAsync(["match", "-t", terms], { from: "user" });
    expect(out).toEqual(["0\t5\tBronx", "10\t19\tthe Bronx", "14\t19\tBronx"]);
  });

  it("counts loaded terms", async () => {
    await buildProgram(io).parseAsync(["count", "--terms", terms], { from: "user" });
    expect(out).toEqual(["2"]);
  });

  it("exits with status 1 when the terms file is missing", async () => {
    const missing = join(dir, "missing.txt");
    const program = buildProgram(io).exitOverride();

    await expect(program.parseAsync(["count", "--terms", missing], { from: "user" })).rejects.toMatchObject({
      exitCode: 1,
      code: "RESOURCE_UNAVAILABLE",
    });
    expect(err).toEqual([`cannot read terms file '${missing}'`]);
  });

  it("exits with status 1 when serve cannot load its terms file", async () => {
    const missing = join(dir, "missing.txt");
    const program = buildProgram(io).exitOverride();

    await expect(
      program.parseAsync(["serve", "--port", "0", "--terms", missing], { from: "user" }),
    ).rejects.toMatchObject({ exitCode: 1, code: "RESOURCE_UNAVAILABLE" });
    expect(err).toEqual([`cannot read terms file '${missing}'`]);
  });
});
