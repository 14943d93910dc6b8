import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { documentKind, readParagraphs, splitParagraphs } from "../../src/document";
import { DocumentNotFoundError, InvalidInputError } from "../../src/errors";
import { makeTempDir } from "../helpers/fakes";

describe("splitParagraphs", () => {
  it("trims lines and drops blank ones", () => {
    expect(splitParagraphs("  First line \r\n\n\t\nSecond line\n")).toEqual([
      "First line",
      "Second line",
    ]);
  });

  it("returns nothing for whitespace", () => {
    expect(splitParagraphs(" \n \n")).toEqual([]);
  });
});

describe("documentKind", () => {
  it("lower-cases the extension", () => {
    expect(documentKind("/tmp/Project.DOCX")).toBe(".docx");
    expect(documentKind("notes")).toBe("");
  });
});

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("readParagraphs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a text document line by line", async () => {
    const file = path.join(dir, "project.md");
    await fs.writeFile(file, "# Overview\n\nThe project ships in May.\n\n  Budget is fixed.  \n", "utf8");

    expect(await readParagraphs(file)).toEqual([
      "# Overview",
      "The project ships in May.",
      "Budget is fixed.",
    ]);
  });

  it("reads the paragraphs of a .docx document", async () => {
    expect(await readParagraphs(fixture("project.docx"))).toEqual([
      "Project Overview",
      "The launch is planned for May.",
      "The budget is fixed.",
    ]);
  });

  it("reports a missing document", async () => {
    const file = path.join(dir, "missing.txt");
    await expect(readParagraphs(file)).rejects.toBeInstanceOf(DocumentNotFoundError);
    await expect(readParagraphs(file)).rejects.toThrow(`Document not found at ${file}`);
  });

  it("refuses a directory", async () => {
    await expect(readParagraphs(dir)).rejects.toBeInstanceOf(InvalidInputError);
  });
});
