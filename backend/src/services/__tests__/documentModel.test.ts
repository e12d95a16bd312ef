import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import { DocumentError } from "../../errors.js";
import { buildDocx } from "../../__tests__/docxFixture.js";
import { DocxDocument } from "../documentModel.js";

describe("DocxDocument.load", () => {
  it("orders containers body, tables, headers, footers", async () => {
    const document = await DocxDocument.load(
      await buildDocx({
        paragraphs: [["First paragraph."], ["Second one."]],
        table: [
          ["A1", "B1"],
          ["A2", "B2"]
        ],
        header: "Header text",
        footer: "Page footer"
      })
    );

    expect(document.containers.map((container) => container.text)).toEqual([
      "First paragraph.",
      "Second one.",
      "A1",
      "B1",
      "A2",
      "B2",
      "Header text",
      "Page footer"
    ]);
    expect(document.containers.map((container) => container.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(document.containers[3].location).toEqual({ source: "table", table: 0, row: 0, cell: 1 });
    expect(document.containers[6].location).toEqual({
      source: "header",
      partPath: "word/header1.xml",
      variant: "default"
    });
    expect(document.containers[7].location.source).toBe("footer");
  });

  it("visits a header shared by two sections once", async () => {
    const document = await DocxDocument.load(
      await buildDocx({ paragraphs: [["Body"]], header: "Shared header", repeatHeaderSection: true })
    );
    const headers = document.containers.filter((container) => container.location.source === "header");
    expect(headers).toHaveLength(1);
    expect(headers[0].text).toBe("Shared header");
  });

  it("reads run formatting", async () => {
    const document = await DocxDocument.load(
      await buildDocx({ paragraphs: [[{ text: "Bold", bold: true }, { text: " plain" }, { text: " slanted", italic: true }]] })
    );
    const [bold, plain, italic] = document.containers[0].runs;
    expect(bold.formatting.bold).toBe(true);
    expect(bold.formatting.italic).toBe(false);
    expect(plain.formatting).toEqual({ bold: false, italic: false, underline: null, fontFamily: null, fontSize: null });
    expect(italic.formatting.italic).toBe(true);
  });

  it("rejects data that is not a zip package", async () => {
    await expect(DocxDocument.load(Buffer.from("not a zip"))).rejects.toBeInstanceOf(DocumentError);
  });

  it("rejects a package without a main document part", async () => {
    const zip = new JSZip();
    zip.file("readme.txt", "hello");
    const buffer = await zip.generateAsync({ type: "nodebuffer" });
    await expect(DocxDocument.load(buffer)).rejects.toThrow("Package has no word/document.xml.");
  });

  it("reports a missing file as a document error", async () => {
    const error = await DocxDocument.open("/nonexistent/dir/gone.docx").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(DocumentError);
    expect(error).toMatchObject({
      userMessage: "Could not read the document. Please send it again.",
      status: 422
    });
  });

  it("rejects malformed XML", async () => {
    const zip = new JSZip();
    zip.file("word/document.xml", "this is not xml");
    const buffer = await zip.generateAsync({ type: "nodebuffer" });
    await expect(DocxDocument.load(buffer)).rejects.toBeInstanceOf(DocumentError);
  });
});

describe("DocxDocument editing", () => {
  it("persists run text and keeps formatting through a save", async () => {
    const document = await DocxDocument.load(
      await buildDocx({ paragraphs: [[{ text: "Teh ", bold: true }, { text: "quick fox" }]] })
    );
    expect(document.changed).toBe(false);

    document.containers[0].runs[0].text = "The ";
    expect(document.changed).toBe(true);

    const reloaded = await DocxDocument.load(await document.toBuffer());
    const runs = reloaded.containers[0].runs;
    expect(runs.map((run) => run.text)).toEqual(["The ", "quick fox"]);
    expect(runs[0].formatting.bold).toBe(true);
  });

  it("writes tabs and line breaks as their own elements", async () => {
    const document = await DocxDocument.load(await buildDocx({ paragraphs: [["plain"]] }));
    document.containers[0].runs[0].text = "a\tb\nc";

    const reloaded = await DocxDocument.load(await document.toBuffer());
    expect(reloaded.containers[0].text).toBe("a\tb\nc");
  });

  it("empties a run when set to an empty string", async () => {
    const document = await DocxDocument.load(await buildDocx({ paragraphs: [["keep", "drop"]] }));
    document.containers[0].runs[1].text = "";

    const reloaded = await DocxDocument.load(await document.toBuffer());
    expect(reloaded.containers[0].runs.map((run) => run.text)).toEqual(["keep", ""]);
  });
});

describe("DocxDocument.fullText", () => {
  it("joins body lines, table rows and labelled headers", async () => {
    const document = await DocxDocument.load(
      await buildDocx({
        paragraphs: [["First paragraph."], ["   "], ["Second one."]],
        table: [
          ["A1", "B1"],
          ["A2", ""]
        ],
        header: "Header text",
        footer: "Page footer"
      })
    );
    expect(document.fullText()).toBe(
      "First paragraph.\nSecond one.\nA1 | B1\nA2\n[HEADER] Header text\n[FOOTER] Page footer"
    );
  });
});
