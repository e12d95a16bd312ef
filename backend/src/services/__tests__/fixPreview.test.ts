import { describe, expect, it } from "vitest";
import { buildDocx } from "../../__tests__/docxFixture.js";
import { DocxDocument } from "../documentModel.js";
import { buildDiffHtml, previewFix } from "../fixPreview.js";

describe("buildDiffHtml", () => {
  it("marks added and removed words", () => {
    const html = buildDiffHtml("a erors b", "a errors b");
    expect(html).toContain('<span class="diff-removed">erors</span>');
    expect(html).toContain('<span class="diff-added">errors</span>');
  });

  it("escapes markup in the text", () => {
    expect(buildDiffHtml("<b>", "<b>")).toBe("<span>&lt;b&gt;</span>");
  });
});

describe("previewFix", () => {
  it("shows each affected sentence before and after", async () => {
    const document = await DocxDocument.load(
      await buildDocx({ paragraphs: [["Fine sentence. Two erors here."], ["No match."]] })
    );
    const preview = previewFix(document, { search: "erors", replace: "errors" });

    expect(preview.fix).toEqual({ search: "erors", replace: "errors" });
    expect(preview.occurrences).toHaveLength(1);
    expect(preview.occurrences[0]).toMatchObject({
      index: 0,
      containerIndex: 0,
      sentence: "Two erors here.",
      proposedSentence: "Two errors here."
    });
  });

  it("has no occurrences when the search is absent", async () => {
    const document = await DocxDocument.load(await buildDocx({ paragraphs: [["Clean."]] }));
    expect(previewFix(document, { search: "erors", replace: "errors" }).occurrences).toEqual([]);
  });
});
