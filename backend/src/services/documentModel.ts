import { promises as fs } from "node:fs";
import JSZip from "jszip";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { DocumentError } from "../errors.js";

const WORD_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const MAIN_PART_PATH = "word/document.xml";
const MAIN_RELS_PATH = "word/_rels/document.xml.rels";
const ELEMENT_NODE = 1;
const TEXT_LIKE_TAGS = new Set(["w:t", "w:tab", "w:br", "w:cr", "w:noBreakHyphen"]);

export type HeaderFooterVariant = "default" | "first" | "even";

export type ContainerLocation =
  | { source: "body" }
  | { source: "table"; table: number; row: number; cell: number }
  | {
      source: "header" | "footer";
      partPath: string;
      variant: HeaderFooterVariant;
      table?: { table: number; row: number; cell: number };
    };

export type RunFormatting = {
  bold: boolean;
  italic: boolean;
  underline: string | null;
  fontFamily: string | null;
  fontSize: number | null;
};

/** Smallest span of uniformly formatted text. */
export interface TextRun {
  text: string;
}

/** Paragraph-like holder of runs; the unit of search and replace. */
export interface TextContainer {
  readonly runs: readonly TextRun[];
}

export function containerText(container: TextContainer): string {
  return container.runs.map((run) => run.text).join("");
}

function isElement(node: Node | null | undefined): node is Element {
  return !!node && node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Element, tagName?: string): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i += 1) {
    const child = parent.childNodes.item(i);
    if (isElement(child) && (!tagName || child.nodeName === tagName)) {
      out.push(child);
    }
  }
  return out;
}

function firstChildElement(parent: Element, tagName: string): Element | undefined {
  return childElements(parent, tagName)[0];
}

function nearestAncestor(node: Element, tagName: string): Element | null {
  let current = node.parentNode;
  while (current) {
    if (isElement(current) && current.nodeName === tagName) {
      return current;
    }
    current = current.parentNode;
  }
  return null;
}

function isSwitchedOff(element: Element | undefined): boolean {
  if (!element) {
    return true;
  }
  const value = element.getAttribute("w:val");
  return value === "0" || value === "false" || value === "off";
}

function requiresXmlSpacePreserve(text: string): boolean {
  return /^\s/.test(text) || /\s$/.test(text) || text.includes("  ");
}

class DocxPart {
  dirty = false;

  constructor(
    readonly path: string,
    readonly xml: Document
  ) {}
}

export class DocxRun implements TextRun {
  constructor(
    private readonly element: Element,
    private readonly part: DocxPart
  ) {}

  get text(): string {
    return childElements(this.element)
      .map((child) => {
        switch (child.nodeName) {
          case "w:t":
            return child.textContent || "";
          case "w:tab":
            return "\t";
          case "w:br":
          case "w:cr":
            return "\n";
          case "w:noBreakHyphen":
            return "-";
          default:
            return "";
        }
      })
      .join("");
  }

  set text(value: string) {
    const previous = childElements(this.element).filter((child) => TEXT_LIKE_TAGS.has(child.nodeName));
    const anchor = previous[0] ?? null;
    for (const node of this.buildTextNodes(value)) {
      this.element.insertBefore(node, anchor);
    }
    for (const node of previous) {
      this.element.removeChild(node);
    }
    this.part.dirty = true;
  }

  get formatting(): RunFormatting {
    const props = firstChildElement(this.element, "w:rPr");
    if (!props) {
      return { bold: false, italic: false, underline: null, fontFamily: null, fontSize: null };
    }
    const underline = firstChildElement(props, "w:u")?.getAttribute("w:val") || null;
    const size = firstChildElement(props, "w:sz")?.getAttribute("w:val");
    return {
      bold: !isSwitchedOff(firstChildElement(props, "w:b")),
      italic: !isSwitchedOff(firstChildElement(props, "w:i")),
      underline: underline === "none" ? null : underline,
      fontFamily: firstChildElement(props, "w:rFonts")?.getAttribute("w:ascii") || null,
      fontSize: size ? Number(size) / 2 : null
    };
  }

  private buildTextNodes(value: string): Element[] {
    const doc = this.part.xml;
    const nodes: Element[] = [];
    for (const piece of value.split(/(\t|\n)/)) {
      if (piece === "") {
        continue;
      }
      if (piece === "\t") {
        nodes.push(doc.createElementNS(WORD_NS, "w:tab"));
        continue;
      }
      if (piece === "\n") {
        nodes.push(doc.createElementNS(WORD_NS, "w:br"));
        continue;
      }
      const textElement = doc.createElementNS(WORD_NS, "w:t");
      textElement.appendChild(doc.createTextNode(piece));
      if (requiresXmlSpacePreserve(piece)) {
        textElement.setAttribute("xml:space", "preserve");
      }
      nodes.push(textElement);
    }
    return nodes;
  }
}

export class DocxParagraph implements TextContainer {
  readonly runs: DocxRun[];

  constructor(
    readonly index: number,
    readonly location: ContainerLocation,
    element: Element,
    part: DocxPart
  ) {
    const runElements: Element[] = [];
    const all = element.getElementsByTagName("w:r");
    for (let i = 0; i < all.length; i += 1) {
      const run = all.item(i);
      // runs of nested paragraphs (text boxes) belong to those paragraphs
      if (run && nearestAncestor(run, "w:p") === element) {
        runElements.push(run);
      }
    }
    this.runs = runElements.map((run) => new DocxRun(run, part));
  }

  get text(): string {
    return containerText(this);
  }
}

type PendingContainer = {
  element: Element;
  part: DocxPart;
  location: ContainerLocation;
};

function parseXml(xml: string, partPath: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (message: string) => problems.push(message),
      fatalError: (message: string) => problems.push(message)
    }
  });
  const parsed = parser.parseFromString(xml, "text/xml");
  if (!parsed || !parsed.documentElement || problems.length > 0) {
    throw new DocumentError(
      `Part ${partPath} is not well-formed XML${problems.length ? `: ${problems[0]}` : "."}`,
      "Invalid or corrupted DOCX file."
    );
  }
  return parsed;
}

function resolveRelationshipTarget(target: string): string {
  if (target.startsWith("/")) {
    return target.slice(1);
  }
  return `word/${target.replace(/^\.\//, "")}`;
}

function tableCellParagraphs(
  table: Element
): Array<{ paragraph: Element; row: number; cell: number }> {
  const out: Array<{ paragraph: Element; row: number; cell: number }> = [];
  childElements(table, "w:tr").forEach((row, rowIndex) => {
    childElements(row, "w:tc").forEach((cell, cellIndex) => {
      for (const paragraph of childElements(cell, "w:p")) {
        out.push({ paragraph, row: rowIndex, cell: cellIndex });
      }
    });
  });
  return out;
}

const SECTION_PARTS: Array<{ tag: "w:headerReference" | "w:footerReference"; variant: HeaderFooterVariant }> = [
  { tag: "w:headerReference", variant: "default" },
  { tag: "w:footerReference", variant: "default" },
  { tag: "w:headerReference", variant: "first" },
  { tag: "w:footerReference", variant: "first" },
  { tag: "w:headerReference", variant: "even" },
  { tag: "w:footerReference", variant: "even" }
];

/**
 * A loaded .docx package with its text flattened into containers.
 *
 * Container order: body paragraphs, body table cells (row-major), then the
 * header/footer parts of each section (default, first-page, even-page).
 * A header or footer part shared between sections is visited once.
 */
export class DocxDocument {
  readonly containers: DocxParagraph[];

  private constructor(
    private readonly zip: JSZip,
    private readonly parts: DocxPart[],
    pending: PendingContainer[]
  ) {
    this.containers = pending.map(
      (item, index) => new DocxParagraph(index, item.location, item.element, item.part)
    );
  }

  static async load(buffer: Buffer): Promise<DocxDocument> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw new DocumentError(
        `Package could not be opened: ${error instanceof Error ? error.message : String(error)}`,
        "Invalid or corrupted DOCX file."
      );
    }

    const mainFile = zip.file(MAIN_PART_PATH);
    if (!mainFile) {
      throw new DocumentError(`Package has no ${MAIN_PART_PATH}.`, "Invalid or corrupted DOCX file.");
    }

    const mainPart = new DocxPart(MAIN_PART_PATH, parseXml(await mainFile.async("text"), MAIN_PART_PATH));
    const root = mainPart.xml.documentElement;
    const body = root ? firstChildElement(root, "w:body") : undefined;
    if (!body) {
      throw new DocumentError("Document part has no body.", "Invalid or corrupted DOCX file.");
    }

    const parts: DocxPart[] = [mainPart];
    const pending: PendingContainer[] = [];

    for (const paragraph of childElements(body, "w:p")) {
      pending.push({ element: paragraph, part: mainPart, location: { source: "body" } });
    }
    childElements(body, "w:tbl").forEach((table, tableIndex) => {
      for (const { paragraph, row, cell } of tableCellParagraphs(table)) {
        pending.push({
          element: paragraph,
          part: mainPart,
          location: { source: "table", table: tableIndex, row, cell }
        });
      }
    });

    const relationships = await readRelationships(zip);
    const visited = new Set<string>();
    for (const sectionProps of sectionProperties(body)) {
      for (const { tag, variant } of SECTION_PARTS) {
        const reference = childElements(sectionProps, tag).find(
          (item) => (item.getAttribute("w:type") || "default") === variant
        );
        const target = reference ? relationships.get(reference.getAttribute("r:id") || "") : undefined;
        if (!target || visited.has(target)) {
          continue;
        }
        visited.add(target);

        const file = zip.file(target);
        if (!file) {
          continue;
        }
        const part = new DocxPart(target, parseXml(await file.async("text"), target));
        parts.push(part);
        const partRoot = part.xml.documentElement;
        if (!partRoot) {
          continue;
        }

        const source = tag === "w:headerReference" ? "header" : "footer";
        for (const paragraph of childElements(partRoot, "w:p")) {
          pending.push({ element: paragraph, part, location: { source, partPath: target, variant } });
        }
        childElements(partRoot, "w:tbl").forEach((table, tableIndex) => {
          for (const { paragraph, row, cell } of tableCellParagraphs(table)) {
            pending.push({
              element: paragraph,
              part,
              location: { source, partPath: target, variant, table: { table: tableIndex, row, cell } }
            });
          }
        });
      }
    }

    return new DocxDocument(zip, parts, pending);
  }

  static async open(filePath: string): Promise<DocxDocument> {
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (error) {
      throw new DocumentError(
        `Cannot open ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        "Could not read the document. Please send it again."
      );
    }
    return DocxDocument.load(data);
  }

  get changed(): boolean {
    return this.parts.some((part) => part.dirty);
  }

  /** Readable text for fix generation: body, table rows, then headers and footers. */
  fullText(): string {
    const lines: string[] = [];
    let currentRow: { key: string; cells: Map<number, string[]> } | null = null;

    const flushRow = () => {
      if (!currentRow) {
        return;
      }
      const cells = Array.from(currentRow.cells.entries())
        .sort(([left], [right]) => left - right)
        .map(([, paragraphs]) => paragraphs.join("\n").trim())
        .filter((cell) => cell.length > 0);
      if (cells.length > 0) {
        lines.push(cells.join(" | "));
      }
      currentRow = null;
    };

    for (const container of this.containers) {
      const location = container.location;
      if (location.source === "table") {
        const key = `${location.table}:${location.row}`;
        if (!currentRow || currentRow.key !== key) {
          flushRow();
          currentRow = { key, cells: new Map() };
        }
        const cell = currentRow.cells.get(location.cell) || [];
        cell.push(container.text);
        currentRow.cells.set(location.cell, cell);
        continue;
      }

      flushRow();
      const text = container.text;
      if (!text.trim()) {
        continue;
      }
      if (location.source === "body") {
        lines.push(text);
      } else {
        lines.push(`[${location.source.toUpperCase()}] ${text}`);
      }
    }
    flushRow();

    return lines.join("\n");
  }

  async toBuffer(): Promise<Buffer> {
    const serializer = new XMLSerializer();
    for (const part of this.parts) {
      if (part.dirty) {
        this.zip.file(part.path, serializer.serializeToString(part.xml));
      }
    }
    return this.zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE"
    });
  }

  async save(filePath: string): Promise<void> {
    await fs.writeFile(filePath, await this.toBuffer());
  }
}

async function readRelationships(zip: JSZip): Promise<Map<string, string>> {
  const targets = new Map<string, string>();
  const file = zip.file(MAIN_RELS_PATH);
  if (!file) {
    return targets;
  }
  const xml = parseXml(await file.async("text"), MAIN_RELS_PATH);
  const relationships = xml.getElementsByTagName("Relationship");
  for (let i = 0; i < relationships.length; i += 1) {
    const relationship = relationships.item(i);
    const id = relationship?.getAttribute("Id");
    const target = relationship?.getAttribute("Target");
    if (id && target && relationship?.getAttribute("TargetMode") !== "External") {
      targets.set(id, resolveRelationshipTarget(target));
    }
  }
  return targets;
}

function sectionProperties(body: Element): Element[] {
  const sections: Element[] = [];
  for (const paragraph of childElements(body, "w:p")) {
    const props = firstChildElement(paragraph, "w:pPr");
    const sectionProps = props ? firstChildElement(props, "w:sectPr") : undefined;
    if (sectionProps) {
      sections.push(sectionProps);
    }
  }
  const finalSection = firstChildElement(body, "w:sectPr");
  if (finalSection) {
    sections.push(finalSection);
  }
  return sections;
}
