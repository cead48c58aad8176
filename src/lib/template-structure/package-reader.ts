import { readFile } from "fs/promises";
import JSZip from "jszip";
import { PackageError, PartMissingError } from "./errors";
import { parseXml } from "./xml";

export const DOCUMENT_PART_PATH = "word/document.xml";

// OLE2 compound file signature (legacy .doc)
const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0];

/**
 * Read access to the parts of an opened .docx archive.
 * Each instance owns its own JSZip handle; nothing is shared between calls.
 */
export class DocxPackage {
  private constructor(
    private readonly zip: JSZip,
    readonly source: string
  ) {}

  /**
   * Open a package from a filesystem path or from its bytes.
   * `label` names a Buffer source in error messages.
   */
  static async open(
    input: string | Buffer,
    label = "<buffer>"
  ): Promise<DocxPackage> {
    const source = typeof input === "string" ? input : label;
    const buffer = typeof input === "string" ? await readSource(input) : input;

    if (isLegacyDoc(buffer)) {
      throw new PackageError(
        "Legacy .doc files are not supported; convert to .docx first",
        source
      );
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (err) {
      throw new PackageError("Not a valid zip archive", source, { cause: err });
    }

    const pkg = new DocxPackage(zip, source);
    if (!pkg.hasPart(DOCUMENT_PART_PATH)) {
      throw new PackageError(`Missing ${DOCUMENT_PART_PATH}`, source);
    }
    return pkg;
  }

  listParts(): string[] {
    return Object.values(this.zip.files)
      .filter((entry) => !entry.dir)
      .map((entry) => entry.name)
      .sort();
  }

  hasPart(partPath: string): boolean {
    const entry = this.zip.files[partPath];
    return Boolean(entry && !entry.dir);
  }

  async readPart(partPath: string): Promise<Uint8Array> {
    return this.entry(partPath).async("uint8array");
  }

  async readText(partPath: string): Promise<string> {
    return this.entry(partPath).async("string");
  }

  async readXml(partPath: string): Promise<Document> {
    return parseXml(await this.readText(partPath));
  }

  /** The main body part, parsed. Malformed body XML is fatal. */
  async readDocumentXml(): Promise<{ xml: string; doc: Document }> {
    const xml = await this.readText(DOCUMENT_PART_PATH);
    try {
      return { xml, doc: parseXml(xml) };
    } catch (err) {
      throw new PackageError(
        `Malformed ${DOCUMENT_PART_PATH}`,
        this.source,
        { cause: err }
      );
    }
  }

  private entry(partPath: string): JSZip.JSZipObject {
    const entry = this.zip.files[partPath];
    if (!entry || entry.dir) throw new PartMissingError(partPath);
    return entry;
  }
}

async function readSource(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new PackageError("Cannot read document", filePath, { cause: err });
  }
}

function isLegacyDoc(buffer: Buffer): boolean {
  return OLE_SIGNATURE.every((byte, i) => buffer[i] === byte);
}
