import { PDFDocument } from "pdf-lib";
import { AppError, errorMessage } from "../errors";

/** Image→PDF and PDF merge capabilities the worker calls into. */
export interface PdfEngine {
  imageToPdf(image: Buffer): Promise<Buffer>;
  /** Concatenate the pages of `sources` in the order given. */
  merge(sources: Buffer[]): Promise<Buffer>;
}

export type ImageFormat = "png" | "jpeg";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(data: Buffer, signature: number[]) {
  return data.length >= signature.length && signature.every((byte, i) => data[i] === byte);
}

export function detectImageFormat(data: Buffer): ImageFormat | null {
  if (startsWith(data, PNG_SIGNATURE)) return "png";
  if (startsWith(data, JPEG_SIGNATURE)) return "jpeg";
  return null;
}

const conversionFailure = (message: string, cause?: unknown) =>
  new AppError({ code: "CONVERSION_FAILURE", message, cause });

const mergeFailure = (message: string, cause?: unknown) => new AppError({ code: "MERGE_FAILURE", message, cause });

/**
 * pdf-lib backed engine. Documents are written without producer/date
 * metadata so the same input always yields the same bytes.
 */
export class PdfLibEngine implements PdfEngine {
  async imageToPdf(image: Buffer): Promise<Buffer> {
    const format = detectImageFormat(image);
    if (!format) {
      throw conversionFailure("Failed to convert image to PDF: unsupported image format (expected PNG or JPEG)");
    }

    try {
      const doc = await PDFDocument.create({ updateMetadata: false });
      const embedded = format === "png" ? await doc.embedPng(image) : await doc.embedJpg(image);
      const page = doc.addPage([embedded.width, embedded.height]);
      page.drawImage(embedded, { x: 0, y: 0, width: embedded.width, height: embedded.height });
      return Buffer.from(await doc.save());
    } catch (err) {
      throw conversionFailure(`Failed to convert image to PDF: ${errorMessage(err)}`, err);
    }
  }

  async merge(sources: Buffer[]): Promise<Buffer> {
    if (sources.length === 0) {
      throw mergeFailure("No files provided to merge");
    }

    const merged = await PDFDocument.create({ updateMetadata: false });

    for (const [index, source] of sources.entries()) {
      let doc: PDFDocument;
      try {
        doc = await PDFDocument.load(source, { updateMetadata: false });
      } catch (err) {
        throw mergeFailure(`Input ${index + 1} is not a valid PDF: ${errorMessage(err)}`, err);
      }

      // a document can parse yet still have no usable page tree
      try {
        const pages = await merged.copyPages(doc, doc.getPageIndices());
        pages.forEach((page) => merged.addPage(page));
      } catch (err) {
        throw mergeFailure(`Input ${index + 1} could not be read: ${errorMessage(err)}`, err);
      }
    }

    try {
      return Buffer.from(await merged.save());
    } catch (err) {
      throw mergeFailure(`Failed to merge PDFs: ${errorMessage(err)}`, err);
    }
  }
}
