import busboy from "busboy";
import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";
import type { Request, Response } from "express";

import { isLayoutOption, resolveExtractionOptions } from "../../src/config";
import type { ExtractionOptions } from "../../src/config";
import { processDocument, serializeRecords } from "../../src/services/document-engine";
import type { ProcessDocumentResult } from "../../src/services/document-engine";

/**
 * HTTP handler:
 *   POST /process-roster
 *
 * Request:
 * - multipart/form-data
 *   - field "file"       : PDF file
 *   - field "layout"     : auto | one | two            (optional)
 *   - field "xThreshold" : number, PDF points          (optional)
 *   - field "forceOcr"   : true | false                (optional)
 *   - field "ocrDpi"     : number                      (optional)
 *   - field "format"     : csv | xlsx, default xlsx    (optional)
 *
 * Response (success):
 * - 200, the roster as an attachment (roster.xlsx or roster.csv)
 *
 * Response (error), body is text/plain:
 * - 405: not a POST
 * - 400: not multipart / no file / invalid field
 * - 500: the document could not be processed
 */

export type UploadFormat = "csv" | "xlsx";

export interface MultipartUpload {
  file: Buffer | null;
  fields: Record<string, string>;
}

export interface UploadRequest {
  options: Partial<ExtractionOptions>;
  format: UploadFormat;
}

export type DocumentProcessor = (
  pdfBuffer: Uint8Array,
  options: Partial<ExtractionOptions>
) => Promise<ProcessDocumentResult>;

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const CONTENT_TYPES: Record<UploadFormat, string> = {
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  csv: "text/csv; charset=utf-8",
};

function parseNumberField(name: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`parseUploadFields: ${name} must be a number, got "${value}"`);
  }
  return n;
}

function parseBooleanField(name: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  throw new Error(`parseUploadFields: ${name} must be true or false, got "${value}"`);
}

/**
 * Maps the optional form fields onto extraction options.
 * Throws on any invalid value (the handler answers 400).
 */
export function parseUploadFields(fields: Record<string, string>): UploadRequest {
  const options: Partial<ExtractionOptions> = {};

  const layout = fields.layout?.trim();
  if (layout) {
    if (!isLayoutOption(layout)) {
      throw new Error(`parseUploadFields: layout must be auto, one or two, got "${layout}"`);
    }
    options.layout = layout;
  }
  if (fields.xThreshold !== undefined) {
    options.xThreshold = parseNumberField("xThreshold", fields.xThreshold);
  }
  if (fields.forceOcr !== undefined) {
    options.forceOcr = parseBooleanField("forceOcr", fields.forceOcr);
  }
  if (fields.ocrDpi !== undefined) {
    options.ocrDpi = parseNumberField("ocrDpi", fields.ocrDpi);
  }

  let format: UploadFormat = "xlsx";
  const requested = fields.format?.trim().toLowerCase();
  if (requested) {
    if (requested !== "csv" && requested !== "xlsx") {
      throw new Error(`parseUploadFields: format must be csv or xlsx, got "${requested}"`);
    }
    format = requested;
  }

  // Surface option errors as bad input rather than processing failures
  resolveExtractionOptions(options);
  return { options, format };
}

/** Reads one multipart/form-data body; the first "file" part is the PDF. */
export function readMultipartUpload(
  body: Readable,
  headers: IncomingHttpHeaders,
  maxFileBytes: number = MAX_UPLOAD_BYTES
): Promise<MultipartUpload> {
  return new Promise<MultipartUpload>((resolve, reject) => {
    const parser = busboy({ headers, limits: { fileSize: maxFileBytes, files: 1 } });
    const fileChunks: Buffer[] = [];
    const fields: Record<string, string> = {};

    parser.on("file", (name, file) => {
      if (name !== "file") {
        file.resume();
        return;
      }
      file.on("data", (data: Buffer) => {
        fileChunks.push(data);
      });
      file.on("limit", () => {
        reject(new Error("readMultipartUpload: uploaded file is too large"));
      });
    });

    parser.on("field", (name, value) => {
      fields[name] = value;
    });

    parser.on("error", (err) => {
      reject(err);
    });

    parser.on("close", () => {
      resolve({ file: fileChunks.length > 0 ? Buffer.concat(fileChunks) : null, fields });
    });

    body.pipe(parser);
  });
}

function sendText(res: Response, status: number, message: string): void {
  res.status(status).set("Content-Type", "text/plain; charset=utf-8").send(message);
}

export function createProcessRosterHandler(
  processor: DocumentProcessor = processDocument
): (req: Request, res: Response) => Promise<void> {
  return async (req, res) => {
    // 1) POST only
    if (req.method !== "POST") {
      sendText(res, 405, "Method Not Allowed");
      return;
    }

    // 2) multipart/form-data only
    const contentType = req.headers["content-type"] || "";
    if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
      sendText(res, 400, "Invalid content type. Expected multipart/form-data");
      return;
    }

    let upload: MultipartUpload;
    try {
      upload = await readMultipartUpload(req, req.headers);
    } catch (err) {
      console.error("[processRosterToSheet] Failed to parse multipart form:", err);
      sendText(res, 400, "Invalid multipart/form-data request");
      return;
    }

    // 3) file + fields
    if (!upload.file || upload.file.length === 0) {
      sendText(res, 400, "Missing PDF file");
      return;
    }

    let request: UploadRequest;
    try {
      request = parseUploadFields(upload.fields);
    } catch (err) {
      console.error("[processRosterToSheet] Invalid form fields:", err);
      sendText(res, 400, err instanceof Error ? err.message : "Invalid form fields");
      return;
    }

    // 4) PDF → records → file
    let body: Buffer;
    try {
      console.log("[processRosterToSheet] Calling processDocument...", {
        bytes: upload.file.length,
        format: request.format,
      });
      const result = await processor(upload.file, request.options);
      body = serializeRecords(result.records, request.format);
      console.log("[processRosterToSheet] processDocument completed.", {
        records: result.records.length,
        source: result.source,
        mode: result.mode,
      });
    } catch (err) {
      console.error("[processRosterToSheet] processDocument failed:", err);
      sendText(res, 500, err instanceof Error && err.message ? err.message : "Internal Server Error");
      return;
    }

    // 5) attachment
    res.status(200);
    res.setHeader("Content-Type", CONTENT_TYPES[request.format]);
    res.setHeader("Content-Disposition", `attachment; filename="roster.${request.format}"`);
    res.setHeader("Content-Length", body.length.toString());
    res.end(body);
  };
}

export const processRosterToSheet = createProcessRosterHandler();
