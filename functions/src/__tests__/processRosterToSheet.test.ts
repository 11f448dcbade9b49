import type { Server } from "node:http";
import { Readable } from "node:stream";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import * as XLSX from "xlsx";
import type { RosterRecord } from "../../../core/types";
import { SHEET_NAME, exportRecordsToCsv } from "../../../src/services/document-engine";
import type { ProcessDocumentResult } from "../../../src/services/document-engine";
import { createApp } from "../app";
import { parseUploadFields, readMultipartUpload } from "../processRosterToSheet";
import type { DocumentProcessor } from "../processRosterToSheet";

const BOUNDARY = "----roster-test";

function multipartBody(parts: Array<{ name: string; value: string; filename?: string }>): Buffer {
  const chunks: string[] = [];
  for (const part of parts) {
    chunks.push(`--${BOUNDARY}\r\n`);
    if (part.filename) {
      chunks.push(`Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\n`);
      chunks.push("Content-Type: application/pdf\r\n\r\n");
    } else {
      chunks.push(`Content-Disposition: form-data; name="${part.name}"\r\n\r\n`);
    }
    chunks.push(`${part.value}\r\n`);
  }
  chunks.push(`--${BOUNDARY}--\r\n`);
  return Buffer.from(chunks.join(""), "utf8");
}

const headers = { "content-type": `multipart/form-data; boundary=${BOUNDARY}` };

describe("parseUploadFields", () => {
  test("no fields means default options and an xlsx response", () => {
    expect(parseUploadFields({})).toEqual({ options: {}, format: "xlsx" });
  });

  test("maps the optional fields", () => {
    expect(
      parseUploadFields({ layout: "two", xThreshold: "300", forceOcr: "true", ocrDpi: "200", format: "CSV" })
    ).toEqual({
      options: { layout: "two", xThreshold: 300, forceOcr: true, ocrDpi: 200 },
      format: "csv",
    });
  });

  test("an empty layout field is ignored", () => {
    expect(parseUploadFields({ layout: "  " }).options).toEqual({});
  });

  test("invalid values are rejected", () => {
    expect(() => parseUploadFields({ layout: "three" })).toThrow(
      'parseUploadFields: layout must be auto, one or two, got "three"'
    );
    expect(() => parseUploadFields({ xThreshold: "" })).toThrow('parseUploadFields: xThreshold must be a number, got ""');
    expect(() => parseUploadFields({ forceOcr: "yes" })).toThrow(
      'parseUploadFields: forceOcr must be true or false, got "yes"'
    );
    expect(() => parseUploadFields({ format: "pdf" })).toThrow('parseUploadFields: format must be csv or xlsx, got "pdf"');
    expect(() => parseUploadFields({ ocrDpi: "-5" })).toThrow(
      "resolveExtractionOptions: ocrDpi must be a positive number, got -5"
    );
  });
});

describe("readMultipartUpload", () => {
  test("collects the file part and the text fields", async () => {
    const body = multipartBody([
      { name: "layout", value: "two" },
      { name: "file", value: "%PDF-test", filename: "roster.pdf" },
      { name: "format", value: "csv" },
    ]);

    const upload = await readMultipartUpload(Readable.from(body), headers);

    expect(upload.file?.toString("utf8")).toBe("%PDF-test");
    expect(upload.fields).toEqual({ layout: "two", format: "csv" });
  });

  test("a form without a file part yields no file", async () => {
    const upload = await readMultipartUpload(Readable.from(multipartBody([{ name: "layout", value: "one" }])), headers);

    expect(upload.file).toBeNull();
    expect(upload.fields).toEqual({ layout: "one" });
  });

  test("files under another field name are ignored", async () => {
    const body = multipartBody([{ name: "attachment", value: "%PDF-other", filename: "other.pdf" }]);
    const upload = await readMultipartUpload(Readable.from(body), headers);
    expect(upload.file).toBeNull();
  });

  test("a file over the size limit is rejected", async () => {
    const body = multipartBody([{ name: "file", value: "%PDF-too-large", filename: "big.pdf" }]);
    await expect(readMultipartUpload(Readable.from(body), headers, 4)).rejects.toThrow(
      "readMultipartUpload: uploaded file is too large"
    );
  });
});

describe("createApp", () => {
  const records: RosterRecord[] = [
    { Delegation: "KENYA", Honorific: "Ms.", PersonName: "Wanjiru Kamau", Affiliation: "Forest Service" },
  ];

  const processor = vi.fn<DocumentProcessor>();
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    server = createApp(processor).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(() => {
    processor.mockReset();
    processor.mockResolvedValue({
      records,
      mode: "two",
      source: "text-layer",
      pageCount: 1,
      emptyPages: [],
      failedPages: [],
    } satisfies ProcessDocumentResult);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function postForm(parts: Array<{ name: string; value: string; filename?: string }>): Promise<Response> {
    return fetch(`${baseUrl}/process-roster`, { method: "POST", headers, body: multipartBody(parts) });
  }

  test("GET /health answers ok", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  test("other methods get 405", async () => {
    const res = await fetch(`${baseUrl}/process-roster`);
    expect(res.status).toBe(405);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe("Method Not Allowed");
  });

  test("a body that is not multipart gets 400", async () => {
    const res = await fetch(`${baseUrl}/process-roster`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{}",
    });
    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Invalid content type. Expected multipart/form-data");
    expect(processor).not.toHaveBeenCalled();
  });

  test("a form without a file gets 400", async () => {
    const res = await postForm([{ name: "layout", value: "two" }]);
    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Missing PDF file");
    expect(processor).not.toHaveBeenCalled();
  });

  test("an invalid field gets 400 with the reason", async () => {
    const res = await postForm([
      { name: "file", value: "%PDF-test", filename: "roster.pdf" },
      { name: "layout", value: "three" },
    ]);
    expect(res.status).toBe(400);
    expect(await res.text()).toBe('parseUploadFields: layout must be auto, one or two, got "three"');
    expect(processor).not.toHaveBeenCalled();
  });

  test("a processing failure gets 500 with the error message", async () => {
    processor.mockRejectedValue(new Error("processDocument: pdfBuffer is empty"));

    const res = await postForm([{ name: "file", value: "%PDF-test", filename: "roster.pdf" }]);

    expect(res.status).toBe(500);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe("processDocument: pdfBuffer is empty");
  });

  test("a csv request returns the roster as a csv attachment", async () => {
    const res = await postForm([
      { name: "file", value: "%PDF-test", filename: "roster.pdf" },
      { name: "format", value: "csv" },
      { name: "layout", value: "two" },
    ]);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="roster.csv"');
    expect(Buffer.from(await res.arrayBuffer()).toString("utf8")).toBe(exportRecordsToCsv(records));

    expect(processor).toHaveBeenCalledTimes(1);
    const [pdfBuffer, options] = processor.mock.calls[0];
    expect(Buffer.from(pdfBuffer).toString("utf8")).toBe("%PDF-test");
    expect(options).toEqual({ layout: "two" });
  });

  test("the default response is an xlsx workbook", async () => {
    const res = await postForm([{ name: "file", value: "%PDF-test", filename: "roster.pdf" }]);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="roster.xlsx"');

    const workbook = XLSX.read(Buffer.from(await res.arrayBuffer()), { type: "buffer" });
    expect(XLSX.utils.sheet_to_json<string[]>(workbook.Sheets[SHEET_NAME], { header: 1 })).toEqual([
      ["Delegation", "Honorific", "PersonName", "Affiliation"],
      ["KENYA", "Ms.", "Wanjiru Kamau", "Forest Service"],
    ]);
  });
});
