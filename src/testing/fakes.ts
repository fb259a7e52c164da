import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ImageEncoder } from "../archive";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { Rasterizer } from "../convert";
import { PageImage } from "../types";

export const TEST_BOUNDARY = "----formboundary7MA4YWxkTrZu0gW";

/** A tiny PDF-looking document; `/Count` drives how many pages the fake renderer returns. */
export function samplePdf(label: string, pageCount = 1): Buffer {
  return Buffer.from(`%PDF-1.4\n% ${label}\n<< /Type /Pages /Count ${pageCount} >>\ntrailer\n<< /Root 1 0 R >>\n%%EOF`, "latin1");
}

export function wrapBase64(bytes: Buffer, width = 76): string {
  const encoded = bytes.toString("base64");
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += width) {
    lines.push(encoded.slice(i, i + width));
  }
  return lines.join("\r\n");
}

export interface MultipartPart {
  name: string;
  filename?: string;
  contentType?: string;
  body: string | Buffer;
}

export function buildMultipart(parts: MultipartPart[], boundary = TEST_BOUNDARY): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"`
      : `Content-Disposition: form-data; name="${part.name}"`;
    const headers = [`--${boundary}`, disposition];
    if (part.contentType) {
      headers.push(`Content-Type: ${part.contentType}`);
    }
    chunks.push(Buffer.from(`${headers.join("\r\n")}\r\n\r\n`, "latin1"));
    chunks.push(typeof part.body === "string" ? Buffer.from(part.body, "latin1") : part.body);
    chunks.push(Buffer.from("\r\n", "latin1"));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`, "latin1"));
  return Buffer.concat(chunks);
}

export interface RasterizeCall {
  filePath: string;
  dpi: number;
  label: string;
}

/** Reads the written PDF back and returns one `png:<label>:<n>` page per `/Count`. */
export class FakeRasterizer implements Rasterizer {
  readonly calls: RasterizeCall[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly behaviour: {
      failWhen?: (label: string) => boolean;
      hangWhen?: (label: string) => boolean;
      delayMs?: number;
    } = {},
  ) {}

  async rasterize(filePath: string, dpi: number): Promise<PageImage[]> {
    const text = (await fs.promises.readFile(filePath)).toString("latin1");
    if (!text.startsWith("%PDF")) {
      throw new Error(`not a PDF: ${filePath}`);
    }
    const label = /^% (.+)$/m.exec(text)?.[1] ?? "unlabelled";
    const count = Number.parseInt(/\/Count (\d+)/.exec(text)?.[1] ?? "1", 10);
    this.calls.push({ filePath, dpi, label });

    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.behaviour.hangWhen?.(label)) {
        await new Promise<never>(() => undefined);
      }
      if (this.behaviour.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, this.behaviour.delayMs));
      }
      if (this.behaviour.failWhen?.(label)) {
        throw new Error(`cannot render ${label}`);
      }
      return Array.from({ length: count }, (_, index) => ({
        pageNumber: index + 1,
        data: Buffer.from(`png:${label}:${index + 1}`),
        format: "png" as const,
      }));
    } finally {
      this.inFlight -= 1;
    }
  }
}

/** Stands in for JPEG encoding: `jpeg:<png payload>@<quality>`. */
export class FakeEncoder implements ImageEncoder {
  async toJpeg(page: PageImage, quality: number): Promise<Buffer> {
    return Buffer.from(`jpeg:${page.data.toString()}@${quality}`);
  }
}

export async function makeTempDir(prefix = "pdf-jpeg-test"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export function testConfig(workDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...DEFAULT_CONFIG, workDir, logLevel: "silent", ...overrides };
}
