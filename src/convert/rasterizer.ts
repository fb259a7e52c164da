import fs from "node:fs";
import { PDFParse } from "pdf-parse";
import { PageImage } from "../types";

/** Renders every page of the PDF at `filePath` to an image, in page order. */
export interface Rasterizer {
  rasterize(filePath: string, dpi: number): Promise<PageImage[]>;
}

const PDF_POINTS_PER_INCH = 72;

interface ScreenshotParams {
  scale: number;
  imageBuffer: boolean;
  imageDataUrl: boolean;
}

interface ParserLike {
  getScreenshot(params: ScreenshotParams): Promise<{
    total: number;
    pages: Array<{
      pageNumber: number;
      data: Uint8Array;
      width: number;
      height: number;
    }>;
  }>;
  destroy(): Promise<void>;
}

interface PdfParseRasterizerDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export class PdfParseRasterizer implements Rasterizer {
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: PdfParseRasterizerDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps?.readFile ?? ((filePath) => fs.promises.readFile(filePath));
  }

  async rasterize(filePath: string, dpi: number): Promise<PageImage[]> {
    const pdfBuffer = await this.readFile(filePath);
    const parser = this.parserFactory(pdfBuffer);

    let screenshots;
    try {
      screenshots = await parser.getScreenshot({
        scale: dpi / PDF_POINTS_PER_INCH,
        imageBuffer: true,
        imageDataUrl: false,
      });
    } finally {
      await parser.destroy().catch(() => undefined);
    }

    if (screenshots.pages.length === 0) {
      throw new Error(`Renderer returned no pages (document reports ${screenshots.total})`);
    }

    return [...screenshots.pages]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map((page, index): PageImage => ({
        pageNumber: index + 1,
        data: Buffer.from(page.data.buffer, page.data.byteOffset, page.data.byteLength),
        format: "png",
        width: page.width,
        height: page.height,
      }));
  }
}
