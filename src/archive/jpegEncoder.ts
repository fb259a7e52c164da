import { createCanvas, loadImage } from "@napi-rs/canvas";
import { PageImage } from "../types";

export interface ImageEncoder {
  toJpeg(page: PageImage, quality: number): Promise<Buffer>;
}

export class CanvasJpegEncoder implements ImageEncoder {
  async toJpeg(page: PageImage, quality: number): Promise<Buffer> {
    const image = await loadImage(page.data);
    const canvas = createCanvas(image.width, image.height);
    const context = canvas.getContext("2d");
    // JPEG has no alpha channel; transparent regions render white as on paper.
    context.fillStyle = "#ffffff";
    context.fillRect(0, 0, image.width, image.height);
    context.drawImage(image, 0, 0);
    return canvas.encode("jpeg", quality);
  }
}
