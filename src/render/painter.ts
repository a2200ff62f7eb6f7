import PDFDocument from "pdfkit";
import type { PdfFontFamily } from "../constants.js";
import type { Typography } from "./typography.js";

export interface TextStyle {
  bold: boolean;
  size: number;
}

/** Page-painting primitives the layout pass drives. Coordinates are points from the top-left. */
export interface PagePainter {
  widthOfText(text: string, style: TextStyle): number;
  drawText(text: string, x: number, y: number, style: TextStyle): void;
  drawLine(x1: number, x2: number, y: number): void;
  drawImage(data: Buffer, x: number, y: number, width: number, height: number): void;
  addPage(): void;
}

const FONT_FACES: Record<PdfFontFamily, { regular: string; bold: string }> = {
  Helvetica: { regular: "Helvetica", bold: "Helvetica-Bold" },
  Times: { regular: "Times-Roman", bold: "Times-Bold" },
  Courier: { regular: "Courier", bold: "Courier-Bold" },
};

const TEXT_COLOR = "#333333";
const RULE_COLOR = "#cccccc";

export class PdfKitPainter implements PagePainter {
  private readonly doc: PDFKit.PDFDocument;
  private readonly faces: { regular: string; bold: string };
  private readonly output: Promise<Buffer>;

  constructor(typography: Typography, info: { title?: string } = {}) {
    this.faces = FONT_FACES[typography.family];
    this.doc = new PDFDocument({
      size: [typography.page.width, typography.page.height],
      margin: 0,
      info: info.title ? { Title: info.title } : undefined,
    });

    const chunks: Buffer[] = [];
    this.output = new Promise<Buffer>((resolve, reject) => {
      this.doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      this.doc.on("end", () => resolve(Buffer.concat(chunks)));
      this.doc.on("error", reject);
    });
    this.doc.fillColor(TEXT_COLOR);
  }

  private use(style: TextStyle): PDFKit.PDFDocument {
    return this.doc.font(style.bold ? this.faces.bold : this.faces.regular).fontSize(style.size);
  }

  widthOfText(text: string, style: TextStyle): number {
    return this.use(style).widthOfString(text);
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.use(style).text(text, x, y, { lineBreak: false });
  }

  drawLine(x1: number, x2: number, y: number): void {
    this.doc.save().moveTo(x1, y).lineTo(x2, y).lineWidth(0.5).strokeColor(RULE_COLOR).stroke().restore();
  }

  drawImage(data: Buffer, x: number, y: number, width: number, height: number): void {
    this.doc.image(data, x, y, { width, height });
  }

  addPage(): void {
    this.doc.addPage();
  }

  /** Close the document and collect its bytes. */
  finish(): Promise<Buffer> {
    this.doc.end();
    return this.output;
  }
}
