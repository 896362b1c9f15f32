import PDFDocument from "pdfkit";
import type { ReportDocument, ReportTable } from "./report-document";

export interface DocumentRenderer {
  /** Complete file bytes of the rendered document. */
  render(content: ReportDocument): Promise<Buffer>;
}

type Pdf = PDFKit.PDFDocument;

const PRIMARY = "#1e3a8a";
const TEXT = "#111827";
const MUTED = "#4b5563";
const CHART_HEIGHT = 300;
const FOOTER_SPACE = 30;

/**
 * A4 layout: title block, executive summary, quote table, one chart per
 * block, detailed analysis, data-quality notes and a numbered page footer.
 */
export class PdfDocumentRenderer implements DocumentRenderer {
  public async render(content: ReportDocument): Promise<Buffer> {
    const doc = new PDFDocument({
      size: "A4",
      margin: 50,
      bufferPages: true,
      info: { Title: content.title, Author: content.author },
    });

    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);
    });

    doc.font("Helvetica-Bold").fontSize(20).fillColor(PRIMARY);
    doc.text(content.title, { align: "center" });
    doc.moveDown(0.3);
    doc.font("Helvetica").fontSize(10).fillColor(MUTED);
    doc.text(content.subtitle, { align: "center" });
    doc.moveDown(1.5);

    this.heading(doc, "Resumen Ejecutivo");
    this.paragraph(doc, content.summary);

    this.heading(doc, "Datos de Cotizaciones");
    this.table(doc, content.table);
    doc.moveDown(1);

    for (const chart of content.charts) {
      this.ensureSpace(doc, CHART_HEIGHT + 60);
      this.heading(doc, chart.title);
      this.paragraph(doc, chart.description);
      const width = this.contentWidth(doc);
      const top = doc.y;
      doc.image(chart.image, doc.page.margins.left, top, {
        fit: [width, CHART_HEIGHT],
        align: "center",
      });
      doc.x = doc.page.margins.left;
      doc.y = top + CHART_HEIGHT + 12;
    }

    if (content.sections.length > 0) {
      this.heading(doc, "Análisis Detallado");
      for (const section of content.sections) {
        this.ensureSpace(doc, 60);
        doc.font("Helvetica-Bold").fontSize(12).fillColor(TEXT);
        doc.text(section.heading);
        doc.moveDown(0.3);
        this.paragraph(doc, section.body);
      }
    }

    if (content.notes.length > 0) {
      this.heading(doc, "Observaciones de Calidad de Datos");
      doc.font("Helvetica").fontSize(10).fillColor(TEXT);
      doc.list(content.notes);
      doc.moveDown(1);
    }

    doc.moveDown(1);
    doc.font("Helvetica-Oblique").fontSize(9).fillColor(MUTED);
    for (const line of content.footer) {
      doc.text(line);
    }

    this.numberPages(doc);
    doc.end();
    return done;
  }

  private contentWidth(doc: Pdf): number {
    return doc.page.width - doc.page.margins.left - doc.page.margins.right;
  }

  private ensureSpace(doc: Pdf, needed: number) {
    const bottom = doc.page.height - doc.page.margins.bottom - FOOTER_SPACE;
    if (doc.y + needed > bottom) {
      doc.addPage();
    }
  }

  private heading(doc: Pdf, text: string) {
    this.ensureSpace(doc, 40);
    doc.font("Helvetica-Bold").fontSize(14).fillColor(PRIMARY);
    doc.text(text, doc.page.margins.left);
    doc.moveDown(0.4);
  }

  private paragraph(doc: Pdf, text: string) {
    doc.font("Helvetica").fontSize(10.5).fillColor(TEXT);
    doc.text(text, { align: "justify" });
    doc.moveDown(1);
  }

  private table(doc: Pdf, table: ReportTable) {
    const left = doc.page.margins.left;
    const width = this.contentWidth(doc);
    const weights = [2.4, 1.3, 1.3, 1.1, 1.1, 1.8];
    const totalWeight = weights.reduce((sum, w) => sum + w, 0);
    const columns = table.headers.map(
      (_, i) => ((weights[i] ?? 1) / totalWeight) * width
    );

    const drawRow = (cells: string[], index: number) => {
      const isHeader = index < 0;
      doc.font(isHeader ? "Helvetica-Bold" : "Helvetica").fontSize(9);
      const rowHeight =
        Math.max(...cells.map((cell, i) => doc.heightOfString(cell, { width: columns[i] - 8 }))) + 10;
      this.ensureSpace(doc, rowHeight);

      const top = doc.y;
      const fill = isHeader ? "#6b7280" : index % 2 === 0 ? "#ffffff" : "#f5f5dc";
      doc.rect(left, top, width, rowHeight).fill(fill);

      doc.fillColor(isHeader ? "#ffffff" : TEXT);
      let x = left;
      cells.forEach((cell, i) => {
        doc.text(cell, x + 4, top + 5, {
          width: columns[i] - 8,
          align: i === 0 ? "left" : "center",
        });
        x += columns[i];
      });

      doc.rect(left, top, width, rowHeight).lineWidth(0.5).strokeColor("#9ca3af").stroke();
      doc.x = left;
      doc.y = top + rowHeight;
    };

    drawRow(table.headers, -1);
    table.rows.forEach((row, i) => drawRow(row, i));
  }

  private numberPages(doc: Pdf) {
    const range = doc.bufferedPageRange();
    for (let i = range.start; i < range.start + range.count; i++) {
      doc.switchToPage(i);
      // Writing inside the bottom margin would otherwise open a new page
      const bottomMargin = doc.page.margins.bottom;
      doc.page.margins.bottom = 0;
      doc.font("Helvetica").fontSize(8).fillColor(MUTED);
      doc.text(
        `Página ${i - range.start + 1} de ${range.count}`,
        doc.page.margins.left,
        doc.page.height - 35,
        { width: this.contentWidth(doc), align: "center", lineBreak: false }
      );
      doc.page.margins.bottom = bottomMargin;
    }
  }
}
