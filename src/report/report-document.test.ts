import { describe, expect, it } from "vitest";
import { sampleReport } from "../test/fixtures";
import { buildQuoteTable, buildReportDocument, truncateText } from "./report-document";

const OPTIONS = {
  title: "Reporte de prueba",
  company: "ACME Test",
  narrativeMaxChars: 1000,
  renderedAt: new Date(2026, 9, 19, 14, 30, 0),
};

describe("truncateText", () => {
  it("cuts at the limit and marks the cut", () => {
    expect(truncateText("abcdef ghij", 7)).toBe("abcdef...");
  });

  it("keeps short text and a zero limit untouched", () => {
    expect(truncateText("abc", 5)).toBe("abc");
    expect(truncateText("abcdef", 0)).toBe("abcdef");
  });
});

describe("buildQuoteTable", () => {
  it("shows prices, spread and gap per house", () => {
    const table = buildQuoteTable(sampleReport());

    expect(table.headers).toEqual(["Casa", "Compra", "Venta", "Spread", "Brecha", "Actualización"]);
    expect(table.rows).toEqual([
      ["Oficial", "$1,400.00", "$1,450.00", "$50.00", "Referencia", "2026-10-19 14:05"],
      ["Blue", "$1,420.00", "$1,440.00", "$20.00", "-0.69%", "2026-10-19 14:05"],
      ["Tarjeta", "$1,820.00", "$1,885.00", "$65.00", "+30.00%", "2026-10-19 14:05"],
    ]);
  });

  it("marks gaps as unavailable without a reference", () => {
    const report = sampleReport();
    report.reference = null;
    report.metrics.gaps = [];

    expect(buildQuoteTable(report).rows.map(row => row[4])).toEqual(["N/D", "N/D", "N/D"]);
  });
});

describe("buildReportDocument", () => {
  it("assembles title block, narrative and footer", () => {
    const doc = buildReportDocument(sampleReport(), [], OPTIONS);

    expect(doc.title).toBe("Reporte de prueba");
    expect(doc.subtitle).toBe(
      "Fecha: 19/10/2026 14:30 | Fuente: DolarAPI | Datos al 2026-10-19 14:06"
    );
    expect(doc.summary).toBe("Resumen del día.");
    expect(doc.sections.map(s => s.heading)).toEqual([
      "Análisis de Cotizaciones",
      "Análisis de Brechas Cambiarias",
      "Análisis de Spreads y Tendencias",
    ]);
    expect(doc.footer).toEqual([
      "Reporte generado automáticamente por ACME Test",
      "Modelo: test-model | Análisis: 2026-10-19 14:10",
    ]);
  });

  it("truncates long sections and drops empty ones", () => {
    const report = sampleReport();
    report.narrative.quotes = "x".repeat(50);
    report.narrative.gaps = "  ";
    report.narrative.executiveSummary = "";

    const doc = buildReportDocument(report, [], { ...OPTIONS, narrativeMaxChars: 10 });

    expect(doc.summary).toBe("No hay resumen disponible.");
    expect(doc.sections).toEqual([
      { heading: "Análisis de Cotizaciones", body: `${"x".repeat(10)}...` },
      { heading: "Análisis de Spreads y Tendencias", body: "Texto de s..." },
    ]);
  });

  it("lists data quality issues as notes", () => {
    const report = sampleReport();
    report.dataQuality = [
      { houseType: "blue", kind: "inverted-prices", message: "Blue: venta 1 menor que compra 2" },
    ];

    expect(buildReportDocument(report, [], OPTIONS).notes).toEqual([
      "Blue: venta 1 menor que compra 2",
    ]);
  });
});
