import PDFDocument from "pdfkit"

import { asciiSafe } from "@/lib/normalizers"

const SECTION_HEADING = /^[A-Z][A-Z0-9 &/,-]{2,}$/

const contentWidth = (doc: PDFKit.PDFDocument) => doc.page.width - doc.page.margins.left - doc.page.margins.right

const renderSectionTitle = (doc: PDFKit.PDFDocument, title: string) => {
  doc.moveDown(0.9)
  doc.font("Helvetica-Bold").fontSize(11).text(title.toUpperCase())
  doc.font("Helvetica")
  doc.moveDown(0.15)
}

const renderLine = (doc: PDFKit.PDFDocument, text: string) => {
  doc.fontSize(10).text(text, { width: contentWidth(doc), lineGap: 2 })
}

export const isSectionHeading = (line: string) => SECTION_HEADING.test(line.trim())

// Lines written entirely in capitals become section headings.
export const renderTextPdf = async (title: string, body: string): Promise<Buffer> => {
  const doc = new PDFDocument({ size: "A4", margin: 50, info: { Title: asciiSafe(title) } })
  const chunks: Buffer[] = []

  doc.on("data", (chunk: Buffer) => chunks.push(chunk))

  const completion = new Promise<Buffer>((resolve, reject) => {
    doc.on("end", () => resolve(Buffer.concat(chunks)))
    doc.on("error", reject)
  })

  doc.fillColor("#111827").font("Helvetica")

  body.split(/\r?\n/).forEach((rawLine) => {
    const line = asciiSafe(rawLine)
    if (!line) {
      doc.moveDown(0.5)
    } else if (isSectionHeading(line)) {
      renderSectionTitle(doc, line)
    } else {
      renderLine(doc, line)
    }
  })

  doc.end()
  return completion
}
