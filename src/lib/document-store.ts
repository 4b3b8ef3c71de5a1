import { constants as fsConstants } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"

import { renderTextPdf } from "./pdf"

export type StoredDocument = {
  title: string
  location: string
  bytes: number
}

export interface DocumentStore {
  createDocument(title: string, body: string): Promise<StoredDocument>
  /** Resolves true when documents can be written; rejects with the cause otherwise. */
  isAvailable(): Promise<boolean>
}

const safeFileName = (title: string) => title.replace(/[^a-zA-Z0-9_.-]+/g, "_").replace(/^_+|_+$/g, "") || "document"

export class PdfDocumentStore implements DocumentStore {
  constructor(private readonly outputDir: string) {}

  async createDocument(title: string, body: string): Promise<StoredDocument> {
    const pdf = await renderTextPdf(title, body)
    await fs.mkdir(this.outputDir, { recursive: true })
    const location = path.resolve(this.outputDir, `${safeFileName(title)}.pdf`)
    await fs.writeFile(location, pdf)
    return { title, location, bytes: pdf.length }
  }

  async isAvailable(): Promise<boolean> {
    await fs.mkdir(this.outputDir, { recursive: true })
    await fs.access(this.outputDir, fsConstants.W_OK)
    return true
  }
}

/**
 * Keeps documents in a map instead of writing files.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly documents = new Map<string, string>()

  async createDocument(title: string, body: string): Promise<StoredDocument> {
    this.documents.set(title, body)
    return { title, location: `memory://${title}`, bytes: Buffer.byteLength(body) }
  }

  async isAvailable(): Promise<boolean> {
    return true
  }
}
