import { DocumentNotFound } from "../../core/errors"
import type { DocumentStore } from "../../ports/document-store"

export class MemoryDocumentStore implements DocumentStore {
  private readonly documents: Map<string, string>

  constructor(initial: Record<string, string> = {}) {
    this.documents = new Map(Object.entries(initial))
  }

  async read(name: string): Promise<string | null> {
    return this.documents.get(name) ?? null
  }

  async write(name: string, contents: string): Promise<void> {
    this.documents.set(name, contents)
  }

  async exists(name: string): Promise<boolean> {
    return this.documents.has(name)
  }

  async copy(from: string, to: string): Promise<void> {
    const contents = this.documents.get(from)

    if (contents === undefined) {
      throw DocumentNotFound.create(`${from} does not exist`, {
        context: { name: from },
      })
    }

    this.documents.set(to, contents)
  }

  /** Names of every stored document, sorted. */
  names(): string[] {
    return [...this.documents.keys()].sort()
  }
}
