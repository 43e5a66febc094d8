import * as fs from "node:fs/promises"
import * as path from "node:path"

import { DocumentNameInvalid, DocumentNotFound } from "../../core/errors"
import { isNotFoundError } from "../../core/utils/is-not-found"
import type { DocumentStore } from "../../ports/document-store"

export interface FsDocumentStoreOptions {
  /** Data directory; created on first write. */
  dir: string
}

export class FsDocumentStore implements DocumentStore {
  private readonly dir: string

  constructor(options: FsDocumentStoreOptions) {
    this.dir = path.resolve(options.dir)
  }

  async read(name: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(name), "utf-8")
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }
  }

  async write(name: string, contents: string): Promise<void> {
    const filePath = this.resolve(name)

    await fs.mkdir(this.dir, { recursive: true })
    await fs.writeFile(filePath, contents, "utf-8")
  }

  async exists(name: string): Promise<boolean> {
    const filePath = this.resolve(name)

    try {
      await fs.access(filePath)
      return true
    } catch {
      return false
    }
  }

  async copy(from: string, to: string): Promise<void> {
    const target = this.resolve(to)

    try {
      await fs.copyFile(this.resolve(from), target)
    } catch (err) {
      if (isNotFoundError(err)) {
        throw DocumentNotFound.create(`${from} does not exist`, {
          context: { name: from },
          cause: err,
        })
      }
      throw err
    }
  }

  private resolve(name: string): string {
    if (name === "" || path.basename(name) !== name) {
      throw DocumentNameInvalid.create(`Invalid document name: ${name}`, { context: { name } })
    }

    return path.join(this.dir, name)
  }
}
