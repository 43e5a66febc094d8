/**
 * Flat store of named text documents (`config.yml`, `config.yml.old`, ...).
 */
export interface DocumentStore {
  /** Contents of `name`, or `null` if it does not exist. */
  read(name: string): Promise<string | null>

  /** Create or overwrite `name`. */
  write(name: string, contents: string): Promise<void>

  exists(name: string): Promise<boolean>

  /** Copy `from` over `to`. Fails with code "document_not_found" if `from` is missing. */
  copy(from: string, to: string): Promise<void>
}
