import type { ConfigMap, ConfigValue } from "../../ports/config-value"
import type { ConfigDocument, ConfigRepair } from "../document/config-document"
import { describeValue, isConfigMap, setEntry } from "../utils/config-value"
import { asBool, asInt, asNumber, asString, type Conversion } from "./conversions"

export const DOC_PREFIX = "#"

/**
 * Cursor over one map of a {@link ConfigDocument}.
 *
 * Reads never fail: a missing or malformed value is replaced by the caller's
 * default, written back with its documentation, and recorded as a repair.
 * Running the same reads over an empty document therefore generates a
 * complete, documented file.
 *
 * @example
 * ```ts
 * const transfer = parser.enter("transfer", "Settings for money transfer commands.")
 * const rate = transfer.expectNumber("rate", 1, "How much of the sent money arrives.")
 * ```
 */
export class Parser {
  private constructor(
    private readonly document: ConfigDocument,
    private readonly node: ConfigMap,
    private readonly path: readonly string[],
  ) {}

  static over(document: ConfigDocument): Parser {
    return new Parser(document, document.root, [])
  }

  expectString(key: string, fallback: string, doc: string): string {
    return this.expect(key, fallback, doc, asString)
  }

  expectInt(key: string, fallback: number, doc: string): number {
    return this.expect(key, fallback, doc, asInt)
  }

  expectNumber(key: string, fallback: number, doc: string): number {
    return this.expect(key, fallback, doc, asNumber)
  }

  expectBool(key: string, fallback: boolean, doc: string): boolean {
    return this.expect(key, fallback, doc, asBool)
  }

  /**
   * Overwrites `key` after a read returned a value that is well-typed but not
   * acceptable. `reason` is recorded as the repair message.
   */
  setValue<T extends ConfigValue>(key: string, value: T, reason: string): T {
    setEntry(this.node, key, value)
    this.document.recordRepair(this.keyPath(key), reason)

    return value
  }

  /** Records `message` as a repair of this map and returns `fallback`. */
  failSafe<T>(fallback: T, message: string): T {
    this.document.recordRepair(this.getPath(), message)

    return fallback
  }

  /**
   * Child parser over the map at `key`, created empty if missing. `doc` is
   * written as `#key` unless a loaded document already has one.
   */
  enter(key: string, doc: string): Parser {
    const existing = this.read(key)
    const docKey = DOC_PREFIX + key

    // a loaded document keeps the user's own note
    if (doc !== "" && (this.document.failSafe || !Object.hasOwn(this.node, docKey))) {
      setEntry(this.node, docKey, doc)
    }

    if (isConfigMap(existing)) {
      return new Parser(this.document, existing, [...this.path, key])
    }

    const child: ConfigMap = {}

    setEntry(this.node, key, child)
    this.document.recordRepair(
      this.keyPath(key),
      existing === undefined
        ? `Missing section "${key}"`
        : `Expected a map at "${key}", got ${describeValue(existing)}`,
    )

    return new Parser(this.document, child, [...this.path, key])
  }

  /** Keys of this map in document order, documentation keys excluded. */
  getKeys(): string[] {
    return Object.keys(this.node).filter((key) => !key.startsWith(DOC_PREFIX))
  }

  /** `true` when the document is being generated from scratch. */
  isFailSafe(): boolean {
    return this.document.failSafe
  }

  isRepaired(): boolean {
    return this.document.repaired
  }

  getRepairs(): readonly ConfigRepair[] {
    return this.document.getRepairs()
  }

  /** Dotted path of this map from the root ("" at the root). */
  getPath(): string {
    return this.path.join(".")
  }

  /** Copy of the whole document, documentation included. */
  getFullConfig(): ConfigMap {
    return this.document.snapshot()
  }

  private expect<T extends string | number | boolean>(
    key: string,
    fallback: T,
    doc: string,
    conversion: Conversion<T>,
  ): T {
    const raw = this.read(key)

    if (raw !== undefined) {
      const value = conversion.convert(raw)

      if (value !== undefined) return value
    }

    if (doc !== "") {
      setEntry(this.node, DOC_PREFIX + key, doc)
    }
    setEntry(this.node, key, fallback)
    this.document.recordRepair(
      this.keyPath(key),
      raw === undefined
        ? `Missing key "${key}"`
        : `Expected ${conversion.expected} at "${key}", got ${describeValue(raw)}`,
    )

    return fallback
  }

  private read(key: string): ConfigValue | undefined {
    return Object.hasOwn(this.node, key) ? this.node[key] : undefined
  }

  private keyPath(key: string): string {
    return [...this.path, key].join(".")
  }
}
