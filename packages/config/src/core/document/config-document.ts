import type { ConfigMap } from "../../ports/config-value"
import { toConfigMap } from "../utils/config-value"

export interface ConfigRepair {
  /** Dotted key path the repair applies to ("" for the root). */
  path: string
  message: string
}

/**
 * The tree a load pass parses, plus what the pass changed in it.
 *
 * Owned by one load pass; parsers write defaults into `root` in place.
 */
export class ConfigDocument {
  private readonly repairs: ConfigRepair[] = []

  private constructor(
    readonly root: ConfigMap,
    readonly failSafe: boolean,
  ) {}

  /** Wraps a document read from storage. */
  static loaded(root: ConfigMap): ConfigDocument {
    return new ConfigDocument(root, false)
  }

  /** A blank document to generate every key from defaults. */
  static failSafe(header?: string): ConfigDocument {
    return new ConfigDocument(header ? { "#": header } : {}, true)
  }

  get repaired(): boolean {
    return this.repairs.length > 0
  }

  recordRepair(path: string, message: string): void {
    this.repairs.push({ path, message })
  }

  getRepairs(): readonly ConfigRepair[] {
    return this.repairs.map((repair) => ({ ...repair }))
  }

  snapshot(): ConfigMap {
    return toConfigMap(this.root)
  }
}
