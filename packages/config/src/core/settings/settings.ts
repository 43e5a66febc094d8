import type { Settings } from "../../ports/settings"

export class ResolvedSettings<T extends Record<string, unknown>> implements Settings<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }
}
