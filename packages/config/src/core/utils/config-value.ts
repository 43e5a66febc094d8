import type { ConfigMap, ConfigValue } from "../../ports/config-value"
import { ConfigException } from "../errors"

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isConfigMap(value: ConfigValue | undefined): value is ConfigMap {
  return isRecord(value)
}

export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "a list"
  if (typeof value === "object") return isPlainPrototype(value) ? "a map" : "an object"
  if (typeof value === "function") return "a function"
  if (typeof value === "string") return JSON.stringify(value)

  return String(value)
}

/**
 * Deep-copies `value` into a {@link ConfigValue}, rejecting anything a config
 * document cannot hold (functions, dates, class instances, ...).
 */
export function toConfigValue(value: unknown, path = ""): ConfigValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toConfigValue(item, `${path}[${index}]`))
  }

  if (isRecord(value) && isPlainPrototype(value)) {
    return toConfigMap(value, path)
  }

  throw new ConfigException(`Unsupported value at ${path || "<root>"}: ${describeValue(value)}`, {
    context: { path },
  })
}

export function toConfigMap(value: Record<string, unknown>, path = ""): ConfigMap {
  const map: ConfigMap = {}

  for (const [key, item] of Object.entries(value)) {
    setEntry(map, key, toConfigValue(item, path ? `${path}.${key}` : key))
  }

  return map
}

/** Assigns an own, enumerable entry. A `__proto__` key stays a plain key. */
export function setEntry(map: ConfigMap, key: string, value: ConfigValue): void {
  Object.defineProperty(map, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

function isPlainPrototype(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
