import type { ConfigValue } from "../../ports/config-value"

/** Converts a raw document value, or returns `undefined` if it does not fit. */
export type Conversion<T> = {
  expected: string
  convert: (raw: ConfigValue) => T | undefined
}

const INTEGER = /^-?\d+$/

export const asString: Conversion<string> = {
  expected: "a string",
  convert: (raw) => {
    if (typeof raw === "string") return raw
    if (typeof raw === "number" || typeof raw === "boolean") return String(raw)

    return undefined
  },
}

export const asInt: Conversion<number> = {
  expected: "an integer",
  convert: (raw) => {
    if (typeof raw === "number") return Number.isSafeInteger(raw) ? raw : undefined
    if (typeof raw === "string" && INTEGER.test(raw.trim())) {
      const value = Number(raw.trim())

      return Number.isSafeInteger(value) ? value : undefined
    }

    return undefined
  },
}

export const asNumber: Conversion<number> = {
  expected: "a number",
  convert: (raw) => {
    if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined
    if (typeof raw === "string" && raw.trim() !== "") {
      const value = Number(raw)

      return Number.isFinite(value) ? value : undefined
    }

    return undefined
  },
}

export const asBool: Conversion<boolean> = {
  expected: "true or false",
  convert: (raw) => {
    if (typeof raw === "boolean") return raw
    if (typeof raw === "string") {
      const lowered = raw.trim().toLowerCase()

      if (lowered === "true") return true
      if (lowered === "false") return false
    }

    return undefined
  },
}
