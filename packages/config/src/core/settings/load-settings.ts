import { type ZodType, z } from "zod"

import { EnvSource } from "../../adapters/env/env-source"
import type { Settings } from "../../ports/settings"
import type { ConfigSource } from "../../ports/source"
import { SettingsInvalid } from "../errors"
import { ResolvedSettings } from "./settings"

export type LoadSettingsOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Applied in order; later sources win. Defaults to the process environment. */
  sources?: ConfigSource[]
}

export async function loadSettings<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadSettingsOptions<T>): Promise<Settings<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw SettingsInvalid.create(`Invalid settings:\n${z.prettifyError(result.error)}`, {
      context: { sources: [...new Set(Object.values(provenance))] },
    })
  }

  const used: Record<string, string> = {}

  for (const key of Object.keys(result.data)) {
    const source = provenance[key]

    if (source !== undefined) used[key] = source
  }

  return new ResolvedSettings<T>(result.data, used)
}
