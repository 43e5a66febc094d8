import { CORE_SCHEMA, dump, load } from "js-yaml"

import type { ConfigMap } from "../../ports/config-value"
import { ConfigException } from "../errors"
import { isRecord, toConfigMap } from "../utils/config-value"

/**
 * Parses a stored document. Blank or comment-only text yields `null`, meaning
 * "no document yet".
 *
 * @throws ConfigException if the text is not YAML or its root is not a map.
 */
export function parseYamlDocument(text: string, file: string): ConfigMap | null {
  let parsed: unknown

  try {
    parsed = load(text, { schema: CORE_SCHEMA, filename: file })
  } catch (err) {
    throw new ConfigException(`${file} is not valid YAML`, { cause: err, context: { file } })
  }

  if (parsed === undefined || parsed === null) return null

  if (!isRecord(parsed)) {
    throw new ConfigException(`${file} must contain a map at the top level`, {
      context: { file },
    })
  }

  return toConfigMap(parsed)
}

export function stringifyYamlDocument(document: ConfigMap): string {
  return dump(document, {
    schema: CORE_SCHEMA,
    lineWidth: -1,
    noRefs: true,
  })
}
