export type ConfigScalar = string | number | boolean | null

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMap

/**
 * A map node of a config document.
 *
 * Keys starting with `#` hold documentation for the sibling key of the same
 * name (`#command` documents `command`); the root key `#` is the file header.
 */
export interface ConfigMap {
  [key: string]: ConfigValue
}
