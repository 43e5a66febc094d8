declare const serviceType: unique symbol

/**
 * Typed handle for a service in a {@link ServiceRegistry}.
 *
 * Tokens compare by identity; the name only shows up in errors and logs.
 */
export interface ServiceToken<T> {
  readonly name: string
  readonly key: string
  readonly [serviceType]?: T
}

export type AnyToken = ServiceToken<unknown>

export type Dependencies = readonly AnyToken[]

/** Maps a tuple of tokens to the tuple of values they resolve to. */
export type TokenValues<D extends Dependencies> = {
  -readonly [K in keyof D]: D[K] extends ServiceToken<infer T> ? T : never
}

let sequence = 0

export function createToken<T>(name: string): ServiceToken<T> {
  sequence += 1

  return Object.freeze({ name, key: `${name}#${sequence}` })
}
