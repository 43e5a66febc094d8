import type { Dependencies, ServiceToken, TokenValues } from "./service-token"

export interface ServiceProvider<T, D extends Dependencies = Dependencies> {
  /** Services handed to `create`, in order. */
  deps: D
  create: (...deps: TokenValues<D>) => T | Promise<T>

  /** Called by `shutdown()` for instances this provider built. */
  dispose?: (instance: T) => void | Promise<void>
}

export interface StoreEvent<T = unknown> {
  token: ServiceToken<T>
  instance: T

  /** `true` when an earlier instance was stored under the same token. */
  replaced: boolean
}

export type StoreListener = (event: StoreEvent) => void

export type Unsubscribe = () => void
