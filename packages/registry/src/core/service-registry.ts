import { MemorySingleflight } from "@tally/singleflight"

import type {
  ServiceProvider,
  StoreListener,
  Unsubscribe,
} from "../ports/service-provider"
import {
  type AnyToken,
  createToken,
  type Dependencies,
  type ServiceToken,
  type TokenValues,
} from "../ports/service-token"
import { DependencyError } from "./errors"

interface RegisteredProvider {
  deps: Dependencies
  build: () => Promise<void>
}

/**
 * Process-wide service registry.
 *
 * Instances are either stored directly or built on first request from a
 * provider. Concurrent requests for a service that is still being built share
 * one construction. The registry stores itself under {@link ServiceRegistryToken}.
 *
 * @example
 * ```ts
 * const registry = new ServiceRegistry()
 *
 * registry.store(LoggerToken, logger)
 * registry.provide(ConfigLoaderToken, {
 *   deps: [LoggerToken, DocumentStoreToken],
 *   create: (logger, store) => new ConfigLoader({ logger, store, modules }),
 * })
 *
 * const [loader] = await registry.resolveDependencies([ConfigLoaderToken])
 * ```
 */
export class ServiceRegistry {
  private readonly instances = new Map<AnyToken, unknown>()
  private readonly providers = new Map<AnyToken, RegisteredProvider>()
  private readonly listeners = new Set<StoreListener>()
  private readonly flights = new MemorySingleflight<void>()
  private disposers: Array<() => void | Promise<void>> = []

  constructor() {
    this.store(ServiceRegistryToken, this)
  }

  store<T>(token: ServiceToken<T>, instance: T): void {
    const replaced = this.instances.has(token)

    this.instances.set(token, instance)

    for (const listener of [...this.listeners]) {
      listener({ token, instance, replaced })
    }
  }

  /** The stored instance, without constructing anything. */
  fetch<T>(token: ServiceToken<T>): T | undefined {
    // keyed by token, so the value has the token's type
    return this.instances.get(token) as T | undefined
  }

  provide<T, const D extends Dependencies>(
    token: ServiceToken<T>,
    provider: ServiceProvider<T, D>,
  ): void {
    this.providers.set(token, {
      deps: provider.deps,
      build: async () => {
        const values = await this.resolveDependencies(provider.deps)
        const instance = await provider.create(...values)
        const { dispose } = provider

        this.store(token, instance)

        if (dispose) {
          this.disposers.push(() => dispose(instance))
        }
      },
    })
  }

  async resolveDependencies<const D extends Dependencies>(deps: D): Promise<TokenValues<D>> {
    const values = await Promise.all(deps.map((dep) => this.resolve(dep)))

    // resolve() returns each token's own type, in order
    return values as TokenValues<D>
  }

  get<T>(token: ServiceToken<T>): Promise<T> {
    return this.resolve(token)
  }

  async call<const D extends Dependencies, R>(
    deps: D,
    fn: (...values: TokenValues<D>) => R | Promise<R>,
  ): Promise<R> {
    const values = await this.resolveDependencies(deps)

    return fn(...values)
  }

  onStore(listener: StoreListener): Unsubscribe {
    this.listeners.add(listener)

    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Runs provider `dispose` hooks, most recently built first.
   *
   * Every hook runs even if an earlier one throws.
   */
  async shutdown(): Promise<void> {
    const disposers = this.disposers.reverse()
    const failures: unknown[] = []

    this.disposers = []

    for (const dispose of disposers) {
      try {
        await dispose()
      } catch (err) {
        failures.push(err)
      }
    }

    if (failures.length > 0) {
      throw new DependencyError(`${failures.length} service(s) failed to dispose`, {
        cause: new AggregateError(failures),
      })
    }
  }

  private async resolve<T>(token: ServiceToken<T>): Promise<T> {
    if (!this.instances.has(token)) {
      const provider = this.providers.get(token)

      if (!provider) {
        throw new DependencyError(`${token.name} is not registered`, {
          context: { service: token.name },
        })
      }

      this.assertAcyclic(token, [])
      await this.flights.run(token.key, provider.build)
    }

    // keyed by token, so the value has the token's type
    return this.instances.get(token) as T
  }

  private assertAcyclic(token: AnyToken, path: readonly AnyToken[]): void {
    if (path.includes(token)) {
      const cycle = [...path, token].map((t) => t.name)

      throw new DependencyError(`Dependency cycle: ${cycle.join(" -> ")}`, {
        context: { cycle },
      })
    }

    const provider = this.instances.has(token) ? undefined : this.providers.get(token)

    for (const dep of provider?.deps ?? []) {
      this.assertAcyclic(dep, [...path, token])
    }
  }
}

export const ServiceRegistryToken = createToken<ServiceRegistry>("ServiceRegistry")
