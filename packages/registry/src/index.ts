export { DependencyError } from "./core/errors"
export { ServiceRegistry, ServiceRegistryToken } from "./core/service-registry"
export type {
  ServiceProvider,
  StoreEvent,
  StoreListener,
  Unsubscribe,
} from "./ports/service-provider"
export {
  type AnyToken,
  createToken,
  type Dependencies,
  type ServiceToken,
  type TokenValues,
} from "./ports/service-token"
