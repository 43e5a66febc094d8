import type { ConfigLoader, DocumentStore } from "@tally/config"
import type { Logger } from "@tally/logger"
import { createToken } from "@tally/registry"

export const LoggerToken = createToken<Logger>("Logger")
export const DocumentStoreToken = createToken<DocumentStore>("DocumentStore")
export const ConfigLoaderToken = createToken<ConfigLoader>("ConfigLoader")
