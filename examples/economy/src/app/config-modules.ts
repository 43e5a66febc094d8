import type { ConfigModule } from "@tally/config"
import { SchemaConfig } from "@tally/schema"

import { TransferConfig } from "../domains/transfer/config/transfer-config"

/** Every module `config.yml` holds. A module missing here cannot be loaded. */
export const configModules: readonly ConfigModule[] = [SchemaConfig, TransferConfig]

export const CONFIG_HEADER = `Economy settings.
Invalid values are replaced with defaults when the server starts.
If the file cannot be read at all, it is moved to config.yml.old and generated again.`
