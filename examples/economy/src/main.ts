import { toAppError } from "@tally/errors"
import { createPinoLogger } from "@tally/logger"

import { run } from "./run"

run().catch((err: unknown) => {
  createPinoLogger().fatal("Startup failed", { err: toAppError(err) })
  process.exitCode = 1
})
