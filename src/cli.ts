import { describeError } from "@/lib/errors"
import { run } from "@/lib/cli"
import { createLogger } from "@/lib/logger"

const logger = createLogger("cli")

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    logger.error(describeError(error))
    process.exitCode = 1
  },
)
