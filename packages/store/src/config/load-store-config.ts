import type { LoggerOptions } from "@kvtree/logger"
import { z } from "zod"
import type { DatabaseOptions } from "../core/database/database"
import { storeEnvSchema } from "./schema"

export type StoreConfig = {
  database: DatabaseOptions
  logging: LoggerOptions
}

/**
 * Reads database and logging settings from environment variables.
 *
 * @throws Error listing every invalid variable.
 */
export function loadStoreConfig(
  env: Record<string, string | undefined> = process.env,
): StoreConfig {
  const result = storeEnvSchema.safeParse(env)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  const config = result.data

  return {
    database: {
      inlineBufferBytes: config.KVTREE_INLINE_BUFFER_BYTES,
      ...(config.KVTREE_TX_MAX_RETRIES !== undefined && {
        maxTransactionRetries: config.KVTREE_TX_MAX_RETRIES,
      }),
    },
    logging: {
      level: config.LOG_LEVEL,
      prettify: config.LOG_PRETTY,
    },
  }
}
