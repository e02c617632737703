import { logLevelNames } from "@kvtree/logger"
import { z } from "zod"

export const storeEnvSchema = z.object({
  KVTREE_INLINE_BUFFER_BYTES: z.coerce.number().int().min(8).max(4096).default(64),
  KVTREE_TX_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type StoreEnv = z.infer<typeof storeEnvSchema>
