/**
 * Zod validation schemas for the envkeeper configuration file.
 */

import { z } from 'zod'

/** Upper bound for `confirm_attempts` */
export const MAX_CONFIRM_ATTEMPTS = 10

export const EnvkeeperConfigSchema = z
  .object({
    /** Env file to edit; relative paths resolve against the working directory */
    env_file: z.string().min(1),
    /** Re-entry attempts granted before an overwrite is rejected */
    confirm_attempts: z.number().int().min(1).max(MAX_CONFIRM_ATTEMPTS),
  })
  .strict()

export type EnvkeeperConfig = z.infer<typeof EnvkeeperConfigSchema>

export const PartialEnvkeeperConfigSchema = EnvkeeperConfigSchema.partial()

export type PartialEnvkeeperConfig = z.infer<typeof PartialEnvkeeperConfigSchema>
