/**
 * Reader configuration.
 *
 * Options may come from code or from a JSON file; both pass through the same
 * schema, and absent keys fall back to the defaults below.
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import { ConfigError } from './errors'
import { initLogger, setLogLevel } from './logger'
import type { LoadOptions } from './dump-collection'
import { BUILTIN_ARRAY_FORMULAS } from './dump-layout'

// ============================================================================
// Schemas
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent'])

export const UnsupportedArrayPolicySchema = z.enum(['abort', 'skip'])

/** Array name → element count offset over the zone count. */
export const ArrayFormulasSchema = z.record(
  z.string().regex(/^\S+$/, 'array names cannot contain whitespace'),
  z.number().int().nonnegative(),
).refine(
  formulas => Object.keys(formulas).every(name => !Object.prototype.hasOwnProperty.call(BUILTIN_ARRAY_FORMULAS, name)),
  { message: 'built-in array formulas cannot be redefined' },
)

export const ReaderConfigSchema = z.object({
  strict: z.boolean().default(false),
  unsupportedArrays: UnsupportedArrayPolicySchema.default('abort'),
  arrayFormulas: ArrayFormulasSchema.default({}),
  logLevel: LogLevelSchema.default('info'),
  logDir: z.string().min(1).optional(),
}).strict()

export type ReaderConfig = z.infer<typeof ReaderConfigSchema>
export type ReaderConfigInput = z.input<typeof ReaderConfigSchema>

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(err: z.ZodError): string {
  return err.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseConfig(raw: unknown): ReaderConfig {
  const result = ReaderConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigError(`Invalid reader configuration: ${formatIssues(result.error)}`)
  }
  return result.data
}

export function loadConfigFile(filepath: string): ReaderConfig {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filepath, 'utf-8'))
  } catch (e) {
    throw new ConfigError(`Cannot read configuration ${filepath}`, { cause: e })
  }
  return parseConfig(raw)
}

/** Apply the logging settings and return the matching load options. */
export function applyConfig(config: ReaderConfig): LoadOptions {
  setLogLevel(config.logLevel)
  if (config.logDir) initLogger(config.logDir)
  return {
    strict: config.strict,
    unsupportedArrays: config.unsupportedArrays,
    arrayFormulas: config.arrayFormulas,
  }
}
