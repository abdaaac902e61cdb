/**
 * Command-line flags for one pipeline pass.
 */

import { parseArgs } from 'util'
import { InvalidInputError } from './errors'
import { LOG_LEVELS, parseLogLevel } from './logger'
import type { LogLevel } from './logger'

export interface CliArgs {
  help: boolean
  logLevel: LogLevel
  pipeline: {
    roles: string[]
    since?: Date
    limit?: number
    runSessionClassification: boolean
    runMessageClassification: boolean
    reclassifyExistingMessages: boolean
    perSessionMessageBatchSize?: number
  }
}

export const USAGE = `Usage: convo-classify [options]

Classifies support sessions and their messages into the configured taxonomy.

Options:
  --roles <role...>                       Roles to include, repeatable or comma-separated (default: user)
  --since <iso-timestamp>                 Only consider messages at or after this time
  --limit <n>                             Max sessions to process this run
  --no-session                            Disable session-level classification
  --no-messages                           Disable message-level classification
  --reclassify-existing-messages          Classify messages that already have results
  --per-session-message-batch-size <n>    Messages per model call (default: whole session)
  --log-level <level>                     debug | info | warn | error (default: info)
  -h, --help                              Show this help
`

function positiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  if (!/^\d+$/.test(raw.trim()) || parseInt(raw, 10) <= 0) {
    throw new InvalidInputError(`${flag} must be a positive integer, got "${raw}"`, { flag, value: raw })
  }
  return parseInt(raw, 10)
}

function timestamp(flag: string, raw: string | undefined): Date | undefined {
  if (raw === undefined) return undefined
  const date = new Date(raw)
  if (isNaN(date.getTime())) {
    throw new InvalidInputError(`${flag} must be an ISO timestamp, got "${raw}"`, { flag, value: raw })
  }
  return date
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        roles: { type: 'string', multiple: true },
        since: { type: 'string' },
        limit: { type: 'string' },
        'no-session': { type: 'boolean' },
        'no-messages': { type: 'boolean' },
        'reclassify-existing-messages': { type: 'boolean' },
        'per-session-message-batch-size': { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values
  } catch (err) {
    throw new InvalidInputError(err instanceof Error ? err.message : String(err))
  }
}

function logLevel(raw: string | undefined): LogLevel {
  if (raw === undefined) return 'info'
  const normalized = raw.trim().toLowerCase()
  if (normalized !== 'warning' && !LOG_LEVELS.some((l) => l === normalized)) {
    throw new InvalidInputError(`--log-level must be one of ${LOG_LEVELS.join(', ')}; got "${raw}"`)
  }
  return parseLogLevel(normalized)
}

/**
 * @throws InvalidInputError on unknown flags or malformed values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values = readFlags(argv)

  const roles = (values.roles ?? ['user'])
    .flatMap((r) => r.split(','))
    .map((r) => r.trim())
    .filter((r) => r.length > 0)

  if (roles.length === 0) {
    throw new InvalidInputError('--roles must name at least one role')
  }

  return {
    help: values.help === true,
    logLevel: logLevel(values['log-level']),
    pipeline: {
      roles: [...new Set(roles)],
      since: timestamp('--since', values.since),
      limit: positiveInt('--limit', values.limit),
      runSessionClassification: values['no-session'] !== true,
      runMessageClassification: values['no-messages'] !== true,
      reclassifyExistingMessages: values['reclassify-existing-messages'] === true,
      perSessionMessageBatchSize: positiveInt(
        '--per-session-message-batch-size',
        values['per-session-message-batch-size'],
      ),
    },
  }
}
