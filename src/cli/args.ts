/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, InvalidArgumentError } from 'commander'
import type { ParseKind } from '../caching/key'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'set' | 'unset'
export type LlmAction = 'check' | 'ping'
export type CacheAction = 'status' | 'cleanup' | 'clear'
export type MonitorAction = 'import' | 'list' | 'stats' | 'cleanup'

export interface CLIArgs {
  command: string
  /** For parse: input file; for monitor import: feed file */
  input: string
  quiet: boolean
  verbose: boolean
  noCache: boolean
  cacheDir: string | undefined
  dataDir: string | undefined
  configFile: string | undefined
  /** Overrides llmProvider for this run */
  provider: string | undefined
  /** For parse: document type */
  parseKind: ParseKind
  /** For parse: try the other provider when the configured one is down */
  fallback: boolean
  jsonOutput: string | undefined
  llmAction: LlmAction
  cacheAction: CacheAction
  monitorAction: MonitorAction
  keywords: string | undefined
  city: string | undefined
  pageLimit: number | undefined
  onlyToday: boolean | undefined
  /** For monitor import: parse each new job description */
  analyze: boolean
  /** For monitor list: only jobs first seen in the last N days */
  days: number | undefined
  /** For monitor cleanup: overrides monitorRetentionDays */
  retentionDays: number | undefined
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Parse resumes and job descriptions with an LLM, and monitor a job board.

Examples:
  $ job-match parse resume.txt --type resume
  $ job-match parse jd.txt --provider cloud
  $ job-match llm check
  $ job-match monitor import ./crawl/jobs.json --analyze
  $ job-match cache status`

function positiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function createProgram(): Command {
  const program = new Command()
    .name('job-match')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--no-cache', 'Skip the parse cache')
    .option('--cache-dir <dir>', 'Custom cache directory (or set JOB_MATCH_CACHE_DIR)')
    .option('--data-dir <dir>', 'Custom data directory (or set JOB_MATCH_DATA_DIR)')
    .option('--config-file <path>', 'Config file path (or set JOB_MATCH_CONFIG)')

  // ============ PARSE ============
  program
    .command('parse')
    .description('Extract structured data from a resume or job description')
    .argument('<input>', 'Text file to parse')
    .option('-t, --type <type>', 'Document type: resume or jd', 'jd')
    .option('-p, --provider <name>', 'LLM provider for this run: local or cloud')
    .option('--fallback', 'Use the other provider if the configured one is unreachable')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')

  // ============ LLM ============
  program
    .command('llm')
    .description('Check LLM provider connectivity')
    .argument('[action]', 'Action: check (default), ping')
    .option('-p, --provider <name>', 'Provider to ping: local or cloud')

  // ============ CACHE ============
  program
    .command('cache')
    .description('Inspect or prune the parse cache')
    .argument('[action]', 'Action: status (default), cleanup, clear')

  // ============ MONITOR ============
  program
    .command('monitor')
    .description('Track job postings and detect new ones')
    .argument('[action]', 'Action: import, list (default), stats, cleanup')
    .argument('[feed]', 'For import: JSON file exported by the crawler')
    .option('-k, --keywords <keywords>', 'Search keywords (overrides monitorKeywords)')
    .option('-c, --city <city>', 'Search city (overrides monitorCity)')
    .option('--pages <num>', 'Result pages to crawl', positiveInt)
    .option('--only-today', 'Only keep postings published today')
    .option('--analyze', 'Parse each new job description with the LLM')
    .option('--days <num>', 'For list: only jobs first seen in the last N days', positiveInt)
    .option('--retention-days <num>', 'For cleanup: days of jobs to keep', positiveInt)
    .option('--json [file]', 'For list: output as JSON (to file if specified, otherwise stdout)')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  job-match config                                 List current settings
  job-match config set llmProvider cloud           Use the cloud provider
  job-match config set cloudApiKey '\${LLM_API_KEY}'  Read the key from the environment
  job-match config unset cacheDir                  Remove custom cache dir`
    )

  return program
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    quiet: opts['quiet'] === true,
    verbose: opts['verbose'] === true,
    noCache: opts['cache'] === false,
    cacheDir: optionalString(opts['cacheDir']),
    dataDir: optionalString(opts['dataDir']),
    configFile: optionalString(opts['configFile']),
    provider: optionalString(opts['provider']),
    parseKind: pick(opts['type'], ['resume', 'jd'], 'jd'),
    fallback: opts['fallback'] === true,
    jsonOutput: opts['json'] === true ? 'stdout' : optionalString(opts['json']),
    llmAction: 'check',
    cacheAction: 'status',
    monitorAction: 'list',
    keywords: optionalString(opts['keywords']),
    city: optionalString(opts['city']),
    pageLimit: optionalNumber(opts['pages']),
    onlyToday: opts['onlyToday'] === true ? true : undefined,
    analyze: opts['analyze'] === true,
    days: optionalNumber(opts['days']),
    retentionDays: optionalNumber(opts['retentionDays']),
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

/**
 * Attach action handlers that capture the parsed args of whichever
 * subcommand runs.
 */
function captureArgs(program: Command): () => CLIArgs | null {
  let result: CLIArgs | null = null

  for (const cmd of program.commands) {
    const name = cmd.name()
    cmd.action((first?: string, second?: string, third?: string) => {
      // Use optsWithGlobals() to include global options from parent program
      const base = buildCLIArgs(name, '', cmd.optsWithGlobals())
      switch (name) {
        case 'parse':
          result = { ...base, input: first ?? '' }
          break
        case 'llm':
          result = { ...base, llmAction: pick(first, ['check', 'ping'], 'check') }
          break
        case 'cache':
          result = { ...base, cacheAction: pick(first, ['status', 'cleanup', 'clear'], 'status') }
          break
        case 'monitor':
          result = {
            ...base,
            monitorAction: pick(first, ['import', 'list', 'stats', 'cleanup'], 'list'),
            input: second ?? ''
          }
          break
        case 'config':
          result = {
            ...base,
            configAction: pick(first, ['list', 'set', 'unset'], 'list'),
            configKey: second,
            configValue: third
          }
          break
        default:
          result = base
      }
    })
  }

  return () => result
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()
  const captured = captureArgs(program)

  program.parse()

  return captured() ?? program.help()
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()
  const captured = captureArgs(program)

  if (!exitOnHelp) {
    // Subcommands copy these settings when created, so set them on each
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => {}, writeErr: () => {} })
    }
  }

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help, version and invalid input
    if (exitOnHelp) throw error
  }

  return captured() ?? buildCLIArgs('help', '', {})
}
